import { QueryFailedError } from 'typeorm';
import { FakeClock, testSettings } from '../common/config/attendance-settings.testing';
import { AttendanceService } from './attendance.service';

const TOKEN = 'c'.repeat(32);

function openSession() {
  return {
    id: 'session-1',
    courseId: 'course-1',
    course: { id: 'course-1', code: 'CS101', title: 'Intro to Programming' },
    startTime: new Date('2025-03-10T08:00:00.000Z'),
    expiresAt: new Date('2025-03-10T08:15:00.000Z'),
    endTime: null,
    isOpen: true,
    token: TOKEN,
  };
}

describe('AttendanceService', () => {
  function createService() {
    const clock = new FakeClock(new Date('2025-03-10T08:05:00.000Z'));
    const attendanceRepo = {
      findOne: jest.fn(async (): Promise<{ id: string } | null> => null),
      insert: jest.fn(async () => ({ identifiers: [{ id: 'att-1' }] })),
    };
    const sessionsService = {
      findByToken: jest.fn(async (token: string) => (token === TOKEN ? openSession() : null)),
    };
    const service = new AttendanceService(
      attendanceRepo as any,
      sessionsService as any,
      testSettings(),
      clock
    );
    return { service, clock, attendanceRepo, sessionsService };
  }

  it('records a typed check-in with normalized fields and the server time', async () => {
    const { service, attendanceRepo } = createService();

    const result = await service.record(TOKEN, {
      email: ' Ana.Lopez@Uni.TEST',
      name: ' Ana   Lopez ',
      source: 'typed',
    });

    expect(attendanceRepo.insert).toHaveBeenCalledWith({
      sessionId: 'session-1',
      studentName: 'Ana Lopez',
      studentEmail: 'ana.lopez@uni.test',
      createdAt: new Date('2025-03-10T08:05:00.000Z'),
    });
    expect(result).toEqual({
      status: 'recorded',
      message: 'Attendance recorded. Thank you!',
      sessionId: 'session-1',
      studentName: 'Ana Lopez',
      studentEmail: 'ana.lopez@uni.test',
      checkedInAt: '2025-03-10T08:05:00.000Z',
    });
  });

  it('answers already_recorded without writing when the student is on the list', async () => {
    const { service, attendanceRepo } = createService();
    attendanceRepo.findOne.mockResolvedValueOnce({ id: 'att-1' });

    const result = await service.record(TOKEN, {
      email: 'ana.lopez@uni.test',
      name: 'Ana Lopez',
      source: 'typed',
    });

    expect(result).toEqual({
      status: 'already_recorded',
      message: 'You are already recorded for this session.',
      sessionId: 'session-1',
      studentEmail: 'ana.lopez@uni.test',
    });
    expect(attendanceRepo.insert).not.toHaveBeenCalled();
  });

  it('maps a concurrent duplicate insert to already_recorded', async () => {
    const { service, attendanceRepo } = createService();
    attendanceRepo.insert.mockRejectedValueOnce(
      new QueryFailedError(
        'INSERT INTO attendance',
        [],
        Object.assign(new Error('Duplicate entry'), { code: 'ER_DUP_ENTRY' })
      )
    );

    const result = await service.record(TOKEN, {
      email: 'ana.lopez@uni.test',
      name: 'Ana Lopez',
      source: 'typed',
    });

    expect(result.status).toBe('already_recorded');
  });

  it('propagates other insert failures', async () => {
    const { service, attendanceRepo } = createService();
    attendanceRepo.insert.mockRejectedValueOnce(new Error('connection lost'));

    await expect(
      service.record(TOKEN, { email: 'ana@uni.test', name: 'Ana', source: 'typed' })
    ).rejects.toThrow('connection lost');
  });

  it('rejects an unknown token', async () => {
    const { service } = createService();
    expect(
      await service.record('missing', { email: 'ana@uni.test', name: 'Ana', source: 'typed' })
    ).toEqual({ status: 'rejected', reason: 'not_found', message: 'Invalid session token.' });
  });

  it('rejects check-ins after the expiry and accepts them at the expiry instant', async () => {
    const { service, clock } = createService();
    const claim = { email: 'ana@uni.test', name: 'Ana', source: 'typed' as const };

    clock.set('2025-03-10T08:15:00.000Z');
    expect((await service.record(TOKEN, claim)).status).toBe('recorded');

    clock.set('2025-03-10T08:20:00.000Z');
    expect(await service.record(TOKEN, claim)).toEqual({
      status: 'rejected',
      reason: 'expired',
      message: 'This session has expired.',
    });
  });

  it('rejects a closed session even before its expiry', async () => {
    const { service, sessionsService } = createService();
    sessionsService.findByToken.mockResolvedValueOnce({ ...openSession(), isOpen: false });

    const result = await service.record(TOKEN, {
      email: 'ana@uni.test',
      name: 'Ana',
      source: 'typed',
    });

    expect(result).toEqual({
      status: 'rejected',
      reason: 'closed',
      message: 'This session is closed.',
    });
  });

  it('names the institutional domain when a typed email is rejected', async () => {
    const { service } = createService();
    const result = await service.record(TOKEN, {
      email: 'ana@gmail.com',
      name: 'Ana',
      source: 'typed',
    });
    expect(result).toEqual({
      status: 'rejected',
      reason: 'invalid_email',
      message: 'Email must be a valid @uni.test address.',
    });
  });

  it('describes a session in the caller zone', async () => {
    const { service } = createService();
    expect(await service.describeSession(TOKEN, 'Europe/Athens')).toEqual({
      validity: 'ok',
      courseCode: 'CS101',
      courseTitle: 'Intro to Programming',
      expiresAt: '2025-03-10T08:15:00.000Z',
      expiresAtLocal: '2025-03-10 10:15:00',
      timeZone: 'Europe/Athens',
    });
    expect((await service.describeSession('missing', null)).validity).toBe('not_found');
  });
});
