import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { FakeClock, testSettings } from '../common/config/attendance-settings.testing';
import { AttendanceSessionEntity } from './attendance-session.entity';
import { SessionsService } from './sessions.service';

const T = '2025-03-10T08:00:00.000Z';
const COURSE = { id: 'course-1', code: 'CS101', title: 'Intro to Programming' };

function duplicateToken() {
  return new QueryFailedError(
    'INSERT INTO attendance_sessions',
    [],
    Object.assign(new Error('Duplicate entry'), { code: 'ER_DUP_ENTRY' })
  );
}

describe('SessionsService', () => {
  function createService() {
    const clock = new FakeClock(new Date(T));
    const sessionsRepo = {
      create: jest.fn((data: Partial<AttendanceSessionEntity>) => ({ ...data })),
      save: jest.fn(async (data: Partial<AttendanceSessionEntity>) => ({
        id: 'session-1',
        ...data,
      })),
      findOne: jest.fn(),
      find: jest.fn(),
    };
    const attendanceRepo = { count: jest.fn(async () => 0) };
    const coursesService = {
      getByIdOrThrow: jest.fn(async () => COURSE),
      canManageCourse: jest.fn(async () => true),
    };
    let issued = 0;
    const tokenIssuer = {
      issue: jest.fn(() => {
        issued++;
        return `${issued}`.padStart(32, 'a');
      }),
    };
    const service = new SessionsService(
      sessionsRepo as any,
      attendanceRepo as any,
      coursesService as any,
      tokenIssuer,
      testSettings(),
      clock
    );
    return { service, clock, sessionsRepo, attendanceRepo, coursesService, tokenIssuer };
  }

  function storedSession(overrides: Partial<AttendanceSessionEntity> = {}) {
    return {
      id: 'session-1',
      courseId: COURSE.id,
      course: COURSE,
      startTime: new Date(T),
      expiresAt: new Date('2025-03-10T08:15:00.000Z'),
      endTime: null,
      isOpen: true,
      token: 'f'.repeat(32),
      ...overrides,
    };
  }

  it('open uses the default duration and builds the check-in link', async () => {
    const { service, sessionsRepo } = createService();

    const session = await service.open('prof@uni.test', COURSE.id, undefined, 'Europe/Athens');

    expect(sessionsRepo.create).toHaveBeenCalledWith({
      startTime: new Date(T),
      expiresAt: new Date('2025-03-10T08:15:00.000Z'),
      endTime: null,
      isOpen: true,
      courseId: COURSE.id,
      token: 'aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa1',
    });
    expect(session).toMatchObject({
      id: 'session-1',
      courseCode: 'CS101',
      state: 'OPEN',
      startTime: T,
      expiresAt: '2025-03-10T08:15:00.000Z',
      startTimeLocal: '2025-03-10 10:00:00',
      expiresAtLocal: '2025-03-10 10:15:00',
      timeZone: 'Europe/Athens',
      checkInUrl:
        'https://attendance.uni.test/?session=aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa1&autocheckin=1',
      checkIns: 0,
    });
  });

  it('open falls back to the display zone without a caller zone', async () => {
    const { service } = createService();
    const session = await service.open('prof@uni.test', COURSE.id, 30, null);
    expect(session.timeZone).toBe('UTC');
    expect(session.expiresAtLocal).toBe('2025-03-10 08:30:00');
  });

  it('open rejects durations outside the bounds', async () => {
    const { service, sessionsRepo } = createService();
    await expect(service.open('prof@uni.test', COURSE.id, 4, null)).rejects.toBeInstanceOf(
      BadRequestException
    );
    await expect(service.open('prof@uni.test', COURSE.id, 241, null)).rejects.toThrow(
      'Duration must be a whole number of minutes between 5 and 240.'
    );
    expect(sessionsRepo.save).not.toHaveBeenCalled();
  });

  it('open refuses instructors not assigned to the course', async () => {
    const { service, coursesService } = createService();
    coursesService.canManageCourse.mockResolvedValue(false);
    await expect(service.open('other@uni.test', COURSE.id, 15, null)).rejects.toBeInstanceOf(
      ForbiddenException
    );
  });

  it('open retries with a fresh token after a collision', async () => {
    const { service, sessionsRepo, tokenIssuer } = createService();
    sessionsRepo.save.mockRejectedValueOnce(duplicateToken());

    const session = await service.open('prof@uni.test', COURSE.id, 15, null);

    expect(tokenIssuer.issue).toHaveBeenCalledTimes(2);
    expect(session.checkInUrl).toContain('session=aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa2&');
  });

  it('open fails loudly once every attempt collided', async () => {
    const { service, sessionsRepo } = createService();
    sessionsRepo.save.mockRejectedValue(duplicateToken());

    await expect(service.open('prof@uni.test', COURSE.id, 15, null)).rejects.toBeInstanceOf(
      ServiceUnavailableException
    );
    expect(sessionsRepo.save).toHaveBeenCalledTimes(3);
  });

  it('open does not retry other database errors', async () => {
    const { service, sessionsRepo } = createService();
    sessionsRepo.save.mockRejectedValue(new Error('connection lost'));

    await expect(service.open('prof@uni.test', COURSE.id, 15, null)).rejects.toThrow(
      'connection lost'
    );
    expect(sessionsRepo.save).toHaveBeenCalledTimes(1);
  });

  it('extend after expiry counts from now', async () => {
    const { service, clock, sessionsRepo } = createService();
    sessionsRepo.findOne.mockResolvedValue(storedSession());
    clock.set('2025-03-10T08:40:00.000Z');

    const session = await service.extend('prof@uni.test', 'session-1', undefined, null);

    expect(session.expiresAt).toBe('2025-03-10T08:50:00.000Z');
    expect(session.state).toBe('OPEN');
  });

  it('extend of a live session counts from its expiry', async () => {
    const { service, clock, sessionsRepo } = createService();
    sessionsRepo.findOne.mockResolvedValue(storedSession());
    clock.set('2025-03-10T08:10:00.000Z');

    const session = await service.extend('prof@uni.test', 'session-1', 5, null);

    expect(session.expiresAt).toBe('2025-03-10T08:20:00.000Z');
  });

  it('extend rejects a closed session', async () => {
    const { service, sessionsRepo } = createService();
    sessionsRepo.findOne.mockResolvedValue(storedSession({ isOpen: false }));

    await expect(service.extend('prof@uni.test', 'session-1', 10, null)).rejects.toBeInstanceOf(
      ConflictException
    );
    expect(sessionsRepo.save).not.toHaveBeenCalled();
  });

  it('close is idempotent', async () => {
    const { service, clock, sessionsRepo, attendanceRepo } = createService();
    attendanceRepo.count.mockResolvedValue(4);
    sessionsRepo.findOne.mockResolvedValueOnce(storedSession());
    clock.set('2025-03-10T08:05:00.000Z');

    const first = await service.close('prof@uni.test', 'session-1', null);
    expect(first).toMatchObject({
      state: 'CLOSED',
      endTime: '2025-03-10T08:05:00.000Z',
      checkIns: 4,
    });

    sessionsRepo.findOne.mockResolvedValueOnce(
      storedSession({ isOpen: false, endTime: new Date('2025-03-10T08:05:00.000Z') })
    );
    clock.set('2025-03-10T09:00:00.000Z');
    const second = await service.close('prof@uni.test', 'session-1', null);

    expect(second.endTime).toBe('2025-03-10T08:05:00.000Z');
    expect(sessionsRepo.save).toHaveBeenCalledTimes(1);
  });

  it('listActive leaves out sessions past their expiry', async () => {
    const { service, clock, sessionsRepo, attendanceRepo } = createService();
    clock.set('2025-03-10T08:20:00.000Z');
    sessionsRepo.find.mockResolvedValue([
      storedSession({ id: 'live', expiresAt: new Date('2025-03-10T08:30:00.000Z') }),
      storedSession({ id: 'stale' }),
    ]);
    attendanceRepo.count.mockResolvedValue(2);

    const sessions = await service.listActive('prof@uni.test', COURSE.id, null);

    expect(sessions.map((s) => s.id)).toEqual(['live']);
    expect(sessions[0].checkIns).toBe(2);
  });
});
