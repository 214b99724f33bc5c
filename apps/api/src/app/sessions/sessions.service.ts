import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import type { InstructorSession } from '@attendance/shared';
import { MoreThanOrEqual, Repository } from 'typeorm';
import { AttendanceEntity } from '../attendance/attendance.entity';
import {
  ATTENDANCE_SETTINGS,
  AttendanceSettings,
} from '../common/config/attendance-settings';
import { Clock, CLOCK } from '../common/utils/clock';
import { formatInTimeZone } from '../common/utils/time.util';
import { CoursesService } from '../courses/courses.service';
import { isUniqueViolation } from '../database/unique-violation';
import { AttendanceSessionEntity } from './attendance-session.entity';
import {
  closeWindow,
  extendedExpiry,
  isActive,
  isDurationWithinBounds,
  openWindow,
  sessionStateAt,
} from './session-lifecycle';
import { SessionTokenIssuer } from './session-token';

@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);

  constructor(
    @InjectRepository(AttendanceSessionEntity)
    private readonly sessionsRepo: Repository<AttendanceSessionEntity>,
    @InjectRepository(AttendanceEntity)
    private readonly attendanceRepo: Repository<AttendanceEntity>,
    private readonly coursesService: CoursesService,
    private readonly tokenIssuer: SessionTokenIssuer,
    @Inject(ATTENDANCE_SETTINGS) private readonly settings: AttendanceSettings,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  checkInUrl(token: string): string {
    return `${this.settings.publicBaseUrl}/?session=${encodeURIComponent(token)}&autocheckin=1`;
  }

  findByToken(token: string): Promise<AttendanceSessionEntity | null> {
    const value = token.trim();
    if (!value) return Promise.resolve(null);
    return this.sessionsRepo.findOne({ where: { token: value }, relations: { course: true } });
  }

  async open(
    email: string,
    courseId: string,
    durationMinutes: number | undefined,
    timeZone: string | null
  ): Promise<InstructorSession> {
    const course = await this.coursesService.getByIdOrThrow(courseId);
    await this.assertCanManage(email, courseId);

    const minutes = durationMinutes ?? this.settings.sessionDefaultMinutes;
    const bounds = this.settings.sessionDuration;
    if (!isDurationWithinBounds(minutes, bounds)) {
      throw new BadRequestException(
        `Duration must be a whole number of minutes between ${bounds.min} and ${bounds.max}.`
      );
    }

    const window = openWindow(this.clock.now(), minutes);
    for (let attempt = 1; attempt <= this.settings.tokenIssueAttempts; attempt++) {
      const candidate = this.sessionsRepo.create({
        ...window,
        courseId,
        token: this.tokenIssuer.issue(),
      });
      try {
        const saved = await this.sessionsRepo.save(candidate);
        saved.course = course;
        this.logger.log(
          `Session ${saved.id} opened for ${course.code} by ${email} (${minutes} min)`
        );
        return this.describe(saved, 0, timeZone);
      } catch (error) {
        if (!isUniqueViolation(error)) throw error;
        this.logger.warn(`Session token collision on attempt ${attempt}; issuing a new token`);
      }
    }
    this.logger.error(`No unique session token after ${this.settings.tokenIssueAttempts} attempts`);
    throw new ServiceUnavailableException('Could not open the session. Please retry.');
  }

  async extend(
    email: string,
    sessionId: string,
    deltaMinutes: number | undefined,
    timeZone: string | null
  ): Promise<InstructorSession> {
    const session = await this.getManagedSession(email, sessionId);
    if (!session.isOpen) {
      throw new ConflictException('This session is closed.');
    }

    const delta = deltaMinutes ?? this.settings.sessionExtendMinutes;
    const max = this.settings.sessionDuration.max;
    if (!Number.isInteger(delta) || delta < 1 || delta > max) {
      throw new BadRequestException(`Extension must be between 1 and ${max} minutes.`);
    }

    const now = this.clock.now();
    session.expiresAt = extendedExpiry(session, now, delta);
    const saved = await this.sessionsRepo.save(session);
    this.logger.log(`Session ${session.id} extended by ${delta} min until ${saved.expiresAt.toISOString()}`);
    return this.describe(saved, await this.countCheckIns(session.id), timeZone);
  }

  /** Closing a closed session is a no-op. */
  async close(email: string, sessionId: string, timeZone: string | null): Promise<InstructorSession> {
    const session = await this.getManagedSession(email, sessionId);
    const checkIns = await this.countCheckIns(session.id);
    if (!session.isOpen) {
      return this.describe(session, checkIns, timeZone);
    }

    const closed = closeWindow(session, this.clock.now());
    const saved = await this.sessionsRepo.save(closed);
    this.logger.log(`Session ${session.id} closed with ${checkIns} check-ins`);
    return this.describe(saved, checkIns, timeZone);
  }

  async listActive(
    email: string,
    courseId: string,
    timeZone: string | null
  ): Promise<InstructorSession[]> {
    const course = await this.coursesService.getByIdOrThrow(courseId);
    await this.assertCanManage(email, courseId);

    const now = this.clock.now();
    const rows = await this.sessionsRepo.find({
      where: { courseId, isOpen: true, expiresAt: MoreThanOrEqual(now) },
      order: { startTime: 'DESC' },
    });

    const active = rows.filter((row) => isActive(row, now));
    const result: InstructorSession[] = [];
    for (const row of active) {
      row.course = course;
      result.push(this.describe(row, await this.countCheckIns(row.id), timeZone));
    }
    return result;
  }

  describe(
    session: AttendanceSessionEntity,
    checkIns: number,
    timeZone: string | null
  ): InstructorSession {
    const zone = timeZone ?? this.settings.displayTimeZone;
    return {
      id: session.id,
      courseId: session.courseId,
      courseCode: session.course.code,
      courseTitle: session.course.title,
      state: sessionStateAt(session, this.clock.now()),
      startTime: session.startTime.toISOString(),
      expiresAt: session.expiresAt.toISOString(),
      endTime: session.endTime ? session.endTime.toISOString() : null,
      startTimeLocal: formatInTimeZone(session.startTime, zone),
      expiresAtLocal: formatInTimeZone(session.expiresAt, zone),
      timeZone: zone,
      checkInUrl: this.checkInUrl(session.token),
      checkIns,
    };
  }

  private countCheckIns(sessionId: string) {
    return this.attendanceRepo.count({ where: { sessionId } });
  }

  private async assertCanManage(email: string, courseId: string) {
    if (!(await this.coursesService.canManageCourse(email, courseId))) {
      throw new ForbiddenException('You are not assigned to this course.');
    }
  }

  private async getManagedSession(email: string, sessionId: string) {
    const session = await this.sessionsRepo.findOne({
      where: { id: sessionId },
      relations: { course: true },
    });
    if (!session) throw new NotFoundException('Session not found.');
    await this.assertCanManage(email, session.courseId);
    return session;
  }
}
