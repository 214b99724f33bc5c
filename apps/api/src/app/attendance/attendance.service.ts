import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import type {
  CheckInRejection,
  CheckInResult,
  CheckInSessionInfo,
} from '@attendance/shared';
import { Repository } from 'typeorm';
import {
  ATTENDANCE_SETTINGS,
  AttendanceSettings,
} from '../common/config/attendance-settings';
import { Clock, CLOCK } from '../common/utils/clock';
import { formatInTimeZone } from '../common/utils/time.util';
import { isUniqueViolation } from '../database/unique-violation';
import { validateForCheckIn } from '../sessions/session-lifecycle';
import { SessionsService } from '../sessions/sessions.service';
import { AttendanceEntity } from './attendance.entity';
import { CheckInClaim, prepareCheckIn } from './check-in.policy';

export const ALREADY_RECORDED_MESSAGE = 'You are already recorded for this session.';
export const RECORDED_MESSAGE = 'Attendance recorded. Thank you!';

/** The attendance ledger: at most one row per (session, student email). */
@Injectable()
export class AttendanceService {
  private readonly logger = new Logger(AttendanceService.name);

  constructor(
    @InjectRepository(AttendanceEntity)
    private readonly attendanceRepo: Repository<AttendanceEntity>,
    private readonly sessionsService: SessionsService,
    @Inject(ATTENDANCE_SETTINGS) private readonly settings: AttendanceSettings,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  rejectionMessage(reason: CheckInRejection): string {
    switch (reason) {
      case 'not_found':
        return 'Invalid session token.';
      case 'closed':
        return 'This session is closed.';
      case 'expired':
        return 'This session has expired.';
      case 'invalid_name':
        return 'Please provide your full name.';
      case 'invalid_email':
        return `Email must be a valid ${this.settings.emailDomain} address.`;
    }
  }

  async describeSession(token: string, timeZone: string | null): Promise<CheckInSessionInfo> {
    const zone = timeZone ?? this.settings.displayTimeZone;
    const session = await this.sessionsService.findByToken(token);
    const validity = validateForCheckIn(session, this.clock.now());
    if (!session) {
      return {
        validity,
        courseCode: null,
        courseTitle: null,
        expiresAt: null,
        expiresAtLocal: null,
        timeZone: zone,
      };
    }
    return {
      validity,
      courseCode: session.course.code,
      courseTitle: session.course.title,
      expiresAt: session.expiresAt.toISOString(),
      expiresAtLocal: formatInTimeZone(session.expiresAt, zone),
      timeZone: zone,
    };
  }

  async record(token: string, claim: CheckInClaim): Promise<CheckInResult> {
    const session = await this.sessionsService.findByToken(token);
    if (!session) return this.rejected('not_found');

    const now = this.clock.now();
    const validity = validateForCheckIn(session, now);
    if (validity !== 'ok') return this.rejected(validity);

    const prepared = prepareCheckIn(claim, this.settings.emailDomain);
    if (!prepared.ok) return this.rejected(prepared.reason);

    const already: CheckInResult = {
      status: 'already_recorded',
      message: ALREADY_RECORDED_MESSAGE,
      sessionId: session.id,
      studentEmail: prepared.email,
    };
    const existing = await this.attendanceRepo.findOne({
      where: { sessionId: session.id, studentEmail: prepared.email },
    });
    if (existing) return already;

    try {
      await this.attendanceRepo.insert({
        sessionId: session.id,
        studentName: prepared.name,
        studentEmail: prepared.email,
        createdAt: now,
      });
    } catch (error) {
      // A concurrent submission won the insert.
      if (isUniqueViolation(error)) return already;
      throw error;
    }

    this.logger.log(`Check-in recorded for session ${session.id} (${claim.source})`);
    return {
      status: 'recorded',
      message: RECORDED_MESSAGE,
      sessionId: session.id,
      studentName: prepared.name,
      studentEmail: prepared.email,
      checkedInAt: now.toISOString(),
    };
  }

  private rejected(reason: CheckInRejection): CheckInResult {
    return { status: 'rejected', reason, message: this.rejectionMessage(reason) };
  }
}
