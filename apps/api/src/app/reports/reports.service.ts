import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { AttendanceReport, ReportGranularity } from '@attendance/shared';
import { DataSource } from 'typeorm';
import type { ReportScope } from '../access/access-policy';
import {
  ATTENDANCE_SETTINGS,
  AttendanceSettings,
} from '../common/config/attendance-settings';
import { Clock, CLOCK } from '../common/utils/clock';
import { addUtcDays, startOfUtcDay, toUtcDate } from '../common/utils/time.util';
import {
  attendanceRates,
  groupCheckIns,
  pivotGrouped,
  toRawRows,
} from './report-aggregator';
import { CheckInRow, ReportRange, ReportRequest } from './report.types';

function column(row: unknown, key: string): unknown {
  if (typeof row !== 'object' || row === null) return undefined;
  return Reflect.get(row, key);
}

function requiredDate(row: unknown, key: string): Date {
  const raw = column(row, key);
  const value = raw instanceof Date || typeof raw === 'string' ? toUtcDate(raw) : null;
  if (!value) throw new Error(`Report row without ${key}`);
  return value;
}

function toCheckInRow(row: unknown): CheckInRow {
  return {
    courseCode: String(column(row, 'courseCode') ?? ''),
    courseTitle: String(column(row, 'courseTitle') ?? ''),
    sessionId: String(column(row, 'sessionId') ?? ''),
    sessionStart: requiredDate(row, 'sessionStart'),
    studentName: String(column(row, 'studentName') ?? ''),
    studentEmail: String(column(row, 'studentEmail') ?? ''),
    checkInAt: requiredDate(row, 'checkInAt'),
  };
}

@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(
    private readonly dataSource: DataSource,
    @Inject(ATTENDANCE_SETTINGS) private readonly settings: AttendanceSettings,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  /** Defaults to the last 30 days through tomorrow, at UTC midnight. */
  resolveRange(from?: string, to?: string): ReportRange {
    const today = startOfUtcDay(this.clock.now());
    let range: ReportRange;
    try {
      range = {
        from: toUtcDate(from) ?? addUtcDays(today, -30),
        to: toUtcDate(to) ?? addUtcDays(today, 1),
      };
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : String(error));
    }
    if (range.from.getTime() >= range.to.getTime()) {
      throw new BadRequestException("'from' must be earlier than 'to'.");
    }
    return range;
  }

  /** Check-ins with `from <= createdAt < to`, limited to the caller's scope. */
  async fetchCheckIns(
    scope: ReportScope,
    range: ReportRange,
    courseIds: string[] = []
  ): Promise<CheckInRow[]> {
    const joins: string[] = [];
    const where = ['a.createdAt >= ?', 'a.createdAt < ?'];
    const params: Array<Date | string> = [range.from, range.to];

    if (scope.kind === 'instructor') {
      joins.push(
        'INNER JOIN course_instructors ci ON ci.courseId = c.id',
        'INNER JOIN users u ON u.id = ci.userId'
      );
      where.push('u.email = ?');
      params.push(scope.email);
    }
    if (courseIds.length > 0) {
      where.push(`c.id IN (${courseIds.map(() => '?').join(', ')})`);
      params.push(...courseIds);
    }

    const sql = `
      SELECT
        c.code AS courseCode,
        c.title AS courseTitle,
        s.id AS sessionId,
        s.startTime AS sessionStart,
        a.studentName AS studentName,
        a.studentEmail AS studentEmail,
        a.createdAt AS checkInAt
      FROM attendance a
      INNER JOIN attendance_sessions s ON s.id = a.sessionId
      INNER JOIN courses c ON c.id = s.courseId
      ${joins.join('\n      ')}
      WHERE ${where.join(' AND ')}
      ORDER BY c.code ASC, a.createdAt ASC
    `;
    const rows: unknown = await this.dataSource.query(sql, params);
    return Array.isArray(rows) ? rows.map(toCheckInRow) : [];
  }

  async buildReport(scope: ReportScope, request: ReportRequest): Promise<AttendanceReport> {
    const range = this.resolveRange(request.from, request.to);
    const granularity = request.granularity ?? ReportGranularity.DAY;
    const zone = this.settings.reportTimeZone;

    const rows = await this.fetchCheckIns(scope, range, request.courseIds);
    const grouped = groupCheckIns(rows, granularity, zone);
    this.logger.log(
      `Report ${range.from.toISOString()}..${range.to.toISOString()} (${scope.kind}): ${rows.length} check-ins`
    );

    return {
      from: range.from.toISOString(),
      to: range.to.toISOString(),
      granularity,
      timeZone: zone,
      raw: toRawRows(rows, zone),
      grouped,
      pivot: pivotGrouped(grouped),
      rates: attendanceRates(rows),
    };
  }
}
