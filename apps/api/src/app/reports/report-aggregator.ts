import {
  ReportGranularity,
  ReportGroupedRow,
  ReportPivot,
  ReportRateRow,
  ReportRawRow,
} from '@attendance/shared';
import { formatDateOnly, formatInTimeZone, mondayOf, zonedParts } from '../common/utils/time.util';
import { CheckInRow } from './report.types';

// Plain code-point order keeps exports stable across locales.
export function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** First day (YYYY-MM-DD) of the bucket holding the instant, in the reporting zone. */
export function bucketKey(
  instant: Date,
  granularity: ReportGranularity,
  timeZone: string
): string {
  const parts = zonedParts(instant, timeZone);
  switch (granularity) {
    case ReportGranularity.DAY:
      return formatDateOnly(parts);
    case ReportGranularity.WEEK:
      return mondayOf(parts);
    case ReportGranularity.MONTH:
      return formatDateOnly({ year: parts.year, month: parts.month, day: 1 });
  }
}

export function toRawRows(rows: CheckInRow[], timeZone: string): ReportRawRow[] {
  return rows.map((row) => ({
    course_code: row.courseCode,
    course_title: row.courseTitle,
    session_id: row.sessionId,
    session_start: formatInTimeZone(row.sessionStart, timeZone),
    student_name: row.studentName,
    student_email: row.studentEmail,
    check_in_at: formatInTimeZone(row.checkInAt, timeZone),
  }));
}

export function groupCheckIns(
  rows: CheckInRow[],
  granularity: ReportGranularity,
  timeZone: string
): ReportGroupedRow[] {
  const groups = new Map<
    string,
    { row: ReportGroupedRow; students: Set<string>; sessions: Set<string> }
  >();

  for (const checkIn of rows) {
    const bucket = bucketKey(checkIn.checkInAt, granularity, timeZone);
    const key = [checkIn.courseCode, checkIn.courseTitle, bucket].join('\u0000');
    let group = groups.get(key);
    if (!group) {
      group = {
        row: {
          course_code: checkIn.courseCode,
          course_title: checkIn.courseTitle,
          bucket,
          check_ins: 0,
          unique_students: 0,
          sessions: 0,
        },
        students: new Set(),
        sessions: new Set(),
      };
      groups.set(key, group);
    }
    group.row.check_ins++;
    group.students.add(checkIn.studentEmail);
    group.sessions.add(checkIn.sessionId);
  }

  return [...groups.values()]
    .map(({ row, students, sessions }) => ({
      ...row,
      unique_students: students.size,
      sessions: sessions.size,
    }))
    .sort(
      (a, b) =>
        compareText(a.bucket, b.bucket) ||
        compareText(a.course_code, b.course_code) ||
        compareText(a.course_title, b.course_title)
    );
}

/** Buckets by course code, check-in counts as cells, missing combinations as 0. */
export function pivotGrouped(grouped: ReportGroupedRow[]): ReportPivot {
  const columns = [...new Set(grouped.map((g) => g.course_code))].sort(compareText);
  const buckets = [...new Set(grouped.map((g) => g.bucket))].sort(compareText);

  const counts = new Map<string, Record<string, number>>();
  for (const bucket of buckets) {
    counts.set(bucket, Object.fromEntries(columns.map((code) => [code, 0])));
  }
  for (const g of grouped) {
    const cells = counts.get(g.bucket);
    if (cells) cells[g.course_code] = (cells[g.course_code] ?? 0) + g.check_ins;
  }

  return {
    columns,
    rows: buckets.map((bucket) => ({ bucket, counts: counts.get(bucket) ?? {} })),
  };
}

// One decimal, ties to the even digit: 6.25 -> 6.2, 18.75 -> 18.8.
function roundHalfEven(value: number): number {
  const scaled = value * 10;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  if (fraction > 0.5) return (floor + 1) / 10;
  if (fraction < 0.5) return floor / 10;
  return (floor % 2 === 0 ? floor : floor + 1) / 10;
}

/**
 * The denominator is the number of distinct sessions of the course that have
 * at least one check-in in the filtered rows, not every session held.
 */
export function attendanceRates(rows: CheckInRow[]): ReportRateRow[] {
  const sessionsByCourse = new Map<string, Set<string>>();
  const attendedByStudent = new Map<string, { course: string; email: string; sessions: Set<string> }>();

  for (const row of rows) {
    let courseSessions = sessionsByCourse.get(row.courseCode);
    if (!courseSessions) {
      courseSessions = new Set();
      sessionsByCourse.set(row.courseCode, courseSessions);
    }
    courseSessions.add(row.sessionId);

    const key = `${row.courseCode}\u0000${row.studentEmail}`;
    let attended = attendedByStudent.get(key);
    if (!attended) {
      attended = { course: row.courseCode, email: row.studentEmail, sessions: new Set() };
      attendedByStudent.set(key, attended);
    }
    attended.sessions.add(row.sessionId);
  }

  return [...attendedByStudent.values()]
    .map(({ course, email, sessions }) => {
      const total = sessionsByCourse.get(course)?.size ?? 0;
      const rate = total > 0 ? roundHalfEven((sessions.size / total) * 100) : 0;
      return {
        course_code: course,
        student_email: email,
        attended_sessions: sessions.size,
        total_sessions: total,
        attendance_rate: rate,
      };
    })
    .sort(
      (a, b) =>
        compareText(a.course_code, b.course_code) ||
        b.attendance_rate - a.attendance_rate ||
        compareText(a.student_email, b.student_email)
    );
}
