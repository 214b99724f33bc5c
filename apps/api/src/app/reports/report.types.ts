import type { ReportGranularity } from '@attendance/shared';

/** One attendance row joined with its session and course; instants are UTC. */
export interface CheckInRow {
  courseCode: string;
  courseTitle: string;
  sessionId: string;
  sessionStart: Date;
  studentName: string;
  studentEmail: string;
  checkInAt: Date;
}

export interface ReportRange {
  from: Date;
  to: Date;
}

export interface ReportRequest {
  from?: string;
  to?: string;
  granularity?: ReportGranularity;
  courseIds?: string[];
}
