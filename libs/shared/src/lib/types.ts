import type { ReportGranularity, UserRole } from './enums';

export type Uuid = string;

export interface AuthIdentity {
  email: string | null;
  name: string | null;
}

export interface AuthRoles {
  admin: boolean;
  instructor: boolean;
  secretary: boolean;
}

export interface AuthMeResponse {
  identity: AuthIdentity;
  roles: AuthRoles;
}

// Create/assign operations never fail on duplicates; `created` tells the caller
// whether anything was written.
export interface MutationResult {
  ok: true;
  created: boolean;
  id: Uuid;
  message: string;
}

export interface AdminUser {
  id: Uuid;
  name: string;
  email: string;
  role: UserRole;
}

export interface CourseSummary {
  id: Uuid;
  code: string;
  title: string;
}

export interface CourseInstructorItem {
  userId: Uuid;
  name: string;
  email: string;
}

export interface BulkImportRow {
  course_code?: string | null;
  course_title?: string | null;
  instructor_name?: string | null;
  instructor_email?: string | null;
}

export interface BulkImportSummary {
  rowsRead: number;
  skippedRows: number[];
  addedCourses: number;
  addedInstructors: number;
  addedAssignments: number;
  message: string;
}

export type SessionState = 'OPEN' | 'EXPIRED' | 'CLOSED';

export type CheckInValidity = 'ok' | 'closed' | 'expired' | 'not_found';

export interface InstructorSession {
  id: Uuid;
  courseId: Uuid;
  courseCode: string;
  courseTitle: string;
  state: SessionState;
  startTime: string; // ISO-8601 UTC
  expiresAt: string; // ISO-8601 UTC
  endTime: string | null;
  startTimeLocal: string; // YYYY-MM-DD HH:mm:ss in the caller zone
  expiresAtLocal: string;
  timeZone: string;
  checkInUrl: string;
  checkIns: number;
}

export interface CheckInSessionInfo {
  validity: CheckInValidity;
  courseCode: string | null;
  courseTitle: string | null;
  expiresAt: string | null;
  expiresAtLocal: string | null;
  timeZone: string;
}

export type CheckInRejection =
  | 'not_found'
  | 'closed'
  | 'expired'
  | 'invalid_name'
  | 'invalid_email';

export type CheckInResult =
  | {
      status: 'recorded';
      message: string;
      sessionId: Uuid;
      studentName: string;
      studentEmail: string;
      checkedInAt: string;
    }
  | {
      status: 'already_recorded';
      message: string;
      sessionId: Uuid;
      studentEmail: string;
    }
  | {
      status: 'rejected';
      reason: CheckInRejection;
      message: string;
    };

export interface CheckInPageResponse {
  session: CheckInSessionInfo;
  checkIn: CheckInResult | null;
}

// Report rows use the export column names so JSON and CSV agree.
export interface ReportRawRow {
  course_code: string;
  course_title: string;
  session_id: Uuid;
  session_start: string; // YYYY-MM-DD HH:mm:ss in the reporting zone
  student_name: string;
  student_email: string;
  check_in_at: string;
}

export interface ReportGroupedRow {
  course_code: string;
  course_title: string;
  bucket: string; // YYYY-MM-DD, first day of the bucket
  check_ins: number;
  unique_students: number;
  sessions: number;
}

export interface ReportPivot {
  columns: string[];
  rows: Array<{ bucket: string; counts: Record<string, number> }>;
}

export interface ReportRateRow {
  course_code: string;
  student_email: string;
  attended_sessions: number;
  total_sessions: number;
  attendance_rate: number;
}

export interface AttendanceReport {
  from: string;
  to: string;
  granularity: ReportGranularity;
  timeZone: string;
  raw: ReportRawRow[];
  grouped: ReportGroupedRow[];
  pivot: ReportPivot;
  rates: ReportRateRow[];
}
