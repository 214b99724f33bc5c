import { AttendanceReport, ReportView } from '@attendance/shared';
import * as XLSX from 'xlsx';

type Cell = string | number;

export const RAW_COLUMNS = [
  'course_code',
  'course_title',
  'session_id',
  'session_start',
  'student_name',
  'student_email',
  'check_in_at',
] as const;

export const GROUPED_COLUMNS = [
  'course_code',
  'course_title',
  'bucket',
  'check_ins',
  'unique_students',
  'sessions',
] as const;

export const RATE_COLUMNS = [
  'course_code',
  'student_email',
  'attended_sessions',
  'total_sessions',
  'attendance_rate',
] as const;

function table<K extends string>(columns: readonly K[], rows: Array<Record<K, Cell>>): Cell[][] {
  return [[...columns], ...rows.map((row) => columns.map((column) => row[column]))];
}

/** Header row plus data rows for one report view. */
export function viewTable(report: AttendanceReport, view: ReportView): Cell[][] {
  switch (view) {
    case ReportView.RAW:
      return table(RAW_COLUMNS, report.raw);
    case ReportView.GROUPED:
      return table(GROUPED_COLUMNS, report.grouped);
    case ReportView.RATES:
      return table(RATE_COLUMNS, report.rates);
    case ReportView.PIVOT: {
      const { columns, rows } = report.pivot;
      return [
        ['bucket', ...columns],
        ...rows.map((row) => [row.bucket, ...columns.map((code) => row.counts[code] ?? 0)]),
      ];
    }
  }
}

export function reportViewToCsv(report: AttendanceReport, view: ReportView): string {
  return XLSX.utils.sheet_to_csv(XLSX.utils.aoa_to_sheet(viewTable(report, view)));
}

const SHEETS: Array<[string, ReportView]> = [
  ['Raw', ReportView.RAW],
  ['Grouped', ReportView.GROUPED],
  ['Pivot', ReportView.PIVOT],
  ['Rates', ReportView.RATES],
];

export function reportWorkbook(report: AttendanceReport): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, view] of SHEETS) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(viewTable(report, view)), name);
  }
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
}
