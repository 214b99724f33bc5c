import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { BulkImportRow, BulkImportSummary, UserRole } from '@attendance/shared';
import * as XLSX from 'xlsx';
import { normalizeEmail, normalizePersonName } from '../common/utils/names.util';
import { UsersService } from '../users/users.service';
import { CoursesService } from './courses.service';

const IMPORT_COLUMNS = [
  'course_code',
  'course_title',
  'instructor_name',
  'instructor_email',
] as const;

type ImportColumn = (typeof IMPORT_COLUMNS)[number];

function cell(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

function headerKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function isImportColumn(key: string): key is ImportColumn {
  return IMPORT_COLUMNS.some((column) => column === key);
}

@Injectable()
export class CourseImportService {
  private readonly logger = new Logger(CourseImportService.name);

  constructor(
    private readonly coursesService: CoursesService,
    private readonly usersService: UsersService
  ) {}

  /**
   * Each complete row ensures its course, instructor and assignment exist.
   * Incomplete rows are skipped and reported by row number.
   */
  async importRows(rows: BulkImportRow[], firstRowNumber = 1): Promise<BulkImportSummary> {
    const summary: BulkImportSummary = {
      rowsRead: rows.length,
      skippedRows: [],
      addedCourses: 0,
      addedInstructors: 0,
      addedAssignments: 0,
      message: '',
    };

    for (const [index, row] of rows.entries()) {
      const code = cell(row.course_code);
      const title = cell(row.course_title);
      const name = normalizePersonName(cell(row.instructor_name));
      const email = normalizeEmail(cell(row.instructor_email));
      if (!code || !title || !name || !email) {
        summary.skippedRows.push(firstRowNumber + index);
        continue;
      }

      const course = await this.coursesService.ensureCourse({ code, title });
      const instructor = await this.usersService.ensureUser({
        name,
        email,
        role: UserRole.INSTRUCTOR,
      });
      const assignment = await this.coursesService.ensureAssignment(
        course.course.id,
        instructor.user.id
      );

      if (course.created) summary.addedCourses++;
      if (instructor.created) summary.addedInstructors++;
      if (assignment.created) summary.addedAssignments++;
    }

    summary.message =
      `Import complete: ${summary.addedCourses} courses, ` +
      `${summary.addedInstructors} instructors, ` +
      `${summary.addedAssignments} assignments added.`;
    if (summary.skippedRows.length > 0) {
      summary.message += ` Skipped ${summary.skippedRows.length} incomplete rows.`;
    }
    this.logger.log(summary.message);
    return summary;
  }

  /** Reads the first sheet of a CSV or XLSX upload; the first row is the header. */
  parseSpreadsheet(buffer: Buffer): BulkImportRow[] {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(buffer, { type: 'buffer' });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new BadRequestException(`Unreadable spreadsheet: ${detail}`);
    }
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheet) throw new BadRequestException('The uploaded file has no sheets.');

    const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
      defval: '',
      raw: false,
    });
    return records.map((record) => {
      const row: BulkImportRow = {};
      for (const [rawKey, value] of Object.entries(record)) {
        const key = headerKey(rawKey);
        if (isImportColumn(key)) row[key] = cell(value);
      }
      return row;
    });
  }

  async importSpreadsheet(buffer: Buffer): Promise<BulkImportSummary> {
    const rows = this.parseSpreadsheet(buffer);
    if (rows.length === 0) {
      throw new BadRequestException('The uploaded file has no rows.');
    }
    // Row 1 is the header.
    return this.importRows(rows, 2);
  }
}
