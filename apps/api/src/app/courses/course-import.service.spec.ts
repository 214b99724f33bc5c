import { BadRequestException } from '@nestjs/common';
import { UserRole } from '@attendance/shared';
import * as XLSX from 'xlsx';
import { CourseImportService } from './course-import.service';

describe('CourseImportService', () => {
  function createService() {
    const courses = new Map<string, { id: string }>();
    const users = new Map<string, { id: string }>();
    const links = new Set<string>();

    const coursesService = {
      ensureCourse: jest.fn(async ({ code }: { code: string; title: string }) => {
        const existing = courses.get(code);
        if (existing) return { course: existing, created: false };
        const course = { id: `course-${code}` };
        courses.set(code, course);
        return { course, created: true };
      }),
      ensureAssignment: jest.fn(async (courseId: string, userId: string) => {
        const key = `${courseId}/${userId}`;
        const created = !links.has(key);
        links.add(key);
        return { link: { id: key }, created };
      }),
    };
    const usersService = {
      ensureUser: jest.fn(async ({ email }: { name: string; email: string; role: UserRole }) => {
        const existing = users.get(email);
        if (existing) return { user: existing, created: false };
        const user = { id: `user-${email}` };
        users.set(email, user);
        return { user, created: true };
      }),
    };

    const service = new CourseImportService(coursesService as any, usersService as any);
    return { service, coursesService, usersService };
  }

  it('skips an incomplete row and imports the rows around it', async () => {
    const { service, usersService } = createService();

    const summary = await service.importRows([
      {
        course_code: 'CS101',
        course_title: 'Intro to Programming',
        instructor_name: 'Nikos Georgiou',
        instructor_email: 'N.Georgiou@uni.test',
      },
      {
        course_code: 'CS102',
        course_title: 'Data Structures',
        instructor_name: 'Maria Ioannou',
        instructor_email: '  ',
      },
      {
        course_code: 'MATH201',
        course_title: 'Calculus II',
        instructor_name: 'Nikos Georgiou',
        instructor_email: 'n.georgiou@uni.test',
      },
    ]);

    expect(summary).toEqual({
      rowsRead: 3,
      skippedRows: [2],
      addedCourses: 2,
      addedInstructors: 1,
      addedAssignments: 2,
      message:
        'Import complete: 2 courses, 1 instructors, 2 assignments added. Skipped 1 incomplete rows.',
    });
    expect(usersService.ensureUser).toHaveBeenCalledWith({
      name: 'Nikos Georgiou',
      email: 'n.georgiou@uni.test',
      role: UserRole.INSTRUCTOR,
    });
  });

  it('adds nothing when the same rows are imported twice', async () => {
    const { service } = createService();
    const rows = [
      {
        course_code: 'CS101',
        course_title: 'Intro to Programming',
        instructor_name: 'Nikos Georgiou',
        instructor_email: 'n.georgiou@uni.test',
      },
    ];

    await service.importRows(rows);
    const second = await service.importRows(rows);

    expect(second).toMatchObject({
      addedCourses: 0,
      addedInstructors: 0,
      addedAssignments: 0,
      message: 'Import complete: 0 courses, 0 instructors, 0 assignments added.',
    });
  });

  it('reads a CSV upload with loosely written headers', async () => {
    const { service } = createService();
    const csv = [
      'Course Code,Course Title,Instructor Name,Instructor Email,Notes',
      'CS101,Intro to Programming,Nikos Georgiou,n.georgiou@uni.test,first term',
      'CS102,Data Structures,,m.ioannou@uni.test,',
    ].join('\n');

    const rows = service.parseSpreadsheet(Buffer.from(csv, 'utf8'));

    expect(rows).toEqual([
      {
        course_code: 'CS101',
        course_title: 'Intro to Programming',
        instructor_name: 'Nikos Georgiou',
        instructor_email: 'n.georgiou@uni.test',
      },
      {
        course_code: 'CS102',
        course_title: 'Data Structures',
        instructor_name: '',
        instructor_email: 'm.ioannou@uni.test',
      },
    ]);

    const summary = await service.importSpreadsheet(Buffer.from(csv, 'utf8'));
    expect(summary.skippedRows).toEqual([3]);
  });

  it('reads an XLSX upload', () => {
    const { service } = createService();
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      wb,
      XLSX.utils.aoa_to_sheet([
        ['course_code', 'course_title', 'instructor_name', 'instructor_email'],
        ['PHY110', 'Mechanics', 'Eleni Markou', 'e.markou@uni.test'],
      ]),
      'Courses'
    );
    const buffer: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });

    expect(service.parseSpreadsheet(buffer)).toEqual([
      {
        course_code: 'PHY110',
        course_title: 'Mechanics',
        instructor_name: 'Eleni Markou',
        instructor_email: 'e.markou@uni.test',
      },
    ]);
  });

  it('rejects an upload with a header row only', async () => {
    const { service } = createService();
    await expect(
      service.importSpreadsheet(Buffer.from('course_code,course_title\n', 'utf8'))
    ).rejects.toBeInstanceOf(BadRequestException);
  });
});
