import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { UserRole } from '@attendance/shared';
import { readFileSync } from 'fs';
import { DataSource } from 'typeorm';
import { AccessPolicy } from './app/access/access-policy';
import { parseEmailList } from './app/common/config/attendance-settings';
import { displayNameFromEmail } from './app/common/utils/names.util';
import { CourseImportService } from './app/courses/course-import.service';
import { CourseInstructorEntity } from './app/courses/course-instructor.entity';
import { CourseEntity } from './app/courses/course.entity';
import { CoursesService } from './app/courses/courses.service';
import { createDataSourceOptionsFromEnv } from './app/database/typeorm.options';
import { UserEntity } from './app/users/user.entity';
import { UsersService } from './app/users/users.service';

const logger = new Logger('Seed');

// Usage: npm run seed [-- path/to/courses.xlsx]
async function main() {
  const dataSource = new DataSource(createDataSourceOptionsFromEnv());
  await dataSource.initialize();
  try {
    await dataSource.runMigrations();

    const adminEmails = parseEmailList(process.env.ADMIN_EMAILS);
    const policy = new AccessPolicy({
      adminEmails,
      instructorEmails: parseEmailList(process.env.INSTRUCTOR_EMAILS),
      secretaryEmails: parseEmailList(process.env.SECRETARY_EMAILS),
    });
    const usersService = new UsersService(dataSource.getRepository(UserEntity));
    const coursesService = new CoursesService(
      dataSource.getRepository(CourseEntity),
      dataSource.getRepository(CourseInstructorEntity),
      dataSource.getRepository(UserEntity),
      policy
    );

    for (const email of adminEmails) {
      const result = await usersService.createUser({
        name: displayNameFromEmail(email),
        email,
        role: UserRole.ADMIN,
      });
      logger.log(`${email}: ${result.message}`);
    }

    const spreadsheetPath = process.argv[2];
    if (spreadsheetPath) {
      const importer = new CourseImportService(coursesService, usersService);
      const summary = await importer.importSpreadsheet(readFileSync(spreadsheetPath));
      if (summary.skippedRows.length > 0) {
        logger.warn(`Skipped rows: ${summary.skippedRows.join(', ')}`);
      }
    }
  } finally {
    await dataSource.destroy();
  }
}

main().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
