import { ConfigService } from '@nestjs/config';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import type { DataSourceOptions } from 'typeorm';

import { AttendanceEntity } from '../attendance/attendance.entity';
import { CourseInstructorEntity } from '../courses/course-instructor.entity';
import { CourseEntity } from '../courses/course.entity';
import { AttendanceSessionEntity } from '../sessions/attendance-session.entity';
import { UserEntity } from '../users/user.entity';
import { Init001Migration1767000000000 } from './migrations/001-init.migration';

export const TYPEORM_ENTITIES = [
  UserEntity,
  CourseEntity,
  CourseInstructorEntity,
  AttendanceSessionEntity,
  AttendanceEntity,
];

export const TYPEORM_MIGRATIONS = [Init001Migration1767000000000];

// DATETIME columns carry no zone; 'Z' makes the driver read and write them as UTC.
const DB_TIMEZONE = 'Z';

export function createDataSourceOptionsFromEnv(): DataSourceOptions {
  return {
    type: 'mysql',
    host: process.env.DB_HOST ?? 'localhost',
    port: Number(process.env.DB_PORT ?? 3306),
    username: process.env.DB_USER ?? 'root',
    password: process.env.DB_PASS ?? '',
    database: process.env.DB_NAME ?? 'attendance',
    timezone: DB_TIMEZONE,
    entities: TYPEORM_ENTITIES,
    migrations: TYPEORM_MIGRATIONS,
    synchronize: false,
  };
}

export function createTypeOrmOptionsFromConfig(
  config: ConfigService
): TypeOrmModuleOptions {
  return {
    type: 'mysql',
    host: config.get<string>('DB_HOST', 'localhost'),
    port: Number(config.get<string>('DB_PORT', '3306')),
    username: config.get<string>('DB_USER', 'root'),
    password: config.get<string>('DB_PASS', ''),
    database: config.get<string>('DB_NAME', 'attendance'),
    timezone: DB_TIMEZONE,
    entities: TYPEORM_ENTITIES,
    migrations: TYPEORM_MIGRATIONS,
    synchronize: false,
    logging: config.get<string>('DB_LOGGING', 'false') === 'true',
  };
}
