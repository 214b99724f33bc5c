import type { MigrationInterface, QueryRunner } from 'typeorm';

// TypeORM expects migration class names to end with a JS timestamp.
export class Init001Migration1767000000000 implements MigrationInterface {
  name = 'Init001Migration1767000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS users (
        id CHAR(36) NOT NULL,
        name VARCHAR(200) NOT NULL,
        email VARCHAR(254) NOT NULL,
        role ENUM('admin','instructor') NOT NULL,
        createdAt DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
        PRIMARY KEY (id),
        UNIQUE KEY UQ_users_email (email)
      ) ENGINE=InnoDB;
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS courses (
        id CHAR(36) NOT NULL,
        code VARCHAR(50) NOT NULL,
        title VARCHAR(200) NOT NULL,
        createdAt DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
        PRIMARY KEY (id),
        UNIQUE KEY UQ_courses_code (code)
      ) ENGINE=InnoDB;
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS course_instructors (
        id CHAR(36) NOT NULL,
        courseId CHAR(36) NOT NULL,
        userId CHAR(36) NOT NULL,
        createdAt DATETIME(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
        PRIMARY KEY (id),
        UNIQUE KEY UQ_course_instructors_course_user (courseId, userId),
        KEY IX_course_instructors_userId (userId),
        CONSTRAINT FK_course_instructors_courseId FOREIGN KEY (courseId) REFERENCES courses(id) ON DELETE CASCADE,
        CONSTRAINT FK_course_instructors_userId FOREIGN KEY (userId) REFERENCES users(id) ON DELETE CASCADE
      ) ENGINE=InnoDB;
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS attendance_sessions (
        id CHAR(36) NOT NULL,
        courseId CHAR(36) NOT NULL,
        startTime DATETIME(3) NOT NULL,
        endTime DATETIME(3) NULL,
        isOpen TINYINT(1) NOT NULL DEFAULT 1,
        token CHAR(32) NOT NULL,
        expiresAt DATETIME(3) NOT NULL,
        PRIMARY KEY (id),
        UNIQUE KEY UQ_attendance_sessions_token (token),
        KEY IX_attendance_sessions_course_open (courseId, isOpen),
        CONSTRAINT FK_attendance_sessions_courseId FOREIGN KEY (courseId) REFERENCES courses(id) ON DELETE CASCADE,
        CONSTRAINT CK_attendance_sessions_expiry CHECK (expiresAt >= startTime)
      ) ENGINE=InnoDB;
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS attendance (
        id CHAR(36) NOT NULL,
        sessionId CHAR(36) NOT NULL,
        studentName VARCHAR(200) NOT NULL,
        studentEmail VARCHAR(254) NOT NULL,
        createdAt DATETIME(3) NOT NULL,
        PRIMARY KEY (id),
        UNIQUE KEY UQ_attendance_session_email (sessionId, studentEmail),
        KEY IX_attendance_createdAt (createdAt),
        CONSTRAINT FK_attendance_sessionId FOREIGN KEY (sessionId) REFERENCES attendance_sessions(id) ON DELETE CASCADE
      ) ENGINE=InnoDB;
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP TABLE IF EXISTS attendance');
    await queryRunner.query('DROP TABLE IF EXISTS attendance_sessions');
    await queryRunner.query('DROP TABLE IF EXISTS course_instructors');
    await queryRunner.query('DROP TABLE IF EXISTS courses');
    await queryRunner.query('DROP TABLE IF EXISTS users');
  }
}
