import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AttendanceEntity } from '../attendance/attendance.entity';
import { CoursesModule } from '../courses/courses.module';
import { AttendanceSessionEntity } from './attendance-session.entity';
import { SessionTokenIssuer } from './session-token';
import { SessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';

@Module({
  imports: [TypeOrmModule.forFeature([AttendanceSessionEntity, AttendanceEntity]), CoursesModule],
  controllers: [SessionsController],
  providers: [SessionsService, SessionTokenIssuer],
  exports: [SessionsService],
})
export class SessionsModule {}
