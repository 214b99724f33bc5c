import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SessionsModule } from '../sessions/sessions.module';
import { AttendanceEntity } from './attendance.entity';
import { AttendanceService } from './attendance.service';
import { CheckInController } from './check-in.controller';

@Module({
  imports: [TypeOrmModule.forFeature([AttendanceEntity]), SessionsModule],
  controllers: [CheckInController],
  providers: [AttendanceService],
  exports: [AttendanceService],
})
export class AttendanceModule {}
