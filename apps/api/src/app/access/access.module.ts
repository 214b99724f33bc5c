import { Global, Module } from '@nestjs/common';
import {
  ATTENDANCE_SETTINGS,
  AttendanceSettings,
} from '../common/config/attendance-settings';
import { AccessPolicy } from './access-policy';

@Global()
@Module({
  providers: [
    {
      provide: AccessPolicy,
      inject: [ATTENDANCE_SETTINGS],
      useFactory: (settings: AttendanceSettings) => new AccessPolicy(settings),
    },
  ],
  exports: [AccessPolicy],
})
export class AccessModule {}
