import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, systemClock } from '../utils/clock';
import { ATTENDANCE_SETTINGS, loadAttendanceSettings } from './attendance-settings';

@Global()
@Module({
  providers: [
    {
      provide: ATTENDANCE_SETTINGS,
      inject: [ConfigService],
      useFactory: loadAttendanceSettings,
    },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [ATTENDANCE_SETTINGS, CLOCK],
})
export class SettingsModule {}
