import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { DataSource } from 'typeorm';
import { ATTENDANCE_SETTINGS, AttendanceSettings } from './common/config/attendance-settings';
import { CLOCK, Clock } from './common/utils/clock';
import { MigrationRunnerService } from './database/migration-runner.service';

@ApiTags('health')
@Controller('health')
export class AppController {
  constructor(
    private readonly dataSource: DataSource,
    private readonly migrations: MigrationRunnerService,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ATTENDANCE_SETTINGS) private readonly settings: AttendanceSettings
  ) {}

  @Get()
  get() {
    return {
      ok: true,
      database: this.dataSource.isInitialized,
      migrationsOnBoot: this.migrations.isEnabled(),
      authMode: this.settings.authMode,
      serverTime: this.clock.now().toISOString(),
    };
  }
}
