import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';

@Injectable()
export class MigrationRunnerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(MigrationRunnerService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService
  ) {}

  isEnabled(): boolean {
    const flag = this.config.get<string>('DB_RUN_MIGRATIONS');
    return flag === undefined
      ? this.config.get<string>('NODE_ENV') !== 'production'
      : flag === 'true';
  }

  async onApplicationBootstrap() {
    if (!this.isEnabled()) {
      this.logger.log('Database migrations skipped (DB_RUN_MIGRATIONS).');
      return;
    }

    this.logger.log('Running database migrations...');
    const applied = await this.dataSource.runMigrations();
    this.logger.log(`Database migrations completed (${applied.length} applied).`);
  }
}
