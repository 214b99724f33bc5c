import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { MigrationRunnerService } from './migration-runner.service';

function createService(env: Record<string, string>) {
  const runMigrations = jest.fn(async () => []);
  const dataSource = { runMigrations } as unknown as DataSource;
  // process.env would win over values passed to a real ConfigService.
  const config = { get: (key: string) => env[key] } as unknown as ConfigService;
  return {
    service: new MigrationRunnerService(dataSource, config),
    runMigrations,
  };
}

describe('MigrationRunnerService', () => {
  it('runs migrations outside production by default', async () => {
    const { service, runMigrations } = createService({ NODE_ENV: 'development' });
    await service.onApplicationBootstrap();
    expect(runMigrations).toHaveBeenCalledTimes(1);
  });

  it('skips migrations in production unless asked', async () => {
    const { service, runMigrations } = createService({ NODE_ENV: 'production' });
    await service.onApplicationBootstrap();
    expect(runMigrations).not.toHaveBeenCalled();

    const forced = createService({ NODE_ENV: 'production', DB_RUN_MIGRATIONS: 'true' });
    await forced.service.onApplicationBootstrap();
    expect(forced.runMigrations).toHaveBeenCalledTimes(1);
  });
});
