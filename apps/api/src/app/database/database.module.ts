import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MigrationRunnerService } from './migration-runner.service';
import { createTypeOrmOptionsFromConfig } from './typeorm.options';

// ConfigModule is global, so the factory only needs the injected service.
@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: createTypeOrmOptionsFromConfig,
    }),
  ],
  providers: [MigrationRunnerService],
  exports: [MigrationRunnerService],
})
export class DatabaseModule {}
