import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AccessModule } from './access/access.module';
import { AttendanceModule } from './attendance/attendance.module';
import { validateEnv } from './common/config/env.validation';
import { SettingsModule } from './common/config/settings.module';
import { CoursesModule } from './courses/courses.module';
import { DatabaseModule } from './database/database.module';
import { IdentityMiddleware } from './identity/identity.middleware';
import { IdentityModule } from './identity/identity.module';
import { ReportsModule } from './reports/reports.module';
import { SessionsModule } from './sessions/sessions.module';
import { UsersModule } from './users/users.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    SettingsModule,
    DatabaseModule,
    AccessModule,
    IdentityModule,
    UsersModule,
    CoursesModule,
    SessionsModule,
    AttendanceModule,
    ReportsModule,
  ],
  controllers: [AppController],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(IdentityMiddleware).forRoutes('*');
  }
}
