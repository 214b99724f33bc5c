import { Global, Module } from '@nestjs/common';
import { ATTENDANCE_SETTINGS } from '../common/config/attendance-settings';
import { createIdentityResolver } from './identity.factory';
import { IdentityContextService } from './identity-context.service';
import { IdentityController } from './identity.controller';
import { IdentityMiddleware } from './identity.middleware';
import { IDENTITY_RESOLVER } from './identity.types';

@Global()
@Module({
  controllers: [IdentityController],
  providers: [
    IdentityContextService,
    IdentityMiddleware,
    {
      provide: IDENTITY_RESOLVER,
      inject: [ATTENDANCE_SETTINGS],
      useFactory: createIdentityResolver,
    },
  ],
  exports: [IdentityContextService, IdentityMiddleware, IDENTITY_RESOLVER],
})
export class IdentityModule {}
