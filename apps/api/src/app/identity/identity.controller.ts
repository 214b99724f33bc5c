import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { AuthMeResponse } from '@attendance/shared';
import { AccessPolicy } from '../access/access-policy';
import { IdentityContextService } from './identity-context.service';

@ApiTags('auth')
@Controller('auth')
export class IdentityController {
  constructor(
    private readonly identityContext: IdentityContextService,
    private readonly accessPolicy: AccessPolicy
  ) {}

  @Get('me')
  me(): AuthMeResponse {
    const identity = this.identityContext.current();
    return { identity, roles: this.accessPolicy.rolesOf(identity.email) };
  }
}
