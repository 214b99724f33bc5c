import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { AccessRole } from '@attendance/shared';
import { AccessPolicy } from '../../access/access-policy';
import { IdentityContextService } from '../../identity/identity-context.service';
import { ROLES_KEY } from '../decorators/roles.decorator';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly identityContext: IdentityContextService,
    private readonly accessPolicy: AccessPolicy
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const roles = this.reflector.getAllAndOverride<AccessRole[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!roles || roles.length === 0) return true;

    const email = this.identityContext.current().email;
    if (!email) {
      throw new UnauthorizedException('Sign in with your university account.');
    }
    if (!this.accessPolicy.hasAnyRole(email, roles)) {
      throw new ForbiddenException('Access restricted.');
    }
    return true;
  }
}
