import { SetMetadata } from '@nestjs/common';
import type { AccessRole } from '@attendance/shared';

export const ROLES_KEY = 'roles';
export const Roles = (...roles: AccessRole[]) => SetMetadata(ROLES_KEY, roles);
