import { AccessRole, AuthRoles } from '@attendance/shared';
import { normalizeEmail } from '../common/utils/names.util';

export type ReportScope = { kind: 'all' } | { kind: 'instructor'; email: string };

export interface RoleAllowLists {
  adminEmails: ReadonlySet<string>;
  instructorEmails: ReadonlySet<string>;
  secretaryEmails: ReadonlySet<string>;
}

/**
 * Role membership is decided purely by the configured allow-lists.
 * Admins implicitly hold every other role.
 */
export class AccessPolicy {
  constructor(private readonly lists: RoleAllowLists) {}

  isAdmin(email: string | null | undefined): boolean {
    const key = normalizeEmail(email);
    return Boolean(key) && this.lists.adminEmails.has(key);
  }

  isInstructor(email: string | null | undefined): boolean {
    const key = normalizeEmail(email);
    if (!key) return false;
    return this.lists.instructorEmails.has(key) || this.isAdmin(key);
  }

  isSecretary(email: string | null | undefined): boolean {
    const key = normalizeEmail(email);
    if (!key) return false;
    return this.lists.secretaryEmails.has(key) || this.isAdmin(key);
  }

  rolesOf(email: string | null | undefined): AuthRoles {
    return {
      admin: this.isAdmin(email),
      instructor: this.isInstructor(email),
      secretary: this.isSecretary(email),
    };
  }

  hasAnyRole(email: string | null | undefined, roles: readonly AccessRole[]): boolean {
    return roles.some((role) => {
      switch (role) {
        case AccessRole.ADMIN:
          return this.isAdmin(email);
        case AccessRole.INSTRUCTOR:
          return this.isInstructor(email);
        case AccessRole.SECRETARY:
          return this.isSecretary(email);
      }
    });
  }

  // Instructors only see their own courses; admins and secretaries see everything.
  reportScopeFor(email: string | null | undefined): ReportScope | null {
    const key = normalizeEmail(email);
    if (!key) return null;
    if (this.isAdmin(key) || this.isSecretary(key)) return { kind: 'all' };
    if (this.isInstructor(key)) return { kind: 'instructor', email: key };
    return null;
  }
}
