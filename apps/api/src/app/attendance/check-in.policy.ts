import {
  displayNameFromEmail,
  normalizeEmail,
  normalizePersonName,
} from '../common/utils/names.util';

/**
 * `typed`: the student filled in the form. `identity`: the email was asserted
 * by the identity provider, so the institutional suffix is not enforced.
 */
export type CheckInSource = 'typed' | 'identity';

export interface CheckInClaim {
  email: string | null | undefined;
  name: string | null | undefined;
  source: CheckInSource;
}

export type PreparedCheckIn =
  | { ok: true; email: string; name: string }
  | { ok: false; reason: 'invalid_name' | 'invalid_email' };

const EMAIL_SHAPE = /^[^\s@]+@[^\s@]+$/;

export function prepareCheckIn(claim: CheckInClaim, emailDomain: string): PreparedCheckIn {
  const email = normalizeEmail(claim.email);
  let name = normalizePersonName(claim.name);

  if (claim.source === 'typed') {
    if (!name) return { ok: false, reason: 'invalid_name' };
    const domain = emailDomain.toLowerCase();
    if (!EMAIL_SHAPE.test(email) || !email.endsWith(domain) || email === domain) {
      return { ok: false, reason: 'invalid_email' };
    }
    return { ok: true, email, name };
  }

  if (!email) return { ok: false, reason: 'invalid_email' };
  if (!name) name = displayNameFromEmail(email);
  return { ok: true, email, name };
}

export function isTruthyFlag(value: unknown): boolean {
  const raw = Array.isArray(value) ? value[0] : value;
  return typeof raw === 'string' && ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
}
