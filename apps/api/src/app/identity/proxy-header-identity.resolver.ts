import {
  displayNameFromEmail,
  normalizeEmail,
  normalizePersonName,
} from '../common/utils/names.util';
import {
  ANONYMOUS,
  firstHeader,
  IdentityRequest,
  IdentityResolver,
  queryText,
  ResolvedIdentity,
} from './identity.types';

export const PROXY_EMAIL_HEADERS = [
  'X-Auth-Request-Email',
  'X-Email',
  'X-Forwarded-Email',
  'X-User-Email',
  'X-LDAP-Email',
  'X-Remote-User',
  'Remote-User',
] as const;

export const PROXY_NAME_HEADERS = [
  'X-Auth-Request-User',
  'X-User',
  'X-Forwarded-User',
  'X-LDAP-User',
  'X-Remote-Name',
  'Display-Name',
  'X-Full-Name',
] as const;

/**
 * Trusts the identity headers set by an authenticating reverse proxy.
 * `sso_email` / `sso_name` query parameters are honoured when the proxy
 * forwards the identity on the redirect instead.
 */
export class ProxyHeaderIdentityResolver implements IdentityResolver {
  async resolve(req: IdentityRequest): Promise<ResolvedIdentity> {
    const email = normalizeEmail(
      firstHeader(req, PROXY_EMAIL_HEADERS) || queryText(req, 'sso_email')
    );
    if (!email) return ANONYMOUS;

    let name = normalizePersonName(
      firstHeader(req, PROXY_NAME_HEADERS) || queryText(req, 'sso_name')
    );
    // LDAP proxies often send the numeric uid as the user name.
    if (!name || /^\d+$/.test(name)) {
      name = displayNameFromEmail(email);
    }
    return { email, name };
  }
}
