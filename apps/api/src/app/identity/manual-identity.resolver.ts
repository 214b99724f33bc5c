import { normalizeEmail, normalizePersonName } from '../common/utils/names.util';
import {
  ANONYMOUS,
  IdentityRequest,
  IdentityResolver,
  queryText,
  ResolvedIdentity,
} from './identity.types';

/** Development sign-in: the identity is whatever `?email=&name=` says. */
export class ManualIdentityResolver implements IdentityResolver {
  async resolve(req: IdentityRequest): Promise<ResolvedIdentity> {
    const email = normalizeEmail(queryText(req, 'email'));
    if (!email) return ANONYMOUS;
    return { email, name: normalizePersonName(queryText(req, 'name')) || null };
  }
}
