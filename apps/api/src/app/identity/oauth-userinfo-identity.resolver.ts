import { Logger, ServiceUnavailableException } from '@nestjs/common';
import axios from 'axios';
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
  ResolvedIdentity,
} from './identity.types';

export interface UserinfoResponse {
  status: number;
  data: unknown;
}

export type UserinfoFetcher = (url: string, accessToken: string) => Promise<UserinfoResponse>;

export const fetchUserinfo: UserinfoFetcher = async (url, accessToken) => {
  const response = await axios.get<unknown>(url, {
    headers: { Authorization: `Bearer ${accessToken}` },
    timeout: 5000,
    validateStatus: () => true,
  });
  return { status: response.status, data: response.data };
};

function field(data: unknown, key: string): string {
  if (typeof data !== 'object' || data === null || !(key in data)) return '';
  const value: unknown = Reflect.get(data, key);
  return typeof value === 'string' ? value : '';
}

/** Forwards the caller's bearer token to the OAuth provider's userinfo endpoint. */
export class OAuthUserinfoIdentityResolver implements IdentityResolver {
  private readonly logger = new Logger(OAuthUserinfoIdentityResolver.name);

  constructor(
    private readonly userinfoUrl: string,
    private readonly fetcher: UserinfoFetcher = fetchUserinfo
  ) {}

  async resolve(req: IdentityRequest): Promise<ResolvedIdentity> {
    const authorization = firstHeader(req, ['Authorization']);
    const match = /^Bearer\s+(.+)$/i.exec(authorization);
    const token = match?.[1]?.trim();
    if (!token) return ANONYMOUS;

    let response: UserinfoResponse;
    try {
      response = await this.fetcher(this.userinfoUrl, token);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Userinfo request failed: ${detail}`);
      throw new ServiceUnavailableException('Identity provider is unavailable.');
    }

    if (response.status === 401 || response.status === 403) return ANONYMOUS;
    if (response.status < 200 || response.status >= 300) {
      this.logger.warn(`Userinfo endpoint answered ${response.status}`);
      throw new ServiceUnavailableException('Identity provider is unavailable.');
    }

    const email = normalizeEmail(field(response.data, 'email'));
    if (!email) return ANONYMOUS;
    const name =
      normalizePersonName(field(response.data, 'name')) ||
      normalizePersonName(
        `${field(response.data, 'given_name')} ${field(response.data, 'family_name')}`
      ) ||
      displayNameFromEmail(email);
    return { email, name };
  }
}
