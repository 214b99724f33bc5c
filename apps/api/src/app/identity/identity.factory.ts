import { AttendanceSettings } from '../common/config/attendance-settings';
import { IdentityResolver } from './identity.types';
import { ManualIdentityResolver } from './manual-identity.resolver';
import { OAuthUserinfoIdentityResolver } from './oauth-userinfo-identity.resolver';
import { ProxyHeaderIdentityResolver } from './proxy-header-identity.resolver';

export function createIdentityResolver(settings: AttendanceSettings): IdentityResolver {
  switch (settings.authMode) {
    case 'proxy':
      return new ProxyHeaderIdentityResolver();
    case 'oauth':
      if (!settings.oauthUserinfoUrl) {
        throw new Error('OAUTH_USERINFO_URL is required when AUTH_MODE=oauth');
      }
      return new OAuthUserinfoIdentityResolver(settings.oauthUserinfoUrl);
    case 'manual':
      return new ManualIdentityResolver();
  }
}
