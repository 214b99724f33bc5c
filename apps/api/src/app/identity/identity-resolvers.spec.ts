import { ServiceUnavailableException } from '@nestjs/common';
import { IdentityRequest } from './identity.types';
import { ManualIdentityResolver } from './manual-identity.resolver';
import {
  OAuthUserinfoIdentityResolver,
  UserinfoFetcher,
} from './oauth-userinfo-identity.resolver';
import { ProxyHeaderIdentityResolver } from './proxy-header-identity.resolver';

function request(
  headers: Record<string, string | string[] | undefined> = {},
  query: Record<string, unknown> = {}
): IdentityRequest {
  return { headers, query };
}

describe('ManualIdentityResolver', () => {
  it('reads email and name from the query string', async () => {
    const identity = await new ManualIdentityResolver().resolve(
      request({}, { email: ' Ana.Lopez@Uni.test ', name: '  Ana   Lopez ' })
    );
    expect(identity).toEqual({ email: 'ana.lopez@uni.test', name: 'Ana Lopez' });
  });

  it('is anonymous without an email', async () => {
    const identity = await new ManualIdentityResolver().resolve(request({}, { name: 'Ana' }));
    expect(identity).toEqual({ email: null, name: null });
  });
});

describe('ProxyHeaderIdentityResolver', () => {
  const resolver = new ProxyHeaderIdentityResolver();

  it('takes the first non-empty email header in priority order', async () => {
    const identity = await resolver.resolve(
      request({
        'x-auth-request-email': '  ',
        'x-forwarded-email': 'Second@Uni.test',
        'remote-user': 'last@uni.test',
        'x-user': 'Nikos Georgiou',
      })
    );
    expect(identity).toEqual({ email: 'second@uni.test', name: 'Nikos Georgiou' });
  });

  it('replaces a numeric uid with a name derived from the email', async () => {
    const identity = await resolver.resolve(
      request({ 'x-email': 'eleni.markou@uni.test', 'x-ldap-user': '104233' })
    );
    expect(identity).toEqual({ email: 'eleni.markou@uni.test', name: 'Eleni Markou' });
  });

  it('falls back to the sso query parameters', async () => {
    const identity = await resolver.resolve(
      request({}, { sso_email: 'kostas@uni.test', sso_name: 'Kostas P' })
    );
    expect(identity).toEqual({ email: 'kostas@uni.test', name: 'Kostas P' });
  });

  it('is anonymous when no email header is present', async () => {
    expect(await resolver.resolve(request({ 'x-user': 'Someone' }))).toEqual({
      email: null,
      name: null,
    });
  });
});

describe('OAuthUserinfoIdentityResolver', () => {
  const url = 'https://idp.test/userinfo';

  function createResolver(fetcher: UserinfoFetcher) {
    return new OAuthUserinfoIdentityResolver(url, fetcher);
  }

  it('forwards the bearer token and reads the userinfo claims', async () => {
    const fetcher = jest.fn<ReturnType<UserinfoFetcher>, Parameters<UserinfoFetcher>>(
      async () => ({
        status: 200,
        data: { email: 'Maria@Uni.test', given_name: 'Maria', family_name: 'Ioannou' },
      })
    );
    const identity = await createResolver(fetcher).resolve(
      request({ authorization: 'Bearer test-token' })
    );
    expect(fetcher).toHaveBeenCalledWith(url, 'test-token');
    expect(identity).toEqual({ email: 'maria@uni.test', name: 'Maria Ioannou' });
  });

  it('does not call the provider without a bearer token', async () => {
    const fetcher = jest.fn<ReturnType<UserinfoFetcher>, Parameters<UserinfoFetcher>>();
    expect(await createResolver(fetcher).resolve(request())).toEqual({
      email: null,
      name: null,
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('treats a rejected token as anonymous', async () => {
    const fetcher = jest.fn<ReturnType<UserinfoFetcher>, Parameters<UserinfoFetcher>>(
      async () => ({ status: 401, data: {} })
    );
    const identity = await createResolver(fetcher).resolve(
      request({ authorization: 'Bearer expired-token' })
    );
    expect(identity).toEqual({ email: null, name: null });
  });

  it('reports an unreachable provider as unavailable', async () => {
    const fetcher = jest.fn<ReturnType<UserinfoFetcher>, Parameters<UserinfoFetcher>>(
      async () => {
        throw new Error('connect ECONNREFUSED');
      }
    );
    await expect(
      createResolver(fetcher).resolve(request({ authorization: 'Bearer test-token' }))
    ).rejects.toBeInstanceOf(ServiceUnavailableException);
  });
});
