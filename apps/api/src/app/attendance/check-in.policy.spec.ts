import { isTruthyFlag, prepareCheckIn } from './check-in.policy';

const DOMAIN = '@uni.test';

describe('prepareCheckIn', () => {
  it('normalizes a typed check-in', () => {
    expect(
      prepareCheckIn(
        { email: ' Ana.Lopez@UNI.test ', name: '  Ana \t  Lopez ', source: 'typed' },
        DOMAIN
      )
    ).toEqual({ ok: true, email: 'ana.lopez@uni.test', name: 'Ana Lopez' });
  });

  it('requires a name on typed check-ins', () => {
    expect(prepareCheckIn({ email: 'ana@uni.test', name: '   ', source: 'typed' }, DOMAIN)).toEqual(
      { ok: false, reason: 'invalid_name' }
    );
  });

  it('requires the institutional suffix on typed emails', () => {
    for (const email of ['ana@gmail.com', 'ana@uni.test.evil.com', '@uni.test', 'not an email']) {
      expect(prepareCheckIn({ email, name: 'Ana', source: 'typed' }, DOMAIN)).toEqual({
        ok: false,
        reason: 'invalid_email',
      });
    }
  });

  it('accepts any non-empty email asserted by the identity provider', () => {
    expect(
      prepareCheckIn({ email: 'Guest@Partner.org', name: 'Guest User', source: 'identity' }, DOMAIN)
    ).toEqual({ ok: true, email: 'guest@partner.org', name: 'Guest User' });
    expect(prepareCheckIn({ email: ' ', name: 'Guest', source: 'identity' }, DOMAIN)).toEqual({
      ok: false,
      reason: 'invalid_email',
    });
  });

  it('derives a display name for identity check-ins without one', () => {
    expect(
      prepareCheckIn({ email: 'maria_ioannou-k@uni.test', name: null, source: 'identity' }, DOMAIN)
    ).toEqual({ ok: true, email: 'maria_ioannou-k@uni.test', name: 'Maria Ioannou K' });
  });
});

describe('isTruthyFlag', () => {
  it('accepts 1, true and yes in any case', () => {
    expect(['1', 'TRUE', ' yes ', 'True'].map(isTruthyFlag)).toEqual([true, true, true, true]);
  });

  it('rejects anything else', () => {
    expect(['0', 'no', '', 'on'].map(isTruthyFlag)).toEqual([false, false, false, false]);
    expect(isTruthyFlag(undefined)).toBe(false);
    expect(isTruthyFlag(['yes'])).toBe(true);
  });
});
