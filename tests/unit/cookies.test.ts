import { describe, it, expect } from 'vitest';
import { CookieJar } from 'tough-cookie';
import { exportCookies, importCookies, storeResponseCookies } from '../../src/http/cookies.js';

const BROKER = 'https://www.nordnet.dk';

describe('cookies', () => {
  it('exports every path of the broker host', async () => {
    const jar = new CookieJar();
    await jar.setCookie('NEXT=s1; Path=/; Secure; HttpOnly', `${BROKER}/login`);
    await jar.setCookie('lang=da; Path=/api; Expires=Fri, 01 Jan 2100 00:00:00 GMT', `${BROKER}/api/2`);

    const cookies = await exportCookies(jar, BROKER);
    const byName = Object.fromEntries(cookies.map((c) => [c.name, c]));

    expect(byName.NEXT).toEqual({
      name: 'NEXT', value: 's1', domain: 'www.nordnet.dk', path: '/', secure: true, httpOnly: true,
    });
    expect(byName.lang).toEqual({
      name: 'lang', value: 'da', domain: 'www.nordnet.dk', path: '/api',
      expires: '2100-01-01T00:00:00.000Z', secure: false, httpOnly: false,
    });
  });

  it('rebuilds a jar that sends the stored cookies', async () => {
    const jar = await importCookies([
      { name: 'NEXT', value: 's1', domain: 'www.nordnet.dk', path: '/', secure: true, httpOnly: true },
      {
        name: 'old', value: 'x', domain: 'www.nordnet.dk', path: '/',
        expires: '2000-01-01T00:00:00.000Z', secure: false, httpOnly: false,
      },
    ]);

    expect(await jar.getCookieString(`${BROKER}/api/2/accounts`)).toBe('NEXT=s1');
  });

  it('skips Set-Cookie headers for foreign domains', async () => {
    const jar = new CookieJar();
    const stored = await storeResponseCookies(jar, `${BROKER}/logind`, [
      '_csrf=abc; Path=/',
      'evil=1; Domain=example.com; Path=/',
    ]);

    expect(stored).toBe(1);
    expect(await jar.getCookieString(`${BROKER}/`)).toBe('_csrf=abc');
  });
});
