/**
 * Conversion between a tough-cookie jar and the cookies stored in the
 * session file.
 */

import { Cookie, CookieJar } from 'tough-cookie';
import type { StoredCookie } from '../auth/types.js';

/**
 * Every cookie the jar would send to `url` on any path.
 */
export async function exportCookies(jar: CookieJar, url: string): Promise<StoredCookie[]> {
    const host = new URL(url).hostname;
    const cookies = await jar.getCookies(url, { allPaths: true });

    return cookies.map((cookie) => {
        const stored: StoredCookie = {
            name: cookie.key,
            value: cookie.value,
            domain: cookie.domain ?? host,
            path: cookie.path ?? '/',
            secure: cookie.secure,
            httpOnly: cookie.httpOnly,
        };
        if (cookie.expires instanceof Date) {
            stored.expires = cookie.expires.toISOString();
        }
        return stored;
    });
}

/**
 * Rebuild a jar from stored cookies. Expired cookies are dropped by the jar.
 */
export async function importCookies(cookies: StoredCookie[], jar: CookieJar = new CookieJar()): Promise<CookieJar> {
    for (const stored of cookies) {
        const cookie = new Cookie({
            key: stored.name,
            value: stored.value,
            domain: stored.domain,
            path: stored.path,
            expires: stored.expires ? new Date(stored.expires) : 'Infinity',
            secure: stored.secure,
            httpOnly: stored.httpOnly,
        });
        await jar.setCookie(cookie, `https://${stored.domain}${stored.path}`, { ignoreError: true });
    }
    return jar;
}

/**
 * Store every Set-Cookie header of a response. Cookies the jar refuses
 * (foreign domain, public suffix) are skipped.
 */
export async function storeResponseCookies(jar: CookieJar, url: string, setCookies: string[]): Promise<number> {
    let stored = 0;
    for (const header of setCookies) {
        const cookie = await jar.setCookie(header, url, { ignoreError: true });
        if (cookie) stored++;
    }
    return stored;
}
