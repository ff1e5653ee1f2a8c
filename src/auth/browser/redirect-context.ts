/**
 * Per-attempt navigation state: current URL, the attempt's cookie jar,
 * fields extracted from the last page and the hop counter.
 */

import type { CookieJar } from 'tough-cookie';
import { ProtocolMismatch } from '../errors.js';

export interface RedirectContext {
    url: string;
    readonly jar: CookieJar;
    /** Fields extracted from the last classified page */
    fields: Record<string, string | undefined>;
    /** Hops followed in the current navigation */
    redirects: number;
    readonly maxRedirects: number;
}

export function createRedirectContext(jar: CookieJar, maxRedirects: number, url = ''): RedirectContext {
    return { url, jar, fields: {}, redirects: 0, maxRedirects };
}

/**
 * Count one followed hop towards `to`. The hop that would exceed the
 * ceiling throws instead of being followed.
 */
export function countRedirect(ctx: RedirectContext, to: string): void {
    if (ctx.redirects >= ctx.maxRedirects) {
        throw new ProtocolMismatch(`Redirect limit of ${ctx.maxRedirects} exceeded`, to);
    }
    ctx.redirects++;
    ctx.url = to;
}
