/**
 * Browser emulation client
 *
 * Drives the provider's script-driven pages without a browser: every
 * request goes out with redirect: 'manual', Set-Cookie headers land in
 * the attempt's jar, and navigate() keeps following hops (HTTP redirects,
 * bootstrap pages, meta refresh, self-submitting forms) until the page
 * classifies as something the flow understands.
 */

import { FormData, type Headers, type Response } from 'undici';
import { logger } from '../../app/logger.js';
import { storeResponseCookies } from '../../http/cookies.js';
import type { Transport } from '../../http/session-factory.js';
import { NetworkError, ProtocolMismatch, errorFromAbort } from '../errors.js';
import { inspectPage, isRedirectStatus, redirectTarget, type PageInspection, type PageSnapshot } from './classify.js';
import { parseMarkup, readAutoSubmitForm, readBootstrapUrl, readMetaRefresh } from './extract.js';
import { countRedirect, type RedirectContext } from './redirect-context.js';

export interface BrowserRequest {
    url: string;
    method?: 'GET' | 'POST';
    /** application/x-www-form-urlencoded body */
    form?: Record<string, string>;
    /** Compact JSON body */
    json?: unknown;
    /** multipart/form-data body */
    multipart?: Record<string, string>;
    headers?: Record<string, string>;
}

export interface HopResult extends PageSnapshot {
    headers: Headers;
}

export type PageOutcome = PageInspection & {
    finalUrl: string;
    status: number;
    body: string;
};

export interface BrowserClientOptions {
    fetch: Transport;
    userAgent: string;
    requestTimeoutMs: number;
    /** Origin that receives the OIDC code; redirects there are never loaded */
    callbackOrigin: string;
    /** Aborts every request of the attempt */
    signal?: AbortSignal;
}

const ACCEPT_HTML = 'text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.7';

/** Origin and path only; query strings carry codes and state. */
export function describeUrl(url: string): string {
    try {
        const parsed = new URL(url);
        return `${parsed.origin}${parsed.pathname}`;
    } catch {
        return '<invalid url>';
    }
}

export function unexpectedPage(outcome: PageOutcome, expected: string): ProtocolMismatch {
    return new ProtocolMismatch(
        `Expected ${expected} page, got ${outcome.kind} (HTTP ${outcome.status})`,
        describeUrl(outcome.finalUrl),
    );
}

export class BrowserEmulationClient {
    constructor(private readonly options: BrowserClientOptions) {}

    /**
     * One request, no redirect following. Cookies go out from and come
     * back into the context's jar.
     */
    async request(ctx: RedirectContext, req: BrowserRequest, extra: { signal?: AbortSignal } = {}): Promise<HopResult> {
        try {
            new URL(req.url);
        } catch (error) {
            throw new ProtocolMismatch(`Unusable URL "${req.url}"`, undefined, { cause: error });
        }

        const { body, contentType } = encodeBody(req);
        const method = req.method ?? (body === undefined ? 'GET' : 'POST');
        const headers: Record<string, string> = {
            'user-agent': this.options.userAgent,
            accept: ACCEPT_HTML,
            'accept-language': 'da-DK,da;q=0.9,en;q=0.8',
        };
        if (contentType) headers['content-type'] = contentType;
        const cookie = await ctx.jar.getCookieString(req.url);
        if (cookie) headers.cookie = cookie;
        Object.assign(headers, req.headers);

        const signals = [AbortSignal.timeout(this.options.requestTimeoutMs)];
        if (this.options.signal) signals.unshift(this.options.signal);
        if (extra.signal) signals.unshift(extra.signal);
        const signal = AbortSignal.any(signals);

        const target = describeUrl(req.url);
        logger.debug({ method, url: target }, 'HTTP request');

        let response: Response;
        let text: string;
        try {
            response = await this.options.fetch(req.url, { method, headers, body, redirect: 'manual', signal });
            text = await response.text();
        } catch (error) {
            if (signal.aborted) throw errorFromAbort(signal, `${method} ${target}`);
            const message = error instanceof Error ? error.message : String(error);
            throw new NetworkError(`${method} ${target} failed: ${message}`, { cause: error });
        }

        const stored = await storeResponseCookies(ctx.jar, req.url, response.headers.getSetCookie());
        logger.debug({ method, url: target, status: response.status, cookies: stored }, 'HTTP response');

        return {
            url: req.url,
            status: response.status,
            location: response.headers.get('location') ?? undefined,
            body: text,
            headers: response.headers,
        };
    }

    /**
     * Follow hops from `start` until a page classifies. Resets the hop
     * counter; the hop exceeding ctx.maxRedirects throws ProtocolMismatch.
     */
    async navigate(ctx: RedirectContext, start: BrowserRequest): Promise<PageOutcome> {
        ctx.url = start.url;
        ctx.redirects = 0;

        let req = start;
        for (;;) {
            const hop = await this.request(ctx, req);
            const inspection = inspectPage(hop, { callbackOrigin: this.options.callbackOrigin });

            if (inspection.kind !== 'unknown') {
                return this.finish(ctx, hop, inspection);
            }

            const next = nextHop(req, hop);
            if (!next) {
                return this.finish(ctx, hop, inspection);
            }
            countRedirect(ctx, next.url);
            logger.debug({ to: describeUrl(next.url), hop: ctx.redirects }, 'Following hop');
            req = next;
        }
    }

    private finish(ctx: RedirectContext, hop: HopResult, inspection: PageInspection): PageOutcome {
        ctx.fields = { ...inspection.fields };
        const finalUrl = inspection.kind === 'callback' ? (redirectTarget(hop) ?? hop.url) : hop.url;
        return { ...inspection, finalUrl, status: hop.status, body: hop.body };
    }
}

function encodeBody(req: BrowserRequest): { body?: string | FormData; contentType?: string } {
    if (req.json !== undefined) {
        return { body: JSON.stringify(req.json), contentType: 'application/json' };
    }
    if (req.form) {
        return { body: new URLSearchParams(req.form).toString(), contentType: 'application/x-www-form-urlencoded' };
    }
    if (req.multipart) {
        const form = new FormData();
        for (const [name, value] of Object.entries(req.multipart)) {
            form.append(name, value);
        }
        // fetch sets the multipart boundary itself
        return { body: form };
    }
    return {};
}

function resolve(href: string, base: string): string {
    try {
        return new URL(href, base).toString();
    } catch (error) {
        throw new ProtocolMismatch(`Unusable link "${href}"`, describeUrl(base), { cause: error });
    }
}

/**
 * The request the page asks for next, or undefined when it asks for none.
 * 303, and 301/302 after a POST, continue as GET; 307/308 repeat the request.
 */
function nextHop(req: BrowserRequest, hop: HopResult): BrowserRequest | undefined {
    if (isRedirectStatus(hop.status)) {
        const target = redirectTarget(hop);
        if (!target) {
            throw new ProtocolMismatch(`HTTP ${hop.status} without a usable Location`, describeUrl(hop.url));
        }
        const method = req.method ?? (req.form || req.json !== undefined || req.multipart ? 'POST' : 'GET');
        const keepsBody = hop.status === 307 || hop.status === 308 || method === 'GET';
        return keepsBody ? { ...req, url: target } : { url: target, method: 'GET' };
    }

    const doc = parseMarkup(hop.body);
    if (!doc) return undefined;

    const bootstrap = readBootstrapUrl(doc);
    if (bootstrap) return { url: resolve(bootstrap, hop.url), method: 'GET' };

    const refresh = readMetaRefresh(doc);
    if (refresh) return { url: resolve(refresh, hop.url), method: 'GET' };

    const form = readAutoSubmitForm(doc);
    if (form) {
        const action = resolve(form.action, hop.url);
        if (form.method === 'POST') return { url: action, method: 'POST', form: form.fields };
        const url = new URL(action);
        for (const [name, value] of Object.entries(form.fields)) url.searchParams.set(name, value);
        return { url: url.toString(), method: 'GET' };
    }

    return undefined;
}
