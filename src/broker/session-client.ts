/**
 * Broker session: replays a session artifact (cookies + headers) against
 * the broker's APIs.
 */

import type { Headers, Response } from 'undici';
import { logger } from '../app/logger.js';
import { importCookies, storeResponseCookies } from '../http/cookies.js';
import type { HttpSession, HttpSessionFactory } from '../http/session-factory.js';
import { NetworkError, errorFromAbort } from '../auth/errors.js';
import type { SessionArtifact } from '../auth/types.js';

export interface BrokerRequest {
    method?: 'GET' | 'POST';
    json?: unknown;
    headers?: Record<string, string>;
}

export interface BrokerResponse {
    url: string;
    status: number;
    headers: Headers;
    body: string;
}

export interface BrokerSessionOptions {
    userAgent: string;
    requestTimeoutMs: number;
}

export class BrokerSession {
    private constructor(
        private readonly http: HttpSession,
        readonly artifact: SessionArtifact,
        private readonly options: BrokerSessionOptions,
    ) {}

    static async open(
        artifact: SessionArtifact,
        factory: HttpSessionFactory,
        options: BrokerSessionOptions,
    ): Promise<BrokerSession> {
        const jar = await importCookies(artifact.cookies);
        return new BrokerSession(factory.create(jar), artifact, options);
    }

    async send(url: string, req: BrokerRequest = {}): Promise<BrokerResponse> {
        const method = req.method ?? (req.json === undefined ? 'GET' : 'POST');
        const headers: Record<string, string> = {
            'user-agent': this.options.userAgent,
            accept: 'application/json',
            ...this.artifact.headers,
        };
        if (req.json !== undefined) headers['content-type'] = 'application/json';
        const cookie = await this.http.jar.getCookieString(url);
        if (cookie) headers.cookie = cookie;
        Object.assign(headers, req.headers);

        const signal = AbortSignal.timeout(this.options.requestTimeoutMs);
        const path = new URL(url).pathname;

        let response: Response;
        let body: string;
        try {
            response = await this.http.fetch(url, {
                method,
                headers,
                body: req.json === undefined ? undefined : JSON.stringify(req.json),
                redirect: 'manual',
                signal,
            });
            body = await response.text();
        } catch (error) {
            if (signal.aborted) throw errorFromAbort(signal, `${method} ${path}`);
            const message = error instanceof Error ? error.message : String(error);
            throw new NetworkError(`${method} ${path} failed: ${message}`, { cause: error });
        }

        await storeResponseCookies(this.http.jar, url, response.headers.getSetCookie());
        logger.debug({ method, path, status: response.status }, 'Broker API call');
        return { url, status: response.status, headers: response.headers, body };
    }

    close(): Promise<void> {
        return this.http.close();
    }
}
