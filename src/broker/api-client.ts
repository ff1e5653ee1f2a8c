/**
 * Nordnet API client
 *
 * Calls the broker with the current session artifact. A 401 (or a 403
 * whose body names the session) triggers exactly one re-authentication
 * through the SessionSource and one retry; a second refusal is
 * AuthenticationFailed.
 *
 * The transaction API on the separate API host takes a JWT bearer token
 * obtained with the session cookies.
 */

import { z } from 'zod';
import type { BrokerConfig } from '../app/config.js';
import { logger } from '../app/logger.js';
import type { HttpSessionFactory } from '../http/session-factory.js';
import { AuthenticationFailed, Cancelled } from '../auth/errors.js';
import type { SessionSource } from '../auth/manager.js';
import type { SessionArtifact } from '../auth/types.js';
import { BrokerSession, type BrokerRequest, type BrokerResponse } from './session-client.js';

export class BrokerApiError extends Error {
    constructor(readonly status: number, message: string) {
        super(`Nordnet API error ${status}: ${message}`);
        this.name = 'BrokerApiError';
    }
}

export interface ApiClientOptions {
    user: string;
    sessions: SessionSource;
    httpFactory: HttpSessionFactory;
    broker: BrokerConfig;
    userAgent: string;
    requestTimeoutMs: number;
}

export const accountSchema = z.object({
    accid: z.number(),
    accno: z.union([z.number(), z.string()]),
    type: z.string().optional(),
    alias: z.string().optional(),
}).passthrough();

export type BrokerAccount = z.infer<typeof accountSchema>;

const tokenSchema = z.object({ jwt: z.string().min(1) }).passthrough();

const summarySchema = z.object({
    totalNumberOfTransactions: z.number().optional(),
    numberOfTransactions: z.number().optional(),
}).passthrough();

export const TRANSACTION_PAGE_SIZE = 800;
const TOKEN_REFRESH_MARGIN_MS = 30_000;
const TRANSACTIONS_PATH = '/transaction/transaction-and-notes/v1';

/** Expiry (ms since epoch) from a JWT's exp claim. */
export function jwtExpiry(token: string): number | undefined {
    const payload = token.split('.')[1];
    if (!payload) return undefined;
    try {
        const claims: unknown = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
        if (typeof claims !== 'object' || claims === null) return undefined;
        const exp: unknown = Reflect.get(claims, 'exp');
        return typeof exp === 'number' ? exp * 1000 : undefined;
    } catch {
        return undefined;
    }
}

function isAuthFailure(res: BrokerResponse): boolean {
    if (res.status === 401) return true;
    if (res.status !== 403) return false;
    return /session|auth|login/i.test(res.body);
}

function decode(res: BrokerResponse): unknown {
    if (res.status === 204) return [];
    if (res.status < 200 || res.status >= 300) {
        throw new BrokerApiError(res.status, res.body.slice(0, 200));
    }
    if (res.body.trim() === '') return null;
    try {
        return JSON.parse(res.body);
    } catch {
        throw new BrokerApiError(res.status, 'response is not JSON');
    }
}

function today(): string {
    return new Date().toISOString().slice(0, 10);
}

export interface TransactionQuery {
    fromDate?: string;
    toDate?: string;
    onProgress?: (fetched: number, total: number) => void;
}

export class ApiClient {
    private session?: BrokerSession;
    private opening?: Promise<BrokerSession>;
    private renewing?: Promise<BrokerSession>;
    private bearer?: { token: string; expiresAt?: number };

    constructor(private readonly options: ApiClientOptions) {}

    /**
     * Call the legacy API on the broker host and return parsed JSON.
     * 204 reads as an empty list.
     */
    async request(path: string, req: BrokerRequest = {}): Promise<unknown> {
        const url = `${this.options.broker.baseUrl}${path}`;
        const session = await this.currentSession();
        let res = await session.send(url, req);

        if (isAuthFailure(res)) {
            logger.info({ path, status: res.status }, 'Session refused, re-authenticating once');
            const renewed = await this.renew(session);
            res = await renewed.send(url, req);
            if (isAuthFailure(res)) {
                throw new AuthenticationFailed(`Broker refused the new session (HTTP ${res.status})`, res.status);
            }
        }
        return decode(res);
    }

    async getAccounts(): Promise<BrokerAccount[]> {
        return z.array(accountSchema).parse(await this.request('/api/2/accounts'));
    }

    getAccountInfo(accid: number): Promise<unknown> {
        return this.request(`/api/2/accounts/${accid}/info`);
    }

    getPositions(accid: number): Promise<unknown> {
        return this.request(`/api/2/accounts/${accid}/positions`);
    }

    getTrades(accid: number): Promise<unknown> {
        return this.request(`/api/2/accounts/${accid}/trades`);
    }

    getOrders(accid: number): Promise<unknown> {
        return this.request(`/api/2/accounts/${accid}/orders`);
    }

    /** Seconds the bearer token stays usable, undefined before the first token. */
    tokenSecondsRemaining(now: number = Date.now()): number | undefined {
        if (!this.bearer?.expiresAt) return undefined;
        return Math.max(0, Math.floor((this.bearer.expiresAt - now) / 1000));
    }

    /** Every transaction of an account, newest first, fetched in pages. */
    async getTransactions(accid: number, query: TransactionQuery = {}): Promise<unknown[]> {
        const range = {
            accids: String(accid),
            fromDate: query.fromDate ?? '2010-01-01',
            toDate: query.toDate ?? today(),
            includeCancellations: 'false',
        };

        const summary = summarySchema.safeParse(await this.txRequest(`${TRANSACTIONS_PATH}/transaction-summary`, range));
        const total = summary.success
            ? (summary.data.totalNumberOfTransactions ?? summary.data.numberOfTransactions ?? 0)
            : 0;

        const transactions: unknown[] = [];
        for (let offset = 0; ; offset += TRANSACTION_PAGE_SIZE) {
            const page = await this.txRequest(`${TRANSACTIONS_PATH}/transactions/page`, {
                ...range,
                offset: String(offset),
                limit: String(TRANSACTION_PAGE_SIZE),
                sort: 'ACCOUNTING_DATE',
                sortOrder: 'DESC',
            });
            const batch = pageItems(page);
            if (batch.length === 0) break;

            transactions.push(...batch);
            query.onProgress?.(transactions.length, total);
            if (batch.length < TRANSACTION_PAGE_SIZE) break;
        }
        return transactions;
    }

    async close(): Promise<void> {
        await this.session?.close();
        this.session = undefined;
    }

    // ============================================
    // Transaction API
    // ============================================

    private async txRequest(path: string, params: Record<string, string>): Promise<unknown> {
        const url = new URL(`${this.options.broker.apiBaseUrl}${path}`);
        for (const [name, value] of Object.entries(params)) url.searchParams.set(name, value);

        let res = await this.sendTx(url.toString(), await this.bearerToken());
        if (res.status === 401) {
            logger.debug({ path }, 'Bearer token refused, fetching a new one');
            res = await this.sendTx(url.toString(), await this.bearerToken(true));
            if (res.status === 401) {
                throw new AuthenticationFailed('Transaction API refused a fresh bearer token', 401);
            }
        }
        return decode(res);
    }

    private async sendTx(url: string, token: string): Promise<BrokerResponse> {
        const session = await this.currentSession();
        return session.send(url, {
            headers: {
                authorization: `Bearer ${token}`,
                'client-id': 'NEXT',
                'x-locale': this.options.broker.locale,
            },
        });
    }

    private async bearerToken(force = false): Promise<string> {
        const cached = this.bearer;
        const fresh = cached && (cached.expiresAt === undefined || cached.expiresAt - Date.now() >= TOKEN_REFRESH_MARGIN_MS);
        if (cached && fresh && !force) return cached.token;

        const parsed = tokenSchema.safeParse(
            await this.request('/nnxapi/authorization/v1/tokens', { method: 'POST', json: {} }),
        );
        if (!parsed.success) throw new BrokerApiError(200, 'token response without jwt');

        this.bearer = { token: parsed.data.jwt, expiresAt: jwtExpiry(parsed.data.jwt) };
        return parsed.data.jwt;
    }

    // ============================================
    // Session
    // ============================================

    private currentSession(): Promise<BrokerSession> {
        if (this.session) return Promise.resolve(this.session);
        this.opening ??= this.open().finally(() => {
            this.opening = undefined;
        });
        return this.opening;
    }

    private async open(): Promise<BrokerSession> {
        const artifact = await this.options.sessions.getSession(this.options.user);
        this.session = await this.openSession(artifact);
        return this.session;
    }

    /** One renewal at a time; requests refused together share it. */
    private renew(stale: BrokerSession): Promise<BrokerSession> {
        if (this.session && this.session !== stale) return Promise.resolve(this.session);
        this.renewing ??= this.reauthenticate(stale).finally(() => {
            this.renewing = undefined;
        });
        return this.renewing;
    }

    private async reauthenticate(stale: BrokerSession): Promise<BrokerSession> {
        let artifact: SessionArtifact;
        try {
            artifact = await this.options.sessions.reauthenticate(this.options.user);
        } catch (error) {
            if (error instanceof Cancelled) throw error;
            throw new AuthenticationFailed('Re-authentication failed', undefined, { cause: error });
        }

        await stale.close();
        this.bearer = undefined;
        this.session = await this.openSession(artifact);
        return this.session;
    }

    private openSession(artifact: SessionArtifact): Promise<BrokerSession> {
        const { httpFactory, userAgent, requestTimeoutMs } = this.options;
        return BrokerSession.open(artifact, httpFactory, { userAgent, requestTimeoutMs });
    }
}

function pageItems(page: unknown): unknown[] {
    if (Array.isArray(page)) return page;
    if (typeof page === 'object' && page !== null) {
        const items: unknown = Reflect.get(page, 'transactions');
        if (Array.isArray(items)) return items;
    }
    return [];
}
