/**
 * Session store
 *
 * Persists the current session artifact as JSON (mode 0600) so later
 * runs can skip the MitID login. Writes go to a temp file first and are
 * renamed into place. Nothing here throws on I/O problems: a missing or
 * broken file reads as "no session".
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { BrokerConfig } from '../app/config.js';
import { logger, redact } from '../app/logger.js';
import type { HttpSessionFactory } from '../http/session-factory.js';
import { BrokerSession } from '../broker/session-client.js';
import { NetworkError, StorageError } from './errors.js';
import { sessionArtifactSchema, type SessionCheck, type SessionArtifact } from './types.js';

export interface SessionStoreOptions {
    /** Absolute path of the session file */
    path: string;
    broker: BrokerConfig;
    httpFactory: HttpSessionFactory;
    userAgent: string;
    requestTimeoutMs: number;
    sessionLifetimeMinutes: number;
}

type ReadResult =
    | { status: 'missing' }
    | { status: 'corrupt'; reason: string }
    | { status: 'ok'; artifact: SessionArtifact };

export class SessionStore {
    constructor(private readonly options: SessionStoreOptions) {}

    get path(): string {
        return this.options.path;
    }

    async load(user: string): Promise<SessionArtifact | undefined> {
        const result = await this.read();
        switch (result.status) {
            case 'missing':
                logger.debug({ path: this.path }, 'No stored session');
                return undefined;
            case 'corrupt':
                logger.warn({ path: this.path, reason: result.reason }, 'Ignoring unreadable session file');
                return undefined;
            case 'ok':
                if (result.artifact.user !== user) {
                    logger.debug({ user: redact(user) }, 'Stored session belongs to another user');
                    return undefined;
                }
                return result.artifact;
        }
    }

    /**
     * Write the artifact for `user`, replacing whatever was stored.
     * Returns false (and logs) when the file could not be written.
     */
    async save(user: string, artifact: SessionArtifact): Promise<boolean> {
        if (artifact.user !== user) {
            throw new Error(`Session artifact belongs to ${redact(artifact.user)}, not ${redact(user)}`);
        }

        const tmp = `${this.path}.tmp`;
        try {
            await fs.mkdir(dirname(this.path), { recursive: true, mode: 0o700 });
            await fs.writeFile(tmp, JSON.stringify(artifact, null, 2), { mode: 0o600 });
            await fs.chmod(tmp, 0o600);
            await fs.rename(tmp, this.path);
        } catch (cause) {
            await fs.rm(tmp, { force: true }).catch(() => undefined);
            const error = new StorageError('Could not write session file', this.path, { cause });
            logger.warn({ error, path: this.path }, 'Session not saved');
            return false;
        }

        logger.debug({ path: this.path, cookies: artifact.cookies.length }, 'Session saved');
        return true;
    }

    /** Remove the stored session of `user` (or an unreadable file). */
    async invalidate(user: string): Promise<void> {
        const result = await this.read();
        if (result.status === 'missing') return;
        if (result.status === 'ok' && result.artifact.user !== user) return;

        try {
            await fs.rm(this.path, { force: true });
            logger.info({ path: this.path }, 'Stored session removed');
        } catch (cause) {
            const error = new StorageError('Could not remove session file', this.path, { cause });
            logger.warn({ error }, 'Session not removed');
        }
    }

    /**
     * Ask the broker whether the artifact still works: the accounts list
     * must come back non-empty. A transport failure is `unreachable`, not
     * a verdict on the session.
     */
    async check(artifact: SessionArtifact): Promise<SessionCheck> {
        const { broker, httpFactory, userAgent, requestTimeoutMs } = this.options;
        let session: BrokerSession | undefined;
        try {
            session = await BrokerSession.open(artifact, httpFactory, { userAgent, requestTimeoutMs });
            const res = await session.send(`${broker.baseUrl}/api/2/accounts`);
            if (res.status !== 200) {
                logger.debug({ status: res.status }, 'Stored session rejected');
                return 'invalid';
            }
            const accounts: unknown = JSON.parse(res.body);
            return Array.isArray(accounts) && accounts.length > 0 ? 'valid' : 'invalid';
        } catch (error) {
            if (error instanceof NetworkError) {
                logger.warn({ error }, 'Broker unreachable, session not checked');
                return 'unreachable';
            }
            logger.debug({ error }, 'Session check failed');
            return 'invalid';
        } finally {
            await session?.close();
        }
    }

    /** Estimated seconds until the broker expires the session, never negative. */
    secondsRemaining(artifact: SessionArtifact, now: number = Date.now()): number {
        const expiresAt = Date.parse(artifact.issuedAt) + this.options.sessionLifetimeMinutes * 60_000;
        return Math.max(0, Math.floor((expiresAt - now) / 1000));
    }

    private async read(): Promise<ReadResult> {
        let raw: string;
        try {
            raw = await fs.readFile(this.path, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return { status: 'missing' };
            }
            return { status: 'corrupt', reason: error instanceof Error ? error.message : String(error) };
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            return { status: 'corrupt', reason: 'invalid JSON' };
        }

        const parsed = sessionArtifactSchema.safeParse(json);
        if (!parsed.success) {
            return { status: 'corrupt', reason: parsed.error.issues[0]?.message ?? 'schema mismatch' };
        }
        return { status: 'ok', artifact: parsed.data };
    }
}
