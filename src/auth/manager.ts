/**
 * AuthManager - owns the current session per user
 *
 * Handles:
 * - Reusing the stored session when the broker still accepts it
 * - Fresh logins, serialized per user, with progress events and cancel
 * - Re-authentication for the API client (invalidate, log in, save)
 * - Logout (drops the stored session)
 */

import { EventEmitter } from 'events';
import type { ApprovalConfig, AuthMethod, BrokerConfig, SignicatConfig } from '../app/config.js';
import { logger, redact } from '../app/logger.js';
import type { HttpSession, HttpSessionFactory } from '../http/session-factory.js';
import { AttemptQueue } from './attempt-queue.js';
import { Cancelled, errorFromAbort } from './errors.js';
import { AuthFlowController, type AuthFlowOptions, type LoginFlow } from './flow/controller.js';
import type { SessionStore } from './session-store.js';
import type { AuthProgress, InputRequester, ProgressListener, SessionArtifact } from './types.js';

export interface AuthManagerOptions {
    store: SessionStore;
    httpFactory: HttpSessionFactory;
    broker: BrokerConfig;
    signicat: SignicatConfig;
    method: AuthMethod;
    /** MitID password for the TOKEN method; kept in memory only */
    password?: string;
    maxRedirects: number;
    requestTimeoutMs: number;
    approval: ApprovalConfig;
    userAgent: string;
    requestInput: InputRequester;
    /** Builds the flow for one attempt; tests substitute a scripted flow */
    createFlow?: (options: AuthFlowOptions) => LoginFlow;
}

export interface SessionRequest {
    /** Skip the stored session and log in again */
    forceLogin?: boolean;
    signal?: AbortSignal;
}

/** What the API client needs from the manager. */
export interface SessionSource {
    getSession(user: string): Promise<SessionArtifact>;
    reauthenticate(user: string): Promise<SessionArtifact>;
}

export class AuthManager implements SessionSource {
    private readonly events = new EventEmitter();
    private readonly attempts = new AttemptQueue();
    private readonly sessions = new Map<string, SessionArtifact>();
    private readonly controllers = new Map<string, AbortController>();
    private readonly createFlow: (options: AuthFlowOptions) => LoginFlow;

    constructor(private readonly options: AuthManagerOptions) {
        this.createFlow = options.createFlow ?? ((flowOptions) => new AuthFlowController(flowOptions));
    }

    /** Subscribe to progress updates; returns the unsubscribe function. */
    onProgress(listener: ProgressListener): () => void {
        this.events.on('progress', listener);
        return () => {
            this.events.off('progress', listener);
        };
    }

    /** Artifact currently held for `user`, if any. */
    current(user: string): SessionArtifact | undefined {
        return this.sessions.get(user);
    }

    /**
     * A working session for `user`: the held or stored one when the broker
     * still accepts it, otherwise a fresh login.
     */
    async getSession(user: string, request: SessionRequest = {}): Promise<SessionArtifact> {
        if (!request.forceLogin) {
            const known = this.sessions.get(user) ?? (await this.options.store.load(user));
            if (known) {
                const verdict = await this.options.store.check(known);
                if (verdict === 'valid') {
                    logger.info({ user: redact(user) }, 'Reusing stored session');
                    this.sessions.set(user, known);
                    return known;
                }
                this.sessions.delete(user);
                if (verdict === 'invalid') {
                    logger.info({ user: redact(user) }, 'Stored session expired, logging in again');
                    await this.options.store.invalidate(user);
                }
                // unreachable: keep the file, a successful login overwrites it
            }
        }
        return this.login(user, request.signal);
    }

    /**
     * Run one login attempt. Attempts for the same user queue behind each
     * other. The artifact is saved and held only when the attempt succeeds
     * and was not cancelled.
     */
    login(user: string, signal?: AbortSignal): Promise<SessionArtifact> {
        return this.attempts.run(user, async () => {
            const controller = new AbortController();
            const onAbort = () => controller.abort(new Cancelled());
            if (signal?.aborted) onAbort();
            signal?.addEventListener('abort', onAbort, { once: true });
            this.controllers.set(user, controller);

            const session: HttpSession = this.options.httpFactory.create();
            try {
                const flow = this.createFlow({
                    credentials: { user, method: this.options.method, password: this.options.password },
                    session,
                    broker: this.options.broker,
                    signicat: this.options.signicat,
                    maxRedirects: this.options.maxRedirects,
                    requestTimeoutMs: this.options.requestTimeoutMs,
                    approval: this.options.approval,
                    userAgent: this.options.userAgent,
                    requestInput: this.options.requestInput,
                    onProgress: (progress) => this.emitProgress(progress),
                    signal: controller.signal,
                });

                logger.info({ user: redact(user) }, 'Starting MitID login');
                const artifact = await flow.run();
                if (controller.signal.aborted) {
                    throw errorFromAbort(controller.signal, 'Login');
                }

                await this.options.store.save(user, artifact);
                this.sessions.set(user, artifact);
                logger.info({ user: redact(user), cookies: artifact.cookies.length }, 'Login complete');
                return artifact;
            } finally {
                signal?.removeEventListener('abort', onAbort);
                this.controllers.delete(user);
                await session.close();
            }
        });
    }

    /** Drop the current session and log in again. */
    async reauthenticate(user: string): Promise<SessionArtifact> {
        logger.info({ user: redact(user) }, 'Re-authenticating');
        await this.drop(user);
        return this.login(user);
    }

    /** Abort the running attempt for `user`. Returns false when none runs. */
    cancel(user: string): boolean {
        const controller = this.controllers.get(user);
        if (!controller) return false;
        controller.abort(new Cancelled());
        return true;
    }

    /** Cancel every running attempt (Ctrl-C). */
    cancelAll(): void {
        for (const user of this.controllers.keys()) {
            this.cancel(user);
        }
    }

    async logout(user: string): Promise<void> {
        this.cancel(user);
        await this.drop(user);
    }

    private async drop(user: string): Promise<void> {
        this.sessions.delete(user);
        await this.options.store.invalidate(user);
    }

    // Progress is handed over on a later tick, never inside the flow's call stack
    private emitProgress(progress: AuthProgress): void {
        const update = Object.freeze({ ...progress });
        setImmediate(() => this.events.emit('progress', update));
    }
}
