/**
 * Auth types - credentials, persisted session artifact, progress reporting
 */

import { z } from 'zod';
import type { AuthMethod } from '../app/config.js';
import type { AuthStateName } from './flow/states.js';

/**
 * What one login attempt starts from. Never persisted.
 */
export interface Credentials {
    /** MitID user id */
    readonly user: string;
    readonly method: AuthMethod;
    /** MitID password, TOKEN method only */
    readonly password?: string;
}

/**
 * Cookie as stored in the session file. Mirrors the subset of
 * tough-cookie's fields needed to replay it against the broker.
 */
export const storedCookieSchema = z.object({
    name: z.string().min(1),
    value: z.string(),
    /** Host name, optionally with the leading dot of a domain cookie */
    domain: z.string().regex(/^\.?[a-z0-9-]+(\.[a-z0-9-]+)*$/i, 'Not a host name'),
    path: z.string().startsWith('/'),
    /** ISO timestamp, absent for session cookies */
    expires: z.string().datetime().optional(),
    secure: z.boolean(),
    httpOnly: z.boolean(),
});

export type StoredCookie = z.infer<typeof storedCookieSchema>;

/**
 * Authenticated broker session produced by a successful login.
 * Substitutes for repeating the login until the broker revokes it.
 */
export const sessionArtifactSchema = z.object({
    version: z.literal(1),
    /** MitID user id the session belongs to */
    user: z.string().min(1),
    cookies: z.array(storedCookieSchema).min(1),
    /** Extra request headers the broker expects (client-id, ntag, ...) */
    headers: z.record(z.string(), z.string()),
    issuedAt: z.string().datetime(),
    /** Broker-assigned user id, when the login response carried one */
    brokerUserId: z.string().optional(),
});

export type SessionArtifact = z.infer<typeof sessionArtifactSchema>;

/** `unreachable`: the broker could not be asked, so nothing is known about the session. */
export type SessionCheck = 'valid' | 'invalid' | 'unreachable';

/**
 * Progress notification sent to the interactive surface.
 */
export interface AuthProgress {
    user: string;
    state: AuthStateName;
    message: string;
}

export type ProgressListener = (progress: AuthProgress) => void;

/**
 * Asks the user for a value mid-flow (the CPR number). Rejects when the
 * signal aborts.
 */
export type InputRequester = (prompt: string, signal: AbortSignal) => Promise<string>;
