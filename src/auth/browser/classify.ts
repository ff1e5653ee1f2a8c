/**
 * Page and approval-poll classification
 *
 * Pure functions: the same snapshot always yields the same verdict.
 * Unknown shapes are reported as 'unknown' and never guessed at.
 */

import {
    parseMarkup,
    readApprovalPage,
    readCprForm,
    readLoginPage,
    type ApprovalPageFields,
    type CallbackFields,
    type CprFormFields,
    type LoginPageFields,
} from './extract.js';

export type PageKind = 'login' | 'verification' | 'approval' | 'callback' | 'unknown';

/** One HTTP response as seen by the emulated browser. */
export interface PageSnapshot {
    url: string;
    status: number;
    location?: string;
    body: string;
}

export interface ClassifyOptions {
    /** Origin the OIDC code is delivered to (the broker) */
    callbackOrigin: string;
}

export type PageInspection =
    | { kind: 'login'; fields: LoginPageFields }
    | { kind: 'verification'; fields: CprFormFields }
    | { kind: 'approval'; fields: ApprovalPageFields }
    | { kind: 'callback'; fields: CallbackFields }
    | { kind: 'unknown'; fields: Record<string, never> };

export function isRedirectStatus(status: number): boolean {
    return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

/** Absolute target of a redirect, undefined when Location is missing or unparseable. */
export function redirectTarget(snapshot: PageSnapshot): string | undefined {
    if (!isRedirectStatus(snapshot.status) || !snapshot.location) return undefined;
    try {
        return new URL(snapshot.location, snapshot.url).toString();
    } catch {
        return undefined;
    }
}

function readCallback(target: string, callbackOrigin: string): CallbackFields | undefined {
    let url: URL;
    try {
        url = new URL(target);
    } catch {
        return undefined;
    }
    if (url.origin !== new URL(callbackOrigin).origin) return undefined;

    const code = url.searchParams.get('code') ?? undefined;
    const error = url.searchParams.get('error') ?? undefined;
    if (!code && !error) return undefined;

    const fields: CallbackFields = {};
    if (code) fields.code = code;
    if (error) fields.error = error;
    const state = url.searchParams.get('state');
    if (state) fields.state = state;
    return fields;
}

/**
 * Classify a snapshot and extract the fields of its kind.
 */
export function inspectPage(snapshot: PageSnapshot, options: ClassifyOptions): PageInspection {
    const callback = readCallback(redirectTarget(snapshot) ?? snapshot.url, options.callbackOrigin);
    if (callback) return { kind: 'callback', fields: callback };

    if (isRedirectStatus(snapshot.status)) return { kind: 'unknown', fields: {} };

    const doc = parseMarkup(snapshot.body);
    if (!doc) return { kind: 'unknown', fields: {} };

    const cpr = readCprForm(doc);
    if (cpr) return { kind: 'verification', fields: cpr };

    const approval = readApprovalPage(doc);
    if (approval) return { kind: 'approval', fields: approval };

    const login = readLoginPage(doc);
    if (login) return { kind: 'login', fields: login };

    return { kind: 'unknown', fields: {} };
}

export function classifyPage(snapshot: PageSnapshot, options: ClassifyOptions): PageKind {
    return inspectPage(snapshot, options).kind;
}

// ============================================
// Approval polling
// ============================================

export type ApprovalVerdict =
    | { status: 'pending'; detail: string }
    | { status: 'approved'; authorizationCode: string }
    | { status: 'rejected'; detail: string }
    | { status: 'expired'; detail: string }
    | { status: 'unknown'; detail: string };

const PENDING = new Set(['pending', 'timeout', 'waiting', 'channel_verified']);
const APPROVED = new Set(['ok', 'approved', 'completed']);
const REJECTED = new Set(['rejected', 'user_rejected', 'declined', 'cancelled', 'canceled']);
const EXPIRED = new Set(['expired', 'session_expired']);

function stringProp(value: object, key: string): string | undefined {
    const prop: unknown = Reflect.get(value, key);
    return typeof prop === 'string' && prop !== '' ? prop : undefined;
}

/**
 * Classify one poll answer. `approved` needs a non-empty
 * authorizationCode; an OK answer with `confirmation: false` means the
 * user declined in the app.
 */
export function classifyApproval(json: unknown): ApprovalVerdict {
    if (typeof json !== 'object' || json === null || Array.isArray(json)) {
        return { status: 'unknown', detail: 'poll answer is not an object' };
    }

    const raw = stringProp(json, 'status');
    if (!raw) return { status: 'unknown', detail: 'poll answer has no status' };
    const status = raw.toLowerCase();

    if (PENDING.has(status) || status.startsWith('channel_validation')) {
        return { status: 'pending', detail: raw };
    }
    if (REJECTED.has(status)) return { status: 'rejected', detail: raw };
    if (EXPIRED.has(status)) return { status: 'expired', detail: raw };

    if (APPROVED.has(status)) {
        if (Reflect.get(json, 'confirmation') === false) return { status: 'rejected', detail: raw };
        const authorizationCode = stringProp(json, 'authorizationCode');
        if (authorizationCode) return { status: 'approved', authorizationCode };
        return { status: 'unknown', detail: `${raw} without authorizationCode` };
    }

    return { status: 'unknown', detail: raw };
}
