/**
 * Field extraction from provider pages
 *
 * The Signicat/MitID pages are script-driven; everything the emulated
 * browser needs to continue is in data attributes, meta refresh tags or
 * hidden forms. jsdom parses the markup, no scripts run.
 */

import { JSDOM } from 'jsdom';

export type LoginPageFields = {
    baseUrl: string;
    initAuthPath: string;
    authCodePath: string;
    finalizeAuthPath: string;
};

export type CprFormFields = {
    baseUrl: string;
    verifyPath: string;
    finalizePath: string;
};

export type ApprovalPageFields = {
    baseUrl: string;
    startPath: string;
    pollPath: string;
    /** Where a code display value is submitted, when the page offers it */
    tokenPath?: string;
};

export type CallbackFields = {
    code?: string;
    state?: string;
    error?: string;
};

export interface AutoSubmitForm {
    action: string;
    method: 'GET' | 'POST';
    fields: Record<string, string>;
}

/** Parse markup; undefined for bodies that are not HTML (JSON, empty). */
export function parseMarkup(body: string): Document | undefined {
    if (!/<[a-z!]/i.test(body)) return undefined;
    return new JSDOM(body).window.document;
}

function attr(el: Element | null, name: string): string | undefined {
    const value = el?.getAttribute(name)?.trim();
    return value ? value : undefined;
}

export function readLoginPage(doc: Document): LoginPageFields | undefined {
    const el = doc.querySelector('[data-base-url][data-init-auth-path]');
    const baseUrl = attr(el, 'data-base-url');
    const initAuthPath = attr(el, 'data-init-auth-path');
    const authCodePath = attr(el, 'data-auth-code-path');
    const finalizeAuthPath = attr(el, 'data-finalize-auth-path');
    if (!baseUrl || !initAuthPath || !authCodePath || !finalizeAuthPath) return undefined;
    return { baseUrl, initAuthPath, authCodePath, finalizeAuthPath };
}

export function readCprForm(doc: Document): CprFormFields | undefined {
    const el = doc.querySelector('#cpr-form');
    const baseUrl = attr(el, 'data-base-url');
    const verifyPath = attr(el, 'data-verify-path');
    const finalizePath = attr(el, 'data-finalize-cpr-path');
    if (!baseUrl || !verifyPath || !finalizePath) return undefined;
    return { baseUrl, verifyPath, finalizePath };
}

export function readApprovalPage(doc: Document): ApprovalPageFields | undefined {
    const el = doc.querySelector('[data-poll-path]');
    const baseUrl = attr(el, 'data-base-url');
    const startPath = attr(el, 'data-start-path');
    const pollPath = attr(el, 'data-poll-path');
    if (!baseUrl || !startPath || !pollPath) return undefined;
    const tokenPath = attr(el, 'data-token-path');
    return tokenPath ? { baseUrl, startPath, pollPath, tokenPath } : { baseUrl, startPath, pollPath };
}

/** Client-side bootstrap page: the real page is loaded from data-index-url. */
export function readBootstrapUrl(doc: Document): string | undefined {
    return attr(doc.querySelector('[data-index-url]'), 'data-index-url');
}

export function readMetaRefresh(doc: Document): string | undefined {
    for (const meta of Array.from(doc.querySelectorAll('meta'))) {
        if (meta.getAttribute('http-equiv')?.toLowerCase() !== 'refresh') continue;
        const match = /url\s*=\s*['"]?([^'"\s]+)/i.exec(meta.getAttribute('content') ?? '');
        if (match) return match[1];
    }
    return undefined;
}

/**
 * A form that submits itself on load: only hidden inputs (a noscript
 * submit button is allowed), as used by SAML POST binding.
 */
export function readAutoSubmitForm(doc: Document): AutoSubmitForm | undefined {
    for (const form of Array.from(doc.querySelectorAll('form'))) {
        const action = attr(form, 'action');
        if (!action) continue;
        if (form.querySelector('select, textarea')) continue;

        const inputs = Array.from(form.querySelectorAll('input'));
        const hidden = inputs.filter((input) => input.type === 'hidden');
        const interactive = inputs.filter((input) => input.type !== 'hidden' && input.type !== 'submit');
        if (hidden.length === 0 || interactive.length > 0) continue;

        const fields: Record<string, string> = {};
        for (const input of hidden) {
            if (input.name) fields[input.name] = input.value;
        }
        const method = (form.getAttribute('method') ?? 'GET').toUpperCase() === 'POST' ? 'POST' : 'GET';
        return { action, method, fields };
    }
    return undefined;
}

/** CSRF token the broker embeds in its login page. */
export function readCsrfToken(doc: Document): string | undefined {
    return attr(doc.querySelector('[data-csrf]'), 'data-csrf');
}
