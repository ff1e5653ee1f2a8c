/**
 * Login flow controller
 *
 * Runs one login attempt against Nordnet through Signicat and MitID (app
 * approval or code display), as a state machine. Every state change is reported through
 * onProgress. Failures end the attempt in a terminal state and are
 * thrown as typed errors; nothing is retried here.
 */

import { randomInt, randomUUID } from 'crypto';
import { z } from 'zod';
import type { ApprovalConfig, BrokerConfig, SignicatConfig } from '../../app/config.js';
import { logger, redact } from '../../app/logger.js';
import { exportCookies } from '../../http/cookies.js';
import type { HttpSession } from '../../http/session-factory.js';
import { classifyApproval, type ApprovalVerdict } from '../browser/classify.js';
import {
    BrowserEmulationClient,
    describeUrl,
    unexpectedPage,
    type HopResult,
    type PageOutcome,
} from '../browser/client.js';
import {
    parseMarkup,
    readCsrfToken,
    type ApprovalPageFields,
    type CprFormFields,
    type LoginPageFields,
} from '../browser/extract.js';
import { createRedirectContext, type RedirectContext } from '../browser/redirect-context.js';
import {
    AuthFlowError,
    ConfigurationError,
    NetworkError,
    ProtocolMismatch,
    Rejected,
    TimedOut,
    errorFromAbort,
} from '../errors.js';
import type { Credentials, InputRequester, ProgressListener, SessionArtifact } from '../types.js';
import { waitForApproval } from './approval.js';
import { canTransition, failureStateFor, type AuthFlowState } from './states.js';

export interface AuthFlowOptions {
    credentials: Credentials;
    /** Fresh session owned by this attempt */
    session: HttpSession;
    broker: BrokerConfig;
    signicat: SignicatConfig;
    maxRedirects: number;
    requestTimeoutMs: number;
    approval: ApprovalConfig;
    userAgent: string;
    requestInput: InputRequester;
    onProgress?: ProgressListener;
    signal?: AbortSignal;
}

/** Anything that runs one attempt; AuthManager creates one per login. */
export interface LoginFlow {
    run(): Promise<SessionArtifact>;
}

type IdentityAnswer = Extract<PageOutcome, { kind: 'verification' | 'approval' }>;

const startResponseSchema = z.object({
    requestUri: z.string().optional(),
    data: z.object({ requestUri: z.string().optional() }).passthrough().optional(),
}).passthrough();

const loginResponseSchema = z.object({
    user_id: z.union([z.string(), z.number()]).optional(),
    userId: z.union([z.string(), z.number()]).optional(),
}).passthrough();

const cprResponseSchema = z.object({ success: z.boolean().optional() }).passthrough();

const CPR_PATTERN = /^(\d{6})-?(\d{4})$/;
const TOKEN_PATTERN = /^\d{6}$/;

function parseJson(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        return undefined;
    }
}

function isAbsoluteUrl(value: string): boolean {
    try {
        new URL(value);
        return true;
    } catch {
        return false;
    }
}

/** 5xx is treated as transient, anything else unexpected as a protocol change. */
function expectOk(hop: HopResult, step: string): void {
    if (hop.status >= 200 && hop.status < 300) return;
    const message = `${step} answered HTTP ${hop.status}`;
    if (hop.status >= 500) throw new NetworkError(message);
    throw new ProtocolMismatch(message, describeUrl(hop.url));
}

export class AuthFlowController implements LoginFlow {
    private current: AuthFlowState = { name: 'Init' };
    private started = false;
    private readonly browser: BrowserEmulationClient;
    private readonly ctx: RedirectContext;
    private readonly brokerOrigin: string;
    private readonly oidcState = `NEXT_OIDC_STATE_${randomUUID()}`;

    constructor(private readonly options: AuthFlowOptions) {
        if (!options.credentials.user) {
            throw new ConfigurationError('No MitID user id given (use --user or auth.user)');
        }
        if (options.credentials.method === 'TOKEN' && !options.credentials.password) {
            throw new ConfigurationError('The TOKEN method needs the MitID password (use --password)');
        }
        for (const url of [options.broker.baseUrl, options.broker.apiBaseUrl, options.broker.redirectUri, options.signicat.authorizeUrl]) {
            if (!isAbsoluteUrl(url)) throw new ConfigurationError(`Invalid URL in configuration: ${url}`);
        }

        this.brokerOrigin = new URL(options.broker.baseUrl).origin;
        this.ctx = createRedirectContext(options.session.jar, options.maxRedirects);
        this.browser = new BrowserEmulationClient({
            fetch: options.session.fetch,
            userAgent: options.userAgent,
            requestTimeoutMs: options.requestTimeoutMs,
            callbackOrigin: new URL(options.broker.redirectUri).origin,
            signal: options.signal,
        });
    }

    get state(): AuthFlowState {
        return this.current;
    }

    async run(): Promise<SessionArtifact> {
        if (this.started) {
            throw new Error('A login flow runs one attempt only; create a new AuthFlowController');
        }
        this.started = true;
        this.report('Preparing login');

        try {
            await this.openBroker();

            const authorizeUrl = await this.requestAuthorization();
            this.transition({ name: 'AuthorizationRequested', authorizeUrl }, 'Opening MitID login');

            const login = await this.openLoginPage(authorizeUrl);
            this.transition({ name: 'ProviderLoginPage', login }, 'Submitting MitID user id');

            let answer = await this.submitIdentity(login);
            if (answer.kind === 'verification') {
                this.transition({ name: 'CprVerification', form: answer.fields }, 'CPR verification required');
                answer = await this.verifyCpr(answer.fields);
            }
            if (answer.kind !== 'approval') throw unexpectedPage(answer, 'approval');

            const token = this.options.credentials.method === 'TOKEN';
            this.transition(
                { name: 'AppApprovalPending', approval: answer.fields },
                token ? 'Enter the code from your MitID code display' : 'Approve the login in the MitID app',
            );
            const authCode = token ? await this.submitToken(answer.fields) : await this.awaitApproval(answer.fields);

            this.transition({ name: 'CallbackExchange' }, 'Approved, completing login');
            const artifact = await this.exchange(login, authCode);

            this.transition({ name: 'Authenticated', artifact }, 'Logged in to Nordnet');
            return artifact;
        } catch (error) {
            const failure = this.toFlowError(error);
            const name = failureStateFor(failure);
            if (canTransition(this.current.name, name)) {
                this.transition({ name, error: failure }, failure.message);
            }
            throw failure;
        }
    }

    // ============================================
    // Steps
    // ============================================

    /** Init: broker cookies, CSRF token and the cookies its scripts would set. */
    private async openBroker(): Promise<void> {
        const page = await this.browser.navigate(this.ctx, { url: `${this.options.broker.baseUrl}/logind` });
        if (page.status >= 500) {
            throw new NetworkError(`Broker login page answered HTTP ${page.status}`);
        }
        const doc = parseMarkup(page.body);
        const csrf = doc ? readCsrfToken(doc) : undefined;
        logger.debug({ csrf: redact(csrf) }, 'Broker login page loaded');

        const lang = this.options.broker.locale.split('-')[0];
        const dcid = `dcid.1.${Date.now()}.${randomInt(1_000_000_000)}`;
        await this.plantCookie('consent_cookie', 'analytics,functional,marketing,necessary');
        await this.plantCookie('lang', lang);
        await this.plantCookie('_dcid', dcid);
    }

    private async plantCookie(name: string, value: string): Promise<void> {
        await this.ctx.jar.setCookie(`${name}=${value}; Path=/`, `${this.options.broker.baseUrl}/`);
    }

    /** Register the OIDC flow with the broker and get the authorize URL back. */
    private async requestAuthorization(): Promise<string> {
        const { broker } = this.options;
        const res = await this.browser.request(this.ctx, {
            url: `${broker.apiBaseUrl}/authentication/v2/methods/signicat/start`,
            method: 'POST',
            json: { redirectUri: broker.redirectUri, state: this.oidcState, idp: 'MITID' },
            headers: {
                accept: '*/*',
                'x-locale': broker.locale,
                origin: this.brokerOrigin,
                referer: `${this.brokerOrigin}/`,
            },
        });

        if (res.status === 200) {
            const parsed = startResponseSchema.safeParse(parseJson(res.body));
            const requestUri = parsed.success ? (parsed.data.data?.requestUri ?? parsed.data.requestUri) : undefined;
            if (requestUri) {
                logger.debug({ length: requestUri.length }, 'Got authorize URL from broker');
                return this.resolveRequestUri(requestUri);
            }
            logger.warn('Broker start answered without requestUri, using constructed authorize URL');
        } else {
            logger.warn({ status: res.status }, 'Broker start failed, using constructed authorize URL');
        }
        return this.fallbackAuthorizeUrl();
    }

    /** requestUri is either the full authorize URL or a pushed-request reference. */
    private resolveRequestUri(requestUri: string): string {
        if (/^https?:\/\//.test(requestUri)) return requestUri;
        if (requestUri.startsWith('urn:')) {
            const url = new URL(this.options.signicat.authorizeUrl);
            url.searchParams.set('client_id', this.options.signicat.clientId);
            url.searchParams.set('request_uri', requestUri);
            return url.toString();
        }
        throw new ProtocolMismatch(`Unusable requestUri from broker: ${redact(requestUri, 12)}`);
    }

    private fallbackAuthorizeUrl(): string {
        const { signicat, broker } = this.options;
        const url = new URL(signicat.authorizeUrl);
        url.searchParams.set('client_id', signicat.clientId);
        url.searchParams.set('response_type', 'code');
        url.searchParams.set('redirect_uri', broker.redirectUri);
        url.searchParams.set('scope', signicat.scope);
        url.searchParams.set('state', this.oidcState);
        return url.toString();
    }

    private async openLoginPage(authorizeUrl: string): Promise<LoginPageFields> {
        const page = await this.browser.navigate(this.ctx, { url: authorizeUrl });
        if (page.kind !== 'login') throw unexpectedPage(page, 'MitID login');
        logger.debug({ base: describeUrl(page.fields.baseUrl) }, 'MitID login page reached');
        return page.fields;
    }

    /** The provider answers with the CPR form (first login) or the approval page. */
    private async submitIdentity(login: LoginPageFields): Promise<IdentityAnswer> {
        const { user, method, password } = this.options.credentials;
        const form: Record<string, string> = { identityClaim: user, method };
        if (method === 'TOKEN' && password) form.password = password;

        const answer = await this.browser.navigate(this.ctx, {
            url: `${login.baseUrl}${login.initAuthPath}`,
            method: 'POST',
            form,
        });
        if (answer.kind === 'verification' || answer.kind === 'approval') return answer;
        throw unexpectedPage(answer, 'CPR verification or approval');
    }

    private async verifyCpr(form: CprFormFields): Promise<IdentityAnswer> {
        const input = await this.options.requestInput(
            'Please enter your CPR number (DDMMYYXXXX): ',
            this.options.signal ?? new AbortController().signal,
        );
        const match = CPR_PATTERN.exec(input.trim());
        if (!match) {
            throw new Rejected('CPR number must be 10 digits (DDMMYYXXXX)', 'cpr-verification-failed');
        }

        const res = await this.browser.request(this.ctx, {
            url: `${form.baseUrl}${form.verifyPath}`,
            method: 'POST',
            form: { cpr: `${match[1]}${match[2]}`, remember: 'false' },
        });
        const parsed = cprResponseSchema.safeParse(parseJson(res.body));
        if (res.status !== 200 || (parsed.success && parsed.data.success === false)) {
            throw new Rejected(`CPR verification failed (HTTP ${res.status})`, 'cpr-verification-failed');
        }
        logger.info('CPR number verified');

        const next = await this.browser.navigate(this.ctx, { url: `${form.baseUrl}${form.finalizePath}` });
        if (next.kind !== 'approval') throw unexpectedPage(next, 'approval');
        return next;
    }

    private async awaitApproval(page: ApprovalPageFields): Promise<string> {
        const start = await this.browser.request(this.ctx, {
            url: `${page.baseUrl}${page.startPath}`,
            method: 'POST',
            json: {},
        });
        expectOk(start, 'Approval start');

        const pollUrl = `${page.baseUrl}${page.pollPath}`;
        return waitForApproval({
            pollIntervalMs: this.options.approval.pollIntervalMs,
            maxWaitMs: this.options.approval.maxWaitMs,
            signal: this.options.signal,
            poll: async (signal): Promise<ApprovalVerdict> => {
                const res = await this.browser.request(this.ctx, { url: pollUrl }, { signal });
                expectOk(res, 'Approval poll');
                return classifyApproval(parseJson(res.body));
            },
            onPending: (elapsedMs) => {
                this.report(`Waiting for approval in the MitID app (${Math.round(elapsedMs / 1000)} s)`);
            },
        });
    }

    /** TOKEN method: one code from the code display instead of polling the app. */
    private async submitToken(page: ApprovalPageFields): Promise<string> {
        if (!page.tokenPath) {
            throw new ProtocolMismatch('The provider did not offer code display login', describeUrl(page.baseUrl));
        }
        const input = await this.options.requestInput(
            'Enter the 6-digit code from your MitID code display: ',
            this.options.signal ?? new AbortController().signal,
        );
        const otp = input.replace(/\s/g, '');
        if (!TOKEN_PATTERN.test(otp)) {
            throw new Rejected('The code display shows 6 digits');
        }

        const res = await this.browser.request(this.ctx, {
            url: `${page.baseUrl}${page.tokenPath}`,
            method: 'POST',
            form: { otp },
        });
        expectOk(res, 'Code display submit');

        const verdict = classifyApproval(parseJson(res.body));
        switch (verdict.status) {
            case 'approved':
                return verdict.authorizationCode;
            case 'rejected':
                throw new Rejected(`Code or password not accepted (${verdict.detail})`);
            case 'expired':
                throw new TimedOut(`Code display login expired (${verdict.detail})`);
            default:
                throw new ProtocolMismatch(`Unexpected code display answer: ${verdict.detail}`, describeUrl(res.url));
        }
    }

    /** Hand the code to the provider, intercept the OIDC code and open the broker session. */
    private async exchange(login: LoginPageFields, authCode: string): Promise<SessionArtifact> {
        const { broker, credentials } = this.options;

        const res = await this.browser.request(this.ctx, {
            url: `${login.baseUrl}${login.authCodePath}`,
            method: 'POST',
            multipart: { authCode },
        });
        expectOk(res, 'Authorization code submit');

        const callback = await this.browser.navigate(this.ctx, { url: `${login.baseUrl}${login.finalizeAuthPath}` });
        if (callback.kind !== 'callback') throw unexpectedPage(callback, 'callback');
        if (callback.fields.error) {
            throw new Rejected(`Login refused by the identity provider (${callback.fields.error})`);
        }
        const code = callback.fields.code;
        if (!code) throw new ProtocolMismatch('Callback carried no authorization code', describeUrl(callback.finalUrl));
        if (callback.fields.state && callback.fields.state !== this.oidcState) {
            throw new ProtocolMismatch('Callback state does not match this attempt', describeUrl(callback.finalUrl));
        }
        logger.debug({ code: redact(code) }, 'Intercepted OIDC code');

        await this.browser.navigate(this.ctx, { url: `${broker.baseUrl}/logind` });

        const apiHeaders: Record<string, string> = {
            'client-id': 'NEXT',
            ntag: 'NO_NTAG_RECEIVED_YET',
            accept: 'application/json',
            origin: this.brokerOrigin,
            referer: `${this.brokerOrigin}/`,
        };
        const sessions = await this.browser.request(this.ctx, {
            url: `${broker.baseUrl}/nnxapi/authentication/v2/sessions`,
            method: 'POST',
            json: {
                authenticationProvider: 'SIGNICAT',
                countryCode: broker.countryCode,
                signicat: { authorizationCode: code, redirectUri: broker.redirectUri, useDtp: true },
            },
            headers: apiHeaders,
        });
        expectOk(sessions, 'Broker session');

        const loginRes = await this.browser.request(this.ctx, {
            url: `${broker.baseUrl}/api/2/authentication/nnx-session/login`,
            method: 'POST',
            json: {},
            headers: apiHeaders,
        });
        expectOk(loginRes, 'Broker login');
        const ntag = loginRes.headers.get('ntag');
        if (!ntag) throw new ProtocolMismatch('Broker login answered without ntag header', describeUrl(loginRes.url));

        const cookies = await exportCookies(this.ctx.jar, `${broker.baseUrl}/`);
        if (cookies.length === 0) {
            throw new ProtocolMismatch('Login completed but the broker set no cookies');
        }

        const artifact: SessionArtifact = {
            version: 1,
            user: credentials.user,
            cookies,
            headers: {
                'client-id': 'NEXT',
                ntag,
                origin: this.brokerOrigin,
                referer: `${this.brokerOrigin}/`,
            },
            issuedAt: new Date().toISOString(),
        };
        const details = loginResponseSchema.safeParse(parseJson(loginRes.body));
        const brokerUserId = details.success ? (details.data.user_id ?? details.data.userId) : undefined;
        if (brokerUserId !== undefined) artifact.brokerUserId = String(brokerUserId);
        return artifact;
    }

    // ============================================
    // State
    // ============================================

    private toFlowError(error: unknown): AuthFlowError {
        if (error instanceof AuthFlowError) return error;
        if (this.options.signal?.aborted) return errorFromAbort(this.options.signal, 'Login');
        const message = error instanceof Error ? error.message : String(error);
        return new ProtocolMismatch(`Unexpected failure during login: ${message}`, undefined, { cause: error });
    }

    private transition(next: AuthFlowState, message: string): void {
        if (!canTransition(this.current.name, next.name)) {
            throw new Error(`Invalid login state change ${this.current.name} -> ${next.name}`);
        }
        logger.debug({ from: this.current.name, to: next.name }, 'Login state change');
        this.current = next;
        this.report(message);
    }

    private report(message: string): void {
        this.options.onProgress?.({ user: this.options.credentials.user, state: this.current.name, message });
    }
}
