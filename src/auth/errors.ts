/**
 * Login and session error taxonomy
 *
 * Every failure of a login attempt ends in exactly one of these classes.
 * `kind` is the stable discriminator the UI switches on; `retryable`
 * tells the caller whether starting a fresh attempt can help.
 */

export type AuthErrorKind =
    | 'network'
    | 'protocol-mismatch'
    | 'rejected'
    | 'timed-out'
    | 'authentication-failed'
    | 'storage'
    | 'configuration';

export abstract class AuthFlowError extends Error {
    abstract readonly kind: AuthErrorKind;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }

    /** Message for the terminal, see describeAuthError() */
    get userMessage(): string {
        return describeAuthError(this);
    }
}

/** Transport failure or timeout of a bounded request. */
export class NetworkError extends AuthFlowError {
    readonly kind = 'network' as const;
    readonly retryable = true;
}

/**
 * The provider answered with something none of the known page shapes
 * match. Not user-fixable: the emulated browser logic needs updating.
 */
export class ProtocolMismatch extends AuthFlowError {
    readonly kind = 'protocol-mismatch' as const;
    readonly retryable = false;

    constructor(message: string, readonly url?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export type RejectionReason = 'user-declined' | 'cpr-verification-failed' | 'cancelled';

/** The user (or the provider on the user's behalf) declined the login. */
export class Rejected extends AuthFlowError {
    readonly kind = 'rejected' as const;
    readonly retryable = false;

    constructor(message: string, readonly reason: RejectionReason = 'user-declined', options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** The user aborted the attempt. */
export class Cancelled extends Rejected {
    constructor(message = 'Login cancelled') {
        super(message, 'cancelled');
    }
}

/** The approval window ran out before the app answered. */
export class TimedOut extends AuthFlowError {
    readonly kind = 'timed-out' as const;
    readonly retryable = true;
}

/** The broker still refuses the session after one fresh login. */
export class AuthenticationFailed extends AuthFlowError {
    readonly kind = 'authentication-failed' as const;
    readonly retryable = false;

    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Session file I/O failure. Callers degrade to "no session". */
export class StorageError extends AuthFlowError {
    readonly kind = 'storage' as const;
    readonly retryable = false;

    constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Invalid configuration detected while building a request. Fatal. */
export class ConfigurationError extends AuthFlowError {
    readonly kind = 'configuration' as const;
    readonly retryable = false;
}

export function isAuthFlowError(err: unknown): err is AuthFlowError {
    return err instanceof AuthFlowError;
}

/**
 * Map an aborted signal to the error the attempt ends with. Reasons that
 * already are flow errors (a deadline's TimedOut, a Cancelled) pass
 * through; AbortSignal.timeout() becomes a NetworkError.
 */
export function errorFromAbort(signal: AbortSignal, what: string): AuthFlowError {
    const reason: unknown = signal.reason;
    if (reason instanceof AuthFlowError) return reason;
    if (reason instanceof Error && reason.name === 'TimeoutError') {
        return new NetworkError(`${what} timed out`, { cause: reason });
    }
    return new Cancelled();
}

/**
 * Message for the terminal: retryable failures say so, approval failures
 * point at the MitID app, protocol mismatches stay generic.
 */
export function describeAuthError(err: unknown): string {
    if (!isAuthFlowError(err)) {
        return `Login failed unexpectedly: ${err instanceof Error ? err.message : String(err)}`;
    }

    switch (err.kind) {
        case 'network':
            return `Network problem while logging in (${err.message}). Check your connection and try again.`;
        case 'timed-out':
            return 'MitID approval timed out. Open the MitID app and try again.';
        case 'rejected':
            if (err instanceof Rejected && err.reason === 'cancelled') return 'Login cancelled.';
            if (err instanceof Rejected && err.reason === 'cpr-verification-failed') {
                return 'The CPR number was not accepted. Check it and try again.';
            }
            return 'The login was declined in the MitID app.';
        case 'protocol-mismatch':
            return 'Login failed: the login pages did not look as expected. Run with --verbose and report the log.';
        case 'authentication-failed':
            return 'Nordnet rejected the session even after logging in again. Run: nordport login --force-login';
        case 'storage':
            return `Could not access the session file: ${err.message}`;
        case 'configuration':
            return `Invalid configuration: ${err.message}`;
    }
}
