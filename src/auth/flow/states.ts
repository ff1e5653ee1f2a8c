/**
 * Login attempt states
 *
 * Init → AuthorizationRequested → ProviderLoginPage → [CprVerification]
 *      → AppApprovalPending → CallbackExchange → Authenticated
 *
 * Any non-terminal state can fail into TimedOut, Rejected, NetworkError
 * or ProtocolMismatch.
 */

import type { ApprovalPageFields, CprFormFields, LoginPageFields } from '../browser/extract.js';
import type { AuthFlowError } from '../errors.js';
import type { SessionArtifact } from '../types.js';

export type FailureStateName = 'TimedOut' | 'Rejected' | 'NetworkError' | 'ProtocolMismatch';

export type AuthFlowState =
    | { name: 'Init' }
    | { name: 'AuthorizationRequested'; authorizeUrl: string }
    | { name: 'ProviderLoginPage'; login: LoginPageFields }
    | { name: 'CprVerification'; form: CprFormFields }
    | { name: 'AppApprovalPending'; approval: ApprovalPageFields }
    | { name: 'CallbackExchange' }
    | { name: 'Authenticated'; artifact: SessionArtifact }
    | { name: FailureStateName; error: AuthFlowError };

export type AuthStateName = AuthFlowState['name'];

const NEXT: Record<AuthStateName, readonly AuthStateName[]> = {
    Init: ['AuthorizationRequested'],
    AuthorizationRequested: ['ProviderLoginPage'],
    ProviderLoginPage: ['CprVerification', 'AppApprovalPending'],
    CprVerification: ['AppApprovalPending'],
    AppApprovalPending: ['CallbackExchange'],
    CallbackExchange: ['Authenticated'],
    Authenticated: [],
    TimedOut: [],
    Rejected: [],
    NetworkError: [],
    ProtocolMismatch: [],
};

export function isTerminal(name: AuthStateName): boolean {
    return NEXT[name].length === 0;
}

/** Whether `from` may move to `to`. Failures are reachable from every non-terminal state. */
export function canTransition(from: AuthStateName, to: AuthStateName): boolean {
    if (isTerminal(from)) return false;
    if (to === 'TimedOut' || to === 'Rejected' || to === 'NetworkError' || to === 'ProtocolMismatch') return true;
    return NEXT[from].includes(to);
}

/** Terminal state an error ends the attempt in. */
export function failureStateFor(error: AuthFlowError): FailureStateName {
    switch (error.kind) {
        case 'timed-out':
            return 'TimedOut';
        case 'rejected':
            return 'Rejected';
        case 'network':
            return 'NetworkError';
        default:
            return 'ProtocolMismatch';
    }
}
