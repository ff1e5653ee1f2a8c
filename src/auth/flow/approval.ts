/**
 * Approval polling
 *
 * Polls until the app answers, the window closes or the attempt is
 * aborted. The wait between polls and the poll request itself both stop
 * as soon as either signal fires.
 */

import { setTimeout as sleep } from 'timers/promises';
import { logger } from '../../app/logger.js';
import type { ApprovalVerdict } from '../browser/classify.js';
import { ProtocolMismatch, Rejected, TimedOut, errorFromAbort } from '../errors.js';

export interface ApprovalPollOptions {
    pollIntervalMs: number;
    maxWaitMs: number;
    /** The attempt's signal */
    signal?: AbortSignal;
    /** One poll request; must honour the signal it is given */
    poll: (signal: AbortSignal) => Promise<ApprovalVerdict>;
    onPending?: (elapsedMs: number, polls: number) => void;
}

/**
 * Resolve with the authorization code once the user approves.
 * Throws TimedOut, Rejected (Cancelled on abort) or ProtocolMismatch.
 */
export async function waitForApproval(options: ApprovalPollOptions): Promise<string> {
    const startedAt = Date.now();
    const deadline = new AbortController();
    const timer = setTimeout(() => {
        deadline.abort(new TimedOut(`No approval within ${Math.round(options.maxWaitMs / 1000)} s`));
    }, options.maxWaitMs);

    const signal = options.signal ? AbortSignal.any([options.signal, deadline.signal]) : deadline.signal;

    try {
        for (let polls = 1; ; polls++) {
            if (signal.aborted) throw errorFromAbort(signal, 'Approval poll');

            const verdict = await options.poll(signal);
            switch (verdict.status) {
                case 'approved':
                    logger.debug({ polls }, 'Approval received');
                    return verdict.authorizationCode;
                case 'rejected':
                    throw new Rejected(`Login declined in the app (${verdict.detail})`);
                case 'expired':
                    throw new TimedOut(`Approval request expired (${verdict.detail})`);
                case 'unknown':
                    throw new ProtocolMismatch(`Unexpected approval status: ${verdict.detail}`);
                case 'pending':
                    options.onPending?.(Date.now() - startedAt, polls);
                    break;
            }

            try {
                await sleep(options.pollIntervalMs, undefined, { signal });
            } catch (error) {
                if (signal.aborted) throw errorFromAbort(signal, 'Approval poll');
                throw error;
            }
        }
    } finally {
        clearTimeout(timer);
    }
}
