/**
 * Unit tests for the approval poll loop
 */

import { describe, it, expect } from 'vitest';
import type { ApprovalVerdict } from '../../src/auth/browser/classify.js';
import { Cancelled, ProtocolMismatch, Rejected, TimedOut } from '../../src/auth/errors.js';
import { waitForApproval } from '../../src/auth/flow/approval.js';

function scripted(verdicts: ApprovalVerdict[]) {
  let calls = 0;
  const poll = async (): Promise<ApprovalVerdict> => verdicts[Math.min(calls++, verdicts.length - 1)];
  return { poll, calls: () => calls };
}

const pending: ApprovalVerdict = { status: 'pending', detail: 'pending' };

describe('waitForApproval', () => {
  it('resolves with the code once approved', async () => {
    const { poll, calls } = scripted([pending, pending, { status: 'approved', authorizationCode: 'code-1' }]);
    const elapsed: number[] = [];

    const code = await waitForApproval({
      pollIntervalMs: 5,
      maxWaitMs: 1000,
      poll,
      onPending: (_ms, polls) => elapsed.push(polls),
    });

    expect(code).toBe('code-1');
    expect(calls()).toBe(3);
    expect(elapsed).toEqual([1, 2]);
  });

  it('gives up after maxWaitMs', async () => {
    const { poll } = scripted([pending]);
    await expect(waitForApproval({ pollIntervalMs: 5, maxWaitMs: 50, poll })).rejects.toBeInstanceOf(TimedOut);
  });

  it('throws Rejected on a declined request', async () => {
    const { poll } = scripted([{ status: 'rejected', detail: 'user_rejected' }]);
    await expect(waitForApproval({ pollIntervalMs: 5, maxWaitMs: 1000, poll }))
      .rejects.toThrow(new Rejected('Login declined in the app (user_rejected)'));
  });

  it('throws ProtocolMismatch on an unknown answer', async () => {
    const { poll } = scripted([{ status: 'unknown', detail: 'odd' }]);
    await expect(waitForApproval({ pollIntervalMs: 5, maxWaitMs: 1000, poll })).rejects.toBeInstanceOf(ProtocolMismatch);
  });

  it('interrupts the wait between polls on abort', async () => {
    const { poll, calls } = scripted([pending]);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const started = Date.now();
    await expect(waitForApproval({ pollIntervalMs: 5000, maxWaitMs: 60_000, poll, signal: controller.signal }))
      .rejects.toBeInstanceOf(Cancelled);
    expect(Date.now() - started).toBeLessThan(1000);
    expect(calls()).toBe(1);
  });

  it('does not poll when already aborted', async () => {
    const { poll, calls } = scripted([pending]);
    const controller = new AbortController();
    controller.abort(new Cancelled());

    await expect(waitForApproval({ pollIntervalMs: 5, maxWaitMs: 1000, poll, signal: controller.signal }))
      .rejects.toBeInstanceOf(Cancelled);
    expect(calls()).toBe(0);
  });

  describe('with a poll request still in flight', () => {
    /** A poll that only settles when its signal aborts. */
    function hanging() {
      let started = 0;
      const poll = (signal: AbortSignal) => new Promise<ApprovalVerdict>((_resolve, reject) => {
        started++;
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
      return { poll, started: () => started };
    }

    it('cancels the request when the attempt is aborted', async () => {
      const { poll, started } = hanging();
      const controller = new AbortController();
      setTimeout(() => controller.abort(new Cancelled()), 30);

      const begin = Date.now();
      await expect(waitForApproval({ pollIntervalMs: 5, maxWaitMs: 60_000, poll, signal: controller.signal }))
        .rejects.toBeInstanceOf(Cancelled);
      expect(Date.now() - begin).toBeLessThan(1000);
      expect(started()).toBe(1);
    });

    it('ends the request at the deadline', async () => {
      const { poll, started } = hanging();

      const begin = Date.now();
      await expect(waitForApproval({ pollIntervalMs: 5, maxWaitMs: 50, poll })).rejects.toBeInstanceOf(TimedOut);
      expect(Date.now() - begin).toBeLessThan(1000);
      expect(started()).toBe(1);
    });
  });
});
