import { describe, it, expect } from 'vitest';
import { canTransition, failureStateFor, isTerminal } from '../../src/auth/flow/states.js';
import { AuthenticationFailed, Cancelled, NetworkError, ProtocolMismatch, TimedOut } from '../../src/auth/errors.js';

describe('login states', () => {
  it('follows the login order', () => {
    expect(canTransition('Init', 'AuthorizationRequested')).toBe(true);
    expect(canTransition('ProviderLoginPage', 'CprVerification')).toBe(true);
    expect(canTransition('ProviderLoginPage', 'AppApprovalPending')).toBe(true);
    expect(canTransition('CprVerification', 'AppApprovalPending')).toBe(true);
    expect(canTransition('AppApprovalPending', 'CallbackExchange')).toBe(true);
    expect(canTransition('CallbackExchange', 'Authenticated')).toBe(true);
  });

  it('refuses skipped steps', () => {
    expect(canTransition('Init', 'ProviderLoginPage')).toBe(false);
    expect(canTransition('AppApprovalPending', 'Authenticated')).toBe(false);
    expect(canTransition('CprVerification', 'ProviderLoginPage')).toBe(false);
  });

  it('allows failing from any running state but never leaves a terminal one', () => {
    expect(canTransition('Init', 'NetworkError')).toBe(true);
    expect(canTransition('AppApprovalPending', 'TimedOut')).toBe(true);
    expect(canTransition('Authenticated', 'ProtocolMismatch')).toBe(false);
    expect(canTransition('Rejected', 'Init')).toBe(false);
  });

  it('knows the terminal states', () => {
    const terminal = ['Authenticated', 'TimedOut', 'Rejected', 'NetworkError', 'ProtocolMismatch'] as const;
    expect(terminal.every((name) => isTerminal(name))).toBe(true);
    expect(isTerminal('CallbackExchange')).toBe(false);
  });

  it('maps errors to failure states', () => {
    expect(failureStateFor(new TimedOut('late'))).toBe('TimedOut');
    expect(failureStateFor(new Cancelled())).toBe('Rejected');
    expect(failureStateFor(new NetworkError('down'))).toBe('NetworkError');
    expect(failureStateFor(new ProtocolMismatch('odd page'))).toBe('ProtocolMismatch');
    expect(failureStateFor(new AuthenticationFailed('refused'))).toBe('ProtocolMismatch');
  });
});
