import type { Config } from '../../src/app/config.js';
import type { AuthFlowOptions } from '../../src/auth/flow/controller.js';
import type { FakeProvider } from './fake-provider.js';
import { testConfig } from './config.js';

export const LINKED_USER = 'U1';
export const NEW_USER = 'U2';

/** Flow options for one attempt against the fake provider. */
export function flowOptions(
  fake: FakeProvider,
  overrides: Partial<AuthFlowOptions> = {},
  config: Config = testConfig(),
): AuthFlowOptions {
  return {
    credentials: { user: LINKED_USER, method: 'APP' },
    session: fake.httpFactory().create(),
    broker: config.broker,
    signicat: config.signicat,
    maxRedirects: config.auth.maxRedirects,
    requestTimeoutMs: config.auth.requestTimeoutMs,
    approval: config.auth.approval,
    userAgent: config.http.userAgent,
    requestInput: async () => {
      throw new Error('No input expected');
    },
    ...overrides,
  };
}
