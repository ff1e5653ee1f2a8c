/**
 * Application - shared wiring for the CLI commands
 *
 * Builds the HTTP session factory, session store, AuthManager and the
 * API client once from config.
 */

import { getConfig, type Config } from './config.js';
import { resolveProjectPath } from './paths.js';
import { prompt } from './terminal.js';
import { HttpSessionFactory } from '../http/session-factory.js';
import { SessionStore } from '../auth/session-store.js';
import { AuthManager } from '../auth/manager.js';
import { ApiClient } from '../broker/api-client.js';
import type { InputRequester } from '../auth/types.js';

export interface ApplicationOptions {
  config?: Config;
  /** Where the CPR prompt goes; the terminal by default */
  requestInput?: InputRequester;
  /** MitID password for the TOKEN method, from --password */
  password?: string;
  /** Stand-in for the network (tests) */
  httpFactory?: HttpSessionFactory;
}

export class Application {
  readonly httpFactory: HttpSessionFactory;
  readonly store: SessionStore;
  readonly authManager: AuthManager;

  private constructor(readonly config: Config, options: ApplicationOptions) {
    const { auth, http, broker, signicat } = config;

    this.httpFactory = options.httpFactory ?? new HttpSessionFactory({
      proxy: http.proxy,
      verifyTls: http.verifyTls,
    });

    this.store = new SessionStore({
      path: resolveProjectPath(auth.sessionPath),
      broker,
      httpFactory: this.httpFactory,
      userAgent: http.userAgent,
      requestTimeoutMs: auth.requestTimeoutMs,
      sessionLifetimeMinutes: auth.sessionLifetimeMinutes,
    });

    this.authManager = new AuthManager({
      store: this.store,
      httpFactory: this.httpFactory,
      broker,
      signicat,
      method: auth.method,
      password: options.password,
      maxRedirects: auth.maxRedirects,
      requestTimeoutMs: auth.requestTimeoutMs,
      approval: auth.approval,
      userAgent: http.userAgent,
      requestInput: options.requestInput ?? prompt,
    });
  }

  static create(options: ApplicationOptions = {}): Application {
    return new Application(options.config ?? getConfig(), options);
  }

  createApiClient(user: string): ApiClient {
    return new ApiClient({
      user,
      sessions: this.authManager,
      httpFactory: this.httpFactory,
      broker: this.config.broker,
      userAgent: this.config.http.userAgent,
      requestTimeoutMs: this.config.auth.requestTimeoutMs,
    });
  }
}
