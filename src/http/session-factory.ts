/**
 * HTTP session factory
 *
 * Builds the fetch function every outbound call goes through: undici with
 * an Agent (TLS verification) or a SOCKS5 dispatcher, plus a fresh cookie
 * jar. One login attempt owns one session, so jars are never shared
 * between attempts.
 */

import { fetch, Agent, type Dispatcher, type RequestInit, type Response } from 'undici';
import { socksDispatcher } from 'fetch-socks';
import { CookieJar } from 'tough-cookie';
import { ConfigurationError } from '../auth/errors.js';

export type Transport = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpSession {
    readonly fetch: Transport;
    readonly jar: CookieJar;
    close(): Promise<void>;
}

export interface HttpSessionOptions {
    /** SOCKS5 proxy as host:port (optionally socks5:// prefixed), empty for none */
    proxy?: string;
    verifyTls: boolean;
    /** Replaces undici's fetch; used by tests to stand in for the network */
    fetchImpl?: Transport;
}

export interface SocksProxy {
    host: string;
    port: number;
}

export function parseProxy(proxy: string): SocksProxy {
    const match = /^(?:socks5h?:\/\/)?([^\s:/]+):(\d{1,5})$/.exec(proxy.trim());
    if (!match) {
        throw new ConfigurationError(`Invalid SOCKS5 proxy "${proxy}", expected host:port`);
    }
    const port = Number(match[2]);
    if (port < 1 || port > 65535) {
        throw new ConfigurationError(`Invalid SOCKS5 proxy port ${port}`);
    }
    return { host: match[1], port };
}

export class HttpSessionFactory {
    private readonly proxy?: SocksProxy;

    constructor(private readonly options: HttpSessionOptions) {
        this.proxy = options.proxy ? parseProxy(options.proxy) : undefined;
    }

    get usesProxy(): boolean {
        return this.proxy !== undefined;
    }

    create(jar: CookieJar = new CookieJar()): HttpSession {
        const fetchImpl = this.options.fetchImpl;
        if (fetchImpl) {
            return { fetch: fetchImpl, jar, close: async () => {} };
        }

        const dispatcher = this.createDispatcher();
        return {
            fetch: (url, init) => fetch(url, { ...init, dispatcher }),
            jar,
            close: () => dispatcher.close(),
        };
    }

    private createDispatcher(): Dispatcher {
        const connect = { rejectUnauthorized: this.options.verifyTls };
        if (this.proxy) {
            return socksDispatcher({ type: 5, host: this.proxy.host, port: this.proxy.port }, { connect });
        }
        return new Agent({ connect });
    }
}
