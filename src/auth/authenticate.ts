/**
 * Auth commands for the nordport CLI
 *
 *   nordport login      - Log in with MitID (reuses a valid stored session)
 *   nordport status     - Show the stored session
 *   nordport logout     - Remove the stored session
 *   nordport accounts   - Print accounts as JSON
 *
 * Ctrl-C during a login cancels the attempt; nothing is saved.
 */

import type { Application } from '../app/index.js';
import { logger } from '../app/logger.js';
import { print } from '../app/terminal.js';
import { BrokerApiError } from '../broker/api-client.js';
import { describeAuthError, isAuthFlowError } from './errors.js';
import { checkSession, printStatus } from './status.js';
import type { AuthProgress } from './types.js';

export type CommandName = 'login' | 'status' | 'logout' | 'accounts';

export const COMMANDS: readonly CommandName[] = ['login', 'status', 'logout', 'accounts'];

export function isCommandName(value: string): value is CommandName {
    return COMMANDS.some((command) => command === value);
}

export interface CommandOptions {
    user: string;
    forceLogin: boolean;
}

function printProgress(progress: AuthProgress): void {
    print(`[${progress.state}] ${progress.message}`);
}

/**
 * Run `fn` with Ctrl-C mapped to cancelling the user's login attempt.
 */
async function withCancelOnInterrupt<T>(app: Application, fn: () => Promise<T>): Promise<T> {
    const onInterrupt = () => {
        print('\nCancelling login...');
        app.authManager.cancelAll();
    };
    const unsubscribe = app.authManager.onProgress(printProgress);
    process.on('SIGINT', onInterrupt);
    try {
        return await fn();
    } finally {
        process.off('SIGINT', onInterrupt);
        unsubscribe();
    }
}

async function login(app: Application, options: CommandOptions): Promise<number> {
    await withCancelOnInterrupt(app, () =>
        app.authManager.getSession(options.user, { forceLogin: options.forceLogin }));
    const info = await checkSession(app.store, options.user);
    printStatus(info);
    return 0;
}

async function status(app: Application, options: CommandOptions): Promise<number> {
    const info = await checkSession(app.store, options.user, { online: true });
    printStatus(info);
    return info.valid ? 0 : 1;
}

async function logout(app: Application, options: CommandOptions): Promise<number> {
    await app.authManager.logout(options.user);
    print('Stored session removed.');
    return 0;
}

async function accounts(app: Application, options: CommandOptions): Promise<number> {
    const client = app.createApiClient(options.user);
    try {
        const list = await withCancelOnInterrupt(app, async () => {
            if (options.forceLogin) {
                await app.authManager.getSession(options.user, { forceLogin: true });
            }
            return client.getAccounts();
        });
        print(JSON.stringify(list, null, 2));
        return 0;
    } finally {
        await client.close();
    }
}

/**
 * Run one command and return the process exit code. Login and API
 * failures are printed, not thrown.
 */
export async function runAuthCommand(app: Application, command: CommandName, options: CommandOptions): Promise<number> {
    try {
        switch (command) {
            case 'login':
                return await login(app, options);
            case 'status':
                return await status(app, options);
            case 'logout':
                return await logout(app, options);
            case 'accounts':
                return await accounts(app, options);
        }
    } catch (error) {
        if (isAuthFlowError(error)) {
            logger.debug({ error }, 'Command failed');
            print(error.userMessage);
            return 1;
        }
        if (error instanceof BrokerApiError) {
            print(error.message);
            return 1;
        }
        print(describeAuthError(error));
        logger.error({ error }, 'Unexpected failure');
        return 1;
    }
}
