/**
 * Session status - what is stored for a user and how long it should last
 */

import { existsSync } from 'fs';
import { redact } from '../app/logger.js';
import { print } from '../app/terminal.js';
import type { SessionStore } from './session-store.js';
import type { SessionArtifact } from './types.js';

export interface StatusInfo {
    user: string;
    source: string;
    valid: boolean;
    details: Record<string, string | number | boolean>;
    warnings: string[];
}

export function formatDuration(seconds: number): string {
    if (seconds < 60) return `${seconds} seconds`;
    if (seconds < 3600) return `${Math.round(seconds / 60)} minutes`;
    return `${(seconds / 3600).toFixed(1)} hours`;
}

/**
 * Describe the stored session. With `online`, ask the broker whether it
 * still accepts it; otherwise judge by its estimated lifetime.
 */
export async function checkSession(
    store: SessionStore,
    user: string,
    options: { online?: boolean; now?: number } = {},
): Promise<StatusInfo> {
    const info: StatusInfo = { user, source: store.path, valid: false, details: {}, warnings: [] };

    const artifact = await store.load(user);
    if (!artifact) {
        info.warnings.push(existsSync(store.path)
            ? 'Session file does not hold a usable session for this user'
            : `Session file not found: ${store.path}`);
        info.warnings.push(`Run: nordport login --user ${user}`);
        return info;
    }

    describeArtifact(info, artifact);
    const remaining = store.secondsRemaining(artifact, options.now);
    info.details.expiresIn = remaining > 0 ? formatDuration(remaining) : 'expired (estimate)';

    if (options.online) {
        const verdict = await store.check(artifact);
        info.valid = verdict === 'valid';
        if (verdict === 'unreachable') {
            info.warnings.push('Could not reach Nordnet to check the session');
        } else {
            info.details.brokerAccepts = info.valid;
            if (!info.valid) info.warnings.push('Nordnet no longer accepts this session');
        }
    } else {
        info.valid = remaining > 0;
        if (!info.valid) info.warnings.push('Session is probably expired');
    }
    return info;
}

function describeArtifact(info: StatusInfo, artifact: SessionArtifact): void {
    info.details.issuedAt = artifact.issuedAt;
    info.details.cookieCount = artifact.cookies.length;
    info.details.ntag = redact(artifact.headers.ntag);
    if (artifact.brokerUserId) info.details.brokerUserId = artifact.brokerUserId;
}

export function printStatus(info: StatusInfo): void {
    const statusIcon = info.valid ? '\x1b[32m✓\x1b[0m' : '\x1b[31m✗\x1b[0m';

    print(`\n${statusIcon} Session for \x1b[1m${redact(info.user)}\x1b[0m`);
    print(`  Source: ${info.source}`);
    if (Object.keys(info.details).length > 0) {
        print('  Details:');
        for (const [key, value] of Object.entries(info.details)) {
            const displayValue = typeof value === 'boolean'
                ? (value ? '\x1b[32myes\x1b[0m' : '\x1b[33mno\x1b[0m')
                : value;
            print(`    ${key}: ${displayValue}`);
        }
    }

    if (info.warnings.length > 0) {
        print('  Warnings:');
        for (const warning of info.warnings) {
            print(`    \x1b[33m⚠\x1b[0m ${warning}`);
        }
    }
}
