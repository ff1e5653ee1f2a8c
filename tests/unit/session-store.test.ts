/**
 * Unit tests for SessionStore
 *
 * Uses a temp directory for the session file and the fake broker for session checks.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync, statSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { SessionStore } from '../../src/auth/session-store.js';
import { HttpSessionFactory } from '../../src/http/session-factory.js';
import { sampleArtifact as artifact } from '../helpers/artifact.js';
import { testConfig } from '../helpers/config.js';
import { FakeProvider } from '../helpers/fake-provider.js';

describe('SessionStore', () => {
  let dir: string;
  let path: string;
  let fake: FakeProvider;
  let store: SessionStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nordport-store-'));
    path = join(dir, 'sessions', 'session.json');
    fake = new FakeProvider();
    const config = testConfig();
    store = new SessionStore({
      path,
      broker: config.broker,
      httpFactory: fake.httpFactory(),
      userAgent: 'test-agent',
      requestTimeoutMs: 1000,
      sessionLifetimeMinutes: 30,
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads back exactly what was saved', async () => {
    const saved = artifact('U1');
    expect(await store.save('U1', saved)).toBe(true);
    expect(await store.load('U1')).toEqual(saved);
  });

  it('writes the file readable by the owner only', async () => {
    await store.save('U1', artifact('U1'));
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(existsSync(`${path}.tmp`)).toBe(false);
  });

  it('replaces the previous artifact', async () => {
    await store.save('U1', artifact('U1', 'first'));
    await store.save('U1', artifact('U1', 'second'));
    expect((await store.load('U1'))?.cookies[0].value).toBe('second');
  });

  it('returns undefined for a missing file', async () => {
    expect(await store.load('U1')).toBeUndefined();
  });

  it('returns undefined for a corrupted file', async () => {
    await store.save('U1', artifact('U1'));
    writeFileSync(path, '{"version":1,"user":"U1","cook');
    expect(await store.load('U1')).toBeUndefined();
  });

  it('returns undefined for a file with the wrong shape', async () => {
    await store.save('U1', artifact('U1'));
    writeFileSync(path, JSON.stringify({ version: 1, user: 'U1', cookies: [] }));
    expect(await store.load('U1')).toBeUndefined();
  });

  it('returns undefined when a cookie has an unusable domain, path or expiry', async () => {
    const stored = artifact('U1');
    await store.save('U1', stored);
    const raw = readFileSync(path, 'utf8');

    writeFileSync(path, raw.replace('"domain": "www.nordnet.dk"', '"domain": "bad domain"'));
    expect(await store.load('U1')).toBeUndefined();

    writeFileSync(path, raw.replace('"path": "/"', '"path": "api"'));
    expect(await store.load('U1')).toBeUndefined();

    writeFileSync(path, raw.replace('"expires": "2099-01-01T00:00:00.000Z"', '"expires": "someday"'));
    expect(await store.load('U1')).toBeUndefined();

    writeFileSync(path, raw);
    expect(await store.load('U1')).toEqual(stored);
  });

  it('does not hand one user the session of another', async () => {
    await store.save('U1', artifact('U1'));
    expect(await store.load('U2')).toBeUndefined();
  });

  it('reports a failed write as false instead of throwing', async () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const broken = new SessionStore({
      path: join(blocker, 'session.json'),
      broker: testConfig().broker,
      httpFactory: fake.httpFactory(),
      userAgent: 'test-agent',
      requestTimeoutMs: 1000,
      sessionLifetimeMinutes: 30,
    });
    expect(await broken.save('U1', artifact('U1'))).toBe(false);
  });

  it('refuses to save an artifact under another user', async () => {
    await expect(store.save('U2', artifact('U1'))).rejects.toThrow('belongs to');
  });

  it('invalidates only the owner\'s session', async () => {
    await store.save('U1', artifact('U1'));
    await store.invalidate('U2');
    expect(existsSync(path)).toBe(true);
    await store.invalidate('U1');
    expect(existsSync(path)).toBe(false);
  });

  it('removes an unreadable file on invalidate', async () => {
    await store.save('U1', artifact('U1'));
    writeFileSync(path, 'garbage');
    await store.invalidate('U1');
    expect(existsSync(path)).toBe(false);
  });

  it('checks the session against the accounts list', async () => {
    fake.issueSession('session-live');
    expect(await store.check(artifact('U1', 'session-live'))).toBe('valid');
    expect(await store.check(artifact('U1', 'session-dead'))).toBe('invalid');

    const [call] = fake.callsTo('GET', '/api/2/accounts');
    expect(call.headers.get('cookie')).toBe('NEXT=session-live; lang=da');
    expect(call.headers.get('ntag')).toBe('ntag-test');
  });

  it('reports unreachable when the broker cannot be reached', async () => {
    const offline = new SessionStore({
      path,
      broker: testConfig().broker,
      httpFactory: new HttpSessionFactory({
        verifyTls: true,
        fetchImpl: async () => {
          throw new TypeError('fetch failed');
        },
      }),
      userAgent: 'test-agent',
      requestTimeoutMs: 1000,
      sessionLifetimeMinutes: 30,
    });
    expect(await offline.check(artifact('U1'))).toBe('unreachable');
  });

  it('reports invalid when the stored cookies cannot be replayed', async () => {
    const broken = artifact('U1');
    broken.cookies[0].domain = 'bad domain';
    expect(await store.check(broken)).toBe('invalid');
    expect(fake.calls).toHaveLength(0);
  });

  it('estimates the remaining lifetime from issuedAt', () => {
    const issued = Date.parse('2026-01-01T12:00:00.000Z');
    expect(store.secondsRemaining(artifact('U1'), issued + 10 * 60_000)).toBe(20 * 60);
    expect(store.secondsRemaining(artifact('U1'), issued + 31 * 60_000)).toBe(0);
  });

  it('keeps the file contents as plain JSON', async () => {
    await store.save('U1', artifact('U1'));
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    expect(raw).toMatchObject({ version: 1, user: 'U1' });
  });
});
