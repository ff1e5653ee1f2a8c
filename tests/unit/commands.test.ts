import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Application } from '../../src/app/index.js';
import { isCommandName, runAuthCommand } from '../../src/auth/authenticate.js';
import { testConfig } from '../helpers/config.js';
import { FakeProvider } from '../helpers/fake-provider.js';
import { LINKED_USER } from '../helpers/flow.js';

describe('runAuthCommand', () => {
  let dir: string;
  let app: Application;
  let fake: FakeProvider;
  let write: MockInstance<typeof process.stdout.write>;

  const printed = () => write.mock.calls.map((call) => String(call[0])).join('');
  const options = { user: LINKED_USER, forceLogin: false };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nordport-cmd-'));
    fake = new FakeProvider({ linkedUsers: [LINKED_USER] });
    app = Application.create({
      config: testConfig({ auth: { sessionPath: join(dir, 'session.json') } }),
      httpFactory: fake.httpFactory(),
      requestInput: async () => {
        throw new Error('No input expected');
      },
    });
    write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    write.mockRestore();
    rmSync(dir, { recursive: true, force: true });
  });

  it('knows its command names', () => {
    expect(isCommandName('accounts')).toBe(true);
    expect(isCommandName('trade')).toBe(false);
  });

  it('logs in and stores the session', async () => {
    expect(await runAuthCommand(app, 'login', options)).toBe(0);
    expect(existsSync(join(dir, 'session.json'))).toBe(true);
    expect(printed()).toContain('Session for');
  });

  it('prints accounts as JSON', async () => {
    expect(await runAuthCommand(app, 'accounts', options)).toBe(0);
    expect(printed()).toContain('"accno": 12345678');
  });

  it('exits 1 from status without a session', async () => {
    expect(await runAuthCommand(app, 'status', options)).toBe(1);
    expect(printed()).toContain(`Run: nordport login --user ${LINKED_USER}`);
  });

  it('removes the session on logout', async () => {
    await runAuthCommand(app, 'login', options);
    expect(await runAuthCommand(app, 'logout', options)).toBe(0);
    expect(existsSync(join(dir, 'session.json'))).toBe(false);
    expect(printed()).toContain('Stored session removed.');
  });

  it('prints the user message when a login fails', async () => {
    fake = new FakeProvider({ linkedUsers: [LINKED_USER], pollAnswers: [{ status: 'user_rejected' }] });
    app = Application.create({
      config: testConfig({ auth: { sessionPath: join(dir, 'session.json') } }),
      httpFactory: fake.httpFactory(),
    });

    expect(await runAuthCommand(app, 'login', options)).toBe(1);
    expect(printed()).toContain('The login was declined in the MitID app.');
  });
});
