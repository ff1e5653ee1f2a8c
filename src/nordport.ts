#!/usr/bin/env node
import arg from 'arg';
import { printHelp, print } from './app/terminal.js';

const spec = {
  '--help': Boolean,
  '--user': String,
  '--method': String,
  '--password': String,
  '--force-login': Boolean,
  '--logout': Boolean,
  '--proxy': String,
  '--insecure': Boolean,
  '--verbose': Boolean,
  '-h': '--help',
  '-u': '--user',
  '-m': '--method',
  '-f': '--force-login',
  '-p': '--proxy',
  '-v': '--verbose',
};

function parseArgs() {
  try {
    return arg(spec, { argv: process.argv.slice(2) });
  } catch (error) {
    print(error instanceof Error ? error.message : String(error));
    printHelp();
    process.exit(2);
  }
}

const args = parseArgs();

// Handle --help before config/logger init
if (args['--help']) {
  printHelp();
  process.exit(0);
}

import { initConfig, getLogConfig, getAuthConfig } from './app/config.js';
import { fatalExit } from './app/config-file.js';
import { initLogger, logger } from './app/logger.js';
import { isCommandName, runAuthCommand, type CommandName } from './auth/authenticate.js';

const positional = args._[0] ?? 'login';
if (!isCommandName(positional)) {
  print(`Unknown command: ${positional}`);
  printHelp();
  process.exit(2);
}
const command: CommandName = args['--logout'] ? 'logout' : positional;

try {
  initConfig({
    user: args['--user'],
    method: args['--method'],
    proxy: args['--proxy'],
    verbose: args['--verbose'],
    insecure: args['--insecure'],
  });
} catch (error) {
  fatalExit(error instanceof Error ? error.message : String(error));
}
initLogger(getLogConfig());

const user = getAuthConfig().user;
if (!user) {
  print('No MitID user id: pass --user or set auth.user in config.yaml');
  process.exit(2);
}

try {
  const { Application } = await import('./app/index.js');
  const app = Application.create({ password: args['--password'] });
  const code = await runAuthCommand(app, command, { user, forceLogin: args['--force-login'] ?? false });
  logger.flush();
  process.exit(code);
} catch (error) {
  logger.fatal({ error }, 'nordport failed');
  logger.flush();
  setTimeout(() => process.exit(1), 200);
}
