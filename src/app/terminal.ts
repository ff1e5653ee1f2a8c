import * as readline from 'readline';

/** Print a message to the user's terminal (stdout, not the logger). */
export function print(text: string, newline = true): void {
  process.stdout.write(text + (newline ? '\n' : ''));
}

/**
 * Ask a question on the terminal and resolve with the trimmed answer.
 * Rejects with the signal's reason if the signal aborts first.
 */
export function prompt(question: string, signal?: AbortSignal): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      rl.close();
      reject(signal?.reason);
    };
    if (signal?.aborted) return onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });

    rl.question(question, (answer) => {
      signal?.removeEventListener('abort', onAbort);
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function printHelp(): void {
  print(`
nordport - Nordnet account data on the command line

Usage:
  nordport login --user <id>       Log in with MitID (reuses a valid session)
  nordport status --user <id>      Show stored session status
  nordport logout --user <id>      Remove the stored session
  nordport accounts --user <id>    Print accounts as JSON
  nordport --help                  Show this help

Options:
  -u, --user <id>       MitID user id (or auth.user in config.yaml)
  -m, --method <m>      APP (MitID app) or TOKEN (code display)
      --password <pw>   MitID password for TOKEN, never stored
  -f, --force-login     Ignore the stored session and log in again
      --logout          Remove the stored session and exit
  -p, --proxy <h:p>     Route all traffic through a SOCKS5 proxy
      --insecure        Skip TLS certificate verification
  -v, --verbose         Debug logging
  -h, --help            Show help

Press Ctrl-C while waiting for MitID approval to cancel the login.
`);
}
