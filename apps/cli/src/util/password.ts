/**
 * Database password prompt.
 * Reads ASKERP_DB_PASSWORD, otherwise prompts on the terminal without echo.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';

export function getPassword(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const envPw = env.ASKERP_DB_PASSWORD;
  if (envPw) {
    return Promise.resolve(envPw);
  }

  if (!process.stdin.isTTY) {
    return Promise.reject(
      new Error('No database password: set ASKERP_DB_PASSWORD or run in a terminal.'),
    );
  }

  // prompt goes to stderr so stdout stays clean; typed characters are dropped
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      if (!muted) process.stderr.write(chunk);
      callback();
    },
  });

  return new Promise((resolve, reject) => {
    const rl = createInterface({ input: process.stdin, output, terminal: true });
    rl.on('error', reject);
    rl.question('Password: ', (answer) => {
      rl.close();
      process.stderr.write('\n');
      resolve(answer);
    });
    muted = true;
  });
}
