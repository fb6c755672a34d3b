/**
 * prompt.ts
 *
 * Run inputs: taken from the environment, asked for on the terminal when missing.
 *
 * - GS_EMAIL, GS_PASSWORD, GS_COURSE_URL, GS_JSON
 * - GS_HEADLESS=1 runs the browser headless
 */

import readline from 'node:readline/promises';
import { Writable } from 'node:stream';
import type { RunInputs } from './types';

export type AskOptions = { silent?: boolean };
export type Ask = (question: string, opts?: AskOptions) => Promise<string>;

// Reads one line from stdin. With `silent`, nothing typed is echoed.
export async function askQuestion(question: string, opts: AskOptions = {}): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) process.stdout.write(chunk, encoding);
      callback();
    },
  });

  const rl = readline.createInterface({ input: process.stdin, output, terminal: true });
  try {
    // the prompt itself is written synchronously, mute only what follows
    const answer = rl.question(question);
    muted = opts.silent ?? false;
    const line = await answer;
    if (muted) process.stdout.write('\n');
    return line;
  } finally {
    rl.close();
  }
}

function fromEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export async function resolveInputs(env: NodeJS.ProcessEnv = process.env, ask: Ask = askQuestion): Promise<RunInputs> {
  const email = fromEnv(env, 'GS_EMAIL') ?? (await ask('GS email: ')).trim();
  // passwords are taken as typed, surrounding spaces included
  const password = env.GS_PASSWORD || (await ask('GS password: ', { silent: true }));
  const courseUrl =
    fromEnv(env, 'GS_COURSE_URL') ?? (await ask('Course URL (e.g., https://www.gradescope.com/courses/xxxxxx): ')).trim();
  const inputPath = fromEnv(env, 'GS_JSON') ?? (await ask('JSON file name: ')).trim();

  return {
    email,
    password,
    courseUrl,
    inputPath,
    headless: /^(1|true|yes)$/i.test(env.GS_HEADLESS ?? ''),
  };
}
