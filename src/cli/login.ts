/**
 * Login command
 * Signs in to einthusan and keeps the cookies for premium (HD) downloads.
 */

import { Command } from 'commander';
import { createInterface, type Interface } from 'readline';
import { Writable } from 'stream';
import { config } from '../config.js';
import { AuthError } from '../errors.js';
import { loadCredentials, loadSession, saveCredentials } from '../session/store.js';
import { EinthusanClient, type Authenticator } from '../sources/einthusan.js';
import type { Credentials } from '../types.js';
import { reportFailure } from './options.js';

interface LoginCliOptions {
  saveCredentials?: boolean;
}

function question(rl: Interface, prompt: string): Promise<string> {
  return new Promise(resolve => {
    rl.question(prompt, answer => resolve(answer.trim()));
  });
}

/**
 * Pass-through to target that drops whatever is written while masked.
 */
export function maskableOutput(target: NodeJS.WritableStream) {
  let masked = false;
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      if (!masked) target.write(chunk);
      callback();
    },
  });
  return {
    stream,
    mask(on: boolean): void {
      masked = on;
    },
  };
}

export async function promptCredentials(): Promise<Credentials> {
  const output = maskableOutput(process.stdout);
  const rl = createInterface({ input: process.stdin, output: output.stream, terminal: process.stdin.isTTY });
  try {
    const email = await question(rl, 'Email: ');

    process.stdout.write('Password: ');
    output.mask(true);
    const password = await question(rl, '');
    output.mask(false);
    process.stdout.write('\n');

    if (!email || !password) {
      throw new AuthError('Email and password are both required');
    }
    return { email, password };
  } finally {
    output.mask(false);
    rl.close();
  }
}

/**
 * Saved credentials when there are any, otherwise ask. Credentials are only
 * written once the site has accepted them.
 */
export async function runLogin(
  authenticator: Authenticator,
  options: LoginCliOptions,
  ask: () => Promise<Credentials> = promptCredentials,
  credentialsPath = config.paths.credentials
): Promise<void> {
  const saved = loadCredentials(credentialsPath);
  if (saved) {
    console.log(`🔑 Using saved credentials for ${saved.email}`);
  }
  const credentials = saved ?? (await ask());

  await authenticator.login(credentials);

  if (options.saveCredentials && !saved) {
    saveCredentials(credentials, credentialsPath);
    console.log(`💾 Credentials saved to ${credentialsPath}`);
  }
}

export function loginCommand(name = 'login'): Command {
  return new Command(name)
    .description('Log in to einthusan for premium (HD) downloads')
    .option('--save-credentials', 'Keep the email and password for later logins')
    .action(async (opts: LoginCliOptions) => {
      try {
        const session = loadSession();
        await runLogin(new EinthusanClient(session), opts);
        console.log(`\n✅ Logged in. Session saved to ${config.paths.cookies}`);
      } catch (error) {
        reportFailure(error);
      }
    });
}
