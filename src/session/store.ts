/**
 * Credential/Session Store
 * Flat files under the per-user config directory; load and save, nothing else.
 *
 * Two concurrent invocations both rewrite cookies.txt on exit and the last
 * one wins. That is accepted for a single-user, cron-driven tool.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config.js';
import { AuthError, describeError } from '../errors.js';
import type { Credentials, Session } from '../types.js';
import { registerCleanup } from '../utils/resilience.js';
import { hasAuthCookie, isExpired, parseNetscape, serializeNetscape } from './cookies.js';

export interface SessionStoreOptions {
  cookiesPath?: string;
  authCookie?: string;
}

export function loadSession(options: SessionStoreOptions = {}): Session {
  const path = options.cookiesPath ?? config.paths.cookies;
  const authCookie = options.authCookie ?? config.site.authCookie;

  if (!existsSync(path)) {
    return { cookies: [], authenticated: false };
  }

  const cookies = parseNetscape(readFileSync(path, 'utf-8')).filter(c => !isExpired(c));
  const authenticated = hasAuthCookie(cookies, authCookie);
  console.log(`[Session] Loaded ${cookies.length} cookies from ${path}${authenticated ? ' (logged in)' : ''}`);

  return { cookies, authenticated };
}

/**
 * Synchronous so it can run from an exit handler.
 */
export function saveSession(session: Session, cookiesPath = config.paths.cookies): void {
  mkdirSync(dirname(cookiesPath), { recursive: true });
  const live = session.cookies.filter(c => !isExpired(c));
  writeFileSync(cookiesPath, serializeNetscape(live), { mode: 0o600 });
}

/**
 * Load the session once for this run and write it back when the process exits.
 */
export function openSession(options: SessionStoreOptions = {}): Session {
  const session = loadSession(options);
  const path = options.cookiesPath ?? config.paths.cookies;
  registerCleanup(() => saveSession(session, path));
  return session;
}

function isCredentials(value: unknown): value is Credentials {
  return (
    typeof value === 'object' && value !== null &&
    'email' in value && typeof value.email === 'string' &&
    'password' in value && typeof value.password === 'string'
  );
}

export function loadCredentials(path = config.paths.credentials): Credentials | null {
  if (!existsSync(path)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new AuthError(`Credentials file ${path} is not valid JSON: ${describeError(error)}`);
  }

  if (!isCredentials(parsed)) {
    throw new AuthError(`Credentials file ${path} must be {"email": string, "password": string}`);
  }
  return { email: parsed.email, password: parsed.password };
}

export function saveCredentials(credentials: Credentials, path = config.paths.credentials): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(credentials, null, 2) + '\n', { mode: 0o600 });
}
