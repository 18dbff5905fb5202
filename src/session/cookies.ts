/**
 * Netscape cookie jar
 *
 * The text format exported by browsers, curl and yt-dlp: one cookie per line,
 * seven tab-separated fields
 *   domain, include-subdomains, path, secure, expiry, name, value
 * Lines starting with "#" are comments, except "#HttpOnly_" which prefixes a
 * real cookie.
 */

import type { Cookie } from '../types.js';

const HTTP_ONLY_PREFIX = '#HttpOnly_';

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function isExpired(cookie: Cookie, now = nowSeconds()): boolean {
  return cookie.expires > 0 && cookie.expires <= now;
}

export function parseNetscape(text: string): Cookie[] {
  const cookies: Cookie[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine.trim();
    let httpOnly = false;

    if (!line) continue;
    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      line = line.slice(HTTP_ONLY_PREFIX.length);
      httpOnly = true;
    } else if (line.startsWith('#')) {
      continue;
    }

    const parts = line.split('\t');
    if (parts.length < 7) continue;

    const [domain, flag, path, secure, expires, name, value] = parts;
    cookies.push({
      domain,
      includeSubdomains: flag.toUpperCase() === 'TRUE',
      path: path || '/',
      secure: secure.toUpperCase() === 'TRUE',
      expires: parseInt(expires, 10) || 0,
      name,
      value,
      ...(httpOnly ? { httpOnly } : {}),
    });
  }

  return cookies;
}

export function serializeNetscape(cookies: Cookie[]): string {
  const lines = [
    '# Netscape HTTP Cookie File',
    '# Written by einthusan-radarr; edits are overwritten on the next run.',
    '',
  ];

  for (const c of cookies) {
    lines.push([
      (c.httpOnly ? HTTP_ONLY_PREFIX : '') + c.domain,
      c.includeSubdomains ? 'TRUE' : 'FALSE',
      c.path,
      c.secure ? 'TRUE' : 'FALSE',
      String(c.expires),
      c.name,
      c.value,
    ].join('\t'));
  }

  return lines.join('\n') + '\n';
}

/**
 * Parse one Set-Cookie header value as sent in reply to requestUrl.
 * Returns null for headers without a name.
 */
export function parseSetCookie(header: string, requestUrl: string, now = nowSeconds()): Cookie | null {
  const [pair, ...attributes] = header.split(';');
  const eq = pair.indexOf('=');
  if (eq <= 0) return null;

  const { hostname, protocol } = new URL(requestUrl);
  const cookie: Cookie = {
    domain: hostname,
    includeSubdomains: false,
    path: '/',
    secure: false,
    expires: 0,
    name: pair.slice(0, eq).trim(),
    value: pair.slice(eq + 1).trim(),
  };

  let maxAge: number | undefined;

  for (const attribute of attributes) {
    const [rawKey, ...rest] = attribute.split('=');
    const key = rawKey.trim().toLowerCase();
    const value = rest.join('=').trim();

    switch (key) {
      case 'domain':
        if (value) {
          cookie.domain = '.' + value.replace(/^\./, '');
          cookie.includeSubdomains = true;
        }
        break;
      case 'path':
        if (value.startsWith('/')) cookie.path = value;
        break;
      case 'expires': {
        const parsed = Date.parse(value);
        if (!Number.isNaN(parsed)) cookie.expires = Math.floor(parsed / 1000);
        break;
      }
      case 'max-age':
        maxAge = parseInt(value, 10);
        break;
      case 'secure':
        cookie.secure = true;
        break;
      case 'httponly':
        cookie.httpOnly = true;
        break;
    }
  }

  // Max-Age wins over Expires; zero or negative deletes the cookie
  if (maxAge !== undefined && !Number.isNaN(maxAge)) {
    cookie.expires = maxAge > 0 ? now + maxAge : now - 1;
  }

  if (cookie.secure && protocol !== 'https:') return null;

  return cookie;
}

function sameCookie(a: Cookie, b: Cookie): boolean {
  return a.name === b.name && a.domain === b.domain && a.path === b.path;
}

/**
 * Fold incoming cookies into the jar in place. An already-expired incoming
 * cookie removes its counterpart.
 */
export function mergeCookies(jar: Cookie[], incoming: Cookie[], now = nowSeconds()): void {
  for (const cookie of incoming) {
    const index = jar.findIndex(existing => sameCookie(existing, cookie));
    if (isExpired(cookie, now)) {
      if (index !== -1) jar.splice(index, 1);
    } else if (index !== -1) {
      jar[index] = cookie;
    } else {
      jar.push(cookie);
    }
  }
}

function domainMatches(cookie: Cookie, hostname: string): boolean {
  const bare = cookie.domain.replace(/^\./, '').toLowerCase();
  const host = hostname.toLowerCase();
  if (host === bare) return true;
  return cookie.includeSubdomains && host.endsWith('.' + bare);
}

/**
 * Cookie request header for url, or undefined when nothing applies.
 */
export function cookieHeader(jar: Cookie[], url: string, now = nowSeconds()): string | undefined {
  const { hostname, pathname, protocol } = new URL(url);

  const applicable = jar.filter(c =>
    !isExpired(c, now) &&
    domainMatches(c, hostname) &&
    pathname.startsWith(c.path) &&
    (!c.secure || protocol === 'https:')
  );

  if (applicable.length === 0) return undefined;
  return applicable.map(c => `${c.name}=${c.value}`).join('; ');
}

export function hasAuthCookie(jar: Cookie[], authCookie: string, now = nowSeconds()): boolean {
  return jar.some(c => c.name === authCookie && c.value !== '' && !isExpired(c, now));
}
