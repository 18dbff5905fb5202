/**
 * Cookie Jar Tests
 */

import { describe, it, expect } from 'vitest';
import {
  cookieHeader,
  hasAuthCookie,
  mergeCookies,
  parseNetscape,
  parseSetCookie,
  serializeNetscape,
} from '../src/session/cookies.js';
import type { Cookie } from '../src/types.js';

const JAR = [
  '# Netscape HTTP Cookie File',
  '# exported for tests',
  '',
  '.einthusan.tv\tTRUE\t/\tTRUE\t2000000000\tremember_token\ttest-token',
  '#HttpOnly_einthusan.tv\tFALSE\t/\tFALSE\t0\tsession\tabc123',
  'broken line without tabs',
].join('\n');

function cookie(overrides: Partial<Cookie>): Cookie {
  return {
    domain: '.einthusan.tv',
    includeSubdomains: true,
    path: '/',
    secure: false,
    expires: 0,
    name: 'a',
    value: '1',
    ...overrides,
  };
}

describe('Netscape format', () => {
  it('should parse cookies and skip comments and malformed lines', () => {
    expect(parseNetscape(JAR)).toEqual([
      {
        domain: '.einthusan.tv',
        includeSubdomains: true,
        path: '/',
        secure: true,
        expires: 2000000000,
        name: 'remember_token',
        value: 'test-token',
      },
      {
        domain: 'einthusan.tv',
        includeSubdomains: false,
        path: '/',
        secure: false,
        expires: 0,
        name: 'session',
        value: 'abc123',
        httpOnly: true,
      },
    ]);
  });

  it('should write tab-separated lines that parse back the same', () => {
    const cookies = parseNetscape(JAR);
    const text = serializeNetscape(cookies);

    expect(text.split('\n')).toContain('#HttpOnly_einthusan.tv\tFALSE\t/\tFALSE\t0\tsession\tabc123');
    expect(parseNetscape(text)).toEqual(cookies);
  });
});

describe('parseSetCookie', () => {
  it('should read domain, max-age and flags', () => {
    const parsed = parseSetCookie(
      'remember_token=test-token; Path=/; Domain=einthusan.tv; Max-Age=3600; Secure; HttpOnly',
      'https://einthusan.tv/ajax/login/',
      1000
    );

    expect(parsed).toEqual({
      domain: '.einthusan.tv',
      includeSubdomains: true,
      path: '/',
      secure: true,
      expires: 4600,
      name: 'remember_token',
      value: 'test-token',
      httpOnly: true,
    });
  });

  it('should default to a host-only session cookie', () => {
    expect(parseSetCookie('csrf=xyz', 'https://einthusan.tv/login/', 1000)).toEqual({
      domain: 'einthusan.tv',
      includeSubdomains: false,
      path: '/',
      secure: false,
      expires: 0,
      name: 'csrf',
      value: 'xyz',
    });
  });

  it('should read Expires dates', () => {
    const parsed = parseSetCookie('a=b; Expires=Wed, 21 Oct 2026 07:28:00 GMT', 'https://einthusan.tv/', 1000);
    expect(parsed?.expires).toBe(1792567680);
  });

  it('should let Max-Age=0 expire the cookie', () => {
    const parsed = parseSetCookie('a=b; Max-Age=0; Expires=Wed, 21 Oct 2026 07:28:00 GMT', 'https://einthusan.tv/', 1000);
    expect(parsed?.expires).toBe(999);
  });

  it('should reject secure cookies over plain http and nameless headers', () => {
    expect(parseSetCookie('a=b; Secure', 'http://einthusan.tv/', 1000)).toBeNull();
    expect(parseSetCookie('garbage', 'https://einthusan.tv/', 1000)).toBeNull();
  });
});

describe('mergeCookies', () => {
  it('should replace, add and delete in place', () => {
    const jar = [cookie({ name: 'a', value: '1' }), cookie({ name: 'b', value: '2' })];

    mergeCookies(jar, [
      cookie({ name: 'a', value: 'updated' }),
      cookie({ name: 'b', value: '', expires: 999 }),
      cookie({ name: 'c', value: '3' }),
    ], 1000);

    expect(jar.map(c => `${c.name}=${c.value}`)).toEqual(['a=updated', 'c=3']);
  });
});

describe('cookieHeader', () => {
  const jar = [
    cookie({ name: 'a', value: '1' }),
    cookie({ name: 'secret', value: '2', secure: true }),
    cookie({ name: 'old', value: '3', expires: 500 }),
    cookie({ name: 'other', value: '4', domain: 'example.test', includeSubdomains: false }),
    cookie({ name: 'scoped', value: '5', path: '/premium/' }),
  ];

  it('should send matching cookies only', () => {
    expect(cookieHeader(jar, 'http://einthusan.tv/movie/watch/AbC1/', 1000)).toBe('a=1');
    expect(cookieHeader(jar, 'https://cdn.einthusan.tv/premium/x', 1000)).toBe('a=1; secret=2; scoped=5');
  });

  it('should return undefined when nothing applies', () => {
    expect(cookieHeader(jar, 'https://unrelated.test/', 1000)).toBeUndefined();
  });
});

describe('hasAuthCookie', () => {
  it('should need a live, non-empty cookie of that name', () => {
    expect(hasAuthCookie([cookie({ name: 'remember_token', value: 'x' })], 'remember_token', 1000)).toBe(true);
    expect(hasAuthCookie([cookie({ name: 'remember_token', value: '' })], 'remember_token', 1000)).toBe(false);
    expect(hasAuthCookie([cookie({ name: 'remember_token', value: 'x', expires: 900 })], 'remember_token', 1000)).toBe(false);
    expect(hasAuthCookie([cookie({ name: 'csrf', value: 'x' })], 'remember_token', 1000)).toBe(false);
  });
});
