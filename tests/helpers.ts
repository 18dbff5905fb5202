/**
 * Test helpers: fixtures, a routed fetch stub, and EJLinks payloads.
 */

import { readFileSync } from 'fs';
import { vi } from 'vitest';
import type { EJLinks } from '../src/sources/ejlinks.js';
import type { SearchResult } from '../src/types.js';

export function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

export function stubFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const mockFetch = vi.fn(async (url: string, init?: RequestInit) => handler(url, init));
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

export function html(body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/html', ...headers } });
}

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function formBody(init?: RequestInit): URLSearchParams {
  return new URLSearchParams(typeof init?.body === 'string' ? init.body : '');
}

export function requestHeader(init: RequestInit | undefined, name: string): string | null {
  return new Headers(init?.headers).get(name);
}

/**
 * Inverse of the site's EJLinks scrambling: the character at offset 10 moves
 * to the end and two filler characters take its place.
 */
export function encodeEJLinks(links: EJLinks): string {
  const b = Buffer.from(JSON.stringify(links)).toString('base64');
  return b.slice(0, 10) + 'XY' + b.slice(11) + b[10];
}

export function makeResult(overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    id: 'AbC1',
    title: 'Kadhalikka Neramillai',
    year: 2023,
    language: 'tamil',
    sourceUrl: 'https://einthusan.test/movie/watch/AbC1/?lang=tamil',
    availableQualities: new Set(['sd']),
    ...overrides,
  };
}
