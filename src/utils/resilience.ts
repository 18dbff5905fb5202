/**
 * Fetch timeouts and exit-time cleanup.
 * Nothing in this tool retries on its own: a failed call is reported once.
 */

import { config } from '../config.js';

// =============================================================================
// Fetch with Timeout
// =============================================================================

/**
 * Wrapper around fetch() with an AbortController timeout.
 * The timer covers connect + headers; a streamed body is not cut off by it.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit & { timeout?: number } = {}
): Promise<Response> {
  const { timeout = config.http.timeout, ...fetchOptions } = options;

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      ...fetchOptions,
      signal: controller.signal,
    });
    return response;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Connection-level failures (as opposed to an HTTP status we got back).
 */
export function isNetworkError(error: unknown): boolean {
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return (
      error.name === 'AbortError' ||
      msg.includes('econnrefused') ||
      msg.includes('econnreset') ||
      msg.includes('etimedout') ||
      msg.includes('enotfound') ||
      msg.includes('aborted') ||
      msg.includes('fetch failed') ||
      msg.includes('socket hang up')
    );
  }
  return false;
}

// =============================================================================
// Process Exit Handlers
// =============================================================================

type CleanupFn = () => void;
const cleanupHandlers: CleanupFn[] = [];
let handlersInstalled = false;
let cleanedUp = false;

function runCleanup(reason: string): void {
  if (cleanedUp) return;
  cleanedUp = true;
  if (reason !== 'exit') {
    console.log(`\n[einthusan] Shutting down (${reason})...`);
  }
  for (const handler of cleanupHandlers) {
    try {
      handler();
    } catch (error) {
      console.error('[einthusan] Cleanup handler failed:', error);
    }
  }
}

/**
 * Register a synchronous cleanup (e.g. writing the cookie jar) that runs once,
 * on normal exit or on SIGINT/SIGTERM.
 */
export function registerCleanup(fn: CleanupFn): void {
  cleanupHandlers.push(fn);

  if (handlersInstalled) return;
  handlersInstalled = true;

  process.on('exit', () => runCleanup('exit'));

  process.on('SIGTERM', () => {
    runCleanup('SIGTERM');
    process.exit(143);
  });

  process.on('SIGINT', () => {
    runCleanup('SIGINT');
    process.exit(130);
  });
}
