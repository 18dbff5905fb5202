/**
 * Downloader
 * Streams a media URL to <name>.part and renames it into place only once every
 * byte has arrived, so the canonical name never holds a partial file.
 */

import { createWriteStream } from 'fs';
import { mkdir, rename, rm } from 'fs/promises';
import { basename, join } from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { config } from '../config.js';
import { DownloadError, describeError } from '../errors.js';
import { fetchWithTimeout } from '../utils/resilience.js';

export interface DownloadOptions {
  /** Final file name; defaults to the URL's last path segment */
  filename?: string;
  userAgent?: string;
  timeout?: number;
  /** Called with a whole percentage each time another 10% has arrived */
  onProgress?: (percent: number, bytes: number) => void;
}

export type Downloader = (url: string, destinationDir: string, options?: DownloadOptions) => Promise<string>;

export const TEMP_SUFFIX = '.part';

function filenameFromUrl(url: string): string {
  const name = basename(new URL(url).pathname);
  return name || 'download.mp4';
}

function logProgress(percent: number, bytes: number): void {
  console.log(`[Download] ${percent}% (${(bytes / (1024 * 1024)).toFixed(1)} MB)`);
}

export async function downloadFile(url: string, destinationDir: string, options: DownloadOptions = {}): Promise<string> {
  const filename = options.filename ?? filenameFromUrl(url);
  const finalPath = join(destinationDir, filename);
  const tempPath = finalPath + TEMP_SUFFIX;
  const onProgress = options.onProgress ?? logProgress;

  let response: Response;
  try {
    response = await fetchWithTimeout(url, {
      headers: {
        'User-Agent': options.userAgent ?? config.site.userAgent,
        'Accept-Encoding': 'identity',
      },
      timeout: options.timeout,
    });
  } catch (error) {
    throw new DownloadError(`Could not connect for ${filename}: ${describeError(error)}`);
  }

  if (!response.ok) {
    throw new DownloadError(`Download of ${filename} failed: HTTP ${response.status}`);
  }
  if (!response.body) {
    throw new DownloadError(`Download of ${filename} returned no body`);
  }

  const lengthHeader = response.headers.get('content-length');
  const expected = lengthHeader ? parseInt(lengthHeader, 10) : NaN;
  // Content-Length counts encoded bytes; fetch hands back decoded ones
  const encoded = (response.headers.get('content-encoding') ?? 'identity') !== 'identity';
  const known = !encoded && Number.isFinite(expected) && expected > 0;

  let received = 0;
  let reported = 0;
  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      received += chunk.length;
      if (known) {
        const percent = Math.floor((received / expected) * 10) * 10;
        if (percent > reported && percent < 100) {
          reported = percent;
          onProgress(percent, received);
        }
      }
      callback(null, chunk);
    },
  });

  console.log(`[Download] ${filename}${known ? ` (${(expected / (1024 * 1024)).toFixed(1)} MB)` : ''}`);

  try {
    await mkdir(destinationDir, { recursive: true });
    await pipeline(Readable.fromWeb(response.body), counter, createWriteStream(tempPath));

    if (known && received !== expected) {
      throw new DownloadError(`Truncated transfer for ${filename}: got ${received} of ${expected} bytes`);
    }

    await rename(tempPath, finalPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    if (error instanceof DownloadError) throw error;
    throw new DownloadError(`Download of ${filename} failed: ${describeError(error)}`);
  }

  console.log(`[Download] ✓ ${filename} (${(received / (1024 * 1024)).toFixed(1)} MB)`);
  return finalPath;
}
