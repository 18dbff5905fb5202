/**
 * Radarr Client
 * Read-only consumer of Radarr's v3 wanted/missing list, plus the rescan
 * command used to tell Radarr a file has landed.
 */

import { config } from '../config.js';
import { RadarrUnavailableError, describeError } from '../errors.js';
import type { RadarrMissingEntry } from '../types.js';
import { languageFromRadarr } from '../utils/language.js';
import { fetchWithTimeout, isNetworkError } from '../utils/resilience.js';

export interface RadarrClientOptions {
  url?: string;
  apiKey?: string;
  pageSize?: number;
  timeout?: number;
}

interface RequestOptions {
  method?: string;
  body?: unknown;
  query?: Record<string, string | number | undefined>;
}

/** The bits of Radarr's MovieResource we read */
interface RadarrMovieRecord {
  id: number;
  title: string;
  year?: number;
  originalLanguage?: { id: number; name: string };
}

interface RadarrPage {
  page: number;
  pageSize: number;
  totalRecords: number;
  records: RadarrMovieRecord[];
}

function isMovieRecord(value: unknown): value is RadarrMovieRecord {
  return (
    typeof value === 'object' && value !== null &&
    'id' in value && typeof value.id === 'number' &&
    'title' in value && typeof value.title === 'string'
  );
}

function toPage(value: unknown): RadarrPage {
  if (typeof value !== 'object' || value === null || !('records' in value) || !Array.isArray(value.records)) {
    throw new RadarrUnavailableError('Radarr returned an unexpected wanted/missing payload');
  }
  const totalRecords = 'totalRecords' in value && typeof value.totalRecords === 'number'
    ? value.totalRecords
    : value.records.length;
  return {
    page: 'page' in value && typeof value.page === 'number' ? value.page : 1,
    pageSize: 'pageSize' in value && typeof value.pageSize === 'number' ? value.pageSize : value.records.length,
    totalRecords,
    records: value.records.filter(isMovieRecord),
  };
}

export interface MissingMovieSource {
  listMissing(limit?: number): Promise<RadarrMissingEntry[]>;
  notifyDownloaded(movieId?: number): Promise<boolean>;
}

export class RadarrClient implements MissingMovieSource {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly pageSize: number;
  private readonly timeout: number;

  constructor(options: RadarrClientOptions = {}) {
    this.baseUrl = (options.url ?? config.radarr.url).replace(/\/$/, '');
    this.apiKey = options.apiKey ?? config.radarr.apiKey;
    this.pageSize = options.pageSize ?? config.radarr.pageSize;
    this.timeout = options.timeout ?? config.http.timeout;
  }

  private async request(endpoint: string, opts: RequestOptions = {}): Promise<Response> {
    if (!this.apiKey) {
      throw new RadarrUnavailableError('Radarr API key missing. Set RADARR_API_KEY.');
    }

    const url = new URL(this.baseUrl + endpoint);
    if (opts.query) {
      Object.entries(opts.query).forEach(([k, v]) => {
        if (v !== undefined) url.searchParams.append(k, String(v));
      });
    }

    try {
      return await fetchWithTimeout(url.toString(), {
        method: opts.method ?? 'GET',
        headers: {
          'X-Api-Key': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        timeout: this.timeout,
      });
    } catch (err) {
      if (isNetworkError(err)) {
        throw new RadarrUnavailableError(`Cannot reach Radarr at ${this.baseUrl}: ${describeError(err)}`);
      }
      throw new RadarrUnavailableError(`Radarr request to ${url.pathname} failed: ${describeError(err)}`);
    }
  }

  /**
   * Monitored movies without a file, oldest-title-first, up to limit.
   */
  async listMissing(limit?: number): Promise<RadarrMissingEntry[]> {
    const entries: RadarrMissingEntry[] = [];
    const pageSize = limit !== undefined && limit > 0 ? Math.min(limit, this.pageSize) : this.pageSize;

    for (let page = 1; ; page++) {
      const res = await this.request('/api/v3/wanted/missing', {
        query: {
          page,
          pageSize,
          monitored: 'true',
          sortKey: 'title',
          sortDirection: 'ascending',
        },
      });
      if (!res.ok) {
        const text = await res.text();
        throw new RadarrUnavailableError(`Radarr wanted/missing failed ${res.status}: ${text.slice(0, 200)}`);
      }

      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        throw new RadarrUnavailableError(`Radarr wanted/missing returned invalid JSON: ${describeError(err)}`);
      }
      const data = toPage(body);

      for (const record of data.records) {
        entries.push({
          radarrMovieId: record.id,
          title: record.title,
          year: record.year || undefined,
          language: languageFromRadarr(record.originalLanguage?.name),
        });
      }

      const reachedLimit = limit !== undefined && limit > 0 && entries.length >= limit;
      const lastPage = data.records.length === 0 || page * pageSize >= data.totalRecords;
      if (reachedLimit || lastPage) break;
    }

    console.log(`[Radarr] ${entries.length} missing movie(s)`);
    return limit !== undefined && limit > 0 ? entries.slice(0, limit) : entries;
  }

  /**
   * Ask Radarr to rescan one movie (or the whole library). Best effort.
   */
  async notifyDownloaded(movieId?: number): Promise<boolean> {
    const body: { name: string; movieIds?: number[] } = { name: 'RescanMovie' };
    if (movieId !== undefined) body.movieIds = [movieId];

    try {
      const res = await this.request('/api/v3/command', { method: 'POST', body });
      if (!res.ok) {
        console.warn(`[Radarr] Rescan request returned ${res.status}`);
      }
      return res.ok;
    } catch (err) {
      console.warn(`[Radarr] Rescan request failed: ${describeError(err)}`);
      return false;
    }
  }
}
