/**
 * Single-movie acquisition
 * search -> pick -> resolve (needs auth?) -> download -> rename
 */

import type { Downloader } from './download/downloader.js';
import { AuthRequiredError, DownloadError, NotFoundError, describeError } from './errors.js';
import { formatFilename } from './format/filename.js';
import { pickBestMatch } from './reconciler/matcher.js';
import type { SiteClient } from './sources/einthusan.js';
import type {
  DownloadJob,
  Language,
  MovieQuery,
  Quality,
  ResolvedDownload,
  SearchResult,
  Session,
} from './types.js';

export type QualityPreference = 'best' | Quality;

export interface AcquireDeps {
  site: SiteClient;
  session: Session;
  download: Downloader;
}

export interface AcquireRequest {
  query?: MovieQuery;
  url?: string;
  /** Used for --url pages that do not say which language they are */
  language: Language;
  quality: QualityPreference;
  outputDir: string;
  searchOnly?: boolean;
  infoOnly?: boolean;
}

export type AcquireOutcome =
  | { kind: 'search'; results: SearchResult[] }
  | { kind: 'info'; result: SearchResult; resolved: Extract<ResolvedDownload, { requiresAuth: false }> }
  | { kind: 'downloaded'; job: DownloadJob };

export function createQuery(title: string, language: Language): MovieQuery {
  return Object.freeze({ title: title.trim(), language });
}

/**
 * "best" only means HD when the site offers it and we can actually get it.
 */
export function chooseQuality(result: SearchResult, preference: QualityPreference, session: Session): Quality {
  if (preference !== 'best') return preference;
  return result.availableQualities.has('hd') && session.authenticated ? 'hd' : 'sd';
}

export function planJob(result: SearchResult, quality: Quality, outputDir: string, extension?: string): DownloadJob {
  return {
    searchResult: result,
    quality,
    destinationPath: outputDir,
    finalFilename: formatFilename({
      title: result.title,
      year: result.year,
      language: result.language,
      quality,
      extension,
    }),
  };
}

/**
 * Run the job; the outcome is recorded on it whichever way it goes.
 */
export async function runJob(job: DownloadJob, url: string, download: Downloader): Promise<DownloadJob> {
  try {
    const path = await download(url, job.destinationPath, { filename: job.finalFilename });
    job.outcome = { status: 'completed', path };
    return job;
  } catch (error) {
    job.outcome = { status: 'failed', reason: describeError(error) };
    throw error instanceof DownloadError ? error : new DownloadError(describeError(error));
  }
}

async function selectResult(deps: AcquireDeps, request: AcquireRequest): Promise<SearchResult | SearchResult[]> {
  if (request.url) {
    return deps.site.describe(request.url, request.language);
  }
  if (!request.query) {
    throw new NotFoundError('Nothing to look for: give a movie title or --url');
  }

  const results = await deps.site.search(request.query);
  if (request.searchOnly) return results;

  const best = pickBestMatch(request.query.title, undefined, results);
  if (!best) {
    throw new NotFoundError(`No ${request.query.language} results for "${request.query.title}"`);
  }
  return best.result;
}

export async function acquireMovie(deps: AcquireDeps, request: AcquireRequest): Promise<AcquireOutcome> {
  const selected = await selectResult(deps, request);
  if (Array.isArray(selected)) {
    return { kind: 'search', results: selected };
  }

  const quality = chooseQuality(selected, request.quality, deps.session);
  const resolved = await deps.site.resolveDownloadUrl(selected, quality, deps.session);
  if (resolved.requiresAuth) {
    throw new AuthRequiredError(selected.title);
  }

  if (request.infoOnly) {
    return { kind: 'info', result: selected, resolved };
  }

  const job = planJob(selected, resolved.metadata.quality, request.outputDir, resolved.metadata.extension);
  await runJob(job, resolved.url, deps.download);
  return { kind: 'downloaded', job };
}
