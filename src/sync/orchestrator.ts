/**
 * Radarr Sync
 * Walks Radarr's missing list one movie at a time:
 *
 *   pending -> searching -> found -> downloading -> done
 *                        -> not_found -> skipped
 *                        -> error -> failed
 *
 * found -> skipped when the file is already on disk. Dry runs stop at found.
 * Entries past the limit never leave pending; Radarr will still list them
 * next time.
 */

import { existsSync, readdirSync } from 'fs';
import { config } from '../config.js';
import type { Downloader } from '../download/downloader.js';
import { NotFoundError, describeError } from '../errors.js';
import { filenameStem } from '../format/filename.js';
import type { MissingMovieSource } from '../radarr/client.js';
import { pickBestMatch, type ScoredMatch } from '../reconciler/matcher.js';
import type { SiteClient } from '../sources/einthusan.js';
import type {
  Language,
  Quality,
  RadarrMissingEntry,
  SearchResult,
  Session,
  SyncEntryResult,
  SyncReport,
  SyncState,
} from '../types.js';
import { searchOrder } from '../utils/language.js';
import { chooseQuality, createQuery, planJob, runJob } from '../workflow.js';

export interface SyncDeps {
  radarr: MissingMovieSource;
  site: SiteClient;
  session: Session;
  download: Downloader;
}

export interface SyncOptions {
  dryRun: boolean;
  languages: Language[];
  /** How many entries may reach searching; 0 or undefined = all */
  limit?: number;
  minScore: number;
  outputDir: string;
  /** Stop trying further languages once a match scores this high */
  perfectScore?: number;
}

const TRANSITIONS: Record<SyncState, readonly SyncState[]> = {
  pending: ['searching'],
  searching: ['found', 'not_found', 'error'],
  found: ['downloading', 'skipped'],
  not_found: ['skipped'],
  downloading: ['done', 'error'],
  error: ['failed'],
  done: [],
  skipped: [],
  failed: [],
};

export function advance(entry: SyncEntryResult, next: SyncState): void {
  if (!TRANSITIONS[entry.state].includes(next)) {
    throw new Error(`Illegal sync transition ${entry.state} -> ${next} for "${entry.entry.title}"`);
  }
  entry.state = next;
}

/**
 * True when a finished download of this movie (either quality) is already in dir.
 */
export function alreadyDownloaded(dir: string, result: SearchResult): boolean {
  if (!existsSync(dir)) return false;

  const stems = (['hd', 'sd'] as const).map(quality =>
    filenameStem({ title: result.title, year: result.year, language: result.language, quality }) + '.'
  );
  return readdirSync(dir).some(name =>
    !name.endsWith('.part') && stems.some(stem => name.startsWith(stem))
  );
}

interface LanguageMatch extends ScoredMatch {
  language: Language;
}

async function findAcrossLanguages(
  site: SiteClient,
  entry: RadarrMissingEntry,
  options: SyncOptions
): Promise<{ best: LanguageMatch | null; searchError?: string }> {
  const perfect = options.perfectScore ?? config.sync.perfectScore;
  let best: LanguageMatch | null = null;
  let lastError: string | undefined;
  let answered = 0;

  for (const language of searchOrder(options.languages, entry.language)) {
    let results: SearchResult[];
    try {
      results = await site.search(createQuery(entry.title, language));
    } catch (error) {
      if (error instanceof NotFoundError) {
        answered++;
      } else {
        lastError = describeError(error);
        console.log(`   ⚠️ Search error (${language}): ${lastError}`);
      }
      continue;
    }
    answered++;

    const match = pickBestMatch(entry.title, entry.year, results);
    if (match && (!best || match.score > best.score)) {
      best = { ...match, language };
    }
    if (best && best.score >= perfect) break;
  }

  // Only a search that no language answered counts as failed
  return { best, searchError: answered === 0 ? lastError : undefined };
}

async function processEntry(
  deps: SyncDeps,
  options: SyncOptions,
  item: SyncEntryResult
): Promise<void> {
  const { entry } = item;
  console.log(`🎬 ${entry.title} (${entry.year ?? '?'})`);
  advance(item, 'searching');

  const { best, searchError } = await findAcrossLanguages(deps.site, entry, options);

  if (!best) {
    if (searchError) {
      item.reason = searchError;
      advance(item, 'error');
      advance(item, 'failed');
      console.log(`   ❌ Search failed: ${searchError}`);
    } else {
      item.reason = 'not on einthusan';
      advance(item, 'not_found');
      advance(item, 'skipped');
      console.log(`   ❌ Not found on einthusan (${options.languages.join(', ')})`);
    }
    return;
  }

  const label = `${best.result.title} (${best.result.year ?? '?'}) [${best.language}] - score ${best.score.toFixed(2)}`;
  item.match = best.result;
  item.score = best.score;

  if (best.score < options.minScore) {
    item.reason = `low match: ${label}`;
    advance(item, 'not_found');
    advance(item, 'skipped');
    console.log(`   ⚠️ Low match: ${label}`);
    return;
  }

  advance(item, 'found');
  console.log(`   ✓ Found: ${label}`);

  if (alreadyDownloaded(options.outputDir, best.result)) {
    item.reason = 'already downloaded';
    advance(item, 'skipped');
    console.log('   ⏭️ Already downloaded');
    return;
  }

  if (options.dryRun) {
    console.log(`   📦 Would download: ${best.result.sourceUrl}`);
    return;
  }

  advance(item, 'downloading');
  console.log('   📥 Downloading...');

  try {
    let quality: Quality = chooseQuality(best.result, 'best', deps.session);
    let resolved = await deps.site.resolveDownloadUrl(best.result, quality, deps.session);
    if (resolved.requiresAuth && quality === 'hd') {
      quality = 'sd';
      resolved = await deps.site.resolveDownloadUrl(best.result, quality, deps.session);
    }
    if (resolved.requiresAuth) {
      throw new Error('site requires a premium login for this title');
    }

    item.job = planJob(best.result, resolved.metadata.quality, options.outputDir, resolved.metadata.extension);
    await runJob(item.job, resolved.url, deps.download);
    advance(item, 'done');
    console.log(`   ✓ Downloaded: ${item.job.finalFilename}`);

    if (await deps.radarr.notifyDownloaded(entry.radarrMovieId)) {
      console.log('   🔄 Radarr notified');
    }
  } catch (error) {
    item.reason = describeError(error);
    advance(item, 'error');
    advance(item, 'failed');
    console.log(`   ❌ Download failed: ${item.reason}`);
  }
}

export async function runSync(deps: SyncDeps, options: SyncOptions): Promise<SyncReport> {
  const startTime = Date.now();
  console.log(`🔍 Checking Radarr for missing movies (languages: ${options.languages.join(', ')})...`);

  // RadarrUnavailableError propagates: no Radarr, no run
  const missing = await deps.radarr.listMissing();
  console.log(`📋 Found ${missing.length} missing movie(s)\n`);

  const entries: SyncEntryResult[] = missing.map(entry => ({ entry, state: 'pending' }));
  const cap = options.limit && options.limit > 0 ? options.limit : entries.length;

  for (const item of entries.slice(0, cap)) {
    await processEntry(deps, options, item);
  }

  const count = (state: SyncState) => entries.filter(e => e.state === state).length;
  const report: SyncReport = {
    dryRun: options.dryRun,
    entries,
    downloaded: count('done'),
    wouldDownload: options.dryRun ? count('found') : 0,
    skipped: count('skipped'),
    failed: count('failed'),
    pending: count('pending'),
    duration: Date.now() - startTime,
  };

  if (report.downloaded > 0) {
    console.log('🔄 Final Radarr library scan...');
    if (!(await deps.radarr.notifyDownloaded())) {
      console.log('⚠️ Could not trigger final scan');
    }
  }

  return report;
}
