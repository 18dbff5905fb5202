/**
 * Radarr Sync Tests
 * Radarr, the site and the downloader are all fakes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Downloader } from '../src/download/downloader.js';
import { NotFoundError, RadarrUnavailableError } from '../src/errors.js';
import type { MissingMovieSource } from '../src/radarr/client.js';
import type { SiteClient } from '../src/sources/einthusan.js';
import { advance, runSync, type SyncOptions } from '../src/sync/orchestrator.js';
import type { MovieQuery, RadarrMissingEntry, SearchResult, Session, SyncEntryResult } from '../src/types.js';
import { makeResult } from './helpers.js';

let outputDir: string;

beforeEach(() => {
  outputDir = mkdtempSync(join(tmpdir(), 'einthusan-sync-'));
});

afterEach(() => {
  rmSync(outputDir, { recursive: true, force: true });
});

const MOVIES: RadarrMissingEntry[] = [
  { radarrMovieId: 1, title: 'Kadhalikka Neramillai', year: 2023, language: 'tamil' },
  { radarrMovieId: 2, title: 'Jailer', year: 2023, language: 'tamil' },
  { radarrMovieId: 3, title: 'Vikram', year: 2022, language: 'tamil' },
  { radarrMovieId: 4, title: 'Leo', year: 2023, language: 'tamil' },
  { radarrMovieId: 5, title: 'Maaveeran', year: 2023, language: 'tamil' },
];

/** Every title exists on the site, in the language asked for */
function catalogue(query: MovieQuery): SearchResult[] {
  const movie = MOVIES.find(m => m.title === query.title);
  if (!movie) throw new NotFoundError(`No ${query.language} results for "${query.title}"`);
  const id = movie.title.toLowerCase().replace(/\s+/g, '-');
  return [makeResult({
    id,
    title: movie.title,
    year: movie.year,
    language: query.language,
    sourceUrl: `https://einthusan.test/movie/watch/${id}/?lang=${query.language}`,
  })];
}

function fakes(missing: RadarrMissingEntry[] = MOVIES, session: Session = { cookies: [], authenticated: false }) {
  const radarr = {
    listMissing: vi.fn<MissingMovieSource['listMissing']>(async () => missing),
    notifyDownloaded: vi.fn<MissingMovieSource['notifyDownloaded']>(async () => true),
  };
  const site = {
    search: vi.fn<SiteClient['search']>(async query => catalogue(query)),
    describe: vi.fn<SiteClient['describe']>(),
    resolveDownloadUrl: vi.fn<SiteClient['resolveDownloadUrl']>(async (result, quality) => ({
      requiresAuth: false as const,
      url: `https://cdn.einthusan.test/${result.id}.mp4`,
      metadata: { title: result.title, year: result.year, language: result.language, quality, extension: 'mp4' },
    })),
  };
  const download = vi.fn<Downloader>(async (_url, dir, options) => join(dir, options?.filename ?? 'x.mp4'));
  return { radarr, site, download, session };
}

function options(overrides: Partial<SyncOptions> = {}): SyncOptions {
  return { dryRun: false, languages: ['tamil'], minScore: 0.85, outputDir, ...overrides };
}

describe('runSync', () => {
  it('should never download in a dry run', async () => {
    const deps = fakes();

    const report = await runSync(deps, options({ dryRun: true }));

    expect(deps.download).not.toHaveBeenCalled();
    expect(deps.site.resolveDownloadUrl).not.toHaveBeenCalled();
    expect(report.entries.map(e => e.state)).toEqual(['found', 'found', 'found', 'found', 'found']);
    expect(report.wouldDownload).toBe(5);
    expect(report.downloaded).toBe(0);
    expect(deps.radarr.notifyDownloaded).not.toHaveBeenCalled();
  });

  it('should search at most limit entries and leave the rest pending', async () => {
    const deps = fakes();

    const report = await runSync(deps, options({ limit: 3 }));

    expect(deps.site.search.mock.calls.map(([q]) => q.title)).toEqual(['Kadhalikka Neramillai', 'Jailer', 'Vikram']);
    expect(deps.download).toHaveBeenCalledTimes(3);
    expect(report.entries.map(e => e.state)).toEqual(['done', 'done', 'done', 'pending', 'pending']);
    expect(report.pending).toBe(2);
  });

  it('should abort before any search when Radarr is down', async () => {
    const deps = fakes();
    deps.radarr.listMissing.mockRejectedValue(new RadarrUnavailableError('Radarr wanted/missing failed 500: boom'));

    await expect(runSync(deps, options())).rejects.toBeInstanceOf(RadarrUnavailableError);
    expect(deps.site.search).not.toHaveBeenCalled();
    expect(deps.download).not.toHaveBeenCalled();
  });

  it('should carry on after a failed download', async () => {
    const deps = fakes(MOVIES.slice(0, 2));
    deps.download.mockRejectedValueOnce(new Error('connection reset'));

    const report = await runSync(deps, options());

    expect(report.entries.map(e => e.state)).toEqual(['failed', 'done']);
    expect(report.entries[0].reason).toBe('connection reset');
    expect(report.entries[0].job?.outcome).toEqual({ status: 'failed', reason: 'connection reset' });
    expect(report.downloaded).toBe(1);
    expect(report.failed).toBe(1);
    expect(deps.radarr.notifyDownloaded.mock.calls).toEqual([[2], []]);
  });

  it('should name downloads after the matched listing', async () => {
    const deps = fakes(MOVIES.slice(0, 1));

    const report = await runSync(deps, options());

    expect(deps.download).toHaveBeenCalledWith(
      'https://cdn.einthusan.test/kadhalikka-neramillai.mp4',
      outputDir,
      { filename: 'Kadhalikka.Neramillai.2023.Tamil.SD.EINTHUSAN.WEB-DL.mp4' }
    );
    expect(report.entries[0].score).toBeCloseTo(1.3);
  });

  it('should skip movies the site does not have', async () => {
    const deps = fakes([{ radarrMovieId: 9, title: 'Not On The Site', year: 2020 }]);

    const report = await runSync(deps, options({ languages: ['tamil', 'hindi'] }));

    expect(report.entries[0].state).toBe('skipped');
    expect(report.entries[0].reason).toBe('not on einthusan');
    expect(deps.site.search).toHaveBeenCalledTimes(2);
  });

  it('should skip matches below the minimum score', async () => {
    const deps = fakes([{ radarrMovieId: 9, title: 'Jailer Returns', year: 2030 }]);
    deps.site.search.mockResolvedValue([makeResult({ id: 'x', title: 'Jailer', year: 2023 })]);

    const report = await runSync(deps, options());

    expect(report.entries[0].state).toBe('skipped');
    expect(report.entries[0].reason).toMatch(/^low match: Jailer \(2023\)/);
    expect(deps.download).not.toHaveBeenCalled();
  });

  it('should skip movies already in the output directory', async () => {
    writeFileSync(join(outputDir, 'Jailer.2023.Tamil.HD.EINTHUSAN.WEB-DL.mkv'), '');
    const deps = fakes(MOVIES.slice(1, 2));

    const report = await runSync(deps, options());

    expect(report.entries[0].state).toBe('skipped');
    expect(report.entries[0].reason).toBe('already downloaded');
    expect(deps.download).not.toHaveBeenCalled();
  });

  it('should not count a leftover partial file as downloaded', async () => {
    writeFileSync(join(outputDir, 'Jailer.2023.Tamil.SD.EINTHUSAN.WEB-DL.mp4.part'), '');
    const deps = fakes(MOVIES.slice(1, 2));

    const report = await runSync(deps, options());

    expect(report.entries[0].state).toBe('done');
  });

  it("should search Radarr's original language first and stop at a strong match", async () => {
    const deps = fakes([{ radarrMovieId: 7, title: 'Vikram', year: 2022, language: 'telugu' }]);

    await runSync(deps, options({ languages: ['tamil', 'telugu'] }));

    expect(deps.site.search.mock.calls.map(([q]) => q.language)).toEqual(['telugu']);
  });

  it('should fall back to SD when HD needs a login the session lacks', async () => {
    const deps = fakes(MOVIES.slice(0, 1), { cookies: [], authenticated: true });
    deps.site.search.mockResolvedValue([makeResult({ id: 'kn', availableQualities: new Set(['sd', 'hd']) })]);
    deps.site.resolveDownloadUrl.mockImplementation(async (result, quality) =>
      quality === 'hd'
        ? { requiresAuth: true }
        : {
            requiresAuth: false,
            url: 'https://cdn.einthusan.test/kn.mp4',
            metadata: { title: result.title, year: result.year, language: result.language, quality, extension: 'mp4' },
          }
    );

    const report = await runSync(deps, options());

    expect(deps.site.resolveDownloadUrl.mock.calls.map(([, quality]) => quality)).toEqual(['hd', 'sd']);
    expect(report.entries[0].job?.finalFilename).toBe('Kadhalikka.Neramillai.2023.Tamil.SD.EINTHUSAN.WEB-DL.mp4');
  });

  it('should fail an entry whose search errors in every language', async () => {
    const deps = fakes(MOVIES.slice(0, 1));
    deps.site.search.mockRejectedValue(new Error('HTTP 503'));

    const report = await runSync(deps, options());

    expect(report.entries[0].state).toBe('failed');
    expect(report.entries[0].reason).toBe('HTTP 503');
  });

  it('should skip rather than fail when one language answers and another errors', async () => {
    const deps = fakes([{ radarrMovieId: 9, title: 'Kadhalikka Neramillai', year: 2023 }]);
    deps.site.search.mockImplementation(async query => {
      if (query.language === 'hindi') throw new Error('HTTP 503');
      throw new NotFoundError(`No ${query.language} results for "${query.title}"`);
    });

    const report = await runSync(deps, options({ languages: ['tamil', 'hindi'] }));

    expect(deps.site.search).toHaveBeenCalledTimes(2);
    expect(report.entries[0].state).toBe('skipped');
    expect(report.entries[0].reason).toBe('not on einthusan');
    expect(report.failed).toBe(0);
  });
});

describe('advance', () => {
  it('should reject transitions the state machine does not allow', () => {
    const item: SyncEntryResult = { entry: MOVIES[0], state: 'pending' };

    expect(() => advance(item, 'downloading')).toThrow('Illegal sync transition pending -> downloading for "Kadhalikka Neramillai"');
    advance(item, 'searching');
    advance(item, 'not_found');
    expect(() => advance(item, 'done')).toThrow(/not_found -> done/);
    expect(item.state).toBe('not_found');
  });
});
