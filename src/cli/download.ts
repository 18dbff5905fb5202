/**
 * Download command
 * One movie, by title search or by page URL.
 */

import { Command } from 'commander';
import { config } from '../config.js';
import { downloadFile } from '../download/downloader.js';
import { AcquisitionError } from '../errors.js';
import { formatFilename } from '../format/filename.js';
import { openSession } from '../session/store.js';
import { EinthusanClient } from '../sources/einthusan.js';
import type { Language, SearchResult } from '../types.js';
import { acquireMovie, createQuery, type AcquireOutcome, type QualityPreference } from '../workflow.js';
import { languageOption, qualityOption, reportFailure } from './options.js';

interface DownloadCliOptions {
  url?: string;
  lang: Language;
  search?: boolean;
  info?: boolean;
  output: string;
  quality: QualityPreference;
}

function qualityTags(result: SearchResult): string {
  return [...result.availableQualities].map(q => q.toUpperCase()).sort().join('/');
}

function printOutcome(outcome: AcquireOutcome): void {
  switch (outcome.kind) {
    case 'search':
      console.log(`\n📚 ${outcome.results.length} result(s):\n`);
      outcome.results.forEach((result, i) => {
        console.log(`  ${i + 1}. ${result.title} (${result.year ?? '?'}) [${qualityTags(result)}]`);
        console.log(`     ${result.sourceUrl}`);
      });
      break;

    case 'info': {
      const { result, resolved } = outcome;
      console.log(`\n🎬 ${result.title} (${result.year ?? '?'})`);
      console.log(`   Quality:  ${resolved.metadata.quality.toUpperCase()}`);
      console.log(`   MP4:      ${resolved.url}`);
      if (resolved.hlsUrl) console.log(`   HLS:      ${resolved.hlsUrl}`);
      console.log(`   Filename: ${formatFilename(resolved.metadata)}`);
      break;
    }

    case 'downloaded':
      if (outcome.job.outcome?.status === 'completed') {
        console.log(`\n✅ Saved ${outcome.job.outcome.path}`);
      }
      break;
  }
}

export function downloadCommand(name = 'download'): Command {
  return new Command(name)
    .description('Download one movie from einthusan')
    .argument('[query...]', 'Movie title to search for')
    .option('--url <url>', 'Movie page URL instead of a search')
    .option('-l, --lang <language>', 'Language to search in', languageOption, 'tamil')
    .option('-s, --search', 'Only list the search results')
    .option('--info', 'Resolve the download link without downloading')
    .option('-o, --output <dir>', 'Output directory', config.paths.downloads)
    .option('-q, --quality <quality>', 'best, hd or sd', qualityOption, 'best')
    .action(async (query: string[], opts: DownloadCliOptions) => {
      try {
        const title = query.join(' ').trim();
        if (!title && !opts.url) {
          throw new AcquisitionError('Give a movie title or --url <url>');
        }

        const session = openSession();
        const client = new EinthusanClient(session);

        const outcome = await acquireMovie(
          { site: client, session, download: downloadFile },
          {
            query: title ? createQuery(title, opts.lang) : undefined,
            url: opts.url,
            language: opts.lang,
            quality: opts.quality,
            outputDir: opts.output,
            searchOnly: opts.search,
            infoOnly: opts.info,
          }
        );
        printOutcome(outcome);
      } catch (error) {
        reportFailure(error);
      }
    });
}
