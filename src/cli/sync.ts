/**
 * Sync command
 * Fill Radarr's wanted/missing list from einthusan. Meant for cron.
 */

import { Command } from 'commander';
import { config } from '../config.js';
import { downloadFile } from '../download/downloader.js';
import { RadarrClient } from '../radarr/client.js';
import { openSession } from '../session/store.js';
import { EinthusanClient } from '../sources/einthusan.js';
import { runSync } from '../sync/orchestrator.js';
import type { Language, SyncReport } from '../types.js';
import { parseLanguage } from '../utils/language.js';
import { languageListOption, limitOption, reportFailure, scoreOption } from './options.js';

interface SyncCliOptions {
  dryRun?: boolean;
  lang?: Language[];
  limit: number;
  minScore: number;
  output: string;
}

export function printReport(report: SyncReport): void {
  console.log('\n' + '='.repeat(60));
  console.log(`📊 Sync ${report.dryRun ? '(dry run) ' : ''}complete in ${(report.duration / 1000).toFixed(1)}s`);
  console.log('='.repeat(60));
  if (report.dryRun) {
    console.log(`   Would download: ${report.wouldDownload}`);
  } else {
    console.log(`   Downloaded:     ${report.downloaded}`);
  }
  console.log(`   Skipped:        ${report.skipped}`);
  console.log(`   Failed:         ${report.failed}`);
  if (report.pending > 0) {
    console.log(`   Left for later: ${report.pending}`);
  }

  const failures = report.entries.filter(e => e.state === 'failed');
  if (failures.length > 0) {
    console.log('\n❌ Failures:');
    for (const { entry, reason } of failures) {
      console.log(`   ${entry.title} (${entry.year ?? '?'}): ${reason ?? 'unknown error'}`);
    }
  }
}

export function syncCommand(name = 'sync'): Command {
  return new Command(name)
    .description("Download movies from Radarr's wanted/missing list")
    .option('--dry-run', 'Search only; never download')
    .option('-l, --lang <language>', 'Language to search (repeatable, or comma-separated)', languageListOption)
    .option('--limit <n>', 'Search at most N movies this run (0 = all)', limitOption, 0)
    .option('--min-score <score>', 'Lowest match score to accept', scoreOption, config.sync.minScore)
    .option('-o, --output <dir>', 'Output directory', config.paths.downloads)
    .action(async (opts: SyncCliOptions) => {
      try {
        const languages = opts.lang ?? config.sync.languages.map(parseLanguage);
        const session = openSession();

        const report = await runSync(
          {
            radarr: new RadarrClient(),
            site: new EinthusanClient(session),
            session,
            download: downloadFile,
          },
          {
            dryRun: opts.dryRun ?? false,
            languages,
            limit: opts.limit,
            minScore: opts.minScore,
            outputDir: opts.output,
          }
        );

        printReport(report);
        if (report.failed > 0) process.exitCode = 4;
      } catch (error) {
        reportFailure(error);
      }
    });
}
