#!/usr/bin/env node
/**
 * einthusan-radarr
 * Downloads South Asian movies from einthusan and fills Radarr's
 * wanted/missing list from it.
 */

import { Command } from 'commander';
import { downloadCommand } from './cli/download.js';
import { loginCommand } from './cli/login.js';
import { syncCommand } from './cli/sync.js';

const program = new Command();

program
  .name('einthusan')
  .description('Einthusan downloader with Radarr wanted/missing sync')
  .version('0.1.0');

program.addCommand(downloadCommand());
program.addCommand(loginCommand());
program.addCommand(syncCommand());

await program.parseAsync(process.argv);
