#!/usr/bin/env node
import { syncCommand } from '../cli/sync.js';

await syncCommand('einthusan-radarr-sync').parseAsync(process.argv);
