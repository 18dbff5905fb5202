#!/usr/bin/env node
import { downloadCommand } from '../cli/download.js';

await downloadCommand('einthusan-dl').parseAsync(process.argv);
