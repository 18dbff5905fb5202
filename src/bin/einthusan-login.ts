#!/usr/bin/env node
import { loginCommand } from '../cli/login.js';

await loginCommand('einthusan-login').parseAsync(process.argv);
