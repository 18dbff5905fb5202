/**
 * einthusan-radarr Configuration
 * Everything comes from the environment, with defaults for a single-user box.
 */

import { homedir } from 'os';
import { join } from 'path';

const configDir = process.env.EINTHUSAN_CONFIG_DIR || join(homedir(), '.config', 'einthusan');

export const config = {
  // Per-user cookie and credential files
  paths: {
    configDir,
    cookies: join(configDir, 'cookies.txt'),
    credentials: join(configDir, 'credentials.json'),
    downloads: process.env.EINTHUSAN_DOWNLOAD_DIR || join(homedir(), 'downloads', 'einthusan'),
  },

  // Source site
  site: {
    baseUrl: (process.env.EINTHUSAN_BASE_URL || 'https://einthusan.tv').replace(/\/$/, ''),
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    authCookie: process.env.EINTHUSAN_AUTH_COOKIE || 'remember_token',
  },

  // Radarr instance (pure consumer of its v3 API)
  radarr: {
    url: (process.env.RADARR_URL || 'http://localhost:7878').replace(/\/$/, ''),
    apiKey: process.env.RADARR_API_KEY || '',
    pageSize: 50,
  },

  // Sync behaviour
  sync: {
    languages: (process.env.EINTHUSAN_SYNC_LANGUAGES || 'tamil,hindi,malayalam,telugu')
      .split(',')
      .map(l => l.trim())
      .filter(Boolean),
    minScore: parseFloat(process.env.EINTHUSAN_MIN_SCORE || '0.85'),
    perfectScore: 0.9,     // stop trying other languages at this score
  },

  // No cancellation protocol above the HTTP layer, so every request gets one
  http: {
    timeout: parseInt(process.env.HTTP_TIMEOUT_MS || '30000', 10),
  },
};

export type Config = typeof config;
