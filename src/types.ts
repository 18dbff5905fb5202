/**
 * einthusan-radarr Type Definitions
 */

// =============================================================================
// Queries & Search
// =============================================================================

export const LANGUAGES = [
  'tamil',
  'hindi',
  'telugu',
  'malayalam',
  'kannada',
  'bengali',
  'marathi',
  'punjabi',
] as const;

export type Language = typeof LANGUAGES[number];

export type Quality = 'hd' | 'sd';

/**
 * What the user (or a Radarr record) asked for
 */
export interface MovieQuery {
  readonly title: string;
  readonly language: Language;
}

/**
 * One movie listing from the site's search page, in the site's order
 */
export interface SearchResult {
  id: string;
  title: string;
  year?: number;
  language: Language;
  sourceUrl: string;
  availableQualities: Set<Quality>;
}

/**
 * Metadata the filename is built from
 */
export interface MovieMetadata {
  title: string;
  year?: number;
  language: Language;
  quality: Quality;
  extension?: string;       // without the dot; defaults to mp4
}

/**
 * Outcome of asking the site for a playable link.
 * Premium quality without a logged-in session yields no URL at all.
 */
export type ResolvedDownload =
  | { requiresAuth: true }
  | {
      requiresAuth: false;
      url: string;
      hlsUrl?: string;
      metadata: MovieMetadata;
    };

// =============================================================================
// Session
// =============================================================================

/**
 * One line of a Netscape cookie jar
 */
export interface Cookie {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  expires: number;          // epoch seconds, 0 = session cookie
  name: string;
  value: string;
  httpOnly?: boolean;
}

export interface Session {
  cookies: Cookie[];
  authenticated: boolean;
}

export interface Credentials {
  email: string;
  password: string;
}

// =============================================================================
// Downloads
// =============================================================================

export type JobOutcome =
  | { status: 'completed'; path: string }
  | { status: 'failed'; reason: string };

export interface DownloadJob {
  searchResult: SearchResult;
  quality: Quality;
  destinationPath: string;  // directory
  finalFilename: string;
  outcome?: JobOutcome;
}

// =============================================================================
// Radarr & Sync
// =============================================================================

/**
 * A movie Radarr tracks but has no file for. Never mutated here.
 */
export interface RadarrMissingEntry {
  radarrMovieId: number;
  title: string;
  year?: number;
  language?: Language;      // Radarr's original language, when it is one we search
}

export type SyncState =
  | 'pending'
  | 'searching'
  | 'found'
  | 'not_found'
  | 'error'
  | 'downloading'
  | 'done'
  | 'skipped'
  | 'failed';

export interface SyncEntryResult {
  entry: RadarrMissingEntry;
  state: SyncState;
  match?: SearchResult;
  score?: number;
  job?: DownloadJob;
  reason?: string;
}

export interface SyncReport {
  dryRun: boolean;
  entries: SyncEntryResult[];
  downloaded: number;
  wouldDownload: number;    // dry runs: entries left at found
  skipped: number;
  failed: number;
  pending: number;
  duration: number;         // milliseconds
}
