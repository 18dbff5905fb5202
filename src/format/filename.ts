/**
 * Plex-style release names
 *   Movie.Name.Year.Lang.Quality.EINTHUSAN.WEB-DL.ext
 * Pure functions only.
 */

import type { MovieMetadata } from '../types.js';
import { languageLabel } from '../utils/language.js';

const TAG = 'EINTHUSAN.WEB-DL';
const DEFAULT_EXTENSION = 'mp4';

/**
 * Dot-separated, title-cased words. Apostrophes vanish ("Don't" -> "Dont"),
 * any other run of whitespace or punctuation becomes one period.
 */
export function normalizeTitle(title: string): string {
  const words = title
    .replace(/['‘’`]/g, '')
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1));

  return words.length > 0 ? words.join('.') : 'Untitled';
}

/**
 * Everything but the extension; two downloads of the same movie, language and
 * quality share a stem whatever container they arrived in.
 */
export function filenameStem(metadata: MovieMetadata): string {
  const parts = [normalizeTitle(metadata.title)];
  if (metadata.year) parts.push(String(metadata.year));
  parts.push(languageLabel(metadata.language), metadata.quality.toUpperCase(), TAG);
  return parts.join('.');
}

export function formatFilename(metadata: MovieMetadata): string {
  const extension = (metadata.extension || DEFAULT_EXTENSION).replace(/^\./, '').toLowerCase();
  return `${filenameStem(metadata)}.${extension}`;
}

export function extensionFromUrl(url: string): string {
  try {
    const match = new URL(url).pathname.match(/\.([a-z0-9]{2,4})$/i);
    return match ? match[1].toLowerCase() : DEFAULT_EXTENSION;
  } catch {
    return DEFAULT_EXTENSION;
  }
}
