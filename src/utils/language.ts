/**
 * Language handling
 * The site partitions its catalogue by language; Radarr reports an original
 * language per movie. Both are mapped onto the same eight names.
 */

import { LANGUAGES, type Language } from '../types.js';

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some(language => language === value);
}

/**
 * Parse a user- or config-supplied language, case-insensitively.
 */
export function parseLanguage(value: string): Language {
  const normalized = value.trim().toLowerCase();
  if (!isLanguage(normalized)) {
    throw new Error(`Unknown language "${value}". Expected one of: ${LANGUAGES.join(', ')}`);
  }
  return normalized;
}

/**
 * Radarr's originalLanguage.name ("Tamil", "Hindi", ...) mapped to ours,
 * or undefined for anything the site does not carry.
 */
export function languageFromRadarr(name: string | undefined): Language | undefined {
  if (!name) return undefined;
  const normalized = name.trim().toLowerCase();
  return isLanguage(normalized) ? normalized : undefined;
}

/**
 * Languages to try for one movie: the detected one first when it is in the list.
 */
export function searchOrder(languages: readonly Language[], preferred?: Language): Language[] {
  const order = [...languages];
  if (preferred && order.includes(preferred)) {
    order.splice(order.indexOf(preferred), 1);
    order.unshift(preferred);
  }
  return order;
}

export function languageLabel(language: Language): string {
  return language.charAt(0).toUpperCase() + language.slice(1);
}
