/**
 * Einthusan Site Client
 * Server-rendered search pages scraped with cheerio, plus the two AJAX
 * endpoints the player and the login form use.
 *
 * Flow for one movie:
 *   /movie/results/?lang=L&query=Q        -> list of /movie/watch/<id>/ links
 *   /movie/watch/<id>/?lang=L             -> csrf token + ejpingables
 *   POST /ajax/movie/watch/<id>/?lang=L   -> EJLinks (MP4 + HLS)
 * Premium (HD) pages live under /premium/ and need a logged-in session.
 */

import * as cheerio from 'cheerio';
import { config } from '../config.js';
import { AcquisitionError, AuthError, DownloadError, NotFoundError, describeError } from '../errors.js';
import { extensionFromUrl } from '../format/filename.js';
import { cookieHeader, hasAuthCookie, mergeCookies, parseSetCookie } from '../session/cookies.js';
import { saveSession } from '../session/store.js';
import type {
  Cookie,
  Credentials,
  Language,
  MovieQuery,
  Quality,
  ResolvedDownload,
  SearchResult,
  Session,
} from '../types.js';
import { isLanguage } from '../utils/language.js';
import { fetchWithTimeout } from '../utils/resilience.js';
import { decodeEJLinks, type EJLinks } from './ejlinks.js';

// =============================================================================
// Capabilities
// =============================================================================

export interface SiteClient {
  search(query: MovieQuery): Promise<SearchResult[]>;
  describe(url: string, fallbackLanguage: Language): Promise<SearchResult>;
  resolveDownloadUrl(result: SearchResult, quality: Quality, session?: Session): Promise<ResolvedDownload>;
}

/**
 * How a session becomes authenticated is the client's business; callers only
 * see this.
 */
export interface Authenticator {
  login(credentials: Credentials): Promise<Session>;
}

interface RequestOptions {
  method?: string;
  body?: string;
  headers?: Record<string, string>;
}

export interface EinthusanClientOptions {
  baseUrl?: string;
  userAgent?: string;
  timeout?: number;
  /** Cookie whose presence marks a logged-in session on later runs */
  authCookie?: string;
  /** Called after a successful login; defaults to writing the cookie jar */
  persist?: (session: Session) => void;
}

// =============================================================================
// Page Parsing
// =============================================================================

const WATCH_PATH = /\/movie\/watch\/([^/?#]+)/;
const HD_MARKERS = '.prem, .premium, .hd, .ultrahd, .uhd';

function extractYear(text: string): number | undefined {
  const match = text.match(/\b(19|20)\d{2}\b/);
  return match ? parseInt(match[0], 10) : undefined;
}

function qualitiesFor(hasHdMarker: boolean, infoText: string): Set<Quality> {
  const qualities = new Set<Quality>(['sd']);
  if (hasHdMarker || /\b(ultra\s*)?hd\b/i.test(infoText)) {
    qualities.add('hd');
  }
  return qualities;
}

export function watchUrl(baseUrl: string, id: string, language: Language, premium = false): string {
  return `${baseUrl}${premium ? '/premium' : ''}/movie/watch/${id}/?lang=${language}`;
}

/**
 * Search results in the order the site ranked them, one per movie id.
 */
export function parseSearchResults(html: string, language: Language, baseUrl = config.site.baseUrl): SearchResult[] {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];
  const seen = new Set<string>();

  $('#UIMovieSummary li, .block2').each((_, block) => {
    const $block = $(block);
    const link = $block.find('a.title').first();
    const title = link.find('h3').text().trim();
    const idMatch = (link.attr('href') ?? '').match(WATCH_PATH);

    if (!title || !idMatch || seen.has(idMatch[1])) return;
    seen.add(idMatch[1]);

    const infoText = $block.find('.info p').text();
    results.push({
      id: idMatch[1],
      title,
      year: extractYear(infoText),
      language,
      sourceUrl: watchUrl(baseUrl, idMatch[1], language),
      availableQualities: qualitiesFor($block.find(HD_MARKERS).length > 0, infoText),
    });
  });

  return results;
}

export interface MoviePage {
  pageId: string;
  ejpingables?: string;
  contentTitle?: string;
  year?: number;
  premium: boolean;
}

export function parseMoviePage(html: string): MoviePage {
  const $ = cheerio.load(html);
  const player = $('section#UIVideoPlayer');
  const summary = $('section#UIMovieSummary');

  return {
    pageId: $('html').attr('data-pageid') ?? '',
    ejpingables: player.length > 0 ? player.attr('data-ejpingables') ?? '' : undefined,
    contentTitle: player.attr('data-content-title') || summary.find('h3').first().text().trim() || undefined,
    year: extractYear(summary.find('.info p').text()),
    premium: html.includes('PGPremiumMovieWatch') || summary.find(HD_MARKERS).length > 0,
  };
}

// =============================================================================
// AJAX Replies
// =============================================================================

interface AjaxReply {
  Event?: string;
  Message?: string;
  Data?: unknown;
}

function parseAjaxReply(value: unknown): AjaxReply {
  if (typeof value !== 'object' || value === null) return {};
  const reply: AjaxReply = {};
  if ('Event' in value && typeof value.Event === 'string') reply.Event = value.Event;
  if ('Message' in value && typeof value.Message === 'string') reply.Message = value.Message;
  if ('Data' in value) reply.Data = value.Data;
  return reply;
}

function ejLinksOf(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'EJLinks' in data && typeof data.EJLinks === 'string') {
    return data.EJLinks;
  }
  return '';
}

function decodeLinks(encoded: string, title: string): EJLinks {
  try {
    return decodeEJLinks(encoded);
  } catch (error) {
    throw new DownloadError(`Failed to decode links for "${title}": ${describeError(error)}`);
  }
}

function ajaxUrlFor(pageUrl: string): string {
  const url = new URL(pageUrl);
  url.pathname = '/ajax' + url.pathname;
  return url.toString();
}

// =============================================================================
// Client
// =============================================================================

export class EinthusanClient implements SiteClient, Authenticator {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeout: number;
  private readonly authCookie: string;
  private readonly persist: (session: Session) => void;

  constructor(private readonly session: Session, options: EinthusanClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.site.baseUrl).replace(/\/$/, '');
    this.userAgent = options.userAgent ?? config.site.userAgent;
    this.timeout = options.timeout ?? config.http.timeout;
    this.authCookie = options.authCookie ?? config.site.authCookie;
    this.persist = options.persist ?? (s => saveSession(s));
  }

  /**
   * Every request carries the jar's cookies and feeds Set-Cookie back into it.
   */
  private async request(url: string, session: Session, init: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Referer: `${this.baseUrl}/`,
    };
    const cookies = cookieHeader(session.cookies, url);
    if (cookies) headers.Cookie = cookies;

    const response = await fetchWithTimeout(url, {
      ...init,
      headers: { ...headers, ...init.headers },
      timeout: this.timeout,
    });

    const incoming = response.headers
      .getSetCookie()
      .map(header => parseSetCookie(header, url))
      .filter((c): c is Cookie => c !== null);
    if (incoming.length > 0) mergeCookies(session.cookies, incoming);

    return response;
  }

  private postForm(url: string, session: Session, fields: Record<string, string>): Promise<Response> {
    return this.request(url, session, {
      method: 'POST',
      body: new URLSearchParams(fields).toString(),
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
        'X-Requested-With': 'XMLHttpRequest',
      },
    });
  }

  async search(query: MovieQuery): Promise<SearchResult[]> {
    const url = `${this.baseUrl}/movie/results/?lang=${query.language}&query=${encodeURIComponent(query.title)}`;
    console.log(`[Einthusan] Searching ${query.language} for: ${query.title}`);

    const response = await this.request(url, this.session);
    if (!response.ok) {
      throw new AcquisitionError(`Search for "${query.title}" failed: HTTP ${response.status}`);
    }

    const results = parseSearchResults(await response.text(), query.language, this.baseUrl);
    if (results.length === 0) {
      throw new NotFoundError(`No ${query.language} results for "${query.title}"`);
    }

    console.log(`[Einthusan] Found ${results.length} result(s)`);
    return results;
  }

  async describe(url: string, fallbackLanguage: Language): Promise<SearchResult> {
    const idMatch = url.match(WATCH_PATH);
    if (!idMatch) {
      throw new NotFoundError(`Not an einthusan movie URL: ${url}`);
    }

    const lang = new URL(url).searchParams.get('lang') ?? '';
    const language = isLanguage(lang) ? lang : fallbackLanguage;

    const response = await this.request(url, this.session);
    if (response.status === 404) {
      throw new NotFoundError(`Movie page not found: ${url}`);
    }
    if (!response.ok) {
      throw new AcquisitionError(`Movie page ${url} failed: HTTP ${response.status}`);
    }

    const page = parseMoviePage(await response.text());
    const availableQualities = new Set<Quality>(['sd']);
    if (page.premium || url.includes('/premium/')) availableQualities.add('hd');

    return {
      id: idMatch[1],
      title: page.contentTitle ?? 'Unknown',
      year: page.year,
      language,
      sourceUrl: watchUrl(this.baseUrl, idMatch[1], language),
      availableQualities,
    };
  }

  async resolveDownloadUrl(
    result: SearchResult,
    quality: Quality,
    session: Session = this.session
  ): Promise<ResolvedDownload> {
    // Premium needs a login; do not even ask the site
    if (quality === 'hd' && !session.authenticated) {
      return { requiresAuth: true };
    }

    const pageUrl = quality === 'hd'
      ? watchUrl(this.baseUrl, result.id, result.language, true)
      : result.sourceUrl;

    return this.resolvePage(pageUrl, result, quality, session, true);
  }

  private async resolvePage(
    pageUrl: string,
    result: SearchResult,
    quality: Quality,
    session: Session,
    followRedirect: boolean
  ): Promise<ResolvedDownload> {
    const pageResponse = await this.request(pageUrl, session);
    if (!pageResponse.ok) {
      throw new DownloadError(`Movie page for "${result.title}" returned HTTP ${pageResponse.status}`);
    }

    const page = parseMoviePage(await pageResponse.text());
    if (page.ejpingables === undefined) {
      if (!session.authenticated) return { requiresAuth: true };
      throw new DownloadError(`Video player not found on ${pageUrl}`);
    }

    const pingResponse = await this.postForm(ajaxUrlFor(pageUrl), session, {
      xEvent: 'UIVideoPlayer.PingOutcome',
      xJson: JSON.stringify({ EJOutcomes: page.ejpingables, NativeHLS: false }),
      'gorilla.csrf.Token': page.pageId,
    });
    if (!pingResponse.ok) {
      throw new DownloadError(`Player ping for "${result.title}" failed: HTTP ${pingResponse.status}`);
    }

    const pingBody = await pingResponse.text();
    let reply: AjaxReply;
    try {
      reply = parseAjaxReply(JSON.parse(pingBody));
    } catch {
      throw new DownloadError(`Player ping for "${result.title}" returned a non-JSON reply`);
    }

    // Premium-only titles answer with a redirect to their /premium/ page
    if (reply.Event === 'redirect' && typeof reply.Data === 'string') {
      if (!session.authenticated) return { requiresAuth: true };
      if (!followRedirect) {
        throw new DownloadError(`Player for "${result.title}" redirected twice`);
      }
      console.log(`[Einthusan] Following premium redirect: ${reply.Data}`);
      return this.resolvePage(this.baseUrl + reply.Data, result, 'hd', session, false);
    }

    const encoded = ejLinksOf(reply.Data);
    if (!encoded) {
      if (!session.authenticated) return { requiresAuth: true };
      throw new DownloadError(`No download links for "${result.title}"`);
    }

    const links = decodeLinks(encoded, result.title);
    if (!links.MP4Link) {
      throw new DownloadError(`No MP4 link for "${result.title}"`);
    }

    return {
      requiresAuth: false,
      url: links.MP4Link,
      hlsUrl: links.HLSLink,
      metadata: {
        title: result.title,
        year: result.year ?? page.year,
        language: result.language,
        quality,
        extension: extensionFromUrl(links.MP4Link),
      },
    };
  }

  async login(credentials: Credentials): Promise<Session> {
    console.log(`[Einthusan] Logging in as ${credentials.email}`);

    const loginPage = await this.request(`${this.baseUrl}/login/`, this.session);
    if (!loginPage.ok) {
      throw new AuthError(`Login page returned HTTP ${loginPage.status}`);
    }
    const { pageId } = parseMoviePage(await loginPage.text());

    const response = await this.postForm(`${this.baseUrl}/ajax/login/`, this.session, {
      xEvent: 'Login',
      xJson: JSON.stringify({ Email: credentials.email, Password: credentials.password }),
      'gorilla.csrf.Token': pageId,
    });
    if (!response.ok) {
      throw new AuthError(`Login failed: HTTP ${response.status}`);
    }

    const body = await response.text();
    if (/captcha/i.test(body)) {
      throw new AuthError('Login was challenged with a captcha. Log in from a browser and export cookies.txt instead.');
    }

    let reply: AjaxReply;
    try {
      reply = parseAjaxReply(JSON.parse(body));
    } catch {
      throw new AuthError('Login reply was not JSON');
    }

    if (reply.Event !== 'redirect') {
      throw new AuthError(reply.Message || 'Invalid email or password');
    }

    this.session.authenticated = true;
    this.persist(this.session);
    console.log('[Einthusan] Logged in');
    if (!hasAuthCookie(this.session.cookies, this.authCookie)) {
      const names = this.session.cookies.map(c => c.name).join(', ') || 'none';
      console.warn(
        `[Einthusan] ⚠️ No "${this.authCookie}" cookie after login (got: ${names}); ` +
        'later runs will count as logged out. Set EINTHUSAN_AUTH_COOKIE to the session cookie name.'
      );
    }
    return this.session;
  }
}
