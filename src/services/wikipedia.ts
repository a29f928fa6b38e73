/**
 * Wikipedia Page Source
 * Resolves a subject through MediaWiki search, then fetches the rendered page
 */

import { PageSource } from '../types/index.js';
import { CONFIG } from '../config.js';
import { ExtractionError } from '../utils/errors.js';

export interface WikipediaOptions {
  apiUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class WikipediaPageSource implements PageSource {
  private readonly apiUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WikipediaOptions = {}) {
    this.apiUrl = options.apiUrl ?? CONFIG.WIKI_API_URL;
    this.userAgent = options.userAgent ?? CONFIG.USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? CONFIG.REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Titles of the pages matching a free-text query, best first
   */
  async search(query: string, limit: number = 10): Promise<string[]> {
    const body = await this.request(query, {
      action: 'query',
      list: 'search',
      srsearch: query,
      srlimit: String(limit)
    });

    const results = isRecord(body) && isRecord(body.query) ? body.query.search : undefined;
    if (!Array.isArray(results)) {
      throw new ExtractionError('fetch-failed', query, 'Search response has no results list');
    }

    return results
      .map(result => (isRecord(result) && typeof result.title === 'string' ? result.title : null))
      .filter((title): title is string => title !== null);
  }

  async fetchPageHtml(subject: string): Promise<string> {
    const titles = await this.search(subject);
    if (titles.length === 0) {
      throw new ExtractionError('no-page', subject, `No page found for "${subject}"`);
    }

    // First search result is taken as the subject's page
    const title = titles[0];
    if (CONFIG.DEBUG) {
      console.log(`[DEBUG] Resolved "${subject}" to page "${title}"`);
    }

    const body = await this.request(subject, {
      action: 'parse',
      page: title,
      prop: 'text',
      redirects: '1'
    });

    const html = isRecord(body) && isRecord(body.parse) ? body.parse.text : undefined;
    if (typeof html !== 'string') {
      throw new ExtractionError('fetch-failed', subject, `Page "${title}" returned no content`);
    }
    return html;
  }

  private async request(subject: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(this.apiUrl);
    url.search = new URLSearchParams({ ...params, format: 'json', formatversion: '2' }).toString();

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new ExtractionError(
        'fetch-failed',
        subject,
        `Request to ${url.host} failed: ${error instanceof Error ? error.message : error}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new ExtractionError('fetch-failed', subject, `Request to ${url.host} failed with status ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ExtractionError('fetch-failed', subject, `Response from ${url.host} was not valid JSON`, { cause: error });
    }

    if (isRecord(body) && isRecord(body.error)) {
      const info = typeof body.error.info === 'string' ? body.error.info : 'unknown error';
      throw new ExtractionError('no-page', subject, `Wikipedia API error: ${info}`);
    }
    return body;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
