/**
 * Shared test doubles
 */

import { readFileSync } from 'fs';
import { PageSource } from '../src/types/index.js';
import { ExtractionError } from '../src/utils/errors.js';

export function loadFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}.html`, import.meta.url), 'utf-8');
}

/**
 * In-memory page source keyed by subject; records every lookup
 */
export class FixturePageSource implements PageSource {
  readonly requests: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchPageHtml(subject: string): Promise<string> {
    this.requests.push(subject);
    const html = this.pages[subject];
    if (html === undefined) {
      throw new ExtractionError('no-page', subject, `No page found for "${subject}"`);
    }
    return html;
  }
}

export function fixturePages(): FixturePageSource {
  return new FixturePageSource({
    'abraham lincoln': loadFixture('abraham-lincoln'),
    'grover cleveland': loadFixture('grover-cleveland'),
    'jane doe': loadFixture('jane-doe'),
    mars: loadFixture('mars'),
    'plain page': loadFixture('no-infobox')
  });
}
