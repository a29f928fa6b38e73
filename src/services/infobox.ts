/**
 * Infobox Parser - locates the summary box in page markup
 */

import * as cheerio from 'cheerio';

export class InfoboxParser {
  constructor(private readonly selector: string = '.infobox') {}

  /**
   * Text of the first infobox block, or null when the page has none
   */
  firstInfoboxText(html: string): string | null {
    const $ = cheerio.load(html);
    const box = $(this.selector).first();

    if (box.length === 0) {
      return null;
    }
    return box.text();
  }
}
