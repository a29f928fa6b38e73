/**
 * Text processing utilities for queries and scraped infobox text
 */

// Printable ASCII plus tab, LF, VT, FF, CR
const NON_PRINTABLE = /[^\x20-\x7E\t\n\x0B\x0C\r]/g;

export class TextProcessor {
  /**
   * Replace non-printable characters with spaces, then collapse
   * runs of spaces and runs of newlines
   */
  static cleanText(text: string): string {
    return text
      .replace(NON_PRINTABLE, ' ')
      .replace(/ +/g, ' ')
      .replace(/\n+/g, '\n');
  }

  /**
   * Normalize a typed question into word tokens
   */
  static tokenizeQuery(query: string): string[] {
    return query
      .replace(/\?/g, '')
      .toLowerCase()
      .split(/\s+/)
      .filter(word => word.length > 0);
  }

  static joinTokens(tokens: string[]): string {
    return tokens.join(' ');
  }
}
