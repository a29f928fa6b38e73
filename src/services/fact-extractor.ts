/**
 * Fact Extractor - fetch, normalize and match infobox fields
 */

import { FieldDefinition, PageSource } from '../types/index.js';
import { TextProcessor } from '../utils/text-processing.js';
import { ExtractionError } from '../utils/errors.js';
import { CONFIG } from '../config.js';
import { InfoboxParser } from './infobox.js';

export class FactExtractor {
  constructor(
    private readonly pageSource: PageSource,
    private readonly parser: InfoboxParser = new InfoboxParser()
  ) {}

  /**
   * Cleaned text of the subject's first infobox
   */
  async infoboxText(subject: string): Promise<string> {
    const html = await this.pageSource.fetchPageHtml(subject);
    const text = this.parser.firstInfoboxText(html);

    if (text === null) {
      throw new ExtractionError('no-infobox', subject, 'Page has no infobox');
    }
    return TextProcessor.cleanText(text);
  }

  /**
   * Value from the first candidate layout that matches
   */
  async extract(subject: string, field: FieldDefinition): Promise<string> {
    const text = await this.infoboxText(subject);

    for (const candidate of field.candidates) {
      const match = candidate.pattern.exec(text);
      if (!match) {
        continue;
      }

      const value = candidate.read ? candidate.read(match) : match.groups?.[field.group];
      if (value !== undefined) {
        return value;
      }
    }

    throw this.mismatch(subject, field);
  }

  /**
   * Every match, in document order, of the first candidate layout that matches at all
   */
  async extractAll(subject: string, field: FieldDefinition): Promise<string[]> {
    const text = await this.infoboxText(subject);

    for (const candidate of field.candidates) {
      const global = new RegExp(candidate.pattern.source, candidate.pattern.flags.replace('g', '') + 'g');
      const values: string[] = [];

      for (const match of text.matchAll(global)) {
        const value = candidate.read ? candidate.read(match) : match.groups?.[field.group];
        if (value !== undefined) {
          values.push(value);
        }
      }

      if (values.length > 0) {
        return values;
      }
    }

    throw this.mismatch(subject, field);
  }

  private mismatch(subject: string, field: FieldDefinition): ExtractionError {
    if (CONFIG.DEBUG) {
      console.log(`[DEBUG] No ${field.name} layout matched for "${subject}"`);
    }
    return new ExtractionError('pattern-mismatch', subject, field.missingText);
  }
}
