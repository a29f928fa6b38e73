/**
 * Action Table - query templates and the handlers that answer them
 * Each handler takes the wildcard capture and returns a list of answers
 */

import { Action, ActionTableEntry, FieldDefinition, TerminateSignal } from '../types/index.js';
import { TextProcessor } from '../utils/text-processing.js';
import { ExtractionError, isExtractionError } from '../utils/errors.js';
import { CONFIG } from '../config.js';
import { FactExtractor } from './fact-extractor.js';
import { EQUATORIAL_RADIUS, FIELDS, MEAN_RADIUS, POLAR_RADIUS } from './fields.js';

export const NO_ANSWERS = 'No answers';
export const TERMINATE: TerminateSignal = { terminate: true };

type Attempt<T> = { ok: true; value: T } | { ok: false; error: ExtractionError };

/**
 * Run an extraction, turning an ExtractionError into a failed result
 */
export async function attempt<T>(work: () => Promise<T>): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await work() };
  } catch (error) {
    if (!isExtractionError(error)) {
      throw error;
    }
    if (CONFIG.DEBUG) {
      console.log(`[DEBUG] Extraction failed for "${error.subject}" (${error.kind}): ${error.message}`);
    }
    return { ok: false, error };
  }
}

/**
 * Year component of a "Month D, YYYY" date; other values pass through
 */
export function yearOf(date: string): string {
  const parts = date.split(',');
  return parts.length > 1 ? parts[1].trim() : date;
}

export class ActionHandlers {
  constructor(private readonly extractor: FactExtractor) {}

  private async single(captured: string[], field: FieldDefinition): Promise<string[]> {
    const result = await attempt(() => this.extractor.extract(TextProcessor.joinTokens(captured), field));
    return result.ok ? [result.value] : [];
  }

  private async year(captured: string[], field: FieldDefinition): Promise<string[]> {
    const result = await attempt(() => this.extractor.extract(TextProcessor.joinTokens(captured), field));
    return [result.ok && result.value ? yearOf(result.value) : NO_ANSWERS];
  }

  birthDate: Action = captured => this.single(captured, FIELDS.birthDate);
  birthYear: Action = async captured => {
    const result = await attempt(() => this.extractor.extract(TextProcessor.joinTokens(captured), FIELDS.birthDate));
    return [result.ok ? result.value.split('-')[0] : NO_ANSWERS];
  };

  incumbencyStart: Action = captured => this.single(captured, FIELDS.incumbencyStart);
  incumbencyStartYear: Action = captured => this.year(captured, FIELDS.incumbencyStart);
  incumbencyEnd: Action = captured => this.single(captured, FIELDS.incumbencyEnd);
  incumbencyEndYear: Action = captured => this.year(captured, FIELDS.incumbencyEnd);

  /**
   * Ordinal rank; two non-contiguous terms come back as "22 & 24"
   */
  presidentialNumber: Action = async captured => {
    const result = await attempt(() =>
      this.extractor.extractAll(TextProcessor.joinTokens(captured), FIELDS.presidentialNumber)
    );
    if (!result.ok) {
      return [];
    }

    // Repeated mentions of the same ordinal count once; at most two terms are reported
    const numbers = [...new Set(result.value)].slice(0, 2);
    return numbers.length > 1 ? [numbers.join(' & ')] : numbers;
  };

  polarRadius: Action = captured => this.single(captured, POLAR_RADIUS);
  equatorialRadius: Action = captured => this.single(captured, EQUATORIAL_RADIUS);
  meanRadius: Action = captured => this.single(captured, MEAN_RADIUS);

  // Capture is ignored
  bye: Action = async () => TERMINATE;
}

function entry(template: string, action: Action): ActionTableEntry {
  return { pattern: template.split(' '), action };
}

/**
 * Ordered table; the first matching template wins
 */
export function createActionTable(extractor: FactExtractor): ActionTableEntry[] {
  const handlers = new ActionHandlers(extractor);

  return [
    entry('when did % take office', handlers.incumbencyStart),
    entry('when did % become president', handlers.incumbencyStart),
    entry('what year did % take office', handlers.incumbencyStartYear),
    entry('what year did % become president', handlers.incumbencyStartYear),
    entry('when did % begin his presidency', handlers.incumbencyStart),
    entry('what year did % begin his presidency', handlers.incumbencyStartYear),
    entry('when did % leave office', handlers.incumbencyEnd),
    entry('when did % end his presidency', handlers.incumbencyEnd),
    entry('what year did % leave office', handlers.incumbencyEndYear),
    entry('what year did % end his presidency', handlers.incumbencyEndYear),
    entry('what number president is %', handlers.presidentialNumber),
    entry('what number president was %', handlers.presidentialNumber),
    entry('which number president is %', handlers.presidentialNumber),
    entry('which number president was %', handlers.presidentialNumber),
    entry('when was % born', handlers.birthDate),
    entry('what year was % born', handlers.birthYear),
    entry('what is the polar radius of %', handlers.polarRadius),
    entry('what is the equatorial radius of %', handlers.equatorialRadius),
    entry('what is the mean radius of %', handlers.meanRadius),
    entry('bye', handlers.bye)
  ];
}
