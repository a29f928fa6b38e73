/**
 * Query Dispatcher
 * Finds the first template matching a tokenized query, resolves pronouns
 * against the session's memory and runs the template's action
 */

import { ActionResult, ActionTableEntry, QueryResult } from '../types/index.js';
import { match } from '../utils/pattern-matcher.js';
import { TextProcessor } from '../utils/text-processing.js';
import { CONFIG } from '../config.js';
import { ContextMemory } from './context-memory.js';
import { NO_ANSWERS } from './actions.js';

export const NOT_UNDERSTOOD = "I don't understand";

const PRONOUNS: ReadonlySet<string> = new Set(CONFIG.PRONOUNS);

export class QueryDispatcher {
  constructor(private readonly table: ActionTableEntry[]) {}

  async dispatch(tokens: string[], memory: ContextMemory): Promise<QueryResult> {
    for (const { pattern, action } of this.table) {
      const captured = match(pattern, tokens);
      if (captured === null) {
        continue;
      }

      const pronoun = captured.some(token => PRONOUNS.has(token.toLowerCase()));
      let result: ActionResult;

      if (pronoun) {
        if (memory.isEmpty()) {
          if (CONFIG.DEBUG) {
            console.log('[DEBUG] Pronoun used before any subject was named');
          }
          return { kind: 'no-answers' };
        }
        if (CONFIG.DEBUG) {
          console.log(`[DEBUG] Resolved pronoun to "${memory.recall()}"`);
        }
        result = await action([memory.recall()]);
      } else {
        result = await action(captured);
        if (captured.length > 0) {
          memory.remember(TextProcessor.joinTokens(captured));
        }
      }

      if (!Array.isArray(result)) {
        return { kind: 'terminate' };
      }
      return result.length > 0 ? { kind: 'answers', answers: result } : { kind: 'no-answers' };
    }

    return { kind: 'not-understood' };
  }

  /**
   * Dispatch and render the answer lines
   */
  async search(tokens: string[], memory: ContextMemory): Promise<string[]> {
    return renderResult(await this.dispatch(tokens, memory));
  }
}

export function renderResult(result: QueryResult): string[] {
  switch (result.kind) {
    case 'answers':
      return result.answers;
    case 'no-answers':
      return [NO_ANSWERS];
    case 'not-understood':
      return [NOT_UNDERSTOOD];
    case 'terminate':
      return [];
  }
}
