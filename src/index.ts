#!/usr/bin/env node
/**
 * Infobox Query System - Main Entry Point
 * Console loop answering templated questions from Wikipedia infoboxes
 */

import * as readline from 'readline';
import { WikipediaPageSource } from './services/wikipedia.js';
import { FactExtractor } from './services/fact-extractor.js';
import { createActionTable } from './services/actions.js';
import { QueryDispatcher, renderResult } from './services/dispatcher.js';
import { ContextMemory } from './services/context-memory.js';
import { TextProcessor } from './utils/text-processing.js';
import { CONFIG } from './config.js';

async function main() {
  console.log('Presidential Information System');
  console.log('===============================');
  console.log('Ask e.g. "when did abraham lincoln take office?"; "bye" to quit');

  const extractor = new FactExtractor(new WikipediaPageSource());
  const dispatcher = new QueryDispatcher(createActionTable(extractor));
  const memory = new ContextMemory();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  // Resolves null on Ctrl-D / Ctrl-C
  let closed = false;
  let pending: ((answer: string | null) => void) | null = null;
  rl.on('close', () => {
    closed = true;
    pending?.(null);
  });

  const askQuestion = (query: string): Promise<string | null> => {
    if (closed) {
      return Promise.resolve(null);
    }
    return new Promise(resolve => {
      pending = resolve;
      rl.question(query, answer => {
        pending = null;
        resolve(answer);
      });
    });
  };

  // Query loop
  while (true) {
    const userInput = await askQuestion('\nYour query? ');
    if (userInput === null) {
      break;
    }

    const tokens = TextProcessor.tokenizeQuery(userInput);
    if (tokens.length === 0) {
      continue;
    }

    try {
      const result = await dispatcher.dispatch(tokens, memory);
      if (result.kind === 'terminate') {
        break;
      }

      for (const answer of renderResult(result)) {
        console.log(answer);
      }
    } catch (error: unknown) {
      let errorMsg = '❌ Error: Unable to answer that query';
      if (CONFIG.DEBUG) {
        errorMsg += `\n    Details: ${error instanceof Error ? error.message : error}`;
        if (error instanceof Error && error.stack) {
          errorMsg += `\n    Stack: ${error.stack}`;
        }
      } else {
        errorMsg += '\n    (Run with DEBUG=true for more details)';
      }
      console.error('\n' + errorMsg);
    }
  }

  console.log('\nSo long!\n');
  rl.close();
}

// Run the application
main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
