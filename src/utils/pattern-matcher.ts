/**
 * Wildcard-aware template matching over token lists
 */

import { Pattern } from '../types/index.js';
import { CONFIG } from '../config.js';

/**
 * Match a pattern against input tokens.
 * `%` binds zero or more contiguous tokens; every split point is tried,
 * shortest capture first. Literal tokens compare case-insensitively.
 * @returns the tokens bound to the wildcard (empty for an empty capture or
 *   a pattern without one), or null when the input does not match
 */
export function match(pattern: Pattern, input: string[]): string[] | null {
  return matchFrom(pattern, 0, input, 0);
}

function matchFrom(pattern: Pattern, p: number, input: string[], i: number): string[] | null {
  if (p === pattern.length) {
    return i === input.length ? [] : null;
  }

  const token = pattern[p];

  if (token === CONFIG.WILDCARD) {
    for (let end = i; end <= input.length; end++) {
      const rest = matchFrom(pattern, p + 1, input, end);
      if (rest !== null) {
        return [...input.slice(i, end), ...rest];
      }
    }
    return null;
  }

  if (i === input.length || token.toLowerCase() !== input[i].toLowerCase()) {
    return null;
  }

  return matchFrom(pattern, p + 1, input, i + 1);
}
