/**
 * Configuration constants
 */

import { config } from 'dotenv';

// Load environment variables before reading them
config();

export const CONFIG = {
  WIKI_API_URL: process.env.WIKI_API_URL || 'https://en.wikipedia.org/w/api.php',
  USER_AGENT: process.env.USER_AGENT || 'infobox-query/1.0 (command-line infobox lookup)',

  // Per-request timeout for search and page fetches
  REQUEST_TIMEOUT_MS: parseInt(process.env.REQUEST_TIMEOUT_MS || '10000', 10),

  DEBUG: process.env.DEBUG === 'true',

  // Tokens in a capture that refer back to the remembered subject
  PRONOUNS: ['he', 'they'],

  WILDCARD: '%'
} as const;
