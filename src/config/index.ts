/**
 * Application configuration
 */

import { env } from './env.js';
import type { ScraperConfig, TableOptions } from '../types/index.js';

const scraper: ScraperConfig = {
  blogUrl: env.BLOG_URL,
  userAgent: env.USER_AGENT,
  rateLimitMs: env.SCRAPE_RATE_LIMIT_MS,
  timeoutMs: env.SCRAPE_TIMEOUT_MS,
  pagesPerYear: env.PAGES_PER_YEAR,
};

const table: TableOptions = {
  maxColumnWidth: null,
  separatorWidth: 100,
};

export const config = {
  app: {
    name: 'cse-dividend-scraper',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  scraper,

  output: {
    dir: env.OUTPUT_DIR,
    table,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
