/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  // Source blog
  BLOG_URL: z.string().url().default('https://cse-dividend-announcements.blogspot.com/'),

  // Scraping
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
    ),
  SCRAPE_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(0),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  PAGES_PER_YEAR: z.coerce.number().int().positive().default(20), // page ceiling = years * this

  // Output
  OUTPUT_DIR: z.string().default('.'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
