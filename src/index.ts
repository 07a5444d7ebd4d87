#!/usr/bin/env node
/**
 * CSE Dividend Announcements Scraper
 *
 * Collects dividend announcements from the CSE dividend blog and lists the
 * ones announced in a chosen month over the past few years.
 *
 * Usage:
 *   node dist/index.js                               - Prompt for everything
 *   node dist/index.js --years 5 --month 6           - Skip the prompts
 *   node dist/index.js --years 3 --month 12 --save   - Also write the CSV
 *   node dist/index.js --month 6 --no-save --out ./reports
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { monthName } from './utils/dates.js';
import { runDividendReport, saveReport } from './pipeline.js';
import {
  DEFAULT_YEARS_BACK,
  createPrompter,
  parseArgs,
  parseMonthInput,
  parseYearsInput,
  parseYesNo,
  promptUntilValid,
  type Prompter,
} from './cli/index.js';

function print(line: string = ''): void {
  process.stdout.write(`${line}\n`);
}

async function main(prompter: Prompter): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  for (const error of args.errors) {
    logger.warn(error);
  }

  print('CSE Dividend Announcements Scraper');
  print('='.repeat(50));

  const yearsBack =
    args.years ??
    (await promptUntilValid(
      prompter.ask,
      `\nHow many years back do you want to search? (default: ${DEFAULT_YEARS_BACK}): `,
      (raw) => parseYearsInput(raw),
      print
    ));

  const monthNumber =
    args.month ??
    (await promptUntilValid(prompter.ask, '\nEnter the month number (1-12): ', parseMonthInput, print));

  print(
    `\nSearching for dividends announced in ${monthName(monthNumber)} over the past ${yearsBack} years...`
  );
  print('This may take a few minutes...\n');

  const result = await runDividendReport({ yearsBack, monthNumber });

  print();
  print(result.report);

  logger.info(
    {
      pagesVisited: result.crawl.pagesVisited,
      fetchErrors: result.crawl.fetchErrors,
      totalFound: result.crawl.records.length,
      matching: result.records.length,
      durationMs: result.durationMs,
    },
    'Search complete'
  );

  if (result.records.length === 0) {
    return;
  }

  const save =
    args.save ??
    parseYesNo(await prompter.ask('\nWould you like to save these results to a CSV file? (y/n): '));

  if (save) {
    const path = await saveReport(result, args.outDir ?? config.output.dir);
    if (path) {
      print(`\nResults saved to ${path}`);
    }
  }
}

const prompter = createPrompter();

main(prompter)
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Application failed');
    process.exitCode = 1;
  })
  .finally(() => {
    prompter.close();
  });
