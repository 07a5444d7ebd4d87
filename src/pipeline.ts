/**
 * Main Pipeline
 *
 * 1. Crawl the blog back to the cutoff year
 * 2. Keep announcements made in the requested month
 * 3. Sort newest first and render the report
 */

import { crawlAnnouncements, type CrawlOptions } from './scraper/index.js';
import { filterByMonth } from './filter/index.js';
import { sortByAnnouncementDateDesc, renderReport, csvFileName, saveCsv } from './report/index.js';
import { config } from './config/index.js';
import { monthName } from './utils/dates.js';
import { logger } from './utils/logger.js';
import type { AnnouncementRecord, CrawlResult, TableOptions } from './types/index.js';

/**
 * Pipeline options
 */
export interface ReportOptions {
  yearsBack: number;
  monthNumber: number;
  startUrl?: string;
  crawl?: CrawlOptions;
  table?: TableOptions;
}

export interface ReportResult {
  yearsBack: number;
  monthNumber: number;
  crawl: CrawlResult;
  /** Matching announcements, newest first */
  records: AnnouncementRecord[];
  report: string;
  durationMs: number;
}

export async function runDividendReport(options: ReportOptions): Promise<ReportResult> {
  const {
    yearsBack,
    monthNumber,
    startUrl = config.scraper.blogUrl,
    table = config.output.table,
  } = options;

  const startTime = Date.now();
  logger.info(
    { yearsBack, month: monthName(monthNumber), startUrl },
    'Searching for dividend announcements'
  );

  const crawl = await crawlAnnouncements(startUrl, yearsBack, options.crawl);
  const filtered = filterByMonth(crawl.records, monthNumber);
  const records = sortByAnnouncementDateDesc(filtered);

  logger.info(
    { total: crawl.records.length, matching: records.length, month: monthName(monthNumber) },
    'Filtered announcements by month'
  );

  return {
    yearsBack,
    monthNumber,
    crawl,
    records,
    report: renderReport(records, table),
    durationMs: Date.now() - startTime,
  };
}

/**
 * Write the report's records to `cse_dividends_<month>_<years>years.csv` in `dir`.
 * Returns the written path, or null when there is nothing to save.
 */
export async function saveReport(
  result: ReportResult,
  dir: string = config.output.dir
): Promise<string | null> {
  if (result.records.length === 0) {
    logger.info('No announcements to save');
    return null;
  }

  return saveCsv(dir, csvFileName(result.monthNumber, result.yearsBack), result.records);
}
