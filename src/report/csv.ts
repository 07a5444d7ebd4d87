/**
 * CSV export
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import { monthName } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { visibleColumns } from './columns.js';
import type { AnnouncementRecord } from '../types/index.js';

function escapeCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Header plus one line per record, using the same columns as the table
 */
export function toCsv(records: readonly AnnouncementRecord[]): string {
  const columns = visibleColumns(records);
  if (columns.length === 0) {
    return '';
  }

  const lines = [
    columns.map((column) => escapeCsvCell(column.header)).join(','),
    ...records.map((record) =>
      columns.map((column) => escapeCsvCell(column.value(record) ?? '')).join(',')
    ),
  ];

  return `${lines.join('\n')}\n`;
}

/**
 * e.g. `cse_dividends_june_5years.csv`
 */
export function csvFileName(monthNumber: number, yearsBack: number): string {
  return `cse_dividends_${monthName(monthNumber).toLowerCase()}_${yearsBack}years.csv`;
}

export async function saveCsv(
  dir: string,
  fileName: string,
  records: readonly AnnouncementRecord[]
): Promise<string> {
  const path = join(dir, fileName);
  await writeFile(path, toCsv(records), 'utf-8');
  logger.info({ path, rows: records.length }, 'Results saved to CSV');
  return path;
}
