/**
 * Plain-text report rendering
 */

import { config } from '../config/index.js';
import { parseAnnouncementDate } from '../utils/dates.js';
import { visibleColumns } from './columns.js';
import type { AnnouncementRecord, TableOptions } from '../types/index.js';

const COLUMN_GAP = '  ';

export const DEFAULT_TABLE_OPTIONS: TableOptions = config.output.table;

/**
 * Newest announcement first. Ties keep their input order; unparseable dates go last.
 */
export function sortByAnnouncementDateDesc(
  records: readonly AnnouncementRecord[]
): AnnouncementRecord[] {
  const keyed = records.map((record) => ({
    record,
    time: parseAnnouncementDate(record.announcementDate)?.getTime() ?? null,
  }));

  keyed.sort((a, b) => {
    if (a.time === null || b.time === null) {
      return (a.time === null ? 1 : 0) - (b.time === null ? 1 : 0);
    }
    return b.time - a.time;
  });

  return keyed.map(({ record }) => record);
}

function truncate(cell: string, maxWidth: number | null): string {
  if (maxWidth === null || cell.length <= maxWidth) {
    return cell;
  }
  return maxWidth <= 1 ? '…' : `${cell.slice(0, maxWidth - 1)}…`;
}

/**
 * Left-aligned table of the columns that have data. Empty cells stay blank.
 */
export function renderTable(
  records: readonly AnnouncementRecord[],
  options: TableOptions = DEFAULT_TABLE_OPTIONS
): string {
  const columns = visibleColumns(records);
  if (columns.length === 0) {
    return '';
  }

  const rows = [
    columns.map((column) => column.header),
    ...records.map((record) =>
      columns.map((column) => truncate(column.value(record) ?? '', options.maxColumnWidth))
    ),
  ];

  const widths = columns.map((_, index) =>
    Math.max(...rows.map((row) => (row[index] ?? '').length))
  );

  return rows
    .map((row) =>
      row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join(COLUMN_GAP)
        .trimEnd()
    )
    .join('\n');
}

/**
 * Table framed by banners, or a one-line notice when there is nothing to show
 */
export function renderReport(
  records: readonly AnnouncementRecord[],
  options: TableOptions = DEFAULT_TABLE_OPTIONS
): string {
  if (records.length === 0) {
    return 'No announcements found for the selected month.';
  }

  const banner = '='.repeat(options.separatorWidth);
  return [
    banner,
    `Found ${records.length} dividend announcements`,
    banner,
    '',
    renderTable(records, options),
    '',
    banner,
  ].join('\n');
}
