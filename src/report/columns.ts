/**
 * Report columns, in display order
 */

import type { AnnouncementRecord } from '../types/index.js';

export interface ReportColumn {
  header: string;
  value: (record: AnnouncementRecord) => string | undefined;
}

export const REPORT_COLUMNS: readonly ReportColumn[] = [
  { header: 'Company_Name', value: (r) => r.companyName },
  { header: 'Company_Code', value: (r) => r.companyCode },
  { header: 'Date_of_Announcement', value: (r) => r.announcementDate },
  { header: 'XD_Date', value: (r) => r.exDividendDate },
  { header: 'Financial_Year', value: (r) => r.financialYear },
  { header: 'Dividend_Rate', value: (r) => r.dividendRate },
];

/**
 * Columns that have a value in at least one record
 */
export function visibleColumns(records: readonly AnnouncementRecord[]): ReportColumn[] {
  return REPORT_COLUMNS.filter((column) =>
    records.some((record) => column.value(record) !== undefined)
  );
}
