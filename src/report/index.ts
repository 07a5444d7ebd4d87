/**
 * Report Module
 *
 * Table rendering and CSV export for filtered announcements
 */

export { REPORT_COLUMNS, visibleColumns, type ReportColumn } from './columns.js';
export {
  sortByAnnouncementDateDesc,
  renderTable,
  renderReport,
  DEFAULT_TABLE_OPTIONS,
} from './table.js';
export { toCsv, csvFileName, saveCsv } from './csv.js';
