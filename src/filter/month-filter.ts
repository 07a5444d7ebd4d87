/**
 * Month Filter
 *
 * Selects announcements made in a given calendar month, any year
 */

import { parseAnnouncementDate } from '../utils/dates.js';
import type { AnnouncementRecord } from '../types/index.js';

/**
 * Records whose announcement date falls in `monthNumber` (1-12), in input order.
 * Records with an unparseable announcement date are skipped.
 */
export function filterByMonth(
  records: readonly AnnouncementRecord[],
  monthNumber: number
): AnnouncementRecord[] {
  if (!Number.isInteger(monthNumber) || monthNumber < 1 || monthNumber > 12) {
    throw new RangeError(`Month number must be between 1 and 12, got ${monthNumber}`);
  }

  return records.filter((record) => {
    const announced = parseAnnouncementDate(record.announcementDate);
    return announced !== null && announced.getUTCMonth() + 1 === monthNumber;
  });
}
