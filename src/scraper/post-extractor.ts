/**
 * Post Extractor
 *
 * Recovers announcement fields from one blog post. Posts are typed by hand on the
 * blog, so every field is an independent pattern match over the post text and
 * any of them may be missing.
 */

import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { DAY_MONTH_YEAR_PATTERN, parseAnnouncementDate } from '../utils/dates.js';
import { TBA, type AnnouncementRecord } from '../types/index.js';

const COMPANY_CODE_PATTERN = /-\s+([A-Z]+)\s*$/;
const ANNOUNCEMENT_DATE_PATTERN =
  /Date of (?:Initial )?Announcement:\s*-?\s*(\d{2}-[A-Za-z]{3}-\d{4})/;
const XD_DATE_PATTERN = /XD:\s*-?\s*(\d{2}\.[A-Za-z]{3}\.\d{4})/;
const XD_TBA_PATTERN = /XD:\s*-?\s*TBA/;
const FINANCIAL_YEAR_PATTERN = /Financial Year:\s*-?\s*([\d\s/]+)/;
const DIVIDEND_RATE_PATTERN = /Rate of Dividend:\s*-?\s*Rs\.\s*([\d.]+)\s*per share/;

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Extract a record from a post container.
 *
 * Returns null when the post has no linked title, no date in the title, or no
 * announcement date in its body.
 */
export function extractPost(post: Cheerio<Element>): AnnouncementRecord | null {
  const heading = post.find('h3, h2').first();
  if (heading.length === 0) {
    return null;
  }

  const link = heading.find('a').first();
  if (link.length === 0) {
    return null;
  }

  return extractFromText(link.text(), post.text());
}

/**
 * Field rules over plain strings: `title` is the post title, `content` the
 * flattened text of the whole post (title included, as its first line).
 */
export function extractFromText(title: string, content: string): AnnouncementRecord | null {
  const postDate = findDate(title, DAY_MONTH_YEAR_PATTERN, 0);
  if (!postDate) {
    return null;
  }

  const announcementDate = findDate(content, ANNOUNCEMENT_DATE_PATTERN, 1);
  if (!announcementDate) {
    return null;
  }

  const record: Mutable<AnnouncementRecord> = { postDate, announcementDate };

  const companyCode = title.match(COMPANY_CODE_PATTERN)?.[1];
  if (companyCode) {
    record.companyCode = companyCode;
  }

  const companyName = secondLine(content);
  if (companyName) {
    record.companyName = companyName;
  }

  const exDividendDate = findExDividendDate(content);
  if (exDividendDate) {
    record.exDividendDate = exDividendDate;
  }

  const financialYear = content.match(FINANCIAL_YEAR_PATTERN)?.[1]?.trim();
  if (financialYear) {
    record.financialYear = financialYear;
  }

  const rate = content.match(DIVIDEND_RATE_PATTERN)?.[1];
  if (rate) {
    record.dividendRate = `Rs. ${rate}`;
  }

  return Object.freeze(record);
}

function findDate(text: string, pattern: RegExp, group: number): string | undefined {
  const token = text.match(pattern)?.[group];
  return token && parseAnnouncementDate(token) ? token : undefined;
}

function findExDividendDate(content: string): string | undefined {
  const dotted = content.match(XD_DATE_PATTERN)?.[1];
  if (dotted) {
    const normalized = dotted.replace(/\./g, '-');
    if (parseAnnouncementDate(normalized)) {
      return normalized;
    }
  }

  return XD_TBA_PATTERN.test(content) ? TBA : undefined;
}

// The title is line one; the company name follows it
function secondLine(content: string): string | undefined {
  const lines = content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  return lines[1];
}
