import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { extractFromText, extractPost } from '../src/scraper/post-extractor.js';

const bloggerPage = readFileSync(new URL('./fixtures/blogger-page.html', import.meta.url), 'utf-8');

function firstPost(html: string, selector = 'div.post-outer') {
  const $ = cheerio.load(html);
  return $<Element, string>(selector).first();
}

describe('extractPost', () => {
  it('should extract every field from a complete post', () => {
    const $ = cheerio.load(bloggerPage);
    const record = extractPost($('div.post-outer').eq(0));

    expect(record).toEqual({
      postDate: '20-Jun-2026',
      announcementDate: '20-Jun-2026',
      companyCode: 'ALPH',
      companyName: 'Alpha Holdings PLC',
      exDividendDate: '05-Jul-2026',
      financialYear: '2025/2026',
      dividendRate: 'Rs. 2.50',
    });
  });

  it('should read the initial announcement label and a TBA ex-dividend date', () => {
    const $ = cheerio.load(bloggerPage);
    const record = extractPost($('div.post-outer').eq(1));

    expect(record).toEqual({
      postDate: '18-Jun-2026',
      announcementDate: '18-Jun-2026',
      companyCode: 'BRVO',
      companyName: 'Bravo Finance PLC',
      exDividendDate: 'TBA',
      financialYear: '2025 / 2026',
      dividendRate: 'Rs. 0.75',
    });
  });

  it('should return null when the title has no date', () => {
    const $ = cheerio.load(bloggerPage);
    expect(extractPost($('div.post-outer').eq(2))).toBeNull();
  });

  it('should return null when the post has no heading', () => {
    const post = firstPost(
      '<div class="post-outer"><p>05-Jun-2024 - ABC</p><p>Date of Announcement: 05-Jun-2024</p></div>'
    );
    expect(extractPost(post)).toBeNull();
  });

  it('should return null when the heading has no link', () => {
    const post = firstPost(
      '<div class="post-outer"><h3>05-Jun-2024 - ABC</h3><p>Date of Announcement: 05-Jun-2024</p></div>'
    );
    expect(extractPost(post)).toBeNull();
  });

  it('should accept an h2 title', () => {
    const post = firstPost(
      '<div class="post-outer"><h2><a href="#">05-Jun-2024 - ABC</a></h2>\nAcme PLC\nDate of Announcement: 05-Jun-2024</div>'
    );
    expect(extractPost(post)?.companyCode).toBe('ABC');
  });

  it('should return records that cannot be modified', () => {
    const $ = cheerio.load(bloggerPage);
    const record = extractPost($('div.post-outer').eq(0));
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe('extractFromText', () => {
  const title = '05-Jun-2024 - Dividend Announcement - ABC';

  function content(...lines: string[]): string {
    return [title, ...lines].join('\n');
  }

  it('should return null when the title has no DD-Mon-YYYY token', () => {
    expect(extractFromText('Dividend Announcement - ABC', content('Date of Announcement: 05-Jun-2024'))).toBeNull();
  });

  it('should return null when the title date is not a real date', () => {
    expect(extractFromText('31-Feb-2024 - ABC', content('Date of Announcement: 05-Jun-2024'))).toBeNull();
  });

  it('should return null without an announcement date', () => {
    expect(extractFromText(title, content('Acme PLC', 'XD: - TBA'))).toBeNull();
  });

  it('should return null when the announcement date does not parse', () => {
    expect(extractFromText(title, content('Acme PLC', 'Date of Announcement: 31-Apr-2024'))).toBeNull();
  });

  it('should take the company code from a trailing dash token', () => {
    const record = extractFromText(title, content('Date of Announcement: 05-Jun-2024'));
    expect(record?.companyCode).toBe('ABC');
  });

  it('should leave the company code unset without a trailing dash token', () => {
    const record = extractFromText(
      '05-Jun-2024 - Dividend Announcement',
      content('Date of Announcement: 05-Jun-2024')
    );
    expect(record).not.toBeNull();
    expect(record?.companyCode).toBeUndefined();
  });

  it('should use the second non-empty line as the company name', () => {
    const record = extractFromText(title, `\n\n  ${title}  \n\n   Acme PLC  \nDate of Announcement: 05-Jun-2024`);
    expect(record?.companyName).toBe('Acme PLC');
  });

  it('should normalize a dotted XD date', () => {
    const record = extractFromText(title, content('Date of Announcement: 05-Jun-2024', 'XD: - 05.Jun.2024'));
    expect(record?.exDividendDate).toBe('05-Jun-2024');
  });

  it('should keep TBA as the XD value', () => {
    const record = extractFromText(title, content('Date of Announcement: 05-Jun-2024', 'XD: - TBA'));
    expect(record?.exDividendDate).toBe('TBA');
  });

  it('should leave the XD date unset when the dotted date does not parse', () => {
    const record = extractFromText(title, content('Date of Announcement: 05-Jun-2024', 'XD: 31.Feb.2024'));
    expect(record).not.toBeNull();
    expect(record?.exDividendDate).toBeUndefined();
  });

  it('should fall back to TBA when the dotted date does not parse', () => {
    const record = extractFromText(
      title,
      content('Date of Announcement: 05-Jun-2024', 'XD: 31.Feb.2024', 'XD: TBA')
    );
    expect(record?.exDividendDate).toBe('TBA');
  });

  it('should leave the financial year unset when it has no digits', () => {
    const record = extractFromText(title, content('Date of Announcement: 05-Jun-2024', 'Financial Year: TBA'));
    expect(record).not.toBeNull();
    expect(record?.financialYear).toBeUndefined();
  });

  it('should leave the XD date unset when it is missing', () => {
    const record = extractFromText(title, content('Date of Announcement: 05-Jun-2024'));
    expect(record?.exDividendDate).toBeUndefined();
  });

  it('should read the dividend rate', () => {
    const record = extractFromText(
      title,
      content('Date of Announcement: 05-Jun-2024', 'Rate of Dividend: Rs. 2.50 per share')
    );
    expect(record?.dividendRate).toBe('Rs. 2.50');
  });

  it('should ignore a rate without the per share suffix', () => {
    const record = extractFromText(
      title,
      content('Date of Announcement: 05-Jun-2024', 'Rate of Dividend: Rs. 2.50 subject to approval')
    );
    expect(record?.dividendRate).toBeUndefined();
  });

  it('should find labels in any order', () => {
    const record = extractFromText(
      title,
      content(
        'Acme PLC',
        'Rate of Dividend: - Rs. 1.25 per share',
        'Financial Year: - 2023/2024',
        'XD: 10.Jul.2024',
        'Date of Initial Announcement: - 05-Jun-2024'
      )
    );

    expect(record).toEqual({
      postDate: '05-Jun-2024',
      announcementDate: '05-Jun-2024',
      companyCode: 'ABC',
      companyName: 'Acme PLC',
      exDividendDate: '10-Jul-2024',
      financialYear: '2023/2024',
      dividendRate: 'Rs. 1.25',
    });
  });
});
