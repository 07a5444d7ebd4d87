import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { PageFetchError, type PageFetcher } from '../../src/scraper/types.js';

export interface PostSpec {
  title: string;
  lines: string[];
}

/**
 * A dividend post whose title and announcement share `date`
 */
export function announcement(date: string, code: string, name: string, extra: string[] = []): PostSpec {
  return {
    title: `${date} - Dividend Announcement - ${code}`,
    lines: [name, `Date of Announcement: - ${date}`, ...extra],
  };
}

export function postHtml(post: PostSpec): string {
  return [
    '<div class="post-outer">',
    '<div class="post hentry">',
    '<h3 class="post-title entry-title">',
    `<a href="https://blog.example/posts/${encodeURIComponent(post.title)}">${post.title}</a>`,
    '</h3>',
    '<div class="post-body entry-content">',
    ...post.lines.map((line) => `${line}<br />`),
    '</div>',
    '</div>',
    '</div>',
  ].join('\n');
}

export function pageHtml(posts: PostSpec[], olderHref?: string): string {
  const pager = olderHref
    ? `<div class="blog-pager"><a class="blog-pager-older-link" href="${olderHref}">Older Posts</a></div>`
    : '<div class="blog-pager"></div>';

  return ['<html><body>', ...posts.map(postHtml), pager, '</body></html>'].join('\n');
}

/**
 * Serves canned HTML by URL and records every request
 */
export class FixtureFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string): Promise<CheerioAPI> {
    this.requested.push(url);
    const html = this.pages[url];
    if (html === undefined) {
      throw new PageFetchError(url, 'HTTP 404: Not Found', { status: 404 });
    }
    return cheerio.load(html);
  }
}
