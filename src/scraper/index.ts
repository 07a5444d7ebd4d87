/**
 * Scraper Module
 *
 * Blog crawling and post field extraction
 */

export { crawlAnnouncements, type CrawlOptions } from './crawler.js';
export { extractPost, extractFromText } from './post-extractor.js';
export {
  locatePosts,
  findOlderPostsHref,
  DEFAULT_POST_MATCHERS,
  OLDER_POSTS_SELECTOR,
  type LocatedPosts,
} from './post-locator.js';
export { HttpPageFetcher } from './page-fetcher.js';
export { PageFetchError } from './types.js';
export type { PageFetcher, PostMatcher } from './types.js';
