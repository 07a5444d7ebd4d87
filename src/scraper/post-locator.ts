/**
 * Post Locator
 *
 * Finds post containers on a Blogger list page. Matchers are tried in order
 * and the first one that finds anything wins.
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { PostMatcher } from './types.js';

export const OLDER_POSTS_SELECTOR = 'a.blog-pager-older-link';

export const DEFAULT_POST_MATCHERS: readonly PostMatcher[] = [
  {
    name: 'post-outer',
    match: ($) => $('div.post-outer'),
  },
  {
    // Looser fallback for templates without the post-outer wrapper
    name: 'post-or-entry-class',
    match: ($) =>
      $('div[class*="post"], article[class*="post"], div[class*="entry"], article[class*="entry"]'),
  },
];

export interface LocatedPosts {
  posts: Element[];
  matcher: string | null;
}

export function locatePosts(
  $: CheerioAPI,
  matchers: readonly PostMatcher[] = DEFAULT_POST_MATCHERS
): LocatedPosts {
  for (const matcher of matchers) {
    const posts = matcher.match($);
    if (posts.length > 0) {
      return { posts: posts.toArray(), matcher: matcher.name };
    }
  }

  return { posts: [], matcher: null };
}

/**
 * href of the "Older Posts" pager link, if the page has one
 */
export function findOlderPostsHref($: CheerioAPI): string | null {
  const href = $(OLDER_POSTS_SELECTOR).first().attr('href');
  return href ? href : null;
}
