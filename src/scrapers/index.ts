/**
 * scrapers/index.ts — Pick the layout a rendered portal page is showing.
 *
 * Detection is explicit and ordered.  For the search page:
 *   1. challenge markers  → challenge (always wins)
 *   2. results table      → results, malformed, not-found (from the table's
 *                           own placeholder) or rendering
 *   3. no table, visible "nothing found" text → not-found
 *   4. none of the above  → unrecognised
 *
 * The portal keeps a hidden empty-result message beside the table, so the
 * page-wide not-found texts are only consulted when no table exists.
 */

import * as cheerio from 'cheerio';
import type { DetailPageState, SearchPageState } from './baseResultSource';
import { ChallengeSource } from './challengeSource';
import { NotFoundSource } from './notFoundSource';
import { SearchResultsSource } from './searchResultsSource';
import { ServantDetailSource } from './servantDetailSource';

const challengeSource = new ChallengeSource();
const notFoundSource = new NotFoundSource();
const searchResultsSource = new SearchResultsSource();
const servantDetailSource = new ServantDetailSource();

export function readSearchPage(html: string, pageUrl: string): SearchPageState {
  const $ = cheerio.load(html);

  const challenge = challengeSource.read($);
  if (challenge) return challenge;

  return (
    searchResultsSource.read($, pageUrl) ??
    notFoundSource.read($) ?? { layout: 'unrecognised' }
  );
}

/**
 * Detail pages: challenge first, then the servant sections, then the
 * generic error page (a stale detail link lands there).
 */
export function readDetailPage(html: string): DetailPageState {
  const $ = cheerio.load(html);

  return (
    challengeSource.read($) ??
    servantDetailSource.read($) ??
    notFoundSource.read($) ?? { layout: 'unrecognised' }
  );
}

export type {
  DetailPageState,
  PageResultSource,
  SearchPageState,
  ServantRow,
} from './baseResultSource';
