/**
 * baseResultSource.ts — The capability every portal layout parser offers,
 * plus the text helpers they share.
 *
 * A result source looks for the markers of exactly one layout.  `read()`
 * returns `null` when its layout is not on the page, so the factory can try
 * the sources in a fixed order and the first non-null answer wins.
 */

import type * as cheerio from 'cheerio';

const MAIN_CONTENT_SELECTOR = 'main, .conteudo-principal, #conteudo';

// ─── Page states ───────────────────────────────────────────

/** One row of the search results table. */
export interface ServantRow {
  /** "Tipo" column, falling back to "Cargo". */
  role: string;
  /** "Situação" column. */
  status: string;
  /** Absolute URL of the servant's detail page, when the row links to one. */
  detailUrl?: string;
}

export type ChallengeState = { layout: 'challenge'; marker: string };
export type NotFoundState = { layout: 'not-found' };
export type UnrecognisedState = { layout: 'unrecognised' };

export type SearchPageState =
  | { layout: 'results'; rows: ServantRow[] }
  /** Results container present, rows not rendered yet. */
  | { layout: 'rendering' }
  /** Results container present but unusable (e.g. no status column). */
  | { layout: 'malformed'; reason: string }
  | ChallengeState
  | NotFoundState
  | UnrecognisedState;

export type DetailPageState =
  /** Raw "Data da aposentadoria" values, in page order. */
  | { layout: 'detail'; retirementDates: string[] }
  | ChallengeState
  | NotFoundState
  | UnrecognisedState;

// ─── Capability ────────────────────────────────────────────

export interface PageResultSource<TState> {
  /** Label used in logs ("search-results", "challenge", …). */
  readonly name: string;
  read($: cheerio.CheerioAPI, pageUrl: string): TState | null;
}

export abstract class BaseResultSource<TState> implements PageResultSource<TState> {
  abstract readonly name: string;
  abstract read($: cheerio.CheerioAPI, pageUrl: string): TState | null;

  // ── Helpers shared by all sources ──────────────────────

  /** Collapse whitespace (including non-breaking spaces) and trim. */
  protected cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }

  /** Lower-case, accent-free form used to compare labels ("Situação" → "situacao"). */
  protected foldLabel(text: string): string {
    return this.cleanText(text)
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '')
      .toLowerCase();
  }

  /**
   * Resolve a link against the page it appeared on.  Script pseudo-links and
   * bare fragments are not navigable and yield undefined.
   */
  protected resolveLink(href: string | undefined, pageUrl: string): string | undefined {
    const trimmed = href?.trim();
    if (!trimmed || trimmed.startsWith('#') || /^javascript:/i.test(trimmed)) {
      return undefined;
    }
    try {
      return new URL(trimmed, pageUrl).toString();
    } catch {
      return undefined;
    }
  }

  /**
   * Selector of the page's main content area, or `body` when the page marks
   * up none of the usual containers.
   */
  protected contentRoot($: cheerio.CheerioAPI): string {
    return $(MAIN_CONTENT_SELECTOR).length > 0 ? MAIN_CONTENT_SELECTOR : 'body';
  }
}
