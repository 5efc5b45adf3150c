/**
 * notFoundSource.ts — The portal's "nothing here" answers.
 *
 * Two variants reach us: the search page's own empty-result message, and the
 * site's generic error page when a CPF (or a stale detail link) resolves to
 * nothing.  Both mean "no bonds", never a failure.
 */

import type { CheerioAPI } from 'cheerio';
import { BaseResultSource, type NotFoundState } from './baseResultSource';

const NOT_FOUND_TEXTS: readonly RegExp[] = [
  /nenhum registro encontrado/i,
  /nenhum resultado encontrado/i,
  /n[aã]o foram encontrados registros/i,
  /p[aá]gina n[aã]o encontrada/i,
  /\berro 404\b/i,
];

/** Messages the portal keeps in the DOM but does not show. */
const HIDDEN_SELECTOR =
  '.hidden, [hidden], [aria-hidden="true"], [style*="display:none"], [style*="display: none"]';

export function isNotFoundText(text: string): boolean {
  return NOT_FOUND_TEXTS.some((pattern) => pattern.test(text));
}

export class NotFoundSource extends BaseResultSource<NotFoundState> {
  readonly name = 'not-found';

  read($: CheerioAPI): NotFoundState | null {
    const visible = $('body').clone();
    visible.find(HIDDEN_SELECTOR).remove();

    return isNotFoundText(this.cleanText(visible.text())) ? { layout: 'not-found' } : null;
  }
}
