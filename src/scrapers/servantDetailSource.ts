/**
 * servantDetailSource.ts — A servant's detail page.
 *
 * The "Histórico dos vínculos com o poder executivo federal" section lists
 * each bond with labelled fields.  The accordion only hides it visually, so
 * the values are already in the HTML before anyone expands it.
 *
 * Values are returned raw; turning them into dates (and tolerating bad ones)
 * is the navigator's job.
 */

import type { CheerioAPI } from 'cheerio';
import { BaseResultSource, type DetailPageState } from './baseResultSource';

type DetailState = Extract<DetailPageState, { layout: 'detail' }>;

/** Label elements whose next sibling holds the value. */
const LABEL_ELEMENTS = 'strong, b, dt, th, td, span, label';
const RETIREMENT_LABEL = /^data d[ae] aposentadoria:?$/;
/** Inline form: "Data da aposentadoria: 15/05/2015". Dates are at most 10 characters. */
const INLINE_RETIREMENT = /data d[ae] aposentadoria\s*:?\s*(\S{1,10})/gi;

/** Headings that only a servant detail page carries. */
const DETAIL_MARKERS: readonly RegExp[] = [
  /historico dos vinculos/,
  /data d[ae] aposentadoria/,
  /dados (?:do|da) servidor/,
];

export class ServantDetailSource extends BaseResultSource<DetailState> {
  readonly name = 'servant-detail';

  read($: CheerioAPI): DetailState | null {
    const root = $(this.contentRoot($)).first();
    const folded = this.foldLabel(root.text());
    if (!DETAIL_MARKERS.some((marker) => marker.test(folded))) return null;

    const labelled = root
      .find(LABEL_ELEMENTS)
      .toArray()
      .filter((el) => RETIREMENT_LABEL.test(this.foldLabel($(el).text())))
      // A label nested in another label element has no sibling of its own.
      .filter((el) => $(el).next().length > 0)
      .map((el) => this.cleanText($(el).next().text()));

    if (labelled.length > 0) {
      return { layout: 'detail', retirementDates: labelled };
    }

    const inline = [...this.cleanText(root.text()).matchAll(INLINE_RETIREMENT)].map(
      (match) => match[1],
    );
    return { layout: 'detail', retirementDates: inline };
  }
}
