/**
 * bondClassifier.ts — Decide whether a subject needs manual investigation.
 *
 * The rule scans every bond; portal order does not matter:
 *   • no retirement date anywhere              → investigate, no date
 *   • latest retirement date after 2003-12-31  → discard, with that date
 *   • latest retirement date on/before it      → investigate, with that date
 *
 * Pure: the result depends only on the bonds and the threshold, and never
 * shares a Date with them.
 */

import { utcDate } from './dateNormalizer';
import type { BondList, ClassificationResult } from './types';

/** End of December 2003.  A retirement must fall strictly after it to be discarded. */
export const RETIREMENT_THRESHOLD: Date = utcDate(2003, 12, 31);

export function classify(
  bonds: BondList,
  threshold: Date = RETIREMENT_THRESHOLD,
): ClassificationResult {
  const latest = latestRetirementDate(bonds);

  if (latest === undefined) {
    return { decision: 'investigate' };
  }

  const date = new Date(latest.getTime());
  if (date.getTime() > threshold.getTime()) {
    return { decision: 'discard', date };
  }

  return { decision: 'investigate', date };
}

/**
 * The most recent retirement date among the bonds, if any.
 * Ties are indistinguishable: only the date value is reported.
 */
export function latestRetirementDate(bonds: BondList): Date | undefined {
  let latest: Date | undefined;
  for (const bond of bonds) {
    const date = bond.retirementDate;
    if (date && (!latest || date.getTime() > latest.getTime())) {
      latest = date;
    }
  }
  return latest;
}
