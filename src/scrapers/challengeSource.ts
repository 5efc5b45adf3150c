/**
 * challengeSource.ts — Layout of an anti-automation challenge page.
 *
 * Checked before every other source: a captcha overlay can sit on top of a
 * half-rendered results page, and the challenge must win.
 */

import type { CheerioAPI } from 'cheerio';
import { detectChallenge } from '../middleware';
import { BaseResultSource, type ChallengeState } from './baseResultSource';

export class ChallengeSource extends BaseResultSource<ChallengeState> {
  readonly name = 'challenge';

  read($: CheerioAPI): ChallengeState | null {
    const marker = detectChallenge($);
    return marker ? { layout: 'challenge', marker } : null;
  }
}
