/**
 * challengeDetector.ts — Recognise anti-automation challenges.
 *
 * The portal sits behind a WAF that, under suspicion, replaces the page with
 * a captcha or an interstitial "checking your browser" screen, or answers
 * the navigation itself with 403 / 429.  Each check returns the name of the
 * marker that fired so the failure can be reported by category without
 * echoing the page.
 */

import type { CheerioAPI } from 'cheerio';

export interface ChallengeMarker {
  /** Stable identifier reported in errors and logs. */
  name: string;
  /** CSS selector whose presence indicates the challenge. */
  selector?: string;
  /** Pattern tested against the visible text of the page. */
  text?: RegExp;
}

export const CHALLENGE_MARKERS: readonly ChallengeMarker[] = [
  {
    name: 'captcha-iframe',
    selector:
      'iframe[src*="recaptcha"], iframe[src*="hcaptcha"], iframe[title*="captcha" i], iframe[src*="challenges.cloudflare.com"]',
  },
  {
    name: 'captcha-widget',
    selector: '.g-recaptcha, .h-captcha, .cf-turnstile, #captcha, [data-sitekey]',
  },
  {
    name: 'cloudflare-interstitial',
    selector: '#challenge-form, #cf-challenge-running, .cf-browser-verification',
  },
  {
    name: 'human-verification-text',
    text: /verifi(?:que|car) (?:que )?(?:você é|voce e|se você é) (?:um )?humano|confirme que você não é um robô|checking your browser|verify you are human/i,
  },
  {
    name: 'access-denied-text',
    text: /acesso negado|access denied|request blocked|solicitação bloqueada/i,
  },
];

/** HTTP statuses the WAF uses instead of a page. */
export function isBlockedResponse(statusCode: number): boolean {
  return statusCode === 403 || statusCode === 429;
}

/** Name of the first challenge marker present on the page, or null. */
export function detectChallenge($: CheerioAPI): string | null {
  let bodyText: string | undefined;

  for (const marker of CHALLENGE_MARKERS) {
    if (marker.selector && $(marker.selector).length > 0) {
      return marker.name;
    }
    if (marker.text) {
      bodyText ??= $('body').text();
      if (marker.text.test(bodyText)) return marker.name;
    }
  }
  return null;
}
