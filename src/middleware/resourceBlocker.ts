/**
 * resourceBlocker.ts — Request-interception policy for portal pages.
 *
 * The portal's results are plain HTML rendered by its own scripts, so images,
 * fonts, stylesheets and third-party trackers are aborted before they leave
 * the browser.  Documents, scripts and XHR/fetch always go through.
 */

import type { HTTPRequest } from 'puppeteer-core';
import { Logger } from '../core/logger';

const logger = new Logger('ResourceBlocker');

export const BLOCKED_RESOURCE_TYPES: ReadonlySet<string> = new Set([
  'image',
  'media',
  'font',
  'stylesheet',
  'websocket',
  'manifest',
]);

/** Substrings of analytics / ad hosts the portal embeds. */
export const BLOCKED_URL_FRAGMENTS: readonly string[] = [
  'google-analytics.com',
  'googletagmanager.com',
  'facebook.net',
  'doubleclick.net',
  'hotjar.com',
  'clarity.ms',
  'analytics',
];

/** Decide from the resource type and URL alone. */
export function shouldBlockRequest(resourceType: string, url: string): boolean {
  if (BLOCKED_RESOURCE_TYPES.has(resourceType)) return true;

  const lowerUrl = url.toLowerCase();
  return BLOCKED_URL_FRAGMENTS.some((fragment) => lowerUrl.includes(fragment));
}

/** The part of Puppeteer's HTTPRequest the handler touches. */
export type InterceptedRequest = Pick<
  HTTPRequest,
  'isInterceptResolutionHandled' | 'resourceType' | 'url' | 'abort' | 'continue'
>;

/**
 * `page.on('request', …)` handler.  Request interception must already be
 * enabled on the page, otherwise abort/continue throw.
 */
export function blockNonEssentialRequests(request: InterceptedRequest): void {
  // Another handler (the stealth plugin) may already have resolved it.
  if (request.isInterceptResolutionHandled()) return;

  const settle = shouldBlockRequest(request.resourceType(), request.url())
    ? request.abort('blockedbyclient')
    : request.continue();

  settle.catch((err: unknown) => {
    // The page can close while a request is still pending.
    logger.debug(`Could not settle intercepted request: ${describe(err)}`);
  });
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
