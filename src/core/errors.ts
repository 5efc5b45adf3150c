/**
 * errors.ts — Error taxonomy for the lookup pipeline.
 *
 * Messages are written for operators and may reach callers, so none of them
 * carries the CPF, page markup, cookies or proxy credentials.
 */

import type { LookupFailureCategory } from './types';

/** Raw input did not pass the CPF pattern / check-digit test. */
export class InvalidIdentifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidIdentifierError';
  }
}

/**
 * Browser or proxy setup failed.  Fatal for the current request; the next
 * acquisition launches a fresh browser.
 */
export class SessionInitError extends Error {
  readonly category = 'session-init' satisfies LookupFailureCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionInitError';
  }
}

// ─── Navigation ────────────────────────────────────────────

export type NavigationFailure = Exclude<LookupFailureCategory, 'session-init'>;

/** Per-request failure while driving the portal.  Never retried. */
export abstract class NavigationError extends Error {
  abstract readonly category: NavigationFailure;
}

/** A page load or the results rendering exceeded its bounded wait. */
export class NavigationTimeoutError extends NavigationError {
  readonly category = 'timeout';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NavigationTimeoutError';
  }
}

/** The portal could not be reached at all (DNS, refused, reset connection). */
export class PortalUnreachableError extends NavigationError {
  readonly category = 'portal-unreachable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PortalUnreachableError';
  }
}

/** The portal answered with a layout none of the result sources recognise. */
export class PageStructureError extends NavigationError {
  readonly category = 'structure-mismatch';

  constructor(message: string) {
    super(message);
    this.name = 'PageStructureError';
  }
}

/** The portal served an anti-automation challenge instead of content. */
export class ChallengeDetectedError extends NavigationError {
  readonly category = 'challenge-detected';

  constructor(
    message: string,
    /** Which marker fired (e.g. "captcha-iframe", "http-403"). */
    readonly marker: string,
  ) {
    super(message);
    this.name = 'ChallengeDetectedError';
  }
}
