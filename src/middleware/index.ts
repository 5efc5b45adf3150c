/**
 * middleware/index.ts — Barrel export for the request-level concerns.
 *
 * Stateless helpers applied to every page: what to let through and what
 * counts as an anti-automation response.
 */

// ── Request filtering ───────────────────────────────────────
export {
  BLOCKED_RESOURCE_TYPES,
  BLOCKED_URL_FRAGMENTS,
  blockNonEssentialRequests,
  shouldBlockRequest,
} from './resourceBlocker';
export type { InterceptedRequest } from './resourceBlocker';

// ── Challenge detection ─────────────────────────────────────
export { CHALLENGE_MARKERS, detectChallenge, isBlockedResponse } from './challengeDetector';
