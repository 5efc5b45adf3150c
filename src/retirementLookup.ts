#!/usr/bin/env node
/**
 * retirementLookup.ts — The query orchestrator that ties every layer together.
 *
 * PIPELINE
 * ────────
 *   1. VALIDATE → parseCpf() rejects malformed identifiers before any browser work
 *   2. ACQUIRE  → BrowserManager lends the shared session (launching it if needed)
 *   3. NAVIGATE → PortalNavigator returns every employment bond for the CPF
 *   4. CLASSIFY → classify() applies the 2003-12-31 retirement rule
 *
 * Every failure is turned into a QueryOutcome; `query()` never rejects.
 *
 * Failures that may leave the browser in an unknown state (session setup,
 * anything unexpected) invalidate the session they ran on so the next
 * query relaunches it.  A launch failure has no session to invalidate.
 * Navigation failures (timeout, layout change, challenge) keep it: the
 * browser is fine, the portal was not.
 */

import { BrowserManager } from './core/browserManager';
import { classify } from './core/bondClassifier';
import { maskCpf, parseCpf } from './core/cpf';
import { formatPortalDate } from './core/dateNormalizer';
import { InvalidIdentifierError, NavigationError, SessionInitError } from './core/errors';
import { Logger } from './core/logger';
import {
  loadServiceConfig,
  type Cpf,
  type QueryOutcome,
  type ServiceConfig,
  type Session,
  type WireResponse,
} from './core/types';
import { PortalNavigator, type BondSource } from './agents';

const logger = new Logger('RetirementLookup');

/** What the orchestrator needs from the browser owner. */
export interface SessionProvider {
  acquire(): Promise<Session>;
  invalidate(session: Session): Promise<void>;
}

export class RetirementLookup {
  /**
   * @param sessions - Usually the process-wide BrowserManager.
   * @param navigator - Usually a PortalNavigator; tests pass a fake.
   */
  constructor(
    private readonly sessions: SessionProvider,
    private readonly navigator: BondSource,
  ) {}

  /** Wire the production pipeline from a service configuration. */
  static fromConfig(config: ServiceConfig, browser: BrowserManager): RetirementLookup {
    return new RetirementLookup(
      browser,
      new PortalNavigator({
        portalBaseUrl: config.portalBaseUrl,
        navigationTimeoutMs: config.navigationTimeoutMs,
        resultsTimeoutMs: config.resultsTimeoutMs,
        pollIntervalMs: config.pollIntervalMs,
      }),
    );
  }

  /**
   * Classify the subject identified by `rawCpf`.
   *
   * Invalid input fails fast without touching the browser.
   */
  async query(rawCpf: string): Promise<QueryOutcome> {
    let cpf: Cpf;
    try {
      cpf = parseCpf(rawCpf);
    } catch (err) {
      if (err instanceof InvalidIdentifierError) {
        logger.info(`Rejected identifier: ${err.message}`);
        return { ok: false, error: { kind: 'invalid-identifier', message: err.message } };
      }
      throw err;
    }

    const masked = maskCpf(cpf);
    logger.info(`Starting lookup for ${masked}`);

    let session: Session | undefined;
    try {
      session = await this.sessions.acquire();
      const bonds = await this.navigator.lookup(session, cpf);
      logger.info(`Portal listed ${bonds.length} bond(s) for ${masked}`);

      const classification = classify(bonds);
      logger.info(
        `Decision for ${masked}: ${classification.decision}` +
          (classification.date ? ` (${formatPortalDate(classification.date)})` : ''),
      );
      return { ok: true, classification };
    } catch (err) {
      return this.toFailure(err, masked, session);
    }
  }

  private async toFailure(
    err: unknown,
    masked: string,
    session: Session | undefined,
  ): Promise<QueryOutcome> {
    if (err instanceof NavigationError) {
      logger.warn(`Lookup for ${masked} failed (${err.category}): ${err.message}`);
      return {
        ok: false,
        error: { kind: 'lookup-failed', category: err.category, message: err.message },
      };
    }

    if (err instanceof SessionInitError) {
      logger.error(`Browser session unavailable for ${masked}`, err);
      if (session) await this.sessions.invalidate(session);
      return {
        ok: false,
        error: { kind: 'lookup-failed', category: err.category, message: err.message },
      };
    }

    logger.error(`Unexpected failure during the lookup for ${masked}`, err);
    if (session) await this.sessions.invalidate(session);
    return {
      ok: false,
      error: { kind: 'internal', message: 'Unexpected failure while querying the portal' },
    };
  }
}

/** Map an outcome to the JSON shape workflow tools consume. */
export function toWireResponse(outcome: QueryOutcome): WireResponse {
  if (!outcome.ok) {
    const { error } = outcome;
    const category = error.kind === 'lookup-failed' ? error.category : error.kind;
    return { error: { category, message: error.message } };
  }

  const { classification } = outcome;
  if (classification.decision === 'discard') {
    return { result: 'descarte', date: formatPortalDate(classification.date) };
  }
  return classification.date
    ? { result: 'pesquisar', date: formatPortalDate(classification.date) }
    : { result: 'pesquisar' };
}

// ─── CLI entry point ────────────────────────────────────────
//
// Usage:
//   npm run lookup -- 529.982.247-25
//
// Prints the wire response and exits 0 on a classification, 1 otherwise.

const isDirectRun = require.main === module;
if (isDirectRun) {
  const rawCpf = process.argv[2];

  if (!rawCpf) {
    console.error('Usage: retirement-lookup <CPF>\nExample: retirement-lookup 529.982.247-25');
    process.exit(1);
  }

  const config = loadServiceConfig();
  const browser = new BrowserManager(config);
  const lookup = RetirementLookup.fromConfig(config, browser);

  void lookup
    .query(rawCpf)
    .then((outcome) => {
      console.log(JSON.stringify(toWireResponse(outcome), null, 2));
      if (!outcome.ok) process.exitCode = 1;
    })
    .catch((err: unknown) => {
      logger.error('Lookup crashed', err);
      process.exitCode = 1;
    })
    .finally(() => browser.close());
}
