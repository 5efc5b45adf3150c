/**
 * portalNavigator.ts — Drive one CPF query on the transparency portal.
 *
 * FLOW
 * ────
 *   1. Open the servant search URL with the CPF already in the query string.
 *   2. Dismiss the cookie banner if it shows up (best effort).
 *   3. Poll the rendered HTML until a known layout appears: results,
 *      not-found or challenge.  The wait is bounded by RESULTS_TIMEOUT_MS.
 *   4. For every retired row, open its detail page and read the retirement
 *      dates.  Everything else becomes a bond without a date.
 *
 * The navigator never retries.  Each failure surfaces as one
 * NavigationError subtype whose message names the step, never the CPF or
 * page content.
 */

import { TimeoutError } from 'puppeteer-core';
import { parsePortalDate } from '../core/dateNormalizer';
import {
  ChallengeDetectedError,
  NavigationTimeoutError,
  PageStructureError,
  PortalUnreachableError,
  SessionInitError,
} from '../core/errors';
import { Logger } from '../core/logger';
import type { BondList, Cpf, EmploymentBond, PortalPage, Session } from '../core/types';
import { isBlockedResponse } from '../middleware';
import {
  readDetailPage,
  readSearchPage,
  type DetailPageState,
  type ServantRow,
} from '../scrapers';

const logger = new Logger('PortalNavigator');

const SEARCH_PATH = '/servidores/consulta';
const SELECTED_COLUMNS = [
  'detalhar',
  'tipo',
  'cpf',
  'nome',
  'orgaoServidorLotacao',
  'matricula',
  'situacao',
  'funcao',
  'cargo',
  'quantidade',
];

const COOKIE_BANNER_SELECTOR = '.cc-btn.cc-dismiss, #accept-all-cookies, button.br-button[aria-label*="Aceitar"]';

/** "Aposentado", "Aposentada", "Aposentadoria", "Inativo". */
const RETIRED_STATUS = /aposentad|aposentadoria|inativ/i;

/** Chromium network errors caused by the upstream proxy rather than the portal. */
const PROXY_FAILURE = /net::ERR_(?:PROXY_|TUNNEL_CONNECTION_FAILED|NO_SUPPORTED_PROXIES)/;
const NETWORK_TIMEOUT = /net::ERR_(?:CONNECTION_)?TIMED_OUT/;
const NETWORK_FAILURE = /net::ERR_[A-Z_]+/;

export interface NavigatorOptions {
  portalBaseUrl: string;
  navigationTimeoutMs: number;
  resultsTimeoutMs: number;
  pollIntervalMs: number;
}

/** What the orchestrator needs from a navigator. */
export interface BondSource {
  lookup(session: Session, cpf: Cpf): Promise<BondList>;
}

type Settled<TState> = Exclude<TState, { layout: 'rendering' | 'unrecognised' }>;

export class PortalNavigator implements BondSource {
  constructor(private readonly options: NavigatorOptions) {}

  /**
   * Return every employment bond the portal lists for `cpf`.
   *
   * @throws NavigationTimeoutError | PortalUnreachableError | PageStructureError |
   *   ChallengeDetectedError
   * @throws SessionInitError when the upstream proxy refuses the connection.
   */
  async lookup(session: Session, cpf: Cpf): Promise<BondList> {
    return session.withPage(async (page) => {
      const opened = await this.open(page, this.searchUrl(cpf), 'search page');
      if (opened === 'not-found') {
        logger.info('Portal answered the search with its not-found page');
        return [];
      }

      await this.dismissCookieBanner(page);

      const state = await this.waitForLayout(page, 'search results', (html, url) =>
        readSearchPage(html, url),
      );

      switch (state.layout) {
        case 'not-found':
          logger.info('No records found for this CPF');
          return [];
        case 'challenge':
          throw challengeError('search results', state.marker);
        case 'malformed':
          throw new PageStructureError(`Search results could not be read: ${state.reason}`);
        case 'results':
          logger.info(`Search returned ${state.rows.length} row(s)`);
          return this.collectBonds(page, state.rows);
      }
    });
  }

  // ── Steps ──────────────────────────────────────────────

  searchUrl(cpf: Cpf): string {
    const params = new URLSearchParams({
      paginacaoSimples: 'true',
      tamanhoPagina: '',
      offset: '',
      direcaoOrdenacao: 'asc',
      cpf,
      colunasSelecionadas: SELECTED_COLUMNS.join(','),
    });
    return `${this.options.portalBaseUrl}${SEARCH_PATH}?${params.toString()}`;
  }

  /**
   * Navigate and screen the HTTP status.
   *
   * @returns "not-found" for a 404, "loaded" otherwise.
   */
  private async open(
    page: PortalPage,
    url: string,
    step: string,
  ): Promise<'loaded' | 'not-found'> {
    let status = 0;
    try {
      const response = await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.options.navigationTimeoutMs,
      });
      status = response?.status() ?? 0;
    } catch (err) {
      throw mapNavigationFailure(err, step);
    }

    if (isBlockedResponse(status)) {
      throw challengeError(step, `http-${status}`);
    }
    return status === 404 ? 'not-found' : 'loaded';
  }

  private async dismissCookieBanner(page: PortalPage): Promise<void> {
    try {
      await page.click(COOKIE_BANNER_SELECTOR);
      logger.debug('Cookie banner dismissed');
    } catch (err) {
      logger.debug(`No cookie banner to dismiss (${describe(err)})`);
    }
  }

  /**
   * Poll the page until `read` recognises a settled layout or the results
   * timeout elapses.
   *
   * At the deadline, a container that is still filling in means the portal
   * is slow (timeout); a page with no known container means its structure
   * changed.
   */
  private async waitForLayout<TState extends { layout: string }>(
    page: PortalPage,
    step: string,
    read: (html: string, url: string) => TState,
  ): Promise<Settled<TState>> {
    const deadline = Date.now() + this.options.resultsTimeoutMs;
    let last = 'unrecognised';

    for (;;) {
      let html: string;
      try {
        html = await page.content();
      } catch (err) {
        throw mapNavigationFailure(err, step);
      }

      const state = read(html, page.url());
      if (isSettled(state)) return state;
      last = state.layout;

      if (Date.now() >= deadline) break;
      await sleep(this.options.pollIntervalMs);
    }

    if (last === 'rendering') {
      throw new NavigationTimeoutError(
        `The ${step} did not finish rendering within ${this.options.resultsTimeoutMs} ms`,
      );
    }
    throw new PageStructureError(`The ${step} page matched no known layout`);
  }

  private async collectBonds(page: PortalPage, rows: ServantRow[]): Promise<EmploymentBond[]> {
    const bonds: EmploymentBond[] = [];

    for (const [index, row] of rows.entries()) {
      if (!RETIRED_STATUS.test(row.status)) {
        bonds.push({ role: row.role, status: row.status });
        continue;
      }

      if (!row.detailUrl) {
        logger.warn(`Row ${index + 1} is retired but links to no detail page`);
        bonds.push({ role: row.role, status: row.status });
        continue;
      }

      const rawDates = await this.readRetirementDates(page, row.detailUrl, index + 1);
      bonds.push(...toRetiredBonds(row, rawDates, index + 1));
    }

    return bonds;
  }

  private async readRetirementDates(
    page: PortalPage,
    detailUrl: string,
    rowNumber: number,
  ): Promise<string[]> {
    const step = `detail page of row ${rowNumber}`;
    const opened = await this.open(page, detailUrl, step);
    if (opened === 'not-found') {
      logger.warn(`The ${step} no longer exists`);
      return [];
    }

    const state: Settled<DetailPageState> = await this.waitForLayout(page, step, (html) =>
      readDetailPage(html),
    );

    switch (state.layout) {
      case 'challenge':
        throw challengeError(step, state.marker);
      case 'not-found':
        logger.warn(`The ${step} answered with the not-found page`);
        return [];
      case 'detail':
        logger.info(`Found ${state.retirementDates.length} retirement date(s) on the ${step}`);
        return state.retirementDates;
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────

/**
 * One bond per retirement date found on the detail page.  An unparseable
 * value still yields a bond, without a date; no value at all yields a
 * single dateless bond.
 */
export function toRetiredBonds(
  row: ServantRow,
  rawDates: readonly string[],
  rowNumber: number,
): EmploymentBond[] {
  if (rawDates.length === 0) {
    logger.warn(`Row ${rowNumber} is retired but its detail page shows no retirement date`);
    return [{ role: row.role, status: row.status }];
  }

  return rawDates.map((raw) => {
    const retirementDate = parsePortalDate(raw);
    if (!retirementDate) {
      logger.warn(`Row ${rowNumber}: ignoring malformed retirement date "${raw}"`);
      return { role: row.role, status: row.status };
    }
    return { role: row.role, status: row.status, retirementDate };
  });
}

function isSettled<TState extends { layout: string }>(state: TState): state is Settled<TState> {
  return state.layout !== 'rendering' && state.layout !== 'unrecognised';
}

function challengeError(step: string, marker: string): ChallengeDetectedError {
  logger.warn(`Anti-automation challenge on the ${step} (${marker})`);
  return new ChallengeDetectedError(`The portal served an anti-automation challenge on the ${step}`, marker);
}

/**
 * Translate a browser failure into the error taxonomy.  Anything that is
 * neither a timeout nor a proxy failure is rethrown untouched: the browser
 * itself is in trouble and the orchestrator decides what to do with it.
 */
function mapNavigationFailure(err: unknown, step: string): unknown {
  if (err instanceof TimeoutError) {
    return new NavigationTimeoutError(`Timed out loading the ${step}`, { cause: err });
  }
  if (err instanceof Error && PROXY_FAILURE.test(err.message)) {
    return new SessionInitError('The upstream proxy refused the connection', { cause: err });
  }
  if (err instanceof Error && NETWORK_TIMEOUT.test(err.message)) {
    return new NavigationTimeoutError(`Timed out loading the ${step}`, { cause: err });
  }
  if (err instanceof Error && NETWORK_FAILURE.test(err.message)) {
    return new PortalUnreachableError(`The portal could not be reached while loading the ${step}`, {
      cause: err,
    });
  }
  return err;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
