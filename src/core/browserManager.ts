/**
 * browserManager.ts — Owner of the shared headless Chromium process.
 *
 * One browser is launched lazily and reused by every lookup; each lookup
 * borrows a page inside its own browser context (separate cookies, storage
 * and cache) that is disposed when the lookup ends, however it ends.
 *
 * The manager is an ordinary object created by whoever wires the service
 * (the HTTP server, the CLI, a test) and handed to the orchestrator.
 *
 * Lookups go through a Bottleneck limiter.  With the default
 * `maxConcurrent: 1` they are queued and run one at a time; raising
 * MAX_CONCURRENT_LOOKUPS lets several isolated contexts navigate at once.
 */

import Bottleneck from 'bottleneck';
import puppeteerCore, { type Browser, type BrowserContext, type Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { blockNonEssentialRequests } from '../middleware';
import { SessionInitError } from './errors';
import { Logger } from './logger';
import type { PortalPage, ServiceConfig, Session } from './types';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

const ACCEPT_LANGUAGE = 'pt-BR,pt;q=0.9,en-US;q=0.8,en;q=0.7';
const VIEWPORT = { width: 1920, height: 1080 };

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-blink-features=AutomationControlled',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-background-networking',
  '--disable-default-apps',
  '--disable-sync',
  '--disable-translate',
  '--metrics-recording-only',
  '--mute-audio',
  '--no-first-run',
  '--safebrowsing-disable-auto-update',
  '--lang=pt-BR',
];

export class BrowserManager {
  private browser: Browser | null = null;
  private session: BrowserSession | null = null;
  /** In-flight launch shared by concurrent first callers. */
  private launching: Promise<Browser> | null = null;
  private readonly limiter: Bottleneck;

  constructor(private readonly config: ServiceConfig) {
    this.limiter = new Bottleneck({ maxConcurrent: config.maxConcurrentLookups });
  }

  // ── Core API ───────────────────────────────────────────

  /**
   * Return the live session, launching the browser on first use or after
   * it disconnected.
   *
   * @throws SessionInitError when Chromium cannot be started.  The failed
   *   attempt is forgotten; the next call tries again.
   */
  async acquire(): Promise<Session> {
    const browser = await this.ensureBrowser();
    if (!this.session || this.session.browser !== browser) {
      this.session = new BrowserSession(browser, this.config, this.limiter);
    }
    return this.session;
  }

  /** Whether a connected browser is currently held. */
  isReady(): boolean {
    return this.browser?.connected ?? false;
  }

  /**
   * Drop `session` after a failure that may have left its browser in an
   * unknown state.  The next `acquire()` launches a new one.
   *
   * A session that is no longer current (already replaced after an earlier
   * failure) is left alone.  The old browser is closed once every lookup
   * still running or queued on it has finished.
   */
  async invalidate(session: Session): Promise<void> {
    const current = this.session;
    if (!current || current !== session) {
      logger.debug('Ignoring invalidation of a session that is no longer current');
      return;
    }

    this.browser = null;
    this.session = null;
    logger.warn('Discarding the current browser; the next lookup relaunches it');
    await current.retire();
  }

  /** Shut the browser down for process exit. */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.session = null;
    if (!browser) return;

    logger.info('Closing the browser');
    await browser.close().catch((err: unknown) => {
      logger.warn(`Browser did not close cleanly: ${describe(err)}`);
    });
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser?.connected) return this.browser;

    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    const { proxy, executablePath } = this.config;
    const args = proxy ? [...LAUNCH_ARGS, `--proxy-server=${proxy.server}`] : LAUNCH_ARGS;

    logger.info(
      `Launching headless Chromium${proxy ? ' through the configured proxy' : ''}…`,
    );

    try {
      const browser = await puppeteer.launch({
        headless: true,
        executablePath,
        args,
      });
      this.browser = browser;
      logger.info('Browser ready');
      return browser;
    } catch (err) {
      logger.error('Browser launch failed', err);
      throw new SessionInitError('Could not launch the headless browser', { cause: err });
    }
  }
}

/**
 * A connected browser lending isolated, instrumented pages.
 */
export class BrowserSession implements Session {
  /** Lookups running or queued on this browser. */
  private users = 0;
  private retired = false;
  private closing: Promise<void> | null = null;

  constructor(
    readonly browser: Browser,
    private readonly config: ServiceConfig,
    private readonly limiter: Bottleneck,
  ) {}

  /**
   * Run `fn` with a fresh page in its own browser context, queued behind the
   * limiter.  The context is closed when `fn` settles.
   *
   * @throws SessionInitError when the context or page cannot be prepared
   *   (browser gone, proxy authentication rejected).
   */
  async withPage<T>(fn: (page: PortalPage) => Promise<T>): Promise<T> {
    this.users += 1;
    try {
      return await this.limiter.schedule(async () => {
        const context = await this.openContext();
        try {
          const page = await this.preparePage(context);
          return await fn(page);
        } finally {
          await context.close().catch((err: unknown) => {
            logger.debug(`Browser context did not close cleanly: ${describe(err)}`);
          });
        }
      });
    } finally {
      this.users -= 1;
      if (this.retired && this.users === 0) {
        await this.closeBrowser();
      }
    }
  }

  /**
   * Stop lending this browser.  It is closed now if idle, otherwise when the
   * last lookup using it finishes.
   */
  async retire(): Promise<void> {
    this.retired = true;
    if (this.users === 0) {
      await this.closeBrowser();
      return;
    }
    logger.info(`Retired browser closes after ${this.users} pending lookup(s)`);
  }

  private closeBrowser(): Promise<void> {
    this.closing ??= this.browser.close().catch((err: unknown) => {
      logger.warn(`Browser did not close cleanly: ${describe(err)}`);
    });
    return this.closing;
  }

  private async openContext(): Promise<BrowserContext> {
    try {
      return await this.browser.createBrowserContext();
    } catch (err) {
      throw new SessionInitError('Could not open a browser context', { cause: err });
    }
  }

  private async preparePage(context: BrowserContext): Promise<Page> {
    try {
      const page = await context.newPage();

      await page.setViewport(VIEWPORT);
      await page.setUserAgent(this.config.userAgent);
      await page.setExtraHTTPHeaders({ 'accept-language': ACCEPT_LANGUAGE });

      const credentials = this.config.proxy?.credentials;
      if (credentials) {
        await page.authenticate(credentials);
      }

      page.setDefaultNavigationTimeout(this.config.navigationTimeoutMs);
      page.setDefaultTimeout(this.config.resultsTimeoutMs);

      await page.setRequestInterception(true);
      page.on('request', blockNonEssentialRequests);

      return page;
    } catch (err) {
      throw new SessionInitError('Could not prepare a browser page', { cause: err });
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
