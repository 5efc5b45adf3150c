/**
 * types.ts — Shared type definitions for the lookup pipeline.
 *
 * Every layer (navigator, classifier, orchestrator, HTTP surface) agrees on
 * the shapes declared here, and the service configuration is built from the
 * environment in one place.
 */

// ─── Identifier ────────────────────────────────────────────

/**
 * An 11-digit CPF that passed the check-digit test.
 *
 * Branded so a raw request string cannot reach the navigator without going
 * through `parseCpf()`.
 */
export type Cpf = string & { readonly __brand: 'Cpf' };

// ─── Employment bonds ──────────────────────────────────────

/** One employment relationship of the subject, as listed by the portal. */
export interface EmploymentBond {
  /** Bond type or role label (e.g. "Servidor Civil", "Técnico Administrativo"). */
  readonly role: string;
  /** Administrative situation label (e.g. "Ativo", "Aposentado"). */
  readonly status: string;
  /**
   * Present only when the status indicates retirement and the portal's
   * date parsed.  A malformed date leaves this undefined.
   */
  readonly retirementDate?: Date;
}

/** All bonds found for one CPF, in portal order.  May be empty. */
export type BondList = readonly EmploymentBond[];

// ─── Classification ────────────────────────────────────────

export type ClassificationResult =
  | { readonly decision: 'discard'; readonly date: Date }
  | { readonly decision: 'investigate'; readonly date?: Date };

// ─── Query outcome ─────────────────────────────────────────

export type LookupFailureCategory =
  | 'session-init'
  | 'timeout'
  | 'portal-unreachable'
  | 'structure-mismatch'
  | 'challenge-detected';

export type QueryError =
  | { readonly kind: 'invalid-identifier'; readonly message: string }
  | {
      readonly kind: 'lookup-failed';
      readonly category: LookupFailureCategory;
      readonly message: string;
    }
  | { readonly kind: 'internal'; readonly message: string };

export type QueryOutcome =
  | { readonly ok: true; readonly classification: ClassificationResult }
  | { readonly ok: false; readonly error: QueryError };

/** JSON returned to workflow tools. */
export type WireResponse =
  | { result: 'descarte'; date: string }
  | { result: 'pesquisar'; date?: string }
  | {
      error: {
        category: 'invalid-identifier' | LookupFailureCategory | 'internal';
        message: string;
      };
    };

// ─── Portal pages ──────────────────────────────────────────

/** Status returned by the portal for the page navigation. */
export interface PortalResponse {
  status(): number;
}

/**
 * The slice of a browser page the navigator drives.
 *
 * Puppeteer's `Page` satisfies it; tests hand the navigator an in-process
 * fake instead.
 */
export interface PortalPage {
  goto(
    url: string,
    options?: {
      waitUntil?: 'domcontentloaded' | 'load';
      timeout?: number;
    },
  ): Promise<PortalResponse | null>;
  content(): Promise<string>;
  click(selector: string): Promise<void>;
  url(): string;
}

/** A live browser able to lend an isolated page for one lookup. */
export interface Session {
  withPage<T>(fn: (page: PortalPage) => Promise<T>): Promise<T>;
}

// ─── Service configuration ─────────────────────────────────

export interface ProxySettings {
  server: string;
  /** Both credentials are set or neither is. */
  credentials?: { username: string; password: string };
}

/**
 * Central configuration, read from environment variables with defaults.
 */
export interface ServiceConfig {
  // Browser
  executablePath: string;
  userAgent: string;
  proxy?: ProxySettings;
  maxConcurrentLookups: number;

  // Portal
  portalBaseUrl: string;
  navigationTimeoutMs: number;
  resultsTimeoutMs: number;
  pollIntervalMs: number;

  // HTTP
  port: number;
  host: string;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Build a ServiceConfig from process.env (or any env-shaped record). */
export function loadServiceConfig(
  env: NodeJS.ProcessEnv = process.env,
): ServiceConfig {
  return {
    executablePath:
      nonEmpty(env.CHROME_EXECUTABLE_PATH) ??
      nonEmpty(env.PUPPETEER_EXECUTABLE_PATH) ??
      '/usr/bin/chromium',
    userAgent: nonEmpty(env.USER_AGENT) ?? DEFAULT_USER_AGENT,
    proxy: loadProxySettings(env),
    maxConcurrentLookups: positiveInt(env.MAX_CONCURRENT_LOOKUPS, 1),
    portalBaseUrl: (
      nonEmpty(env.PORTAL_BASE_URL) ?? 'https://portaldatransparencia.gov.br'
    ).replace(/\/+$/, ''),
    navigationTimeoutMs: positiveInt(env.NAVIGATION_TIMEOUT_MS, 45_000),
    resultsTimeoutMs: positiveInt(env.RESULTS_TIMEOUT_MS, 30_000),
    pollIntervalMs: positiveInt(env.POLL_INTERVAL_MS, 250),
    port: positiveInt(env.PORT, 8000),
    host: nonEmpty(env.HOST) ?? '0.0.0.0',
  };
}

/**
 * Proxying is all-or-nothing: without a server address the credentials are
 * ignored, and a lone username or password is never sent.
 */
export function loadProxySettings(
  env: NodeJS.ProcessEnv,
): ProxySettings | undefined {
  const server = nonEmpty(env.PROXY_SERVER);
  if (!server) return undefined;

  const username = nonEmpty(env.PROXY_USERNAME);
  const password = nonEmpty(env.PROXY_PASSWORD);
  if (username && password) {
    return { server, credentials: { username, password } };
  }
  return { server };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return fallback;
  const parsed = parseInt(raw, 10);
  return parsed > 0 ? parsed : fallback;
}
