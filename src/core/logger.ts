/**
 * logger.ts — Progress logger for the lookup pipeline.
 *
 * Every line carries a timestamp, a level and the module that emitted it:
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [PortalNavigator] Results table rendered (2 rows)
 *
 * CPFs are masked before anything is written, so a message that interpolates
 * one by mistake still never prints the full identifier.
 */

import { maskCpfsInText } from './cpf';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/** Minimum level written, from LOG_LEVEL (default "info"). */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalised = raw?.trim().toLowerCase() ?? '';
  return isLogLevel(normalised) ? normalised : 'info';
}

/**
 * Usage:
 *   const logger = new Logger('RetirementLookup');
 *   logger.info('Lookup finished, decision: discard');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;
  private readonly minLevel: LogLevel;

  constructor(context: string, minLevel: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)) {
    this.context = context;
    this.minLevel = minLevel;
  }

  // ── Public API ─────────────────────────────────────────

  /** Step-by-step detail: polls, skipped banners, blocked requests. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: browser launched, results rendered, decision made. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: malformed date, missing detail link. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: launch error, unexpected browser crash. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err !== undefined && this.enabled('error')) {
      console.error(err instanceof Error ? maskError(err) : err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private emit(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${maskCpfsInText(message)}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

/** Copy of `err` whose message and stack have CPFs masked. */
function maskError(err: Error): Error {
  const masked = new Error(maskCpfsInText(err.message));
  masked.name = err.name;
  if (err.stack) masked.stack = maskCpfsInText(err.stack);
  return masked;
}
