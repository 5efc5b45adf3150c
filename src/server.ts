/**
 * server.ts — HTTP surface for workflow tools.
 *
 *   POST /consultar   { "cpf": "529.982.247-25" }  → wire response
 *   GET  /health      liveness plus whether a browser is currently held
 *   GET  /version     package version and the features this build carries
 *
 * Status codes follow the outcome: 200 for a classification, 400 for a bad
 * identifier, 502 when the portal or the browser failed, 500 otherwise.
 * Other client errors from Fastify (413, 415) keep their status under the
 * `bad-request` category.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { BrowserManager } from './core/browserManager';
import { Logger } from './core/logger';
import { loadServiceConfig, type QueryOutcome } from './core/types';
import { RetirementLookup, toWireResponse } from './retirementLookup';

const logger = new Logger('Server');

const FEATURES = [
  'cpf-validation',
  'stealth-browser',
  'proxy-support',
  'request-blocking',
  'challenge-detection',
  'retirement-classification',
];

export interface ServerDeps {
  lookup: { query(rawCpf: string): Promise<QueryOutcome> };
  browser: { isReady(): boolean };
}

interface ConsultarBody {
  cpf: string;
}

const consultarSchema = {
  body: {
    type: 'object',
    required: ['cpf'],
    properties: { cpf: { type: 'string' } },
  },
} as const;

export function buildServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({ logger: false });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      `${request.method} ${request.url} → ${reply.statusCode} (${Math.round(reply.elapsedTime)} ms)`,
    );
  });

  app.setErrorHandler((error: FastifyError, _request, reply) => {
    if (isMalformedBody(error)) {
      return reply.status(400).send({
        error: { category: 'invalid-identifier', message: 'Request body must be {"cpf": string}' },
      });
    }
    const status = error.statusCode ?? 500;
    if (status >= 400 && status < 500) {
      return reply.status(status).send({
        error: { category: 'bad-request', message: error.message },
      });
    }
    logger.error('Unhandled error in request', error);
    return reply.status(500).send({
      error: { category: 'internal', message: 'Unexpected server error' },
    });
  });

  app.post<{ Body: ConsultarBody }>(
    '/consultar',
    { schema: consultarSchema },
    async (request, reply) => {
      const outcome = await deps.lookup.query(request.body.cpf);
      return reply.status(statusFor(outcome)).send(toWireResponse(outcome));
    },
  );

  app.get('/health', async () => ({
    status: 'ok',
    browserReady: deps.browser.isReady(),
  }));

  app.get('/version', async () => ({
    version: readPackageVersion(),
    features: FEATURES,
  }));

  return app;
}

const MALFORMED_JSON_CODES = new Set(['FST_ERR_CTP_EMPTY_JSON_BODY', 'FST_ERR_CTP_INVALID_JSON_BODY']);

/** Schema violations and unparseable JSON share the shape of a bad CPF. */
function isMalformedBody(error: FastifyError): boolean {
  return (
    error.validation !== undefined ||
    error instanceof SyntaxError ||
    MALFORMED_JSON_CODES.has(error.code)
  );
}

export function statusFor(outcome: QueryOutcome): number {
  if (outcome.ok) return 200;
  switch (outcome.error.kind) {
    case 'invalid-identifier':
      return 400;
    case 'lookup-failed':
      return 502;
    case 'internal':
      return 500;
  }
}

function readPackageVersion(): string {
  const parsed: unknown = JSON.parse(
    readFileSync(join(__dirname, '..', 'package.json'), 'utf8'),
  );
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return '0.0.0';
}

// ─── Entry point ────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const browser = new BrowserManager(config);
  const app = buildServer({
    lookup: RetirementLookup.fromConfig(config, browser),
    browser,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down`);
    await app.close();
    await browser.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('Shutdown did not complete cleanly', err);
        process.exitCode = 1;
      });
    });
  }

  await app.listen({ port: config.port, host: config.host });
  logger.info(`Listening on http://${config.host}:${config.port}`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.error('Server failed to start', err);
    process.exit(1);
  });
}
