import { afterEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { utcDate } from '../core/dateNormalizer';
import type { QueryOutcome } from '../core/types';
import { buildServer, statusFor } from '../server';

let app: FastifyInstance | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

function serve(outcome: QueryOutcome, browserReady = false) {
  const query = vi.fn(async (_rawCpf: string) => outcome);
  app = buildServer({ lookup: { query }, browser: { isReady: () => browserReady } });
  return { app, query };
}

const consultar = (server: FastifyInstance, payload: object) =>
  server.inject({ method: 'POST', url: '/consultar', payload });

describe('POST /consultar', () => {
  it('answers descarte with the date', async () => {
    const { app, query } = serve({
      ok: true,
      classification: { decision: 'discard', date: utcDate(2015, 5, 15) },
    });

    const response = await consultar(app, { cpf: '529.982.247-25' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ result: 'descarte', date: '15/05/2015' });
    expect(query).toHaveBeenCalledWith('529.982.247-25');
  });

  it('answers pesquisar without a date when nothing was found', async () => {
    const { app } = serve({ ok: true, classification: { decision: 'investigate' } });

    const response = await consultar(app, { cpf: '52998224725' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ result: 'pesquisar' });
  });

  it('answers 400 for an invalid identifier', async () => {
    const { app } = serve({
      ok: false,
      error: { kind: 'invalid-identifier', message: 'CPF check digits do not match' },
    });

    const response = await consultar(app, { cpf: '000.000.000-00' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: { category: 'invalid-identifier', message: 'CPF check digits do not match' },
    });
  });

  it('answers 502 when the portal lookup failed', async () => {
    const { app } = serve({
      ok: false,
      error: {
        kind: 'lookup-failed',
        category: 'timeout',
        message: 'Timed out loading the search page',
      },
    });

    const response = await consultar(app, { cpf: '52998224725' });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      error: { category: 'timeout', message: 'Timed out loading the search page' },
    });
  });

  it('answers 500 for internal failures', async () => {
    const { app } = serve({
      ok: false,
      error: { kind: 'internal', message: 'Unexpected failure while querying the portal' },
    });

    const response = await consultar(app, { cpf: '52998224725' });

    expect(response.statusCode).toBe(500);
  });

  it('rejects a body without a cpf before any lookup', async () => {
    const { app, query } = serve({ ok: true, classification: { decision: 'investigate' } });

    const response = await consultar(app, { documento: '52998224725' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: { category: 'invalid-identifier', message: 'Request body must be {"cpf": string}' },
    });
    expect(query).not.toHaveBeenCalled();
  });

  it('treats unparseable JSON as an invalid identifier', async () => {
    const { app, query } = serve({ ok: true, classification: { decision: 'investigate' } });

    const response = await app.inject({
      method: 'POST',
      url: '/consultar',
      headers: { 'content-type': 'application/json' },
      payload: '{"cpf":',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: { category: 'invalid-identifier', message: 'Request body must be {"cpf": string}' },
    });
    expect(query).not.toHaveBeenCalled();
  });

  it('keeps the status of other client errors', async () => {
    const { app, query } = serve({ ok: true, classification: { decision: 'investigate' } });

    const response = await app.inject({
      method: 'POST',
      url: '/consultar',
      headers: { 'content-type': 'application/xml' },
      payload: '<cpf>52998224725</cpf>',
    });

    expect(response.statusCode).toBe(415);
    expect(response.json()).toEqual({
      error: { category: 'bad-request', message: 'Unsupported Media Type: application/xml' },
    });
    expect(query).not.toHaveBeenCalled();
  });
});

describe('service routes', () => {
  it('reports health with the browser state', async () => {
    const { app } = serve({ ok: true, classification: { decision: 'investigate' } }, true);

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.json()).toEqual({ status: 'ok', browserReady: true });
  });

  it('reports the package version and features', async () => {
    const { app } = serve({ ok: true, classification: { decision: 'investigate' } });

    const body = (await app.inject({ method: 'GET', url: '/version' })).json();

    expect(body.version).toBe('1.0.0');
    expect(body.features).toContain('retirement-classification');
  });
});

describe('statusFor', () => {
  it('maps outcomes to HTTP statuses', () => {
    expect(statusFor({ ok: true, classification: { decision: 'investigate' } })).toBe(200);
    expect(statusFor({ ok: false, error: { kind: 'invalid-identifier', message: '' } })).toBe(400);
    expect(
      statusFor({ ok: false, error: { kind: 'lookup-failed', category: 'session-init', message: '' } }),
    ).toBe(502);
    expect(statusFor({ ok: false, error: { kind: 'internal', message: '' } })).toBe(500);
  });
});
