import { describe, expect, it, vi } from 'vitest';
import type { BondSource } from '../agents';
import { utcDate } from '../core/dateNormalizer';
import {
  ChallengeDetectedError,
  NavigationTimeoutError,
  PageStructureError,
  PortalUnreachableError,
  SessionInitError,
} from '../core/errors';
import type { BondList, Cpf, Session } from '../core/types';
import { RetirementLookup, toWireResponse, type SessionProvider } from '../retirementLookup';

const session: Session = {
  withPage: () => Promise.reject(new Error('the fake navigator never opens pages')),
};

function setup(lookup: (cpf: Cpf) => Promise<BondList>) {
  const sessions = {
    acquire: vi.fn(async (): Promise<Session> => session),
    invalidate: vi.fn(async (_session: Session) => {}),
  } satisfies SessionProvider;
  const navigator = {
    lookup: vi.fn((_session: Session, cpf: Cpf) => lookup(cpf)),
  } satisfies BondSource;
  return { sessions, navigator, service: new RetirementLookup(sessions, navigator) };
}

const retiredIn = (date: Date) => [{ role: 'Servidor Civil', status: 'Aposentado', retirementDate: date }];

describe('RetirementLookup.query', () => {
  it('rejects an invalid identifier without touching the browser', async () => {
    const { sessions, navigator, service } = setup(async () => []);

    expect(await service.query('000.000.000-00')).toEqual({
      ok: false,
      error: { kind: 'invalid-identifier', message: 'CPF check digits do not match' },
    });
    expect(sessions.acquire).not.toHaveBeenCalled();
    expect(navigator.lookup).not.toHaveBeenCalled();
  });

  it('classifies the bonds the navigator returns', async () => {
    const { navigator, service } = setup(async () => retiredIn(utcDate(2015, 5, 15)));

    expect(await service.query('529.982.247-25')).toEqual({
      ok: true,
      classification: { decision: 'discard', date: utcDate(2015, 5, 15) },
    });
    expect(navigator.lookup).toHaveBeenCalledWith(session, '52998224725');
  });

  it('investigates when nothing was found', async () => {
    const { service } = setup(async () => []);
    expect(await service.query('11144477735')).toEqual({
      ok: true,
      classification: { decision: 'investigate' },
    });
  });

  it('keeps the session after a timeout and serves the next request', async () => {
    const lookup = vi
      .fn<(cpf: Cpf) => Promise<BondList>>()
      .mockRejectedValueOnce(new NavigationTimeoutError('Timed out loading the search page'))
      .mockResolvedValueOnce(retiredIn(utcDate(1998, 2, 1)));
    const { sessions, service } = setup(lookup);
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await service.query('52998224725')).toEqual({
      ok: false,
      error: {
        kind: 'lookup-failed',
        category: 'timeout',
        message: 'Timed out loading the search page',
      },
    });
    expect(await service.query('52998224725')).toEqual({
      ok: true,
      classification: { decision: 'investigate', date: utcDate(1998, 2, 1) },
    });
    expect(sessions.acquire).toHaveBeenCalledTimes(2);
    expect(sessions.invalidate).not.toHaveBeenCalled();
  });

  it.each([
    [new PageStructureError('The search results page matched no known layout'), 'structure-mismatch'],
    [new ChallengeDetectedError('The portal served a challenge', 'captcha-iframe'), 'challenge-detected'],
    [new PortalUnreachableError('The portal could not be reached'), 'portal-unreachable'],
  ] as const)('reports %s by category', async (error, category) => {
    const { sessions, service } = setup(() => Promise.reject(error));
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(await service.query('52998224725')).toEqual({
      ok: false,
      error: { kind: 'lookup-failed', category, message: error.message },
    });
    expect(sessions.invalidate).not.toHaveBeenCalled();
  });

  it('has no session to invalidate when the browser cannot be launched', async () => {
    const { sessions, navigator, service } = setup(async () => []);
    sessions.acquire.mockRejectedValueOnce(
      new SessionInitError('Could not launch the headless browser'),
    );
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await service.query('52998224725')).toEqual({
      ok: false,
      error: {
        kind: 'lookup-failed',
        category: 'session-init',
        message: 'Could not launch the headless browser',
      },
    });
    expect(navigator.lookup).not.toHaveBeenCalled();
    expect(sessions.invalidate).not.toHaveBeenCalled();
  });

  it('invalidates the session a page could not be prepared on', async () => {
    const { sessions, service } = setup(() =>
      Promise.reject(new SessionInitError('Could not prepare a browser page')),
    );
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await service.query('52998224725')).toEqual({
      ok: false,
      error: {
        kind: 'lookup-failed',
        category: 'session-init',
        message: 'Could not prepare a browser page',
      },
    });
    expect(sessions.invalidate).toHaveBeenCalledTimes(1);
    expect(sessions.invalidate).toHaveBeenCalledWith(session);
  });

  it('maps unexpected failures to internal and discards the browser', async () => {
    const { sessions, service } = setup(() => Promise.reject(new Error('Target closed')));
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(await service.query('52998224725')).toEqual({
      ok: false,
      error: { kind: 'internal', message: 'Unexpected failure while querying the portal' },
    });
    expect(sessions.invalidate).toHaveBeenCalledTimes(1);
    expect(sessions.invalidate).toHaveBeenCalledWith(session);
  });

  it('never writes the full CPF to the log', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { service } = setup(async () => []);

    await service.query('529.982.247-25');

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes('Starting lookup for 529.***.***-25'))).toBe(true);
    expect(lines.filter((line) => line.includes('52998224725'))).toEqual([]);
  });
});

describe('toWireResponse', () => {
  it('maps failures to their category', () => {
    expect(
      toWireResponse({
        ok: false,
        error: { kind: 'lookup-failed', category: 'challenge-detected', message: 'blocked' },
      }),
    ).toEqual({ error: { category: 'challenge-detected', message: 'blocked' } });
    expect(
      toWireResponse({ ok: false, error: { kind: 'invalid-identifier', message: 'bad' } }),
    ).toEqual({ error: { category: 'invalid-identifier', message: 'bad' } });
    expect(toWireResponse({ ok: false, error: { kind: 'internal', message: 'oops' } })).toEqual({
      error: { category: 'internal', message: 'oops' },
    });
  });
});
