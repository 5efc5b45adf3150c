import { describe, expect, it } from 'vitest';
import { toRetiredBonds } from '../agents/portalNavigator';
import { classify, latestRetirementDate, RETIREMENT_THRESHOLD } from '../core/bondClassifier';
import { utcDate } from '../core/dateNormalizer';
import type { EmploymentBond } from '../core/types';
import { toWireResponse } from '../retirementLookup';

const retired = (date?: Date): EmploymentBond => ({
  role: 'Servidor Civil',
  status: 'Aposentado',
  retirementDate: date,
});
const active: EmploymentBond = { role: 'Servidor Civil', status: 'Ativo' };

describe('classify', () => {
  it('investigates without a date when no bond carries one', () => {
    expect(classify([])).toEqual({ decision: 'investigate' });
    expect(classify([active, retired()])).toEqual({ decision: 'investigate' });
  });

  it('discards when the latest retirement is after 2003-12-31', () => {
    const date = utcDate(2004, 1, 1);
    expect(classify([retired(date)])).toEqual({ decision: 'discard', date });
  });

  it('investigates when the latest retirement is on the threshold day', () => {
    expect(classify([retired(utcDate(2003, 12, 31))])).toEqual({
      decision: 'investigate',
      date: utcDate(2003, 12, 31),
    });
  });

  it('investigates with the date when the retirement is older', () => {
    const date = utcDate(1998, 2, 1);
    expect(classify([active, retired(date)])).toEqual({ decision: 'investigate', date });
  });

  it('uses the most recent date whatever the bond order', () => {
    const old = utcDate(1995, 3, 10);
    const recent = utcDate(2015, 5, 15);
    expect(classify([retired(recent), retired(old)])).toEqual({ decision: 'discard', date: recent });
    expect(classify([retired(old), active, retired(recent)])).toEqual({
      decision: 'discard',
      date: recent,
    });
  });

  it('honours a custom threshold', () => {
    const date = utcDate(2010, 6, 1);
    expect(classify([retired(date)], utcDate(2012, 1, 1))).toEqual({
      decision: 'investigate',
      date,
    });
  });

  it('gives the same answer when called twice', () => {
    const bonds = [retired(utcDate(2001, 7, 7)), active];
    expect(classify(bonds)).toEqual(classify(bonds));
  });

  it('leaves the bond date alone when the result date is changed', () => {
    const bondDate = utcDate(2015, 5, 15);
    const result = classify([retired(bondDate)]);

    expect(result.date).not.toBe(bondDate);
    result.date?.setUTCFullYear(1990);

    expect(bondDate.toISOString()).toBe('2015-05-15T00:00:00.000Z');
    expect(classify([retired(bondDate)])).toEqual({ decision: 'discard', date: utcDate(2015, 5, 15) });
  });

  it('exposes the threshold as UTC midnight of 2003-12-31', () => {
    expect(RETIREMENT_THRESHOLD.toISOString()).toBe('2003-12-31T00:00:00.000Z');
  });
});

describe('latestRetirementDate', () => {
  it('is undefined for bonds without dates', () => {
    expect(latestRetirementDate([active])).toBeUndefined();
  });
});

describe('malformed dates', () => {
  it('do not hide the other retirement dates of a row', () => {
    const row = { role: 'Servidor Civil', status: 'Aposentado' };
    const bonds = toRetiredBonds(row, ['31/02/2010', '20/08/2012'], 1);

    expect(bonds).toEqual([
      { role: 'Servidor Civil', status: 'Aposentado' },
      { role: 'Servidor Civil', status: 'Aposentado', retirementDate: utcDate(2012, 8, 20) },
    ]);
    expect(classify(bonds)).toEqual({ decision: 'discard', date: utcDate(2012, 8, 20) });
  });
});

describe('wire scenarios', () => {
  const wire = (bonds: EmploymentBond[]) =>
    toWireResponse({ ok: true, classification: classify(bonds) });

  it('answers descarte for a retirement in 2015', () => {
    expect(wire([retired(utcDate(2015, 5, 15))])).toEqual({
      result: 'descarte',
      date: '15/05/2015',
    });
  });

  it('answers pesquisar with the date for a retirement in 1998', () => {
    expect(wire([retired(utcDate(1998, 2, 1))])).toEqual({
      result: 'pesquisar',
      date: '01/02/1998',
    });
  });

  it('answers pesquisar without a date field when nothing was found', () => {
    const response = wire([]);
    expect(response).toEqual({ result: 'pesquisar' });
    expect(Object.keys(response)).toEqual(['result']);
  });
});
