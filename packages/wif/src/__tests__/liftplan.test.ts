import { describe, it, expect } from 'vitest';
import { Table, shaft, treadle, weft } from '../identifiers';
import type { IdSet, Shaft, Treadle, Weft } from '../identifiers';
import { composeLiftplan, firstLiftplanDifference, reconcileLiftplan } from '../liftplan';
import { LiftplanMismatchError } from '../errors';
import type { WifDocument, WifHeader } from '../types';

describe('composeLiftplan', () => {
  const tieup = new Table<Treadle, IdSet<Shaft>>([
    [treadle(1), new Set([shaft(1), shaft(2)])],
    [treadle(2), new Set([shaft(2), shaft(3)])],
  ]);

  it('unions the shafts tied to every treadle pressed on a row', () => {
    const treadling = new Table<Weft, IdSet<Treadle>>([
      [weft(1), new Set([treadle(1), treadle(2)])],
      [weft(2), new Set([treadle(2)])],
    ]);
    const liftplan = composeLiftplan(treadling, tieup);
    expect(liftplan.get(weft(1))).toEqual(new Set([shaft(1), shaft(2), shaft(3)]));
    expect(liftplan.get(weft(2))).toEqual(new Set([shaft(2), shaft(3)]));
  });

  it('lifts nothing for treadles without a tieup entry', () => {
    const treadling = new Table<Weft, IdSet<Treadle>>([[weft(1), new Set([treadle(7)])]]);
    expect(composeLiftplan(treadling, tieup).get(weft(1))).toEqual(new Set());
  });
});

describe('firstLiftplanDifference', () => {
  const plan = (rows: Array<[number, number[]]>) =>
    new Table<Weft, IdSet<Shaft>>(rows.map(([row, shafts]): [Weft, IdSet<Shaft>] => [weft(row), new Set(shafts.map(shaft))]));

  it('is undefined for identical plans', () => {
    expect(firstLiftplanDifference(plan([[1, [1, 2]]]), plan([[1, [2, 1]]]))).toBeUndefined();
  });

  it('finds the lowest differing row', () => {
    const a = plan([[1, [1]], [2, [2]], [3, [3]]]);
    const b = plan([[1, [1]], [2, [4]], [3, [4]]]);
    expect(firstLiftplanDifference(a, b)).toBe(2);
  });

  it('treats a row present on only one side as a difference', () => {
    expect(firstLiftplanDifference(plan([[1, [1]]]), plan([[1, [1]], [5, []]]))).toBe(5);
  });
});

describe('reconcileLiftplan', () => {
  const header: WifHeader = {
    version: '1.1',
    date: { year: 2020, month: 5, day: 1 },
    developers: 'dev@example.com',
    sourceProgram: 'Test',
  };
  const tieup = new Table<Treadle, IdSet<Shaft>>([[treadle(1), new Set([shaft(2)])]]);
  const treadling = new Table<Weft, IdSet<Treadle>>([[weft(1), new Set([treadle(1)])]]);

  it('returns a document without treadling and tieup unchanged', () => {
    const doc: WifDocument = { header, tieup };
    expect(reconcileLiftplan(doc)).toBe(doc);
  });

  it('adds the composed liftplan when none is supplied', () => {
    const reconciled = reconcileLiftplan({ header, tieup, treadling });
    expect(reconciled.liftplan?.entries()).toEqual([[1, new Set([shaft(2)])]]);
  });

  it('keeps a matching supplied liftplan', () => {
    const doc: WifDocument = {
      header,
      tieup,
      treadling,
      liftplan: new Table<Weft, IdSet<Shaft>>([[weft(1), new Set([shaft(2)])]]),
    };
    expect(reconcileLiftplan(doc)).toBe(doc);
  });

  it('throws on a mismatching supplied liftplan', () => {
    const doc: WifDocument = {
      header,
      tieup,
      treadling,
      liftplan: new Table<Weft, IdSet<Shaft>>([[weft(1), new Set([shaft(3)])]]),
    };
    expect(() => reconcileLiftplan(doc)).toThrow(LiftplanMismatchError);
  });
});
