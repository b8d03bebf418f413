import { describe, it, expect } from 'vitest';
import { MAX_INDEX, Table, intersects, setsEqual, shaft, sortedMembers, treadle, warp, weft } from '../identifiers';
import type { IdSet, Shaft } from '../identifiers';

describe('identifier constructors', () => {
  it('accepts integers in range', () => {
    expect(shaft(0)).toBe(0);
    expect(warp(MAX_INDEX)).toBe(4294967295);
  });

  it('rejects negative, fractional and oversized values', () => {
    expect(() => shaft(-1)).toThrow(RangeError);
    expect(() => weft(1.5)).toThrow('Weft index must be an integer in 0..4294967295, got 1.5');
    expect(() => treadle(MAX_INDEX + 1)).toThrow(RangeError);
  });
});

describe('Table', () => {
  it('iterates in ascending key order whatever the insertion order', () => {
    const table = new Table<number, string>();
    table.set(30, 'c').set(2, 'a').set(11, 'b');
    expect(table.keys()).toEqual([2, 11, 30]);
    expect([...table]).toEqual([
      [2, 'a'],
      [11, 'b'],
      [30, 'c'],
    ]);
  });

  it('replaces the value of an existing key', () => {
    const table = new Table<number, string>([
      [1, 'first'],
      [1, 'second'],
    ]);
    expect(table.size).toBe(1);
    expect(table.get(1)).toBe('second');
  });

  it('deletes entries', () => {
    const table = new Table<number, string>([[1, 'a']]);
    expect(table.delete(1)).toBe(true);
    expect(table.has(1)).toBe(false);
    expect(table.delete(1)).toBe(false);
  });
});

describe('identifier sets', () => {
  const a: IdSet<Shaft> = new Set([shaft(3), shaft(1)]);
  const b: IdSet<Shaft> = new Set([shaft(1), shaft(3)]);
  const c: IdSet<Shaft> = new Set([shaft(2)]);

  it('compares sets regardless of order', () => {
    expect(setsEqual(a, b)).toBe(true);
    expect(setsEqual(a, c)).toBe(false);
    expect(setsEqual(a, new Set([shaft(1)]))).toBe(false);
  });

  it('detects shared members', () => {
    expect(intersects(a, b)).toBe(true);
    expect(intersects(a, c)).toBe(false);
    expect(intersects(a, new Set<Shaft>())).toBe(false);
  });

  it('lists members in ascending order', () => {
    expect(sortedMembers(a)).toEqual([1, 3]);
  });
});
