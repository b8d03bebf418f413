import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { parseWif } from '../document';
import {
  colorRange,
  interlacement,
  normalizeColor,
  shaftCount,
  treadleCount,
  warpColor,
  warpColorBytes,
  warpCount,
  warpSpacing,
  warpSymbol,
  warpThickness,
  weftColor,
  weftColorBytes,
  weftCount,
  weftSymbol,
  weftThickness,
} from '../queries';
import { Table, shaft, warp, weft } from '../identifiers';
import type { IdSet, Shaft, Warp, Weft } from '../identifiers';
import type { Color, WifDocument, WifHeader } from '../types';
import { InvalidSymbolError } from '../errors';

const twill = parseWif(
  fs.readFileSync(fileURLToPath(new URL('./fixtures/twill.wif', import.meta.url)), 'utf-8'),
);

const header: WifHeader = {
  version: '1.1',
  date: { year: 2020, month: 5, day: 1 },
  developers: 'dev@example.com',
  sourceProgram: 'Test',
};

describe('geometry', () => {
  it('reports counts from WEAVING, WARP and WEFT', () => {
    expect(shaftCount(twill)).toBe(4);
    expect(treadleCount(twill)).toBe(4);
    expect(warpCount(twill)).toBe(4);
    expect(weftCount(twill)).toBe(4);
  });

  it('is undefined when the section is absent', () => {
    expect(shaftCount({ header })).toBeUndefined();
    expect(warpCount({ header })).toBeUndefined();
  });
});

describe('thread colors', () => {
  it('resolves a per-thread index through the color table', () => {
    expect(warpColor(twill, warp(2))).toEqual({ red: 999, green: 0, blue: 500 });
  });

  it('falls back to the base color when the per-thread index has no table entry', () => {
    expect(warpColor(twill, warp(4))).toEqual({ red: 999, green: 999, blue: 999 });
  });

  it('uses the base color for threads without their own entry', () => {
    expect(warpColor(twill, warp(1))).toEqual({ red: 999, green: 999, blue: 999 });
    expect(weftColor(twill, weft(3))).toEqual({ red: 0, green: 0, blue: 999 });
  });

  it('uses an inline base color when the table lacks its index', () => {
    const inline: Color = { red: 1, green: 2, blue: 3 };
    const doc: WifDocument = { header, warp: { threads: 1, color: { index: 9, fallback: inline } } };
    expect(warpColor(doc, warp(1))).toEqual(inline);
  });

  it('is undefined when nothing supplies a color', () => {
    expect(weftColor({ header, weft: { threads: 2 } }, weft(1))).toBeUndefined();
  });

  it('normalizes through the palette range', () => {
    expect(warpColorBytes(twill, warp(2))).toEqual([255, 0, 127]);
    expect(weftColorBytes(twill, weft(1))).toEqual([0, 0, 255]);
  });

  it('uses the fallback range only when the palette has none', () => {
    const doc: WifDocument = {
      header,
      warp: { threads: 1, color: { index: 1 } },
      colorTable: new Table<number, Color>([[1, { red: 255, green: 0, blue: 0 }]]),
    };
    expect(warpColorBytes(doc, warp(1), [0, 255])).toEqual([255, 0, 0]);
    expect(colorRange(doc)).toEqual([0, 999]);
    expect(colorRange(doc, [0, 255])).toEqual([0, 255]);
    expect(colorRange(twill, [0, 255])).toEqual([0, 999]);
  });
});

describe('normalizeColor', () => {
  it('truncates toward zero', () => {
    expect(normalizeColor({ red: 255, green: 0, blue: 510 }, [0, 510])).toEqual([127, 0, 255]);
  });

  it('saturates values outside the range', () => {
    expect(normalizeColor({ red: -10, green: 600, blue: 0 }, [0, 510])).toEqual([0, 255, 0]);
  });

  it('maps an empty range to zero', () => {
    expect(normalizeColor({ red: 5, green: 5, blue: 5 }, [5, 5])).toEqual([0, 0, 0]);
  });
});

describe('thread symbols', () => {
  const doc: WifDocument = {
    header,
    warp: { threads: 2, symbol: 'x' },
    warpSymbols: new Table<Warp, number>([[warp(1), 3]]),
    warpSymbolTable: new Table<number, string>([[3, '#35']]),
    weft: { threads: 1, symbol: "'" },
  };

  it('resolves a per-thread index through the symbol table', () => {
    expect(warpSymbol(doc, warp(1))).toEqual({ kind: 'code', char: '#' });
  });

  it('falls back to the axis symbol', () => {
    expect(warpSymbol(doc, warp(2))).toEqual({ kind: 'char', char: 'x' });
  });

  it('throws on malformed symbol text', () => {
    expect(() => weftSymbol(doc, weft(1))).toThrow(InvalidSymbolError);
  });

  it('is undefined when nothing supplies a symbol', () => {
    expect(weftSymbol(twill, weft(1))).toBeUndefined();
  });
});

describe('thickness and spacing', () => {
  const doc: WifDocument = {
    header,
    warp: { threads: 2, thickness: 2 },
    warpThickness: new Table<Warp, number>([[warp(1), 0.5]]),
    weft: { threads: 1 },
  };

  it('prefers the per-thread value over the axis default', () => {
    expect(warpThickness(doc, warp(1))).toBe(0.5);
    expect(warpThickness(doc, warp(2))).toBe(2);
  });

  it('is undefined when neither is given', () => {
    expect(warpSpacing(doc, warp(1))).toBeUndefined();
    expect(weftThickness(doc, weft(1))).toBeUndefined();
  });
});

describe('interlacement', () => {
  it('shows warp where a lifted shaft carries the warp thread', () => {
    expect(interlacement(twill, warp(1), weft(1))).toBe('warp');
    expect(interlacement(twill, warp(2), weft(1))).toBe('warp');
    expect(interlacement(twill, warp(4), weft(4))).toBe('warp');
  });

  it('shows weft otherwise', () => {
    expect(interlacement(twill, warp(3), weft(1))).toBe('weft');
    expect(interlacement(twill, warp(1), weft(2))).toBe('weft');
  });

  it('reads a missing row or threading entry as weft', () => {
    expect(interlacement(twill, warp(9), weft(1))).toBe('weft');
    expect(interlacement(twill, warp(1), weft(9))).toBe('weft');
  });

  it('is undefined without a liftplan or threading', () => {
    const liftplanOnly: WifDocument = { header, liftplan: new Table<Weft, IdSet<Shaft>>([[weft(1), new Set([shaft(1)])]]) };
    expect(interlacement(liftplanOnly, warp(1), weft(1))).toBeUndefined();
    expect(interlacement({ header }, warp(1), weft(1))).toBeUndefined();
  });
});
