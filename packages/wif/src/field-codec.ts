/**
 * Field codecs: conversion between a single WIF value and its text form.
 *
 * Decoding is permissive (case-insensitive booleans, trimmed color parts);
 * encoding is canonical. `encode` returns undefined when there is nothing
 * to write, which the section writers use to omit a key entirely.
 */

import type { BaseColor, Color, WifSymbol } from './types';
import type { CalendarDate } from './date';
import { formatCalendarDate, parseCalendarDate } from './date';
import type { IdSet } from './identifiers';
import { MAX_INDEX, shaft, sortedMembers, treadle, warp, weft } from './identifiers';
import type { Shaft, Treadle, Warp, Weft } from './identifiers';
import {
  ColorPartsError,
  ExpectedBooleanError,
  ExpectedPairError,
  InvalidFloatError,
  InvalidIntegerError,
  InvalidSymbolError,
} from './errors';

export interface FieldCodec<T> {
  decode(raw: string): T;
  encode(value: T): string | undefined;
}

// ============================================================================
// Scalars
// ============================================================================

const INTEGER_RE = /^\+?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseIndex(raw: string): number {
  if (!INTEGER_RE.test(raw)) {
    throw new InvalidIntegerError(raw);
  }
  const value = Number(raw);
  if (value > MAX_INDEX) {
    throw new InvalidIntegerError(raw);
  }
  return value;
}

export const integer: FieldCodec<number> = {
  decode: parseIndex,
  encode: value => String(value),
};

export const float: FieldCodec<number> = {
  decode(raw) {
    if (!FLOAT_RE.test(raw)) {
      throw new InvalidFloatError(raw);
    }
    return Number(raw);
  },
  encode: value => String(value),
};

export const text: FieldCodec<string> = {
  decode: raw => raw,
  encode: value => value,
};

const TRUE_WORDS = new Set(['true', 'on', 'yes', '1']);
const FALSE_WORDS = new Set(['false', 'off', 'no', '0']);

export const bool: FieldCodec<boolean> = {
  decode(raw) {
    const word = raw.toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    throw new ExpectedBooleanError(raw);
  },
  encode: value => (value ? 'true' : 'false'),
};

export const date: FieldCodec<CalendarDate> = {
  decode: parseCalendarDate,
  encode: formatCalendarDate,
};

// ============================================================================
// Identifiers
// ============================================================================

function idCodec<K extends number>(make: (value: number) => K): FieldCodec<K> {
  return {
    decode: raw => make(parseIndex(raw)),
    encode: value => String(value),
  };
}

export const shaftId = idCodec<Shaft>(shaft);
export const warpId = idCodec<Warp>(warp);
export const weftId = idCodec<Weft>(weft);
export const treadleId = idCodec<Treadle>(treadle);

// ============================================================================
// Composites
// ============================================================================

/** Two values split on the first comma: `10,20`. */
export function pair<T>(inner: FieldCodec<T>): FieldCodec<[T, T]> {
  return {
    decode(raw) {
      const comma = raw.indexOf(',');
      if (comma === -1) {
        throw new ExpectedPairError(raw);
      }
      return [inner.decode(raw.slice(0, comma)), inner.decode(raw.slice(comma + 1))];
    },
    encode([first, second]) {
      const a = inner.encode(first);
      const b = inner.encode(second);
      if (a === undefined || b === undefined) return undefined;
      return `${a},${b}`;
    },
  };
}

function encodeAll<T>(inner: FieldCodec<T>, values: readonly T[]): string | undefined {
  const parts: string[] = [];
  for (const value of values) {
    const encoded = inner.encode(value);
    if (encoded === undefined) return undefined;
    parts.push(encoded);
  }
  return parts.join(',');
}

/**
 * Comma-separated values in their written order. Part of the public codec
 * set; no built-in section uses it today.
 */
export function list<T>(inner: FieldCodec<T>): FieldCodec<T[]> {
  return {
    decode: raw => raw.split(',').map(part => inner.decode(part)),
    encode: values => encodeAll(inner, values),
  };
}

/** Comma-separated identifiers, deduplicated and written in ascending order. */
export function idSet<K extends number>(inner: FieldCodec<K>): FieldCodec<IdSet<K>> {
  return {
    decode: raw => new Set(raw.split(',').map(part => inner.decode(part))),
    encode: values => encodeAll(inner, sortedMembers(values)),
  };
}

// ============================================================================
// Domain values
// ============================================================================

export const color: FieldCodec<Color> = {
  decode(raw) {
    const parts = raw.split(',').map(part => parseIndex(part.trim()));
    if (parts.length !== 3) {
      throw new ColorPartsError(raw);
    }
    const [red, green, blue] = parts;
    return { red, green, blue };
  },
  encode: value => `${value.red},${value.green},${value.blue}`,
};

/**
 * The WARP/WEFT `Color` field: a color table index, optionally followed by
 * an inline RGB triple (`3` or `3,999,0,0`).
 */
export const baseColor: FieldCodec<BaseColor> = {
  decode(raw) {
    const comma = raw.indexOf(',');
    if (comma === -1) {
      return { index: parseIndex(raw.trim()) };
    }
    return {
      index: parseIndex(raw.slice(0, comma).trim()),
      fallback: color.decode(raw.slice(comma + 1)),
    };
  },
  encode(value) {
    if (value.fallback === undefined) return String(value.index);
    return `${value.index},${color.encode(value.fallback)}`;
  },
};

const MAX_CODE_POINT = 0x10ffff;

function firstChar(raw: string, from: number): string | undefined {
  const codePoint = raw.codePointAt(from);
  return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
}

export const symbol: FieldCodec<WifSymbol> = {
  decode(raw) {
    if (raw.startsWith("'")) {
      const char = firstChar(raw, 1);
      if (char === undefined) {
        throw new InvalidSymbolError(raw, 'quote is not followed by a character');
      }
      return { kind: 'quoted', char };
    }
    if (raw.startsWith('#')) {
      const code = parseIndex(raw.slice(1));
      if (code > MAX_CODE_POINT || (code >= 0xd800 && code <= 0xdfff)) {
        throw new InvalidSymbolError(raw, `${code} is not a Unicode scalar value`);
      }
      return { kind: 'code', char: String.fromCodePoint(code) };
    }
    const char = firstChar(raw, 0);
    if (char === undefined) {
      throw new InvalidSymbolError(raw, 'symbol is empty');
    }
    return { kind: 'char', char };
  },
  encode(value) {
    switch (value.kind) {
      case 'char':
        return value.char;
      case 'quoted':
        return `'${value.char}`;
      case 'code':
        return `#${value.char.codePointAt(0) ?? 0}`;
    }
  },
};
