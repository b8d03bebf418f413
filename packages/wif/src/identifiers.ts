/**
 * Loom identifiers and keyed tables.
 *
 * Shafts, warp threads, weft threads and treadles are all small non-negative
 * integers in the file, but tables are keyed by one kind and valued by
 * another. Each kind is a distinct branded number so that a Shaft can never
 * be passed where a Treadle is expected.
 */

declare const brand: unique symbol;

type Branded<Kind extends string> = number & { readonly [brand]: Kind };

export type Shaft = Branded<'Shaft'>;
export type Warp = Branded<'Warp'>;
export type Weft = Branded<'Weft'>;
export type Treadle = Branded<'Treadle'>;

export type LoomId = Shaft | Warp | Weft | Treadle;

/** Largest value an identifier or table index may take. */
export const MAX_INDEX = 0xffff_ffff;

export function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_INDEX;
}

function isIndexOf<K extends LoomId>(value: number): value is K {
  return isIndex(value);
}

function outOfRange(kind: string, value: number): RangeError {
  return new RangeError(`${kind} index must be an integer in 0..${MAX_INDEX}, got ${value}`);
}

export function shaft(value: number): Shaft {
  if (isIndexOf<Shaft>(value)) return value;
  throw outOfRange('Shaft', value);
}

export function warp(value: number): Warp {
  if (isIndexOf<Warp>(value)) return value;
  throw outOfRange('Warp', value);
}

export function weft(value: number): Weft {
  if (isIndexOf<Weft>(value)) return value;
  throw outOfRange('Weft', value);
}

export function treadle(value: number): Treadle {
  if (isIndexOf<Treadle>(value)) return value;
  throw outOfRange('Treadle', value);
}

// ============================================================================
// Table
// ============================================================================

/**
 * A map keyed by integer identifiers that always iterates in ascending key
 * order, whatever order entries were inserted in. Serialization walks tables
 * through this order, so output is deterministic.
 */
export class Table<K extends number, V> implements Iterable<[K, V]> {
  private readonly entriesByKey = new Map<K, V>();

  constructor(entries?: Iterable<readonly [K, V]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(key);
  }

  has(key: K): boolean {
    return this.entriesByKey.has(key);
  }

  set(key: K, value: V): this {
    this.entriesByKey.set(key, value);
    return this;
  }

  delete(key: K): boolean {
    return this.entriesByKey.delete(key);
  }

  /** Keys in ascending order. */
  keys(): K[] {
    return [...this.entriesByKey.keys()].sort((a, b) => a - b);
  }

  entries(): Array<[K, V]> {
    const result: Array<[K, V]> = [];
    for (const key of this.keys()) {
      const value = this.entriesByKey.get(key);
      if (value !== undefined) {
        result.push([key, value]);
      }
    }
    return result;
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return this.entries()[Symbol.iterator]();
  }
}

// ============================================================================
// Identifier sets
// ============================================================================

export type IdSet<K extends number> = ReadonlySet<K>;

/** Members of a set in ascending order. */
export function sortedMembers<K extends number>(set: IdSet<K>): K[] {
  return [...set].sort((a, b) => a - b);
}

export function setsEqual<K extends number>(a: IdSet<K>, b: IdSet<K>): boolean {
  if (a.size !== b.size) return false;
  for (const member of a) {
    if (!b.has(member)) return false;
  }
  return true;
}

export function intersects<K extends number>(a: IdSet<K>, b: IdSet<K>): boolean {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const member of small) {
    if (large.has(member)) return true;
  }
  return false;
}
