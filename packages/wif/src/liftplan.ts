/**
 * Liftplan derivation.
 *
 * A draft can say which shafts rise on each weft row directly (LIFTPLAN) or
 * indirectly through the treadles pressed (TREADLING) and what each treadle
 * is tied to (TIEUP). When both forms are present they must agree.
 */

import type { WifDocument } from './types';
import type { IdSet, Shaft, Treadle, Weft } from './identifiers';
import { Table, setsEqual } from './identifiers';
import { LiftplanMismatchError } from './errors';

export function composeLiftplan(
  treadling: Table<Weft, IdSet<Treadle>>,
  tieup: Table<Treadle, IdSet<Shaft>>,
): Table<Weft, IdSet<Shaft>> {
  const liftplan = new Table<Weft, IdSet<Shaft>>();
  for (const [row, treadles] of treadling) {
    const shafts = new Set<Shaft>();
    for (const pressed of treadles) {
      for (const tied of tieup.get(pressed) ?? []) {
        shafts.add(tied);
      }
    }
    liftplan.set(row, shafts);
  }
  return liftplan;
}

/** First weft row on which two liftplans differ, or undefined when they agree. */
export function firstLiftplanDifference(
  a: Table<Weft, IdSet<Shaft>>,
  b: Table<Weft, IdSet<Shaft>>,
): Weft | undefined {
  const rows = new Set<Weft>([...a.keys(), ...b.keys()]);
  for (const row of [...rows].sort((x, y) => x - y)) {
    const left = a.get(row);
    const right = b.get(row);
    if (left === undefined || right === undefined || !setsEqual(left, right)) {
      return row;
    }
  }
  return undefined;
}

/**
 * Fill in a missing liftplan from treadling + tieup, or check a supplied one
 * against them. Returns the document unchanged when there is nothing to do.
 */
export function reconcileLiftplan(doc: WifDocument): WifDocument {
  if (!doc.treadling || !doc.tieup) {
    return doc;
  }

  const composed = composeLiftplan(doc.treadling, doc.tieup);
  if (!doc.liftplan) {
    return { ...doc, liftplan: composed };
  }

  const mismatch = firstLiftplanDifference(composed, doc.liftplan);
  if (mismatch !== undefined) {
    throw new LiftplanMismatchError(mismatch);
  }
  return doc;
}
