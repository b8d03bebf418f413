/**
 * Read-only queries over an assembled WifDocument.
 */

import type {
  BaseColor,
  Color,
  ColorRange,
  Interlacement,
  ThreadAxis,
  WifDocument,
  WifSymbol,
} from './types';
import { DEFAULT_COLOR_RANGE } from './types';
import type { Table, Warp, Weft } from './identifiers';
import { intersects } from './identifiers';
import { symbol } from './field-codec';

// ============================================================================
// Geometry
// ============================================================================

export function shaftCount(doc: WifDocument): number | undefined {
  return doc.weaving?.shafts;
}

export function treadleCount(doc: WifDocument): number | undefined {
  return doc.weaving?.treadles;
}

export function warpCount(doc: WifDocument): number | undefined {
  return doc.warp?.threads;
}

export function weftCount(doc: WifDocument): number | undefined {
  return doc.weft?.threads;
}

// ============================================================================
// Colors
// ============================================================================

function colorAt(doc: WifDocument, index: number): Color | undefined {
  return doc.colorTable?.get(index);
}

function axisColor(doc: WifDocument, base: BaseColor | undefined): Color | undefined {
  if (!base) return undefined;
  return colorAt(doc, base.index) ?? base.fallback;
}

function threadColor<K extends number>(
  doc: WifDocument,
  perThread: Table<K, number> | undefined,
  axis: ThreadAxis | undefined,
  thread: K,
): Color | undefined {
  const index = perThread?.get(thread);
  const resolved = index === undefined ? undefined : colorAt(doc, index);
  return resolved ?? axisColor(doc, axis?.color);
}

/**
 * Color of one warp thread: its WARP COLORS entry resolved through the
 * COLOR TABLE, else the WARP section's base color.
 */
export function warpColor(doc: WifDocument, thread: Warp): Color | undefined {
  return threadColor(doc, doc.warpColors, doc.warp, thread);
}

export function weftColor(doc: WifDocument, thread: Weft): Color | undefined {
  return threadColor(doc, doc.weftColors, doc.weft, thread);
}

/** The palette's declared range, else `fallback`, else 0..999. */
export function colorRange(doc: WifDocument, fallback?: Readonly<ColorRange>): ColorRange {
  const [low, high] = doc.colorPalette?.range ?? fallback ?? DEFAULT_COLOR_RANGE;
  return [low, high];
}

function toByte(value: number, [low, high]: Readonly<ColorRange>): number {
  const scaled = Math.trunc(((value - low) / (high - low)) * 255);
  if (Number.isNaN(scaled)) return 0;
  return Math.min(255, Math.max(0, scaled));
}

/** Scale a color from `range` to 0..255, truncating and saturating each channel. */
export function normalizeColor(color: Color, range: Readonly<ColorRange>): [number, number, number] {
  return [toByte(color.red, range), toByte(color.green, range), toByte(color.blue, range)];
}

export function warpColorBytes(
  doc: WifDocument,
  thread: Warp,
  fallbackRange?: Readonly<ColorRange>,
): [number, number, number] | undefined {
  const color = warpColor(doc, thread);
  return color && normalizeColor(color, colorRange(doc, fallbackRange));
}

export function weftColorBytes(
  doc: WifDocument,
  thread: Weft,
  fallbackRange?: Readonly<ColorRange>,
): [number, number, number] | undefined {
  const color = weftColor(doc, thread);
  return color && normalizeColor(color, colorRange(doc, fallbackRange));
}

// ============================================================================
// Symbols
// ============================================================================

function threadSymbol<K extends number>(
  perThread: Table<K, number> | undefined,
  symbolTable: Table<number, string> | undefined,
  axis: ThreadAxis | undefined,
  thread: K,
): WifSymbol | undefined {
  const index = perThread?.get(thread);
  const raw = (index === undefined ? undefined : symbolTable?.get(index)) ?? axis?.symbol;
  return raw === undefined ? undefined : symbol.decode(raw);
}

/**
 * Display symbol of one warp thread: WARP SYMBOLS → WARP SYMBOL TABLE, else
 * the WARP section's Symbol. Throws InvalidSymbolError on malformed text.
 */
export function warpSymbol(doc: WifDocument, thread: Warp): WifSymbol | undefined {
  return threadSymbol(doc.warpSymbols, doc.warpSymbolTable, doc.warp, thread);
}

export function weftSymbol(doc: WifDocument, thread: Weft): WifSymbol | undefined {
  return threadSymbol(doc.weftSymbols, doc.weftSymbolTable, doc.weft, thread);
}

// ============================================================================
// Thickness and spacing
// ============================================================================

export function warpThickness(doc: WifDocument, thread: Warp): number | undefined {
  return doc.warpThickness?.get(thread) ?? doc.warp?.thickness;
}

export function weftThickness(doc: WifDocument, thread: Weft): number | undefined {
  return doc.weftThickness?.get(thread) ?? doc.weft?.thickness;
}

export function warpSpacing(doc: WifDocument, thread: Warp): number | undefined {
  return doc.warpSpacing?.get(thread) ?? doc.warp?.spacing;
}

export function weftSpacing(doc: WifDocument, thread: Weft): number | undefined {
  return doc.weftSpacing?.get(thread) ?? doc.weft?.spacing;
}

// ============================================================================
// Interlacement
// ============================================================================

/**
 * Which thread shows on top where `warpThread` crosses `weftThread`.
 *
 * Warp shows when any shaft lifted on that weft row carries the warp thread.
 * A row with no liftplan entry, or a warp with no threading entry, reads as
 * weft. Undefined when the document has no liftplan or no threading at all.
 */
export function interlacement(doc: WifDocument, warpThread: Warp, weftThread: Weft): Interlacement | undefined {
  if (!doc.liftplan || !doc.threading) return undefined;

  const lifted = doc.liftplan.get(weftThread);
  // TODO: a sinking-shed loom (Rising Shed=false) may need the opposite default here
  if (!lifted) return 'weft';

  const threaded = doc.threading.get(warpThread);
  if (!threaded) return 'weft';

  return intersects(lifted, threaded) ? 'warp' : 'weft';
}
