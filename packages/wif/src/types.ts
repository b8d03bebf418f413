/**
 * WIF (Weaving Information File) data model.
 *
 * A document is one mandatory header plus independently optional sections.
 * Record sections are plain objects; keyed sections are Tables whose keys
 * are branded loom identifiers.
 */

import type { CalendarDate } from './date';
import type { IdSet, Shaft, Table, Treadle, Warp, Weft } from './identifiers';

// ============================================================================
// Values
// ============================================================================

export interface Color {
  red: number;
  green: number;
  blue: number;
}

/** Inclusive channel bounds declared by the COLOR PALETTE section. */
export type ColorRange = [low: number, high: number];

export const DEFAULT_COLOR_RANGE: Readonly<ColorRange> = [0, 999];

export interface BaseColor {
  /** Index into the COLOR TABLE. */
  index: number;
  /** Inline RGB written after the index, used when the table has no entry. */
  fallback?: Color;
}

/**
 * A display symbol. `quoted` and `code` record how the character was
 * written (`'x`, `#120`) so it is written back the same way.
 */
export type WifSymbol =
  | { kind: 'char'; char: string }
  | { kind: 'quoted'; char: string }
  | { kind: 'code'; char: string };

export type Interlacement = 'warp' | 'weft';

// ============================================================================
// Record sections
// ============================================================================

export interface WifHeader {
  version: string;
  date: CalendarDate;
  developers: string;
  sourceProgram: string;
  sourceVersion?: string;
}

export interface ColorPalette {
  entries: number;
  range: ColorRange;
}

export interface SymbolPalette {
  entries: number;
}

export interface TextInfo {
  title?: string;
  author?: string;
  address?: string;
  email?: string;
  telephone?: string;
  fax?: string;
}

export interface Weaving {
  shafts: number;
  treadles: number;
  risingShed?: boolean;
}

/** Defaults shared by every thread on one axis (the WARP and WEFT sections). */
export interface ThreadAxis {
  threads: number;
  color?: BaseColor;
  symbol?: string;
  symbolNumber?: number;
  units?: string;
  spacing?: number;
  thickness?: number;
  spacingZoom?: number;
  thicknessZoom?: number;
}

// ============================================================================
// Document
// ============================================================================

export interface WifDocument {
  header: WifHeader;
  colorPalette?: ColorPalette;
  warpSymbolPalette?: SymbolPalette;
  weftSymbolPalette?: SymbolPalette;
  text?: TextInfo;
  weaving?: Weaving;
  warp?: ThreadAxis;
  weft?: ThreadAxis;
  colorTable?: Table<number, Color>;
  notes?: Table<number, string>;
  tieup?: Table<Treadle, IdSet<Shaft>>;
  warpSymbolTable?: Table<number, string>;
  weftSymbolTable?: Table<number, string>;
  threading?: Table<Warp, IdSet<Shaft>>;
  warpThickness?: Table<Warp, number>;
  warpThicknessZoom?: Table<Warp, number>;
  warpSpacing?: Table<Warp, number>;
  warpSpacingZoom?: Table<Warp, number>;
  warpColors?: Table<Warp, number>;
  warpSymbols?: Table<Warp, number>;
  treadling?: Table<Weft, IdSet<Treadle>>;
  liftplan?: Table<Weft, IdSet<Shaft>>;
  weftThickness?: Table<Weft, number>;
  weftThicknessZoom?: Table<Weft, number>;
  weftSpacing?: Table<Weft, number>;
  weftSpacingZoom?: Table<Weft, number>;
  weftColors?: Table<Weft, number>;
  weftSymbols?: Table<Weft, number>;
}
