/**
 * Section names and the codec for every WIF section.
 */

import type {
  ColorPalette,
  SymbolPalette,
  TextInfo,
  ThreadAxis,
  Weaving,
  WifHeader,
} from './types';
import {
  baseColor,
  bool,
  color,
  date,
  float,
  idSet,
  integer,
  pair,
  shaftId,
  text,
  treadleId,
  warpId,
  weftId,
} from './field-codec';
import { field, recordSection } from './section-codec';
import { tableSection } from './table-codec';

export const SECTION = {
  WIF: 'WIF',
  CONTENTS: 'CONTENTS',
  COLOR_PALETTE: 'COLOR PALETTE',
  WARP_SYMBOL_PALETTE: 'WARP SYMBOL PALETTE',
  WEFT_SYMBOL_PALETTE: 'WEFT SYMBOL PALETTE',
  TEXT: 'TEXT',
  WEAVING: 'WEAVING',
  WARP: 'WARP',
  WEFT: 'WEFT',
  COLOR_TABLE: 'COLOR TABLE',
  NOTES: 'NOTES',
  TIEUP: 'TIEUP',
  WARP_SYMBOL_TABLE: 'WARP SYMBOL TABLE',
  WEFT_SYMBOL_TABLE: 'WEFT SYMBOL TABLE',
  THREADING: 'THREADING',
  WARP_THICKNESS: 'WARP THICKNESS',
  WARP_THICKNESS_ZOOM: 'WARP THICKNESS ZOOM',
  WARP_SPACING: 'WARP SPACING',
  WARP_SPACING_ZOOM: 'WARP SPACING ZOOM',
  WARP_COLORS: 'WARP COLORS',
  WARP_SYMBOLS: 'WARP SYMBOLS',
  TREADLING: 'TREADLING',
  LIFTPLAN: 'LIFTPLAN',
  WEFT_THICKNESS: 'WEFT THICKNESS',
  WEFT_THICKNESS_ZOOM: 'WEFT THICKNESS ZOOM',
  WEFT_SPACING: 'WEFT SPACING',
  WEFT_SPACING_ZOOM: 'WEFT SPACING ZOOM',
  WEFT_COLORS: 'WEFT COLORS',
  WEFT_SYMBOLS: 'WEFT SYMBOLS',
} as const;

export type SectionName = (typeof SECTION)[keyof typeof SECTION];

// ============================================================================
// Record sections
// ============================================================================

export const headerSection = recordSection<WifHeader>({
  name: SECTION.WIF,
  read: f => ({
    version: f.required('Version', text),
    date: f.required('Date', date),
    developers: f.required('Developers', text),
    sourceProgram: f.required('Source Program', text),
    sourceVersion: f.optional('Source Version', text),
  }),
  fields: v => [
    field('Version', text, v.version),
    field('Date', date, v.date),
    field('Developers', text, v.developers),
    field('Source Program', text, v.sourceProgram),
    field('Source Version', text, v.sourceVersion),
  ],
});

export const colorPaletteSection = recordSection<ColorPalette>({
  name: SECTION.COLOR_PALETTE,
  read: f => ({
    entries: f.required('Entries', integer),
    range: f.required('Range', pair(integer)),
  }),
  fields: v => [field('Entries', integer, v.entries), field('Range', pair(integer), v.range)],
});

function symbolPaletteSection(name: string) {
  return recordSection<SymbolPalette>({
    name,
    read: f => ({ entries: f.required('Entries', integer) }),
    fields: v => [field('Entries', integer, v.entries)],
  });
}

export const warpSymbolPaletteSection = symbolPaletteSection(SECTION.WARP_SYMBOL_PALETTE);
export const weftSymbolPaletteSection = symbolPaletteSection(SECTION.WEFT_SYMBOL_PALETTE);

export const textSection = recordSection<TextInfo>({
  name: SECTION.TEXT,
  read: f => ({
    title: f.optional('Title', text),
    author: f.optional('Author', text),
    address: f.optional('Address', text),
    email: f.optional('EMail', text),
    telephone: f.optional('Telephone', text),
    fax: f.optional('Fax', text),
  }),
  fields: v => [
    field('Title', text, v.title),
    field('Author', text, v.author),
    field('Address', text, v.address),
    field('EMail', text, v.email),
    field('Telephone', text, v.telephone),
    field('Fax', text, v.fax),
  ],
});

export const weavingSection = recordSection<Weaving>({
  name: SECTION.WEAVING,
  read: f => ({
    shafts: f.required('Shafts', integer),
    treadles: f.required('Treadles', integer),
    risingShed: f.optional('Rising Shed', bool),
  }),
  fields: v => [
    field('Shafts', integer, v.shafts),
    field('Treadles', integer, v.treadles),
    field('Rising Shed', bool, v.risingShed),
  ],
});

function threadAxisSection(name: string) {
  return recordSection<ThreadAxis>({
    name,
    read: f => ({
      threads: f.required('Threads', integer),
      color: f.optional('Color', baseColor),
      symbol: f.optional('Symbol', text),
      symbolNumber: f.optional('Symbol Number', integer),
      units: f.optional('Units', text),
      spacing: f.optional('Spacing', float),
      thickness: f.optional('Thickness', float),
      spacingZoom: f.optional('Spacing Zoom', integer),
      thicknessZoom: f.optional('Thickness Zoom', integer),
    }),
    fields: v => [
      field('Threads', integer, v.threads),
      field('Color', baseColor, v.color),
      field('Symbol', text, v.symbol),
      field('Symbol Number', integer, v.symbolNumber),
      field('Units', text, v.units),
      field('Spacing', float, v.spacing),
      field('Thickness', float, v.thickness),
      field('Spacing Zoom', integer, v.spacingZoom),
      field('Thickness Zoom', integer, v.thicknessZoom),
    ],
  });
}

export const warpSection = threadAxisSection(SECTION.WARP);
export const weftSection = threadAxisSection(SECTION.WEFT);

// ============================================================================
// Table sections
// ============================================================================

export const colorTableSection = tableSection({ name: SECTION.COLOR_TABLE, key: integer, value: color });
export const notesSection = tableSection({ name: SECTION.NOTES, key: integer, value: text });
export const warpSymbolTableSection = tableSection({ name: SECTION.WARP_SYMBOL_TABLE, key: integer, value: text });
export const weftSymbolTableSection = tableSection({ name: SECTION.WEFT_SYMBOL_TABLE, key: integer, value: text });

export const tieupSection = tableSection({ name: SECTION.TIEUP, key: treadleId, value: idSet(shaftId) });
export const threadingSection = tableSection({ name: SECTION.THREADING, key: warpId, value: idSet(shaftId) });
export const treadlingSection = tableSection({ name: SECTION.TREADLING, key: weftId, value: idSet(treadleId) });
export const liftplanSection = tableSection({ name: SECTION.LIFTPLAN, key: weftId, value: idSet(shaftId) });

export const warpThicknessSection = tableSection({ name: SECTION.WARP_THICKNESS, key: warpId, value: float });
export const warpThicknessZoomSection = tableSection({ name: SECTION.WARP_THICKNESS_ZOOM, key: warpId, value: integer });
export const warpSpacingSection = tableSection({ name: SECTION.WARP_SPACING, key: warpId, value: float });
export const warpSpacingZoomSection = tableSection({ name: SECTION.WARP_SPACING_ZOOM, key: warpId, value: integer });
export const warpColorsSection = tableSection({ name: SECTION.WARP_COLORS, key: warpId, value: integer });
export const warpSymbolsSection = tableSection({ name: SECTION.WARP_SYMBOLS, key: warpId, value: integer });

export const weftThicknessSection = tableSection({ name: SECTION.WEFT_THICKNESS, key: weftId, value: float });
export const weftThicknessZoomSection = tableSection({ name: SECTION.WEFT_THICKNESS_ZOOM, key: weftId, value: integer });
export const weftSpacingSection = tableSection({ name: SECTION.WEFT_SPACING, key: weftId, value: float });
export const weftSpacingZoomSection = tableSection({ name: SECTION.WEFT_SPACING_ZOOM, key: weftId, value: integer });
export const weftColorsSection = tableSection({ name: SECTION.WEFT_COLORS, key: weftId, value: integer });
export const weftSymbolsSection = tableSection({ name: SECTION.WEFT_SYMBOLS, key: weftId, value: integer });
