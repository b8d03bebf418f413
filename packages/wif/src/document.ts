/**
 * WIF document assembly: text to WifDocument and back.
 *
 * Reading consults [CONTENTS] before touching any optional section; a
 * section that is not flagged true is never read, even if its lines exist.
 * Writing first works out every section that will be emitted, derives
 * [CONTENTS] from that list, then writes the bodies.
 */

import type { Writable } from 'node:stream';
import type { WifDocument } from './types';
import type { IniMap, IniSection } from './ini';
import type { SectionCodec } from './section-codec';
import { formatIni, parseIni } from './ini';
import { bool } from './field-codec';
import { withFieldContext } from './errors';
import { reconcileLiftplan } from './liftplan';
import {
  SECTION,
  colorPaletteSection,
  colorTableSection,
  headerSection,
  liftplanSection,
  notesSection,
  textSection,
  threadingSection,
  tieupSection,
  treadlingSection,
  warpColorsSection,
  warpSection,
  warpSpacingSection,
  warpSpacingZoomSection,
  warpSymbolPaletteSection,
  warpSymbolTableSection,
  warpSymbolsSection,
  warpThicknessSection,
  warpThicknessZoomSection,
  weavingSection,
  weftColorsSection,
  weftSection,
  weftSpacingSection,
  weftSpacingZoomSection,
  weftSymbolPaletteSection,
  weftSymbolTableSection,
  weftSymbolsSection,
  weftThicknessSection,
  weftThicknessZoomSection,
} from './sections';

// ============================================================================
// Reading
// ============================================================================

/** Whether [CONTENTS] flags `name` as present. Absent or false means no. */
export function isSectionListed(ini: IniMap, name: string): boolean {
  const raw = ini.get(SECTION.CONTENTS, name);
  if (raw === undefined) return false;
  return withFieldContext(SECTION.CONTENTS, name, () => bool.decode(raw));
}

function readListed<T>(ini: IniMap, codec: SectionCodec<T>): T | undefined {
  return isSectionListed(ini, codec.name) ? codec.read(ini) : undefined;
}

export function parseWif(input: string): WifDocument {
  const ini = parseIni(input);

  const doc: WifDocument = {
    header: headerSection.read(ini),
    colorPalette: readListed(ini, colorPaletteSection),
    warpSymbolPalette: readListed(ini, warpSymbolPaletteSection),
    weftSymbolPalette: readListed(ini, weftSymbolPaletteSection),
    text: readListed(ini, textSection),
    weaving: readListed(ini, weavingSection),
    warp: readListed(ini, warpSection),
    weft: readListed(ini, weftSection),
    colorTable: readListed(ini, colorTableSection),
    notes: readListed(ini, notesSection),
    tieup: readListed(ini, tieupSection),
    warpSymbolTable: readListed(ini, warpSymbolTableSection),
    weftSymbolTable: readListed(ini, weftSymbolTableSection),
    threading: readListed(ini, threadingSection),
    warpThickness: readListed(ini, warpThicknessSection),
    warpThicknessZoom: readListed(ini, warpThicknessZoomSection),
    warpSpacing: readListed(ini, warpSpacingSection),
    warpSpacingZoom: readListed(ini, warpSpacingZoomSection),
    warpColors: readListed(ini, warpColorsSection),
    warpSymbols: readListed(ini, warpSymbolsSection),
    treadling: readListed(ini, treadlingSection),
    liftplan: readListed(ini, liftplanSection),
    weftThickness: readListed(ini, weftThicknessSection),
    weftThicknessZoom: readListed(ini, weftThicknessZoomSection),
    weftSpacing: readListed(ini, weftSpacingSection),
    weftSpacingZoom: readListed(ini, weftSpacingZoomSection),
    weftColors: readListed(ini, weftColorsSection),
    weftSymbols: readListed(ini, weftSymbolsSection),
  };

  return reconcileLiftplan(doc);
}

// ============================================================================
// Writing
// ============================================================================

interface OptionalSection {
  readonly name: string;
  /** The section body, or undefined when the document does not carry it. */
  render(doc: WifDocument): IniSection | undefined;
}

function optional<T>(
  codec: SectionCodec<T>,
  get: (doc: WifDocument) => T | undefined,
): OptionalSection {
  return {
    name: codec.name,
    render(doc) {
      const value = get(doc);
      return value === undefined ? undefined : { name: codec.name, entries: codec.write(value) };
    },
  };
}

/** Every optional section, in the order they are written. */
export const OPTIONAL_SECTIONS: readonly OptionalSection[] = [
  optional(colorPaletteSection, d => d.colorPalette),
  optional(warpSymbolPaletteSection, d => d.warpSymbolPalette),
  optional(weftSymbolPaletteSection, d => d.weftSymbolPalette),
  optional(textSection, d => d.text),
  optional(weavingSection, d => d.weaving),
  optional(warpSection, d => d.warp),
  optional(weftSection, d => d.weft),
  optional(colorTableSection, d => d.colorTable),
  optional(notesSection, d => d.notes),
  optional(tieupSection, d => d.tieup),
  optional(warpSymbolTableSection, d => d.warpSymbolTable),
  optional(weftSymbolTableSection, d => d.weftSymbolTable),
  optional(threadingSection, d => d.threading),
  optional(warpThicknessSection, d => d.warpThickness),
  optional(warpThicknessZoomSection, d => d.warpThicknessZoom),
  optional(warpSpacingSection, d => d.warpSpacing),
  optional(warpSpacingZoomSection, d => d.warpSpacingZoom),
  optional(warpColorsSection, d => d.warpColors),
  optional(warpSymbolsSection, d => d.warpSymbols),
  optional(weftThicknessSection, d => d.weftThickness),
  optional(weftThicknessZoomSection, d => d.weftThicknessZoom),
  optional(weftSpacingSection, d => d.weftSpacing),
  optional(weftSpacingZoomSection, d => d.weftSpacingZoom),
  optional(weftColorsSection, d => d.weftColors),
  optional(weftSymbolsSection, d => d.weftSymbols),
  optional(treadlingSection, d => d.treadling),
  optional(liftplanSection, d => d.liftplan),
];

/** Names of the optional sections `doc` carries, in write order. */
export function presentSections(doc: WifDocument): string[] {
  return OPTIONAL_SECTIONS.filter(section => section.render(doc) !== undefined).map(section => section.name);
}

export function formatWif(doc: WifDocument): string {
  const bodies: IniSection[] = [];
  for (const section of OPTIONAL_SECTIONS) {
    const body = section.render(doc);
    if (body) bodies.push(body);
  }

  const contents: IniSection = {
    name: SECTION.CONTENTS,
    entries: bodies.map(body => [body.name, 'true']),
  };

  const header: IniSection = { name: SECTION.WIF, entries: headerSection.write(doc.header) };
  return formatIni([header, contents, ...bodies]);
}

/**
 * Write the canonical text of `doc` to `output`. Rejects only on stream errors.
 *
 * A failed write reaches both the write callback and the stream's 'error'
 * event, which fires after the callback. The listener stays attached on
 * failure so that event is handled here rather than thrown.
 */
export function writeWif(doc: WifDocument, output: Writable): Promise<void> {
  const textOut = formatWif(doc);
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => reject(err);
    output.once('error', onError);
    output.write(textOut, err => {
      if (err) {
        reject(err);
        return;
      }
      output.off('error', onError);
      resolve();
    });
  });
}
