export { parseWif, formatWif, writeWif, isSectionListed, presentSections, OPTIONAL_SECTIONS } from './document';
export { composeLiftplan, reconcileLiftplan, firstLiftplanDifference } from './liftplan';
export {
  shaftCount,
  treadleCount,
  warpCount,
  weftCount,
  warpColor,
  weftColor,
  warpColorBytes,
  weftColorBytes,
  colorRange,
  normalizeColor,
  warpSymbol,
  weftSymbol,
  warpThickness,
  weftThickness,
  warpSpacing,
  weftSpacing,
  interlacement,
} from './queries';
export { parseIni, formatIni, IniMap } from './ini';
export type { IniEntry, IniSection, IniSectionMap } from './ini';
export { parseCalendarDate, formatCalendarDate, daysInMonth } from './date';
export type { CalendarDate } from './date';
export * as codecs from './field-codec';
export type { FieldCodec } from './field-codec';
export { FieldReader, field, recordSection } from './section-codec';
export type { SectionCodec, RecordSectionSpec, FieldValue } from './section-codec';
export { readTable, writeTable, tableSection } from './table-codec';
export type { TableSectionSpec } from './table-codec';
export * from './sections';
export * from './identifiers';
export * from './types';
export * from './errors';
