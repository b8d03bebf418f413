/**
 * draft info <file>
 *
 * Summarizes a draft: who made it, the loom it needs, thread counts and
 * which sections it carries.
 */

import {
  SECTION,
  colorRange,
  formatCalendarDate,
  isSectionListed,
  parseIni,
  presentSections,
  shaftCount,
  treadleCount,
  warpCount,
  weftCount,
} from '@drafthouse/wif';
import type { ColorRange, WifDocument } from '@drafthouse/wif';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { loadDraft, requireFile } from '../draft';

export type LiftplanSource = 'supplied' | 'derived' | 'absent';

export interface DraftSummary {
  file: string;
  title?: string;
  author?: string;
  version: string;
  sourceProgram: string;
  sourceVersion?: string;
  date: string;
  shafts?: number;
  treadles?: number;
  warps?: number;
  wefts?: number;
  colors: number;
  colorRange: ColorRange;
  liftplan: LiftplanSource;
  sections: string[];
}

/** Whether the liftplan came from the file or was composed from treadling and tieup. */
export function liftplanSource(text: string, doc: WifDocument): LiftplanSource {
  if (!doc.liftplan) return 'absent';
  return isSectionListed(parseIni(text), SECTION.LIFTPLAN) ? 'supplied' : 'derived';
}

export function summarizeDraft(
  file: string,
  text: string,
  doc: WifDocument,
  fallbackRange: Readonly<ColorRange>
): DraftSummary {
  return {
    file,
    title: doc.text?.title,
    author: doc.text?.author,
    version: doc.header.version,
    sourceProgram: doc.header.sourceProgram,
    sourceVersion: doc.header.sourceVersion,
    date: formatCalendarDate(doc.header.date),
    shafts: shaftCount(doc),
    treadles: treadleCount(doc),
    warps: warpCount(doc),
    wefts: weftCount(doc),
    colors: doc.colorTable?.size ?? 0,
    colorRange: colorRange(doc, fallbackRange),
    liftplan: liftplanSource(text, doc),
    sections: presentSections(doc),
  };
}

function line(label: string, value: string): void {
  console.log(`  ${label.padEnd(13)}${value}`);
}

function orUnknown(value: number | undefined): string {
  return value === undefined ? '?' : String(value);
}

export async function infoCommand(options: CLIOptions, args: string[]): Promise<number> {
  const file = requireFile(args, 'draft info <file>');
  const { text, doc } = loadDraft(file);
  const summary = summarizeDraft(file, text, doc, options.config.colorRange);

  if (options.format === 'json') {
    console.log(JSON.stringify(summary, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  const [low, high] = summary.colorRange;
  const source = summary.sourceVersion
    ? `${summary.sourceProgram} ${summary.sourceVersion}`
    : summary.sourceProgram;

  console.log('');
  line('File:', summary.file);
  line('Title:', summary.title ?? '-');
  line('Author:', summary.author ?? '-');
  line('WIF version:', summary.version);
  line('Source:', source);
  line('Date:', summary.date);
  line('Loom:', `${orUnknown(summary.shafts)} shafts, ${orUnknown(summary.treadles)} treadles`);
  line('Threads:', `${orUnknown(summary.warps)} warp x ${orUnknown(summary.wefts)} weft`);
  line('Colors:', `${summary.colors} (range ${low}..${high})`);
  line('Liftplan:', summary.liftplan);
  line('Sections:', summary.sections.length > 0 ? summary.sections.join(', ') : '-');
  console.log('');

  return EXIT_CODE.SUCCESS;
}
