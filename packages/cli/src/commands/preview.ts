/**
 * draft preview <file> [--warps N] [--wefts N]
 *
 * Prints a drawdown: one row per weft pick, one column per warp thread,
 * showing which of the two is on top at each crossing.
 */

import { interlacement, warp, warpCount, weft, weftCount } from '@drafthouse/wif';
import type { Table, WifDocument } from '@drafthouse/wif';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getCountFlag } from '../flags';
import { loadDraft, requireFile } from '../draft';

export interface DrawdownGlyphs {
  warpGlyph: string;
  weftGlyph: string;
}

function highestKey<K extends number, V>(table: Table<K, V>): number {
  const keys = table.keys();
  return keys.length > 0 ? keys[keys.length - 1] : 0;
}

/**
 * Render `wefts` rows of `warps` columns, weft 1 at the top and warp 1 at
 * the left. Undefined when the document has no liftplan or no threading.
 */
export function renderDrawdown(
  doc: WifDocument,
  warps: number,
  wefts: number,
  glyphs: DrawdownGlyphs
): string[] | undefined {
  if (!doc.liftplan || !doc.threading) {
    return undefined;
  }

  const rows: string[] = [];
  for (let pick = 1; pick <= wefts; pick++) {
    let row = '';
    for (let end = 1; end <= warps; end++) {
      row += interlacement(doc, warp(end), weft(pick)) === 'warp' ? glyphs.warpGlyph : glyphs.weftGlyph;
    }
    rows.push(row);
  }
  return rows;
}

export async function previewCommand(options: CLIOptions, args: string[]): Promise<number> {
  const file = requireFile(args, 'draft preview <file> [--warps <n>] [--wefts <n>]');
  const { doc } = loadDraft(file);
  const { preview } = options.config;

  if (!doc.liftplan || !doc.threading) {
    throw new CLIError(
      `${file}: nothing to preview (needs THREADING and either LIFTPLAN or TREADLING with TIEUP)`,
      EXIT_CODE.INVALID_DOCUMENT
    );
  }

  const warps = Math.min(
    getCountFlag(args, '--warps') ?? preview.maxWarps,
    warpCount(doc) ?? highestKey(doc.threading)
  );
  const wefts = Math.min(
    getCountFlag(args, '--wefts') ?? preview.maxWefts,
    weftCount(doc) ?? highestKey(doc.liftplan)
  );
  const rows = renderDrawdown(doc, warps, wefts, preview) ?? [];

  if (options.format === 'json') {
    console.log(JSON.stringify({ file, warps, wefts, rows }, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  for (const row of rows) {
    console.log(row);
  }
  return EXIT_CODE.SUCCESS;
}
