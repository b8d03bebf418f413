/**
 * draft fmt <file> [--write] [--check]
 *
 * Prints the canonical form of a draft. --write rewrites the file in place;
 * --check only reports, exiting 1 when the file would change.
 */

import * as fs from 'node:fs';
import type { Writable } from 'node:stream';
import { formatWif, writeWif } from '@drafthouse/wif';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { loadDraft, requireFile } from '../draft';

export async function fmtCommand(
  options: CLIOptions,
  args: string[],
  output: Writable = process.stdout
): Promise<number> {
  const file = requireFile(args, 'draft fmt <file> [--write] [--check]');
  const { text, doc } = loadDraft(file);
  const canonical = formatWif(doc);
  const changed = text !== canonical;

  if (args.includes('--check')) {
    if (options.format === 'json') {
      console.log(JSON.stringify({ file, canonical: !changed }, null, 2));
    } else if (changed) {
      console.log(`  [warn] ${file} is not canonical (run: draft fmt ${file} --write)`);
    } else {
      console.log(`  [ok] ${file} is canonical`);
    }
    return changed ? EXIT_CODE.INVALID_DOCUMENT : EXIT_CODE.SUCCESS;
  }

  if (args.includes('--write')) {
    if (changed) {
      fs.writeFileSync(file, canonical);
    }
    if (options.format === 'json') {
      console.log(JSON.stringify({ file, changed }, null, 2));
    } else {
      console.log(changed ? `  [ok] Formatted ${file}` : `  [ok] ${file} already canonical`);
    }
    return EXIT_CODE.SUCCESS;
  }

  await writeWif(doc, output);
  return EXIT_CODE.SUCCESS;
}
