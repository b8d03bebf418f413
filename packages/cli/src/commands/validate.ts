/**
 * draft validate <file>
 *
 * Parses a draft and reports whether it is valid. A document the codec
 * rejects exits with INVALID_DOCUMENT and the error chain.
 */

import { WifError, parseWif, presentSections } from '@drafthouse/wif';
import type { WifDocument } from '@drafthouse/wif';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { readInputFile } from '../flags';
import { requireFile } from '../draft';

export async function validateCommand(options: CLIOptions, args: string[]): Promise<number> {
  const file = requireFile(args, 'draft validate <file>');
  const text = readInputFile(file);

  let doc: WifDocument;
  try {
    doc = parseWif(text);
  } catch (err: unknown) {
    if (!(err instanceof WifError)) {
      throw err;
    }

    if (options.format === 'json') {
      console.log(JSON.stringify({ file, valid: false, error: { name: err.name, message: err.message } }, null, 2));
    } else {
      console.log(`  [fail] ${file}`);
      console.log(`     ${err.message}`);
    }
    return EXIT_CODE.INVALID_DOCUMENT;
  }

  const sections = presentSections(doc);

  if (options.format === 'json') {
    console.log(JSON.stringify({ file, valid: true, version: doc.header.version, sections }, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  console.log(`  [ok] ${file}: WIF ${doc.header.version}, ${sections.length} sections`);
  return EXIT_CODE.SUCCESS;
}
