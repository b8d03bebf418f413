/**
 * Loading a draft named on the command line.
 */

import { WifError, parseWif } from '@drafthouse/wif';
import type { WifDocument } from '@drafthouse/wif';
import { CLIError, EXIT_CODE } from './index';
import { getPositionals, readInputFile } from './flags';

export interface LoadedDraft {
  file: string;
  /** The file's text exactly as read. */
  text: string;
  doc: WifDocument;
}

/** The single file argument of a command, or a usage error. */
export function requireFile(args: string[], usage: string): string {
  const [file] = getPositionals(args);
  if (!file) {
    throw new CLIError(`Usage: ${usage}`);
  }
  return file;
}

/**
 * Read and parse a draft. A document the codec rejects becomes a CLIError
 * with the INVALID_DOCUMENT exit code and the full error chain as message.
 */
export function loadDraft(file: string): LoadedDraft {
  const text = readInputFile(file);
  try {
    return { file, text, doc: parseWif(text) };
  } catch (err: unknown) {
    if (err instanceof WifError) {
      throw new CLIError(`${file}: ${err.message}`, EXIT_CODE.INVALID_DOCUMENT);
    }
    throw err;
  }
}
