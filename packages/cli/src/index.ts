/**
 * Drafthouse CLI
 *
 * Checks, reformats and inspects WIF weaving drafts from the command line.
 */

import { WifError } from '@drafthouse/wif';
import { validateCommand } from './commands/validate';
import { fmtCommand } from './commands/fmt';
import { infoCommand } from './commands/info';
import { previewCommand } from './commands/preview';
import { loadConfig } from './config';
import type { DraftConfig } from './config';
import { getFlag, getPositionals } from './flags';
import packageJson from '../package.json';

const CLI_VERSION = packageJson.version;

const HELP = `
draft - WIF weaving draft toolkit

Usage:
  draft validate <file>            Parse a draft and report the first error, if any
  draft fmt <file> [--write] [--check]
                                   Print the draft in canonical form
  draft info <file>                Summarize a draft (title, loom, threads, sections)
  draft preview <file> [--warps <n>] [--wefts <n>]
                                   Print a drawdown of where warp and weft show
  draft --help                     Show this help
  draft --version                  Show version

Options:
  --config <path>    Path to .drafthouse/ directory (default: .drafthouse/)
  --format <type>    Output format: text, json (default: text)
  --write            fmt only: rewrite the file in place
  --check            fmt only: exit 1 when the file is not canonical
  --warps <n>        preview only: number of warp threads to draw
  --wefts <n>        preview only: number of weft picks to draw
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  INVALID_DOCUMENT: 1,
  RUNTIME_ERROR: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODE.RUNTIME_ERROR
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

export interface CLIFailure {
  exitCode: number;
  /** One line for stderr, already prefixed with `draft:`. */
  message: string;
}

/**
 * Map anything thrown out of `run` to an exit code and message. Codec errors
 * that escape a command count as an invalid document.
 */
export function describeFailure(err: unknown): CLIFailure {
  if (err instanceof CLIError) {
    return { exitCode: err.exitCode, message: `draft: ${err.message}` };
  }
  if (err instanceof WifError) {
    return { exitCode: EXIT_CODE.INVALID_DOCUMENT, message: `draft: ${err.message}` };
  }
  const msg = err instanceof Error ? err.message : String(err);
  return { exitCode: EXIT_CODE.RUNTIME_ERROR, message: `draft: ${msg}` };
}

export interface CLIOptions {
  configPath: string;
  format: 'text' | 'json';
  config: DraftConfig;
}

export async function run(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`draft v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  const configPath = getFlag(args, '--config') || '.drafthouse';
  const config = loadConfig(configPath);
  const rawFormat = getFlag(args, '--format') || config.format;

  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const options: CLIOptions = {
    configPath,
    format: rawFormat,
    config,
  };

  const [command] = getPositionals(args);
  if (command === undefined) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  const restArgs = [...args];
  restArgs.splice(args.indexOf(command), 1);

  switch (command) {
    case 'validate':
      return validateCommand(options, restArgs);
    case 'fmt':
      return fmtCommand(options, restArgs);
    case 'info':
      return infoCommand(options, restArgs);
    case 'preview':
      return previewCommand(options, restArgs);
    default:
      throw new CLIError(`Unknown command: ${command}\n${HELP}`);
  }
}
