#!/usr/bin/env tsx

/**
 * Executable for `draft`. Runs one command and sets the exit status;
 * any failure is reported as a single `draft: ...` line on stderr.
 */

import { describeFailure, run } from './index';

async function main(argv: string[]): Promise<number> {
  try {
    return await run(argv);
  } catch (err: unknown) {
    const failure = describeFailure(err);
    console.error(failure.message);
    return failure.exitCode;
  }
}

process.exitCode = await main(process.argv.slice(2));
