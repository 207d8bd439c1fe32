#!/usr/bin/env node
import { processCommandFromArgv } from '../core/command-processor.js';
import { exitCodeByError, normalizeError, toErrorPayload } from '../core/error-codes.js';

function writeJson(stream: NodeJS.WriteStream, payload: unknown): void {
  stream.write(`${JSON.stringify(payload)}\n`);
}

/** Prints the command result as one JSON line and returns the process exit code. */
async function main(argv: string[]): Promise<number> {
  try {
    writeJson(process.stdout, await processCommandFromArgv(argv, { rootDir: process.cwd() }));
    return 0;
  } catch (error) {
    const normalized = normalizeError(error);
    writeJson(process.stderr, toErrorPayload(normalized));
    return exitCodeByError[normalized.code];
  }
}

process.exitCode = await main(process.argv.slice(2));
