#!/usr/bin/env node
import { exitCodeFor } from '@projpick/shared';
import { createProgram } from './program';
import { reportError } from './output/errors';
import type { GlobalOptions } from './context';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts<GlobalOptions>();
    reportError(e, { json: opts.json, verbose: opts.verbose });
    process.exit(exitCodeFor(e));
  }
}

void main();
