#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createProgram, exitCodeFor, OutputRenderer, type GlobalOptions } from './index';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    // commander has already printed its own message
    if (!(e instanceof CommanderError)) {
      const opts = program.opts<GlobalOptions>();
      new OutputRenderer(!!opts.json).renderError(e, !!opts.verbose);
    }
    process.exitCode = exitCodeFor(e);
  }
}

void main();
