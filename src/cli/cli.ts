#!/usr/bin/env node
/**
 * image-ref-scanner CLI
 */

import { argv } from 'node:process';
import { formatError } from './error-formatting';
import { createProgram } from './program';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    console.error(formatError('Unexpected error', error));
    process.exitCode = 1;
  }
}

void main();
