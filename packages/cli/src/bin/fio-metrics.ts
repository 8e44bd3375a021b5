#!/usr/bin/env node

/**
 * fio-metrics CLI entry point
 *
 * Usage: fio-metrics <path to fio output json file>
 */

import { createProgram } from '../program.js';
import { handleError } from '../core/error-handler.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

void main();
