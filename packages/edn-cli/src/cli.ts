#!/usr/bin/env node
/**
 * edn-events - print the parse events of one Edn document
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { dumpDocument } from './format.js';

interface CliOptions {
  strictCommas?: boolean;
  positions?: boolean;
}

function readInput(inputFile: string | undefined): { text: string; name: string } {
  if (inputFile === undefined || inputFile === '-') {
    return { text: fs.readFileSync(0, 'utf-8'), name: '<stdin>' };
  }
  const inputPath = path.resolve(inputFile);
  return { text: fs.readFileSync(inputPath, 'utf-8'), name: inputPath };
}

const program = new Command();

program
  .name('edn-events')
  .description('Print the parse events of an Edn document, one per line')
  .version('0.1.0')
  .option('--strict-commas', 'Reject a comma directly before a closing delimiter')
  .option('--positions', 'Prefix each event with line:column')
  .argument('[input]', 'Input file (default: stdin)')
  .action((inputFile: string | undefined, options: CliOptions) => {
    try {
      if (inputFile !== undefined && inputFile !== '-' && !fs.existsSync(inputFile)) {
        console.error(`Error: Input file not found: ${inputFile}`);
        process.exit(1);
      }

      const input = readInput(inputFile);
      const result = dumpDocument(input.text, {
        strictCommas: options.strictCommas,
        positions: options.positions,
        file: input.name,
      });
      for (const line of result.lines) {
        console.log(line);
      }

      if (result.error) {
        console.error(`Error: ${result.error.toString()}`);
        if (process.env.DEBUG && result.error.cause !== undefined) {
          console.error(result.error.cause);
        }
        process.exit(1);
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error('Error:', error.message);
        if (process.env.DEBUG) {
          console.error(error.stack);
        }
      }
      process.exit(1);
    }
  });

program.parse();
