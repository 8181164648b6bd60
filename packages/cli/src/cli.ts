#!/usr/bin/env tsx
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for Cycles XML export
 *
 * Writes the document to stdout unless an output file is given.
 */

import { Command, InvalidArgumentError } from 'commander';
import { runExport } from './export-command.js';

function parseFrame(value: string): number {
  const frame = Number(value);
  if (!Number.isInteger(frame)) {
    throw new InvalidArgumentError('Frame must be an integer.');
  }
  return frame;
}

const program = new Command();

program
  .name('cycles-xml')
  .description('Export a JSON scene description to Cycles XML')
  .version('0.1.0');

program
  .argument('<scene>', 'Path to JSON scene file')
  .option('-o, --output <file>', 'Output file (${scene} and # frame padding are substituted)')
  .option('--shader-path <dirs>', 'Colon-separated OSL shader directories (default: $OSL_SHADER_PATHS)')
  .option('--oslinfo <command>', 'oslinfo executable (default: $CYCLES_XML_OSLINFO or oslinfo)')
  .option('--frame <n>', 'Frame number for # substitution', parseFrame, 1)
  .option('-v, --verbose', 'Verbose output', false)
  .action(
    (
      scenePath: string,
      options: {
        output?: string;
        shaderPath?: string;
        oslinfo?: string;
        frame: number;
        verbose: boolean;
      }
    ) => {
      if (options.verbose) {
        process.env.CYCLES_XML_DEBUG = 'true';
      }
      try {
        const start = Date.now();
        const result = runExport(scenePath, options);

        switch (result.kind) {
          case 'text':
            process.stdout.write(result.text);
            break;
          case 'file':
            console.error(`Wrote ${result.fileName} in ${Date.now() - start}ms`);
            break;
          case 'skipped':
            console.error('Output file name is empty, nothing written');
            break;
        }
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    }
  );

program.parse();
