/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Writing exported documents to disk
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { createLogger } from '@cycles-xml/scene';
import type { CyclesSceneExporter } from './exporter.js';

const log = createLogger('FileWriter');

export type FileNameVariables = Readonly<Record<string, string | number>>;

export interface FileExportOptions {
  /** Values for `${name}` references; `frame` also fills `#` runs */
  variables?: FileNameVariables;
}

/**
 * Substitute `${name}` references and `#` frame padding in a file name.
 * Unknown variables become empty; the frame defaults to 1.
 */
export function substituteFileName(template: string, variables: FileNameVariables = {}): string {
  const frame = Math.trunc(Number(variables.frame ?? 1));
  // Substituted values are not rescanned for `#`
  return template.replace(/\$\{([^}]*)\}|#+/g, (match, name: string | undefined) => {
    if (name !== undefined) {
      return variables[name] === undefined ? '' : String(variables[name]);
    }
    const digits = String(Math.abs(frame)).padStart(match.length, '0');
    return frame < 0 ? `-${digits}` : digits;
  });
}

/**
 * Export to a file, creating parent directories as needed.
 *
 * An empty file name skips the export and returns null; otherwise the
 * written path is returned. Existing directories are not an error.
 */
export function exportSceneToFile(
  exporter: CyclesSceneExporter,
  fileName: string,
  options: FileExportOptions = {}
): string | null {
  const target = substituteFileName(fileName, options.variables);
  if (!target) {
    log.info('No output file name, skipping export', { operation: 'exportSceneToFile' });
    return null;
  }

  const text = exporter.exportToString();

  try {
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, text, 'utf-8');
  } catch (error) {
    log.error(`Failed to write ${target}`, error, { operation: 'exportSceneToFile' });
    throw error;
  }

  log.info(`Wrote ${target}`, { operation: 'exportSceneToFile', data: { bytes: Buffer.byteLength(text) } });
  return target;
}
