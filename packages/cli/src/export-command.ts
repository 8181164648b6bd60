/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Export a JSON scene file to Cycles XML
 */

import { basename, extname } from 'path';
import { CyclesSceneExporter, exportSceneToFile } from '@cycles-xml/export';
import { InMemorySceneSource, loadSceneFile } from '@cycles-xml/scene';
import {
  OslInfoIntrospector,
  OslShaderMetadataResolver,
  ShaderSearchPath,
  type ShaderMetadataResolver,
} from '@cycles-xml/shaders';

export interface ExportCommandOptions {
  /** Output file name; `${scene}` and `#` frame padding are substituted */
  output?: string;
  /** Colon-separated shader directories, overriding OSL_SHADER_PATHS */
  shaderPath?: string;
  /** oslinfo executable, overriding CYCLES_XML_OSLINFO */
  oslinfo?: string;
  frame?: number;
  /** Replaces the oslinfo-backed resolver */
  shaders?: ShaderMetadataResolver;
}

export type ExportCommandResult =
  | { kind: 'file'; fileName: string }
  | { kind: 'text'; text: string }
  | { kind: 'skipped' };

function createResolver(options: ExportCommandOptions): ShaderMetadataResolver {
  if (options.shaders) return options.shaders;
  return new OslShaderMetadataResolver({
    searchPath:
      options.shaderPath !== undefined ? new ShaderSearchPath(options.shaderPath) : ShaderSearchPath.fromEnvironment(),
    introspector: new OslInfoIntrospector(options.oslinfo),
  });
}

export function runExport(scenePath: string, options: ExportCommandOptions = {}): ExportCommandResult {
  const source = new InMemorySceneSource(loadSceneFile(scenePath));
  const exporter = new CyclesSceneExporter(source, { shaders: createResolver(options) });

  if (options.output === undefined) {
    return { kind: 'text', text: exporter.exportToString() };
  }

  const fileName = exportSceneToFile(exporter, options.output, {
    variables: { scene: basename(scenePath, extname(scenePath)), frame: options.frame ?? 1 },
  });
  return fileName === null ? { kind: 'skipped' } : { kind: 'file', fileName };
}
