/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Cycles XML exporter
 *
 * Document order: camera, background, then shader and object blocks in
 * traversal order.
 */

import { createLogger, type SceneSource } from '@cycles-xml/scene';
import { OslShaderMetadataResolver, type ShaderMetadataResolver } from '@cycles-xml/shaders';
import { resolveCamera, writeCamera } from './camera.js';
import { SceneDocument, element, type XmlElement } from './document.js';
import { ShaderNetworkWriter } from './shader-writer.js';
import { createRootState } from './state.js';
import { SceneWalker } from './walker.js';

const log = createLogger('Exporter');

export interface CyclesExportOptions {
  /** Defaults to an OslShaderMetadataResolver on OSL_SHADER_PATHS */
  shaders?: ShaderMetadataResolver;
}

/**
 * Constant grey world background
 */
export function createBackgroundBlock(): XmlElement {
  return element('background', [], [
    element('background', { name: 'bg', strength: '2.0', color: '0.2, 0.2, 0.2' }),
    element('connect', { from: 'bg background', to: 'output surface' }),
  ]);
}

export class CyclesSceneExporter {
  private readonly source: SceneSource;
  private readonly shaders: ShaderMetadataResolver;

  constructor(source: SceneSource, options: CyclesExportOptions = {}) {
    this.source = source;
    this.shaders = options.shaders ?? new OslShaderMetadataResolver();
  }

  /**
   * Build the document; every call starts with no shaders written
   */
  buildDocument(): SceneDocument {
    const start = Date.now();
    const document = new SceneDocument();

    document.append(writeCamera(resolveCamera(this.source)));
    document.append(createBackgroundBlock());

    const walker = new SceneWalker(this.source, document, new ShaderNetworkWriter(this.shaders, document));
    walker.walk([], createRootState());

    log.info(`Built document in ${Date.now() - start}ms`, {
      operation: 'buildDocument',
      data: { blocks: document.blocks.length },
    });
    return document;
  }

  exportToString(): string {
    return this.buildDocument().render();
  }
}
