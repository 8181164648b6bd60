/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  createLogger,
  formatPath,
  type SceneObject,
  type ScenePath,
  type SceneSource,
} from '@cycles-xml/scene';
import { element, formatMatrix, type SceneDocument } from './document.js';
import { writeMesh } from './geometry.js';
import type { ShaderNetworkWriter } from './shader-writer.js';
import { deriveState, type TraversalState } from './state.js';

const log = createLogger('SceneWalker');

/**
 * Depth-first, pre-order traversal of a scene source. Each location's
 * object is written before its children; children follow the source's
 * child name order.
 */
export class SceneWalker {
  private readonly source: SceneSource;
  private readonly document: SceneDocument;
  private readonly shaders: ShaderNetworkWriter;

  constructor(source: SceneSource, document: SceneDocument, shaders: ShaderNetworkWriter) {
    this.source = source;
    this.document = document;
    this.shaders = shaders;
  }

  walk(path: ScenePath, parentState: TraversalState): void {
    const state = deriveState(parentState, this.source.transform(path), this.source.attributes(path));

    const object = this.source.object(path);
    if (object) {
      this.writeObject(path, state, object);
    }

    for (const childName of this.source.childNames(path)) {
      this.walk([...path, childName], state);
    }
  }

  private writeObject(path: ScenePath, state: TraversalState, object: SceneObject): void {
    if (object.type !== 'mesh') {
      log.debug(`Skipping ${object.type}`, undefined, { operation: 'writeObject', location: formatPath(path) });
      return;
    }

    const shader = this.shaders.writeShader(state);
    this.document.append(
      element('transform', { matrix: formatMatrix(state.transform) }, [
        element('state', shader !== undefined ? { shader } : {}, [writeMesh(object)]),
      ])
    );
  }
}
