/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @cycles-xml/scene - Scene graph model and sources
 */

export * from './types.js';
export { MathUtils } from './math.js';
export { formatPath, parsePath } from './paths.js';
export { createLogger, type Logger, type LogContext } from './logger.js';
export {
  InMemorySceneSource,
  SceneLocationError,
  type SceneLocation,
  type SceneChild,
  type SceneDescription,
} from './memory-source.js';
export { parseSceneDescription, loadSceneFile, SceneFileError } from './scene-file.js';
