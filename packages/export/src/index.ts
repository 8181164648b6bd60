/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @cycles-xml/export - Cycles XML scene export
 */

export { CyclesSceneExporter, createBackgroundBlock, type CyclesExportOptions } from './exporter.js';
export { exportSceneToFile, substituteFileName, type FileExportOptions, type FileNameVariables } from './file-writer.js';
export {
  SceneDocument,
  element,
  getAttribute,
  escapeXml,
  formatMatrix,
  formatNumbers,
  renderElement,
  type XmlElement,
  type XmlAttribute,
} from './document.js';
export {
  resolveCamera,
  describeCamera,
  writeCamera,
  DEFAULT_RESOLUTION,
  DEFAULT_FOV,
  DEFAULT_CLIPPING_PLANES,
  type CameraDescription,
  type ResolvedCamera,
  type ScreenWindow,
} from './camera.js';
export { writeMesh } from './geometry.js';
export {
  ShaderNetworkWriter,
  getShaderAssignment,
  formatParameterValue,
  SHADER_ATTRIBUTE,
  SURFACE_CLOSURE,
} from './shader-writer.js';
export { SceneWalker } from './walker.js';
export { createRootState, deriveState, type TraversalState } from './state.js';
