/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Camera resolution
 *
 * Picks the render camera named by the globals (or a default one), applies
 * the resolution override and fills in standard parameters.
 */

import {
  MathUtils,
  createLogger,
  parsePath,
  type CameraParameters,
  type Mat4,
  type RenderGlobals,
  type SceneSource,
} from '@cycles-xml/scene';
import { element, formatMatrix, type XmlAttribute, type XmlElement } from './document.js';

const log = createLogger('Camera');

export const DEFAULT_RESOLUTION: readonly [number, number] = [640, 480];
export const DEFAULT_FOV = 90;
export const DEFAULT_CLIPPING_PLANES: readonly [number, number] = [0.01, 100000];

/** The renderer looks down +Z where the scene looks down -Z */
const HANDEDNESS_FLIP = { x: 1, y: 1, z: -1 };

export interface ScreenWindow {
  min: [number, number];
  max: [number, number];
}

/**
 * Camera with standard parameters filled in. `writeCamera` emits only the
 * resolution, projection and fov; the screen window and clipping planes are
 * not written.
 */
export type CameraDescription =
  | (CameraCommon & { projection: 'perspective'; fov: number })
  | (CameraCommon & { projection: 'orthographic' });

interface CameraCommon {
  resolution: [number, number];
  screenWindow: ScreenWindow;
  clippingPlanes: [number, number];
}

export interface ResolvedCamera {
  camera: CameraDescription;
  /** Camera to world, with the handedness flip applied */
  transform: Mat4;
}

function defaultScreenWindow(width: number, height: number): ScreenWindow {
  const aspect = width / height;
  return aspect >= 1
    ? { min: [-aspect, -1], max: [aspect, 1] }
    : { min: [-1, -1 / aspect], max: [1, 1 / aspect] };
}

/**
 * Fill in standard parameters for a camera
 */
export function describeCamera(parameters: CameraParameters): CameraDescription {
  const [width, height] = parameters.resolution ?? DEFAULT_RESOLUTION;
  if (!(width > 0 && height > 0)) {
    throw new RangeError(`Camera resolution must be positive, got ${width}x${height}`);
  }

  const common: CameraCommon = {
    resolution: [width, height],
    screenWindow: defaultScreenWindow(width, height),
    clippingPlanes: [...(parameters.clippingPlanes ?? DEFAULT_CLIPPING_PLANES)],
  };

  if (parameters.projection === 'perspective') {
    return { ...common, projection: 'perspective', fov: parameters['projection:fov'] ?? DEFAULT_FOV };
  }
  return { ...common, projection: 'orthographic' };
}

export function resolveCamera(source: SceneSource, globals: RenderGlobals = source.globals()): ResolvedCamera {
  let parameters: CameraParameters = {};
  let transform = MathUtils.identity();

  if (globals.camera !== undefined) {
    const path = parsePath(globals.camera);
    const object = source.object(path);
    if (object?.type === 'camera') {
      parameters = object.parameters;
      transform = source.fullTransform(path);
    } else {
      log.warn(`${globals.camera} is not a camera, using the default camera`, { operation: 'resolveCamera' });
    }
  }

  if (globals.resolution !== undefined) {
    parameters = { ...parameters, resolution: globals.resolution };
  }

  return {
    camera: describeCamera(parameters),
    transform: MathUtils.scale(transform, HANDEDNESS_FLIP),
  };
}

export function writeCamera({ camera, transform }: ResolvedCamera): XmlElement {
  const attributes: XmlAttribute[] = [
    ['width', String(Math.trunc(camera.resolution[0]))],
    ['height', String(Math.trunc(camera.resolution[1]))],
  ];
  if (camera.projection === 'perspective') {
    attributes.push(['type', 'perspective'], ['fov', camera.fov.toFixed(6)]);
  } else {
    attributes.push(['type', 'orthographic']);
  }
  return element('transform', { matrix: formatMatrix(transform) }, [element('camera', attributes)]);
}
