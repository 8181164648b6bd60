/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * JSON scene description loader
 *
 * Validates a parsed JSON document and converts it into a SceneDescription.
 * Transforms are 16 numbers in column-major order.
 *
 * Example:
 *   {
 *     "globals": { "camera": "/camera", "resolution": [1920, 1080] },
 *     "root": {
 *       "children": [
 *         { "name": "camera", "object": { "type": "camera", "parameters": { "projection": "perspective" } } },
 *         { "name": "cube", "object": { "type": "mesh", ... } }
 *       ]
 *     }
 *   }
 */

import { readFileSync } from 'fs';
import { MathUtils } from './math.js';
import type { SceneChild, SceneDescription, SceneLocation } from './memory-source.js';
import type {
  AttributeValue,
  Attributes,
  CameraParameters,
  RenderGlobals,
  SceneObject,
  ShaderAssignment,
  ShaderNodeData,
  ShaderParameterValue,
} from './types.js';

/** Error thrown when a scene description is malformed */
export class SceneFileError extends Error {
  constructor(
    message: string,
    /** JSON path of the offending value, e.g. "root.children[0].object" */
    public readonly path: string
  ) {
    super(`${path}: ${message}`);
    this.name = 'SceneFileError';
  }
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): JsonRecord {
  if (!isRecord(value)) {
    throw new SceneFileError('expected an object', path);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new SceneFileError('expected a string', path);
  }
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SceneFileError('expected a finite number', path);
  }
  return value;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number' && Number.isFinite(v));
}

function expectNumberArray(value: unknown, path: string): number[] {
  if (!isNumberArray(value)) {
    throw new SceneFileError('expected an array of numbers', path);
  }
  return value;
}

function expectPair(value: unknown, path: string): [number, number] {
  const values = expectNumberArray(value, path);
  if (values.length !== 2) {
    throw new SceneFileError('expected two numbers', path);
  }
  return [values[0], values[1]];
}

function expectIntegerArray(value: unknown, path: string): number[] {
  const values = expectNumberArray(value, path);
  if (!values.every((v) => Number.isInteger(v) && v >= 0)) {
    throw new SceneFileError('expected non-negative integers', path);
  }
  return values;
}

// ============================================================================
// Attributes
// ============================================================================

function parseShaderParameter(value: unknown, path: string): ShaderParameterValue {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return expectNumber(value, path);
  if (isNumberArray(value)) return value;
  throw new SceneFileError('expected a number, string, boolean or number array', path);
}

function parseShaderNode(value: unknown, path: string): ShaderNodeData {
  const node = expectRecord(value, path);
  const parameters: Record<string, ShaderParameterValue> = {};
  if (node.parameters !== undefined) {
    const raw = expectRecord(node.parameters, `${path}.parameters`);
    for (const [name, parameter] of Object.entries(raw)) {
      parameters[name] = parseShaderParameter(parameter, `${path}.parameters.${name}`);
    }
  }
  return { name: expectString(node.name, `${path}.name`), parameters };
}

function parseShaderAssignment(value: JsonRecord, path: string): ShaderAssignment {
  if (!Array.isArray(value.nodes)) {
    throw new SceneFileError('expected an array of shader nodes', `${path}.nodes`);
  }
  return {
    type: 'shader',
    nodes: value.nodes.map((node, i) => parseShaderNode(node, `${path}.nodes[${i}]`)),
  };
}

function parseAttributeValue(value: unknown, path: string): AttributeValue {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return expectNumber(value, path);
  if (isNumberArray(value)) return value;
  if (isRecord(value) && value.type === 'shader') return parseShaderAssignment(value, path);
  throw new SceneFileError('unsupported attribute value', path);
}

function parseAttributes(value: unknown, path: string): Attributes {
  const raw = expectRecord(value, path);
  const attributes: Record<string, AttributeValue> = {};
  for (const [name, attribute] of Object.entries(raw)) {
    attributes[name] = parseAttributeValue(attribute, `${path}.${name}`);
  }
  return attributes;
}

// ============================================================================
// Objects
// ============================================================================

function parseCameraParameters(value: unknown, path: string): CameraParameters {
  const raw = expectRecord(value, path);
  const parameters: CameraParameters = {};
  if (raw.projection !== undefined) {
    parameters.projection = expectString(raw.projection, `${path}.projection`);
  }
  if (raw['projection:fov'] !== undefined) {
    parameters['projection:fov'] = expectNumber(raw['projection:fov'], `${path}.projection:fov`);
  }
  if (raw.resolution !== undefined) {
    parameters.resolution = expectPair(raw.resolution, `${path}.resolution`);
  }
  if (raw.clippingPlanes !== undefined) {
    parameters.clippingPlanes = expectPair(raw.clippingPlanes, `${path}.clippingPlanes`);
  }
  return parameters;
}

function parseObject(value: unknown, path: string): SceneObject {
  const raw = expectRecord(value, path);
  switch (raw.type) {
    case 'mesh': {
      const verticesPerFace = expectIntegerArray(raw.verticesPerFace, `${path}.verticesPerFace`);
      const vertexIds = expectIntegerArray(raw.vertexIds, `${path}.vertexIds`);
      const expectedIds = verticesPerFace.reduce((sum, count) => sum + count, 0);
      if (vertexIds.length !== expectedIds) {
        throw new SceneFileError(
          `expected ${expectedIds} vertex ids for the given face counts, got ${vertexIds.length}`,
          `${path}.vertexIds`
        );
      }
      return {
        type: 'mesh',
        points: expectNumberArray(raw.points, `${path}.points`),
        verticesPerFace,
        vertexIds,
        interpolation:
          raw.interpolation === undefined ? 'linear' : expectString(raw.interpolation, `${path}.interpolation`),
      };
    }
    case 'camera':
      return {
        type: 'camera',
        parameters: raw.parameters === undefined ? {} : parseCameraParameters(raw.parameters, `${path}.parameters`),
      };
    case 'points':
      return { type: 'points', points: expectNumberArray(raw.points, `${path}.points`) };
    case 'curves':
      return {
        type: 'curves',
        verticesPerCurve: expectIntegerArray(raw.verticesPerCurve, `${path}.verticesPerCurve`),
        points: expectNumberArray(raw.points, `${path}.points`),
      };
    default:
      throw new SceneFileError(`unknown object type ${JSON.stringify(raw.type)}`, `${path}.type`);
  }
}

// ============================================================================
// Locations
// ============================================================================

function parseLocation(raw: JsonRecord, path: string): SceneLocation {
  const location: SceneLocation = {};

  if (raw.transform !== undefined) {
    const elements = expectNumberArray(raw.transform, `${path}.transform`);
    if (elements.length !== 16) {
      throw new SceneFileError('expected 16 matrix elements', `${path}.transform`);
    }
    location.transform = MathUtils.fromArray(elements);
  }

  if (raw.attributes !== undefined) {
    location.attributes = parseAttributes(raw.attributes, `${path}.attributes`);
  }

  if (raw.object !== undefined) {
    location.object = parseObject(raw.object, `${path}.object`);
  }

  if (raw.children !== undefined) {
    if (!Array.isArray(raw.children)) {
      throw new SceneFileError('expected an array of locations', `${path}.children`);
    }
    const names = new Set<string>();
    location.children = raw.children.map((value, i): SceneChild => {
      const childPath = `${path}.children[${i}]`;
      const child = expectRecord(value, childPath);
      const name = expectString(child.name, `${childPath}.name`);
      if (name.length === 0 || name.includes('/')) {
        throw new SceneFileError('location names must be non-empty and contain no "/"', `${childPath}.name`);
      }
      if (names.has(name)) {
        throw new SceneFileError(`duplicate location name "${name}"`, `${childPath}.name`);
      }
      names.add(name);
      return { name, ...parseLocation(child, childPath) };
    });
  }

  return location;
}

function parseGlobals(value: unknown, path: string): RenderGlobals {
  const raw = expectRecord(value, path);
  const globals: RenderGlobals = {};
  if (raw.camera !== undefined) {
    globals.camera = expectString(raw.camera, `${path}.camera`);
  }
  if (raw.resolution !== undefined) {
    globals.resolution = expectPair(raw.resolution, `${path}.resolution`);
  }
  return globals;
}

/**
 * Validate a parsed JSON value as a scene description
 */
export function parseSceneDescription(json: unknown): SceneDescription {
  const raw = expectRecord(json, '$');
  const description: SceneDescription = {
    root: parseLocation(expectRecord(raw.root, 'root'), 'root'),
  };
  if (raw.globals !== undefined) {
    description.globals = parseGlobals(raw.globals, 'globals');
  }
  return description;
}

/**
 * Read and validate a JSON scene file
 */
export function loadSceneFile(fileName: string): SceneDescription {
  const text = readFileSync(fileName, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SceneFileError(error instanceof Error ? error.message : String(error), '$');
  }
  return parseSceneDescription(json);
}
