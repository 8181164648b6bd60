/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene graph data model shared by the exporter packages.
 */

// ============================================================================
// Math
// ============================================================================

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/** 4x4 matrix, column-major, translation in m[12..14] */
export interface Mat4 {
  m: Float64Array;
}

// ============================================================================
// Paths
// ============================================================================

/** Ordered path segments; the root is the empty path */
export type ScenePath = readonly string[];

// ============================================================================
// Objects
// ============================================================================

export type MeshInterpolation = 'linear' | 'catmullClark';

export interface MeshPrimitive {
  type: 'mesh';
  /** Flat xyz point positions */
  points: readonly number[];
  verticesPerFace: readonly number[];
  vertexIds: readonly number[];
  /** Anything other than 'catmullClark' is treated as linear */
  interpolation: MeshInterpolation | (string & {});
}

export type CameraProjection = 'perspective' | 'orthographic';

export interface CameraParameters {
  projection?: CameraProjection | (string & {});
  /** Horizontal field of view in degrees */
  'projection:fov'?: number;
  resolution?: readonly [number, number];
  clippingPlanes?: readonly [number, number];
}

export interface CameraObject {
  type: 'camera';
  parameters: CameraParameters;
}

export interface PointsPrimitive {
  type: 'points';
  points: readonly number[];
}

export interface CurvesPrimitive {
  type: 'curves';
  verticesPerCurve: readonly number[];
  points: readonly number[];
}

export type SceneObject = MeshPrimitive | CameraObject | PointsPrimitive | CurvesPrimitive;

// ============================================================================
// Attributes
// ============================================================================

/** Literal shader parameter value, or a `link:<handle>.<parameter>` string */
export type ShaderParameterValue = number | string | boolean | readonly number[];

export interface ShaderNodeData {
  /** Shader name, resolved against the shader search path */
  name: string;
  parameters: Readonly<Record<string, ShaderParameterValue>>;
}

export interface ShaderAssignment {
  type: 'shader';
  nodes: readonly ShaderNodeData[];
}

export type AttributeValue = number | string | boolean | readonly number[] | ShaderAssignment;

export type Attributes = Readonly<Record<string, AttributeValue>>;

// ============================================================================
// Globals
// ============================================================================

export interface RenderGlobals {
  /** Location of the render camera, e.g. "/world/camera" */
  camera?: string;
  resolution?: readonly [number, number];
}

// ============================================================================
// Scene Source
// ============================================================================

/**
 * Read-only access to a hierarchical scene graph.
 *
 * Implementations bridge a host scene representation to the exporter.
 * All queries are pure.
 */
export interface SceneSource {
  /** Local transform of the location */
  transform(path: ScenePath): Mat4;
  /** Transform from the location to world space */
  fullTransform(path: ScenePath): Mat4;
  object(path: ScenePath): SceneObject | null;
  attributes(path: ScenePath): Attributes;
  /** Child names in traversal order */
  childNames(path: ScenePath): readonly string[];
  globals(): RenderGlobals;
}
