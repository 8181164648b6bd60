/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shader networks
 *
 * A shader assignment attribute is an ordered list of nodes. Each node has a
 * handle (the `__handle` parameter, "surface" when absent) and parameters
 * that are either literals or `link:<handle>.<parameter>` references to an
 * output of a node earlier in the list.
 */

import type { ShaderAssignment, ShaderParameterValue } from '@cycles-xml/scene';
import { xxhash64Hex } from './utils/hash.js';

export const DEFAULT_SHADER_HANDLE = 'surface';
export const HANDLE_PARAMETER = '__handle';
export const LINK_PREFIX = 'link:';

/** Literal parameters are written as XML attribute names */
const PARAMETER_NAME = /^[A-Za-z_][\w.-]*$/;

export interface ShaderLink {
  /** Input parameter on the receiving node */
  parameter: string;
  sourceHandle: string;
  sourceParameter: string;
}

export interface ShaderNetworkNode {
  name: string;
  handle: string;
  /** Literal, non-internal parameters in declaration order */
  literals: ReadonlyArray<readonly [string, ShaderParameterValue]>;
  links: readonly ShaderLink[];
}

export interface ShaderNetwork {
  /** Content hash; doubles as the network's name in the output */
  hash: string;
  nodes: readonly ShaderNetworkNode[];
}

/** Error thrown for shader assignments that cannot be wired */
export class ShaderNetworkError extends Error {
  constructor(
    message: string,
    public readonly shaderName?: string
  ) {
    super(shaderName ? `${shaderName}: ${message}` : message);
    this.name = 'ShaderNetworkError';
  }
}

/** Internal parameters drive the exporter and are never written out */
export function isInternalParameter(name: string): boolean {
  return name.startsWith('__');
}

/**
 * Parse a `link:<handle>.<parameter>` value.
 * Returns null for values that are not links.
 */
export function parseLinkReference(
  value: ShaderParameterValue,
  shaderName?: string
): { handle: string; parameter: string } | null {
  if (typeof value !== 'string' || !value.startsWith(LINK_PREFIX)) {
    return null;
  }
  const target = value.slice(LINK_PREFIX.length);
  const dot = target.indexOf('.');
  if (dot <= 0 || dot === target.length - 1) {
    throw new ShaderNetworkError(`malformed link reference "${value}"`, shaderName);
  }
  return { handle: target.slice(0, dot), parameter: target.slice(dot + 1) };
}

/**
 * Content hash of a shader assignment.
 *
 * Depends only on node order, shader names and parameter values; the order
 * parameters were declared in does not matter.
 */
export function hashShaderAssignment(assignment: ShaderAssignment): string {
  const canonical = assignment.nodes.map((node) => [
    node.name,
    Object.keys(node.parameters)
      .sort()
      .map((name) => [name, node.parameters[name]]),
  ]);
  return xxhash64Hex(JSON.stringify(canonical));
}

/**
 * Validate a shader assignment and split its parameters into literals and links
 */
export function buildShaderNetwork(assignment: ShaderAssignment): ShaderNetwork {
  if (assignment.nodes.length === 0) {
    throw new ShaderNetworkError('shader assignment has no nodes');
  }

  const handles = new Set<string>();
  const nodes: ShaderNetworkNode[] = [];

  for (const node of assignment.nodes) {
    if (!node.name) {
      throw new ShaderNetworkError('shader node has no name');
    }

    const handleValue = node.parameters[HANDLE_PARAMETER] ?? DEFAULT_SHADER_HANDLE;
    if (typeof handleValue !== 'string' || handleValue.length === 0) {
      throw new ShaderNetworkError(`${HANDLE_PARAMETER} must be a non-empty string`, node.name);
    }
    if (handles.has(handleValue)) {
      throw new ShaderNetworkError(`duplicate handle "${handleValue}"`, node.name);
    }

    const literals: Array<readonly [string, ShaderParameterValue]> = [];
    const links: ShaderLink[] = [];
    for (const [parameter, value] of Object.entries(node.parameters)) {
      if (isInternalParameter(parameter)) continue;

      const link = parseLinkReference(value, node.name);
      if (!link) {
        if (!PARAMETER_NAME.test(parameter)) {
          throw new ShaderNetworkError(`invalid parameter name ${JSON.stringify(parameter)}`, node.name);
        }
        literals.push([parameter, value]);
        continue;
      }
      // Links may only point upstream, so every network is acyclic
      if (!handles.has(link.handle)) {
        throw new ShaderNetworkError(
          `parameter "${parameter}" links to "${link.handle}", which is not defined by an earlier node`,
          node.name
        );
      }
      links.push({ parameter, sourceHandle: link.handle, sourceParameter: link.parameter });
    }

    handles.add(handleValue);
    nodes.push({ name: node.name, handle: handleValue, literals, links });
  }

  return { hash: hashShaderAssignment(assignment), nodes };
}
