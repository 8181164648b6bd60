/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shader network serialization
 *
 * Writes each distinct shader network once, named by its content hash:
 *
 *   <shader name="HASH">
 *   	<osl_shader name="noise1" src="/shaders/noise.oso" scale="4">
 *   		<input name="scale" type="float" />
 *   		<output name="Cout" type="color" />
 *   	</osl_shader>
 *   	<osl_shader name="surface" src="/shaders/matte.oso" Kd="0.8">
 *   		...
 *   	</osl_shader>
 *   	<connect from="noise1 Cout" to="surface Cs" />
 *   	<connect from="surface Ci" to="output surface" />
 *   </shader>
 */

import {
  createLogger,
  type AttributeValue,
  type Attributes,
  type ShaderAssignment,
  type ShaderParameterValue,
} from '@cycles-xml/scene';
import {
  buildShaderNetwork,
  hashShaderAssignment,
  DEFAULT_SHADER_HANDLE,
  ShaderNetworkError,
  type ResolvedShader,
  type ShaderMetadataResolver,
  type ShaderNetwork,
} from '@cycles-xml/shaders';
import { element, type SceneDocument, type XmlAttribute, type XmlElement } from './document.js';
import type { TraversalState } from './state.js';

const log = createLogger('ShaderWriter');

export const SHADER_ATTRIBUTE = 'shader';

/** Output of the final node that feeds the document's surface */
export const SURFACE_CLOSURE = 'Ci';

const RESERVED_ATTRIBUTES = new Set(['name', 'src']);

function isShaderAssignment(value: AttributeValue | undefined): value is ShaderAssignment {
  return typeof value === 'object' && 'type' in value && value.type === 'shader';
}

/**
 * Shader assignment from accumulated attributes, if any
 */
export function getShaderAssignment(attributes: Attributes): ShaderAssignment | undefined {
  const value = attributes[SHADER_ATTRIBUTE];
  if (value === undefined) return undefined;
  if (!isShaderAssignment(value)) {
    log.warn(`Ignoring "${SHADER_ATTRIBUTE}" attribute that is not a shader assignment`);
    return undefined;
  }
  return value;
}

export function formatParameterValue(value: ShaderParameterValue): string {
  if (typeof value === 'boolean') return value ? '1' : '0';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return value;
  return value.join(' ');
}

function connect(from: string, to: string): XmlElement {
  return element('connect', { from, to });
}

export class ShaderNetworkWriter {
  private readonly resolver: ShaderMetadataResolver;
  private readonly document: SceneDocument;

  constructor(resolver: ShaderMetadataResolver, document: SceneDocument) {
    this.resolver = resolver;
    this.document = document;
  }

  /**
   * Write the shader network assigned to the current location, unless an
   * identical one was already written. Returns the network's handle.
   */
  writeShader(state: TraversalState): string | undefined {
    const assignment = getShaderAssignment(state.attributes);
    if (!assignment) return undefined;

    const hash = hashShaderAssignment(assignment);
    if (state.shadersEmitted.has(hash)) {
      return hash;
    }

    this.document.append(this.buildShaderBlock(buildShaderNetwork(assignment)));
    state.shadersEmitted.add(hash);
    log.debug(`Wrote shader network ${hash}`, { nodes: assignment.nodes.length });
    return hash;
  }

  buildShaderBlock(network: ShaderNetwork): XmlElement {
    const resolved = new Map<string, ResolvedShader>();
    const children: XmlElement[] = [];

    for (const node of network.nodes) {
      const shader = this.resolver.resolve(node.name);
      resolved.set(node.handle, shader);

      const attributes: XmlAttribute[] = [
        ['name', node.handle],
        ['src', shader.path],
      ];
      for (const [parameter, value] of node.literals) {
        if (RESERVED_ATTRIBUTES.has(parameter)) {
          throw new ShaderNetworkError(`parameter "${parameter}" clashes with a reserved attribute`, node.name);
        }
        attributes.push([parameter, formatParameterValue(value)]);
      }

      const declarations = shader.parameters.map((declaration) =>
        element(declaration.direction, { name: declaration.name, type: declaration.type })
      );
      children.push(element('osl_shader', attributes, declarations));

      for (const link of node.links) {
        const source = resolved.get(link.sourceHandle);
        if (source && !source.parameters.some((p) => p.direction === 'output' && p.name === link.sourceParameter)) {
          log.warn(`${source.name} declares no output "${link.sourceParameter}"`, {
            operation: 'buildShaderBlock',
            data: { shader: network.hash },
          });
        }
        children.push(connect(`${link.sourceHandle} ${link.sourceParameter}`, `${node.handle} ${link.parameter}`));
      }
    }

    if (!resolved.has(DEFAULT_SHADER_HANDLE)) {
      log.warn(`Shader network ${network.hash} has no "${DEFAULT_SHADER_HANDLE}" node`, {
        operation: 'buildShaderBlock',
      });
    }
    children.push(connect(`${DEFAULT_SHADER_HANDLE} ${SURFACE_CLOSURE}`, 'output surface'));

    return element('shader', { name: network.hash }, children);
  }
}
