/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import {
  MathUtils,
  formatPath,
  type Attributes,
  type Mat4,
  type MeshPrimitive,
  type SceneObject,
  type ScenePath,
  type SceneSource,
} from '@cycles-xml/scene';
import type { ShaderMetadataResolver } from '@cycles-xml/shaders';
import { SceneDocument, getAttribute, type XmlElement } from './document.js';
import { ShaderNetworkWriter } from './shader-writer.js';
import { createRootState } from './state.js';
import { SceneWalker } from './walker.js';

interface MockLocation {
  transform?: Mat4;
  attributes?: Attributes;
  object?: SceneObject;
  children?: Record<string, MockLocation>;
}

/** Scene source over a nested record that logs object() queries */
function createMockSource(root: MockLocation): SceneSource & { visited: string[] } {
  const visited: string[] = [];
  const find = (path: ScenePath): MockLocation => {
    let location = root;
    for (const name of path) {
      const child = location.children?.[name];
      if (!child) throw new Error(`no location ${formatPath(path)}`);
      location = child;
    }
    return location;
  };
  return {
    visited,
    transform: (path) => find(path).transform ?? MathUtils.identity(),
    fullTransform: () => MathUtils.identity(),
    object: (path) => {
      visited.push(formatPath(path));
      return find(path).object ?? null;
    },
    attributes: (path) => find(path).attributes ?? {},
    childNames: (path) => Object.keys(find(path).children ?? {}),
    globals: () => ({}),
  };
}

const resolver: ShaderMetadataResolver = {
  resolve: (name) => ({ name, path: `/shaders/${name}.oso`, parameters: [] }),
};

const MESH: MeshPrimitive = {
  type: 'mesh',
  points: [0, 0, 0, 1, 0, 0, 0, 1, 0],
  verticesPerFace: [3],
  vertexIds: [0, 1, 2],
  interpolation: 'linear',
};

function walk(source: SceneSource): SceneDocument {
  const document = new SceneDocument();
  new SceneWalker(source, document, new ShaderNetworkWriter(resolver, document)).walk([], createRootState());
  return document;
}

function stateOf(block: XmlElement): XmlElement {
  return block.children[0];
}

describe('SceneWalker', () => {
  it('visits every location once, parents before children', () => {
    const source = createMockSource({
      children: {
        a: { children: { a1: {}, a2: {} } },
        b: { children: { b1: {} } },
      },
    });
    walk(source);
    expect(source.visited).toEqual(['/', '/a', '/a/a1', '/a/a2', '/b', '/b/b1']);
  });

  it('writes objects in traversal order with accumulated transforms', () => {
    const source = createMockSource({
      children: {
        a: {
          transform: MathUtils.translation({ x: 1, y: 0, z: 0 }),
          object: MESH,
          children: { a1: { transform: MathUtils.translation({ x: 0, y: 2, z: 0 }), object: MESH } },
        },
        b: { transform: MathUtils.translation({ x: 0, y: 0, z: 3 }), object: MESH },
      },
    });
    const matrices = walk(source).blocks.map((block) => getAttribute(block, 'matrix'));
    expect(matrices).toEqual([
      '1 0 0 0 0 1 0 0 0 0 1 0 1 0 0 1',
      '1 0 0 0 0 1 0 0 0 0 1 0 1 2 0 1',
      '1 0 0 0 0 1 0 0 0 0 1 0 0 0 3 1',
    ]);
  });

  it('writes a mesh at the root', () => {
    const document = walk(createMockSource({ object: MESH }));
    expect(document.blocks).toHaveLength(1);
    expect(stateOf(document.blocks[0]).children[0].tag).toBe('mesh');
  });

  it('skips objects that are not meshes', () => {
    const source = createMockSource({
      children: {
        cam: { object: { type: 'camera', parameters: {} } },
        dots: { object: { type: 'points', points: [0, 0, 0] } },
        hair: { object: { type: 'curves', verticesPerCurve: [2], points: [0, 0, 0, 0, 1, 0] } },
      },
    });
    expect(walk(source).blocks).toHaveLength(0);
  });

  it('inherits shaders down the hierarchy but not across siblings', () => {
    const shader = { type: 'shader' as const, nodes: [{ name: 'matte', parameters: {} }] };
    const source = createMockSource({
      children: {
        shaded: { attributes: { shader }, children: { inner: { object: MESH } } },
        plain: { object: MESH },
      },
    });
    const document = walk(source);
    const [shaderBlock, inner, plain] = document.blocks;

    expect(shaderBlock.tag).toBe('shader');
    expect(getAttribute(stateOf(inner), 'shader')).toBe(getAttribute(shaderBlock, 'name'));
    expect(getAttribute(stateOf(plain), 'shader')).toBeUndefined();
  });
});
