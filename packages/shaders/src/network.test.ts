/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import type { ShaderAssignment } from '@cycles-xml/scene';
import {
  buildShaderNetwork,
  hashShaderAssignment,
  parseLinkReference,
  ShaderNetworkError,
} from './network.js';

const NOISE_INTO_MATTE: ShaderAssignment = {
  type: 'shader',
  nodes: [
    { name: 'noise', parameters: { __handle: 'noise1', scale: 4 } },
    { name: 'matte', parameters: { Kd: 0.8, Cs: 'link:noise1.Cout' } },
  ],
};

describe('parseLinkReference', () => {
  it('returns null for literal values', () => {
    expect(parseLinkReference(1)).toBeNull();
    expect(parseLinkReference('texture.png')).toBeNull();
    expect(parseLinkReference([1, 2, 3])).toBeNull();
  });

  it('splits handle and parameter', () => {
    expect(parseLinkReference('link:noise1.Cout')).toEqual({ handle: 'noise1', parameter: 'Cout' });
  });

  it('rejects malformed links', () => {
    expect(() => parseLinkReference('link:noise1')).toThrow(ShaderNetworkError);
    expect(() => parseLinkReference('link:.Cout')).toThrow(ShaderNetworkError);
    expect(() => parseLinkReference('link:noise1.', 'matte')).toThrow('matte: malformed link reference "link:noise1."');
  });
});

describe('buildShaderNetwork', () => {
  it('assigns handles and separates literals from links', () => {
    const network = buildShaderNetwork(NOISE_INTO_MATTE);
    expect(network.nodes).toEqual([
      { name: 'noise', handle: 'noise1', literals: [['scale', 4]], links: [] },
      {
        name: 'matte',
        handle: 'surface',
        literals: [['Kd', 0.8]],
        links: [{ parameter: 'Cs', sourceHandle: 'noise1', sourceParameter: 'Cout' }],
      },
    ]);
    expect(network.hash).toBe(hashShaderAssignment(NOISE_INTO_MATTE));
  });

  it('drops internal parameters', () => {
    const network = buildShaderNetwork({
      type: 'shader',
      nodes: [{ name: 'matte', parameters: { __private: 1, Kd: 1 } }],
    });
    expect(network.nodes[0].literals).toEqual([['Kd', 1]]);
  });

  it('rejects links to handles that are not defined earlier', () => {
    expect(() =>
      buildShaderNetwork({
        type: 'shader',
        nodes: [
          { name: 'matte', parameters: { Cs: 'link:noise1.Cout' } },
          { name: 'noise', parameters: { __handle: 'noise1' } },
        ],
      })
    ).toThrow('matte: parameter "Cs" links to "noise1", which is not defined by an earlier node');
  });

  it('rejects self links', () => {
    expect(() =>
      buildShaderNetwork({
        type: 'shader',
        nodes: [{ name: 'matte', parameters: { Cs: 'link:surface.Cout' } }],
      })
    ).toThrow(ShaderNetworkError);
  });

  it('rejects duplicate handles', () => {
    expect(() =>
      buildShaderNetwork({
        type: 'shader',
        nodes: [
          { name: 'matte', parameters: {} },
          { name: 'plastic', parameters: {} },
        ],
      })
    ).toThrow('plastic: duplicate handle "surface"');
  });

  it('rejects empty assignments', () => {
    expect(() => buildShaderNetwork({ type: 'shader', nodes: [] })).toThrow('shader assignment has no nodes');
  });

  it('rejects non-string handles', () => {
    expect(() =>
      buildShaderNetwork({ type: 'shader', nodes: [{ name: 'matte', parameters: { __handle: 3 } }] })
    ).toThrow('matte: __handle must be a non-empty string');
  });

  it('rejects literal parameter names that are not XML names', () => {
    expect(() =>
      buildShaderNetwork({ type: 'shader', nodes: [{ name: 'matte', parameters: { 'K"d x': 1 } }] })
    ).toThrow('matte: invalid parameter name "K\\"d x"');
    expect(() =>
      buildShaderNetwork({ type: 'shader', nodes: [{ name: 'matte', parameters: { '2Kd': 1 } }] })
    ).toThrow(ShaderNetworkError);
  });

  it('accepts dotted and hyphenated parameter names', () => {
    const network = buildShaderNetwork({
      type: 'shader',
      nodes: [{ name: 'matte', parameters: { 'base.color-tint': 1, _Kd: 0.5 } }],
    });
    expect(network.nodes[0].literals).toEqual([
      ['base.color-tint', 1],
      ['_Kd', 0.5],
    ]);
  });
});

describe('hashShaderAssignment', () => {
  it('is a 16 digit hex string', () => {
    expect(hashShaderAssignment(NOISE_INTO_MATTE)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('ignores parameter declaration order', () => {
    const reordered: ShaderAssignment = {
      type: 'shader',
      nodes: [
        { name: 'noise', parameters: { scale: 4, __handle: 'noise1' } },
        { name: 'matte', parameters: { Cs: 'link:noise1.Cout', Kd: 0.8 } },
      ],
    };
    expect(hashShaderAssignment(reordered)).toBe(hashShaderAssignment(NOISE_INTO_MATTE));
  });

  it('changes when any value changes', () => {
    const changed: ShaderAssignment = {
      type: 'shader',
      nodes: [
        { name: 'noise', parameters: { __handle: 'noise1', scale: 5 } },
        { name: 'matte', parameters: { Kd: 0.8, Cs: 'link:noise1.Cout' } },
      ],
    };
    expect(hashShaderAssignment(changed)).not.toBe(hashShaderAssignment(NOISE_INTO_MATTE));
  });

  it('distinguishes values of different types', () => {
    const asNumber: ShaderAssignment = { type: 'shader', nodes: [{ name: 'matte', parameters: { Kd: 1 } }] };
    const asString: ShaderAssignment = { type: 'shader', nodes: [{ name: 'matte', parameters: { Kd: '1' } }] };
    expect(hashShaderAssignment(asNumber)).not.toBe(hashShaderAssignment(asString));
  });
});
