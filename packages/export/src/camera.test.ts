/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { InMemorySceneSource, MathUtils, type Mat4, type SceneDescription } from '@cycles-xml/scene';
import { describeCamera, resolveCamera, writeCamera } from './camera.js';
import { getAttribute, renderElement } from './document.js';

const FLIPPED_IDENTITY = '1 0 0 0 0 1 0 0 0 0 -1 0 0 0 0 1';

/** Matrix values with negative zeros normalized */
function values(matrix: Mat4): number[] {
  return Array.from(matrix.m, (v) => v + 0);
}

function sceneWithCamera(globals: SceneDescription['globals']): InMemorySceneSource {
  return new InMemorySceneSource({
    globals,
    root: {
      children: [
        {
          name: 'rig',
          transform: MathUtils.translation({ x: 0, y: 0, z: 5 }),
          children: [
            {
              name: 'cam',
              transform: MathUtils.translation({ x: 1, y: 0, z: 0 }),
              object: {
                type: 'camera',
                parameters: { projection: 'perspective', 'projection:fov': 45, resolution: [1024, 768] },
              },
            },
          ],
        },
        {
          name: 'box',
          object: { type: 'mesh', points: [], verticesPerFace: [], vertexIds: [], interpolation: 'linear' },
        },
      ],
    },
  });
}

describe('describeCamera', () => {
  it('fills in defaults', () => {
    expect(describeCamera({})).toEqual({
      projection: 'orthographic',
      resolution: [640, 480],
      screenWindow: { min: [-640 / 480, -1], max: [640 / 480, 1] },
      clippingPlanes: [0.01, 100000],
    });
  });

  it('defaults the field of view of perspective cameras', () => {
    const camera = describeCamera({ projection: 'perspective' });
    expect(camera.projection === 'perspective' && camera.fov).toBe(90);
  });

  it('treats unknown projections as orthographic', () => {
    expect(describeCamera({ projection: 'fisheye', 'projection:fov': 30 }).projection).toBe('orthographic');
  });

  it('derives the screen window from the aspect ratio', () => {
    expect(describeCamera({ resolution: [200, 100] }).screenWindow).toEqual({ min: [-2, -1], max: [2, 1] });
    expect(describeCamera({ resolution: [100, 200] }).screenWindow).toEqual({ min: [-1, -2], max: [1, 2] });
  });

  it('rejects empty resolutions', () => {
    expect(() => describeCamera({ resolution: [0, 480] })).toThrow(RangeError);
  });
});

describe('resolveCamera', () => {
  it('uses the camera named by the globals with its full transform', () => {
    const source = sceneWithCamera({ camera: '/rig/cam' });
    const { camera, transform } = resolveCamera(source);

    expect(camera.projection).toBe('perspective');
    expect(camera.resolution).toEqual([1024, 768]);
    expect(values(transform)).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, -1, 0, 1, 0, 5, 1]);
  });

  it('applies the resolution override', () => {
    const source = sceneWithCamera({ camera: '/rig/cam', resolution: [320, 200] });
    expect(resolveCamera(source).camera.resolution).toEqual([320, 200]);
  });

  it('applies the resolution override to the default camera', () => {
    const source = sceneWithCamera({ resolution: [320, 200] });
    expect(resolveCamera(source).camera.resolution).toEqual([320, 200]);
  });

  it('falls back to the default camera when the path is not a camera', () => {
    const source = sceneWithCamera({ camera: '/box' });
    const resolved = resolveCamera(source);
    expect(resolved.camera.projection).toBe('orthographic');
    expect(resolved.camera.resolution).toEqual([640, 480]);
    expect(renderElement(writeCamera(resolved))).toBe(
      `<transform matrix="${FLIPPED_IDENTITY}">\n\t<camera width="640" height="480" type="orthographic" />\n</transform>`
    );
  });

  it('falls back to the default camera when the path does not exist', () => {
    const source = sceneWithCamera({ camera: '/nowhere' });
    expect(resolveCamera(source).camera.resolution).toEqual([640, 480]);
  });

  it('uses the default camera without globals', () => {
    const resolved = resolveCamera(sceneWithCamera(undefined));
    expect(values(resolved.transform)).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, -1, 0, 0, 0, 0, 1]);
  });
});

describe('writeCamera', () => {
  it('writes perspective cameras with their field of view', () => {
    const el = writeCamera(resolveCamera(sceneWithCamera({ camera: '/rig/cam' })));
    expect(getAttribute(el, 'matrix')).toBe('1 0 0 0 0 1 0 0 0 0 -1 0 1 0 5 1');
    expect(renderElement(el.children[0])).toBe('<camera width="1024" height="768" type="perspective" fov="45.000000" />');
  });
});
