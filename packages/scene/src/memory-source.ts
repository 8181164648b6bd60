/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * In-memory scene source
 *
 * Serves SceneSource queries from a plain location tree, as produced by the
 * scene file loader or built directly in code.
 */

import { MathUtils } from './math.js';
import { formatPath } from './paths.js';
import type {
  Attributes,
  Mat4,
  RenderGlobals,
  SceneObject,
  ScenePath,
  SceneSource,
} from './types.js';

export interface SceneLocation {
  transform?: Mat4;
  attributes?: Attributes;
  object?: SceneObject;
  children?: readonly SceneChild[];
}

export interface SceneChild extends SceneLocation {
  name: string;
}

export interface SceneDescription {
  globals?: RenderGlobals;
  root: SceneLocation;
}

/** Error thrown when a query names a location that does not exist */
export class SceneLocationError extends Error {
  constructor(public readonly path: ScenePath) {
    super(`Scene location does not exist: ${formatPath(path)}`);
    this.name = 'SceneLocationError';
  }
}

const EMPTY_ATTRIBUTES: Attributes = Object.freeze({});

export class InMemorySceneSource implements SceneSource {
  private readonly root: SceneLocation;
  private readonly renderGlobals: RenderGlobals;

  constructor(description: SceneDescription) {
    this.root = description.root;
    this.renderGlobals = description.globals ?? {};
  }

  transform(path: ScenePath): Mat4 {
    return this.require(path).transform ?? MathUtils.identity();
  }

  fullTransform(path: ScenePath): Mat4 {
    let result = MathUtils.identity();
    for (let depth = 0; depth <= path.length; depth++) {
      result = MathUtils.multiply(result, this.transform(path.slice(0, depth)));
    }
    return result;
  }

  object(path: ScenePath): SceneObject | null {
    return this.find(path)?.object ?? null;
  }

  attributes(path: ScenePath): Attributes {
    return this.require(path).attributes ?? EMPTY_ATTRIBUTES;
  }

  childNames(path: ScenePath): readonly string[] {
    return (this.require(path).children ?? []).map((child) => child.name);
  }

  globals(): RenderGlobals {
    return this.renderGlobals;
  }

  private find(path: ScenePath): SceneLocation | undefined {
    let location: SceneLocation | undefined = this.root;
    for (const segment of path) {
      location = location.children?.find((child) => child.name === segment);
      if (!location) return undefined;
    }
    return location;
  }

  private require(path: ScenePath): SceneLocation {
    const location = this.find(path);
    if (!location) {
      throw new SceneLocationError(path);
    }
    return location;
  }
}
