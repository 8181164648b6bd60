/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { MathUtils, type Attributes, type Mat4 } from '@cycles-xml/scene';

/**
 * State inherited down the scene hierarchy.
 *
 * transform and attributes are never modified once created; a child gets a
 * new state layered on its parent's. shadersEmitted is shared by the whole
 * document, since a network written once is available to every location.
 */
export interface TraversalState {
  readonly transform: Mat4;
  readonly attributes: Attributes;
  readonly shadersEmitted: Set<string>;
}

export function createRootState(): TraversalState {
  return {
    transform: MathUtils.identity(),
    attributes: Object.freeze({}),
    shadersEmitted: new Set(),
  };
}

/**
 * State for a location: parent transform * local transform, and the
 * parent's attributes overridden by the location's own
 */
export function deriveState(parent: TraversalState, transform: Mat4, attributes: Attributes): TraversalState {
  return {
    transform: MathUtils.multiply(parent.transform, transform),
    attributes:
      Object.keys(attributes).length === 0
        ? parent.attributes
        : Object.freeze({ ...parent.attributes, ...attributes }),
    shadersEmitted: parent.shadersEmitted,
  };
}
