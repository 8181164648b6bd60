/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ScenePath } from './types.js';

/**
 * Format a scene path as "/a/b" ("/" for the root)
 */
export function formatPath(path: ScenePath): string {
  return '/' + path.join('/');
}

/**
 * Parse a "/a/b" location string into path segments.
 * Empty segments are dropped, so "/", "" and "//" all name the root.
 */
export function parsePath(location: string): string[] {
  return location.split('/').filter((segment) => segment.length > 0);
}
