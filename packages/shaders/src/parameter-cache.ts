/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ShaderParameterDeclaration } from './introspection.js';

/**
 * Parameter declarations keyed by shader binary path.
 *
 * Entries are computed on first use and never invalidated: compiled shaders
 * do not change during an export session. Share one instance across exports
 * to avoid introspecting the same binary twice.
 */
export class ShaderParameterCache {
  private readonly entries = new Map<string, readonly ShaderParameterDeclaration[]>();

  getOrCompute(
    binaryPath: string,
    compute: (binaryPath: string) => readonly ShaderParameterDeclaration[]
  ): readonly ShaderParameterDeclaration[] {
    const cached = this.entries.get(binaryPath);
    if (cached) return cached;

    const declarations = Object.freeze([...compute(binaryPath)]);
    this.entries.set(binaryPath, declarations);
    return declarations;
  }

  get size(): number {
    return this.entries.size;
  }
}
