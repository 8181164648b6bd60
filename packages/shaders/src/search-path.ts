/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shader search path
 *
 * Locates compiled OSL shaders (.oso) by name in a colon-delimited list of
 * directories. The first directory containing the shader wins.
 */

import { existsSync } from 'fs';
import { isAbsolute, join } from 'path';

export const SHADER_PATH_ENV = 'OSL_SHADER_PATHS';
export const SHADER_EXTENSION = '.oso';

/** Error thrown when a shader cannot be found on the search path */
export class ShaderResolutionError extends Error {
  constructor(
    public readonly shaderName: string,
    public readonly directories: readonly string[]
  ) {
    super(
      directories.length > 0
        ? `Shader "${shaderName}" not found in ${directories.join(', ')}`
        : `Shader "${shaderName}" not found: the shader search path is empty (set ${SHADER_PATH_ENV})`
    );
    this.name = 'ShaderResolutionError';
  }
}

/**
 * Split a colon-delimited path list, dropping empty entries
 */
export function parseSearchPath(value: string): string[] {
  return value.split(':').filter((entry) => entry.length > 0);
}

export class ShaderSearchPath {
  readonly directories: readonly string[];

  constructor(directories: readonly string[] | string) {
    this.directories = typeof directories === 'string' ? parseSearchPath(directories) : [...directories];
  }

  /**
   * Search path from the OSL_SHADER_PATHS environment variable
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): ShaderSearchPath {
    return new ShaderSearchPath(env[SHADER_PATH_ENV] ?? '');
  }

  /**
   * Resolve a shader name to the path of its compiled binary
   */
  resolve(shaderName: string): string {
    const fileName = shaderName.endsWith(SHADER_EXTENSION) ? shaderName : shaderName + SHADER_EXTENSION;

    if (isAbsolute(fileName)) {
      if (existsSync(fileName)) return fileName;
      throw new ShaderResolutionError(shaderName, []);
    }

    for (const directory of this.directories) {
      const candidate = join(directory, fileName);
      if (existsSync(candidate)) {
        return candidate;
      }
    }

    throw new ShaderResolutionError(shaderName, this.directories);
  }
}
