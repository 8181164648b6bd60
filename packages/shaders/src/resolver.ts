/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shader metadata resolution: name -> binary path -> parameter declarations
 */

import { createLogger } from '@cycles-xml/scene';
import {
  OslInfoIntrospector,
  parseShaderInfo,
  type ShaderIntrospector,
  type ShaderParameterDeclaration,
} from './introspection.js';
import { ShaderParameterCache } from './parameter-cache.js';
import { ShaderSearchPath } from './search-path.js';

const log = createLogger('ShaderResolver');

export interface ResolvedShader {
  name: string;
  /** Path of the compiled binary */
  path: string;
  parameters: readonly ShaderParameterDeclaration[];
}

export interface ShaderMetadataResolver {
  resolve(shaderName: string): ResolvedShader;
}

export interface OslShaderMetadataResolverOptions {
  /** Defaults to OSL_SHADER_PATHS */
  searchPath?: ShaderSearchPath;
  /** Defaults to running oslinfo */
  introspector?: ShaderIntrospector;
  /** Pass a shared cache to reuse declarations across resolvers */
  cache?: ShaderParameterCache;
}

export class OslShaderMetadataResolver implements ShaderMetadataResolver {
  readonly searchPath: ShaderSearchPath;
  readonly cache: ShaderParameterCache;
  private readonly introspector: ShaderIntrospector;

  constructor(options: OslShaderMetadataResolverOptions = {}) {
    this.searchPath = options.searchPath ?? ShaderSearchPath.fromEnvironment();
    this.introspector = options.introspector ?? new OslInfoIntrospector();
    this.cache = options.cache ?? new ShaderParameterCache();
  }

  resolve(shaderName: string): ResolvedShader {
    const path = this.searchPath.resolve(shaderName);
    const parameters = this.cache.getOrCompute(path, (binaryPath) => {
      const declarations = parseShaderInfo(this.introspector.introspect(binaryPath));
      log.debug(`Introspected ${binaryPath}`, { parameters: declarations.length });
      if (declarations.length === 0) {
        log.warn(`No parameters declared by ${binaryPath}`, { operation: 'resolve' });
      }
      return declarations;
    });
    return { name: shaderName, path, parameters };
  }
}
