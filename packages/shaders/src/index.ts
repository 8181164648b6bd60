/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @cycles-xml/shaders - OSL shader networks and metadata
 */

export {
  buildShaderNetwork,
  hashShaderAssignment,
  parseLinkReference,
  isInternalParameter,
  ShaderNetworkError,
  DEFAULT_SHADER_HANDLE,
  HANDLE_PARAMETER,
  LINK_PREFIX,
  type ShaderNetwork,
  type ShaderNetworkNode,
  type ShaderLink,
} from './network.js';
export {
  ShaderSearchPath,
  ShaderResolutionError,
  parseSearchPath,
  SHADER_PATH_ENV,
  SHADER_EXTENSION,
} from './search-path.js';
export {
  OslInfoIntrospector,
  ShaderIntrospectionError,
  parseShaderInfo,
  parseShaderInfoLine,
  SURFACE_OUTPUT,
  OSLINFO_ENV,
  type ShaderIntrospector,
  type ShaderParameterDeclaration,
  type ParameterDirection,
} from './introspection.js';
export { ShaderParameterCache } from './parameter-cache.js';
export {
  OslShaderMetadataResolver,
  type ShaderMetadataResolver,
  type ResolvedShader,
  type OslShaderMetadataResolverOptions,
} from './resolver.js';
export { xxhash64, xxhash64Hex } from './utils/hash.js';
