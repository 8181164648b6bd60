/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Shader introspection
 *
 * Runs `oslinfo` on a compiled shader and parses its parameter listing:
 *
 *   surface "matte"
 *       "Kd" "float"
 *           Default value: 1
 *       "Cout" "output color"
 *
 * Lines that do not declare a parameter are ignored.
 */

import { execFileSync } from 'child_process';

export const OSLINFO_ENV = 'CYCLES_XML_OSLINFO';

export type ParameterDirection = 'input' | 'output';

export interface ShaderParameterDeclaration {
  name: string;
  /** OSL type, e.g. "float", "color", "float[3]", "closure color" */
  type: string;
  direction: ParameterDirection;
}

/** Output every surface shader provides */
export const SURFACE_OUTPUT: ShaderParameterDeclaration = {
  name: 'Ci',
  type: 'closure color',
  direction: 'output',
};

const PRIMITIVE_TYPES = new Set(['int', 'float', 'point', 'vector', 'normal', 'color', 'matrix', 'string']);

/** Error thrown when the introspection tool fails */
export class ShaderIntrospectionError extends Error {
  constructor(
    public readonly binaryPath: string,
    reason: string
  ) {
    super(`Failed to introspect shader ${binaryPath}: ${reason}`);
    this.name = 'ShaderIntrospectionError';
  }
}

export interface ShaderIntrospector {
  /** Raw introspection listing for a compiled shader */
  introspect(binaryPath: string): string;
}

interface Token {
  text: string;
  quoted: boolean;
}

function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  for (const match of line.matchAll(/"([^"]*)"|(\S+)/g)) {
    tokens.push(match[1] !== undefined ? { text: match[1], quoted: true } : { text: match[2], quoted: false });
  }
  return tokens;
}

function isPrimitiveType(type: string): boolean {
  return PRIMITIVE_TYPES.has(type.replace(/\[\d*\]$/, ''));
}

/**
 * Parse one line of introspection output
 */
export function parseShaderInfoLine(line: string): ShaderParameterDeclaration | null {
  const tokens = tokenize(line);
  if (tokens.length < 2) return null;
  const [first, second] = tokens;

  if (!first.quoted) {
    return first.text === 'surface' && second.quoted ? SURFACE_OUTPUT : null;
  }
  if (!second.quoted) return null;

  const typeWords = second.text.trim().split(/\s+/);
  const leading = typeWords[0];
  if (leading === 'output') {
    if (typeWords.length < 2) return null;
    return { name: first.text, type: typeWords.slice(1).join(' '), direction: 'output' };
  }
  if (isPrimitiveType(leading)) {
    return { name: first.text, type: typeWords.join(' '), direction: 'input' };
  }
  return null;
}

/**
 * Parse a full introspection listing into parameter declarations, in order
 */
export function parseShaderInfo(text: string): ShaderParameterDeclaration[] {
  const declarations: ShaderParameterDeclaration[] = [];
  const seen = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const declaration = parseShaderInfoLine(line);
    if (!declaration) continue;
    const key = `${declaration.direction}:${declaration.name}`;
    if (seen.has(key)) continue;
    seen.add(key);
    declarations.push(declaration);
  }
  return declarations;
}

/**
 * Introspector backed by the `oslinfo` command line tool
 */
export class OslInfoIntrospector implements ShaderIntrospector {
  readonly command: string;

  constructor(command: string = process.env[OSLINFO_ENV] ?? 'oslinfo') {
    this.command = command;
  }

  introspect(binaryPath: string): string {
    try {
      return execFileSync(this.command, [binaryPath], {
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw new ShaderIntrospectionError(binaryPath, error instanceof Error ? error.message : String(error));
    }
  }
}
