/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Cycles XML logger - consistent logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that abort an export
 * - warn: Always logged - output was written but may be incomplete
 * - info: Logged when CYCLES_XML_DEBUG=true - general operational info
 * - debug: Logged when CYCLES_XML_DEBUG=true - per-location details
 */

export interface LogContext {
  /** Component/module name (e.g., 'SceneWalker', 'ShaderWriter') */
  component: string;
  /** Operation being performed (e.g., 'walk', 'writeShader') */
  operation?: string;
  /** Scene location, as a "/a/b" string */
  location?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export type Logger = ReturnType<typeof createLogger>;

function isDebugEnabled(): boolean {
  return process.env.CYCLES_XML_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.location !== undefined) {
    prefix += ` ${ctx.location}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  return {
    /**
     * Log an error - always visible
     */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}:`, formatError(error), ctx.data);
        } else {
          console.error(`${prefix} ${message}:`, formatError(error));
        }
      } else if (ctx?.data !== undefined) {
        console.error(`${prefix} ${message}`, ctx.data);
      } else {
        console.error(`${prefix} ${message}`);
      }
    },

    /**
     * Log a warning - always visible
     */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when CYCLES_XML_DEBUG=true
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Log debug - only visible when CYCLES_XML_DEBUG=true
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },
  };
}

