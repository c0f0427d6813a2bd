/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Schematic library logger - consistent, component-prefixed console logging
 *
 * Log levels:
 * - error: Always logged - failures that abort a read or write
 * - warn: Always logged - tolerated anomalies in an input file
 * - info: Logged when SCHLIB_DEBUG is set - per-document summaries
 * - debug: Logged when SCHLIB_DEBUG is set - per-component/per-stream detail
 *
 * Enable debug logging with the SCHLIB_DEBUG=true environment variable.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Module name (e.g., 'SchLibReader', 'SectionKeys') */
  component: string;
  /** Operation being performed (e.g., 'readComponent') */
  operation?: string;
  /** Library reference of the component being processed */
  libReference?: string;
  /** Container stream name */
  stream?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

function isDebugEnabled(): boolean {
  return process.env.SCHLIB_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.libReference !== undefined) {
    prefix += ` <${ctx.libReference}>`;
  }
  if (ctx.stream) {
    prefix += ` (${ctx.stream})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
}

/**
 * Create a logger instance for a specific module
 */
export function createLogger(component: string): Logger {
  return {
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        console.error(`${prefix} ${message}:`, formatError(error));
      } else {
        console.error(`${prefix} ${message}`);
      }
    },

    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message, data, ctx) {
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
