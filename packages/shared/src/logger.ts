/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * marimo-docs logger - consistent console logging for the build extension
 * and the browser loader.
 *
 * Log levels:
 * - error: Always logged - a notebook failed to export, a page failed to load
 * - warn: Always logged - degraded output (missing assets, skipped transforms)
 * - info: Logged when debug is enabled - build progress
 * - debug: Logged when debug is enabled - command lines, resolved paths
 *
 * Enable debug logging by setting:
 * - localStorage.setItem('MARIMO_DOCS_DEBUG', 'true') in browser
 * - MARIMO_DOCS_DEBUG=true environment variable in Node.js
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component name (e.g., 'Exporter', 'GalleryBridge', 'Loader') */
  component: string;
  /** Operation being performed (e.g., 'export', 'convertAll') */
  operation?: string;
  /** Notebook name if applicable */
  notebook?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export const DEBUG_FLAG = 'MARIMO_DOCS_DEBUG';

function isDebugEnabled(): boolean {
  if (typeof localStorage !== 'undefined') {
    try {
      if (localStorage.getItem(DEBUG_FLAG) === 'true') return true;
    } catch {
      // localStorage blocked (sandboxed iframes, privacy mode)
    }
  }
  if (typeof process !== 'undefined' && process.env) {
    return process.env[DEBUG_FLAG] === 'true';
  }
  return false;
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.notebook) {
    prefix += ` (${ctx.notebook})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    /**
     * Log an error - always visible in console
     */
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      const line = error !== undefined ? `${prefix} ${message}: ${formatError(error)}` : `${prefix} ${message}`;
      if (ctx?.data !== undefined) {
        console.error(line, ctx.data);
      } else {
        console.error(line);
      }
    },

    /**
     * Log a warning - always visible in console
     */
    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when MARIMO_DOCS_DEBUG=true
     */
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

    /**
     * Log a caught error that was recovered from - visible when MARIMO_DOCS_DEBUG=true
     */
    caught(message, error, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered): ${formatError(error)}`);
    },
  };
}
