/**
 * Request Logger Middleware for the Vocab Drill API
 *
 * Logs method, path, status and response time of every request:
 *
 * ```
 * [API] GET     /api/cards/due 200 - 3ms
 * [API] POST    /api/cards/vc_1f0c.../review 200 - 812ms (slow)
 * ```
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ slowThresholdMs: 250 }));
 * ```
 */

import type { MiddlewareHandler, Context } from 'hono';

export interface LoggerConfig {
  prefix: string;
  includeTimestamp: boolean;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  colorize: boolean;
  /** Requests taking at least this long are marked "(slow)"; 0 disables */
  slowThresholdMs: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
  slowThresholdMs: 500,
};

/** One finished request, as the logger sees it. */
export interface RequestLogEntry {
  method: string;
  path: string;
  status: number;
  durationMs: number;
  finishedAt: Date;
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function statusColor(status: number): string {
  if (status >= 500) return ANSI.red;
  if (status >= 400) return ANSI.yellow;
  if (status >= 300) return ANSI.cyan;
  return ANSI.green;
}

// Reads are cyan, writes green, deletes red
function methodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return ANSI.cyan;
    case 'DELETE':
      return ANSI.red;
    default:
      return ANSI.green;
  }
}

/**
 * Milliseconds under one second, seconds above.
 */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Renders the log line for a finished request.
 *
 * @example
 * formatRequestLine(
 *   { method: 'GET', path: '/api/stats', status: 200, durationMs: 4, finishedAt },
 *   { ...DEFAULT_LOGGER_CONFIG, colorize: false }
 * );
 * // '[API] GET /api/stats 200 - 4ms'
 */
export function formatRequestLine(entry: RequestLogEntry, config: LoggerConfig): string {
  const time = formatResponseTime(entry.durationMs);
  const slow = config.slowThresholdMs > 0 && entry.durationMs >= config.slowThresholdMs;

  const line = config.colorize
    ? [
        config.prefix,
        `${methodColor(entry.method)}${entry.method.padEnd(7)}${ANSI.reset}`,
        entry.path,
        `${statusColor(entry.status)}${entry.status}${ANSI.reset}`,
        '-',
        `${slow ? ANSI.yellow : ANSI.dim}${time}${ANSI.reset}`,
      ].join(' ')
    : `${config.prefix} ${entry.method} ${entry.path} ${entry.status} - ${time}`;

  const marked = slow ? `${line} (slow)` : line;
  return config.includeTimestamp ? `[${entry.finishedAt.toISOString()}] ${marked}` : marked;
}

/**
 * Creates the request logger.
 *
 * @param config - Overrides of DEFAULT_LOGGER_CONFIG
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c: Context, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();

    console.log(
      formatRequestLine(
        {
          method: c.req.method,
          path,
          status: c.res.status,
          durationMs: Math.round(performance.now() - startTime),
          finishedAt: new Date(),
        },
        finalConfig
      )
    );
  };
}
