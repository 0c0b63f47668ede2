/**
 * Process-wide pino logger.
 *
 * Everything goes to stderr: in stdio mode stdout carries MCP JSON-RPC.
 * The Fastify server is handed the same instance.
 */

import pino, { type Logger } from 'pino';
import type { LogLevel } from '../config/types.js';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LogLevel | 'silent';
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'ontology-lookup',
      level: options.level ?? 'info',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

/**
 * Logger that drops everything; the default for components built in tests.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
