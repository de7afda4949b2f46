/**
 * Logger — pino instance shared by the CLI, aggregator, and MCP server
 */

import { pino, type DestinationStream, type Logger } from 'pino';
import type { MergeDiagnostic } from './types';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** Defaults to stdout. The MCP server passes stderr. */
  destination?: DestinationStream;
}

export function createLogger(options?: LoggerOptions): Logger {
  const level = options?.level || process.env.LOG_LEVEL || 'info';
  if (options?.destination) {
    return pino({ level }, options.destination);
  }
  return pino({ level });
}

export function logDiagnostic(log: Logger, diagnostic: MergeDiagnostic): void {
  const context = { code: diagnostic.code, source: diagnostic.source, ...diagnostic.details };
  switch (diagnostic.level) {
    case 'error':
      log.error(context, diagnostic.message);
      break;
    case 'warn':
      log.warn(context, diagnostic.message);
      break;
    default:
      log.info(context, diagnostic.message);
  }
}
