/**
 * Observability Module - structured logging for parse and field extraction
 */

export type { LogLevel } from '../config/constants.js';

export type {
  LogContext,
  LogEntry,
  Span,
  LogOutput,
  StructuredLogger,
  CreateLoggerOptions,
} from './logger.js';

export {
  ConsoleOutput,
  BufferOutput,
  createStructuredLogger,
  loggerFromConfig,
} from './logger.js';
