/**
 * Structured Logger - leveled entries with context and timing spans
 *
 * The engine never logs on its own: callers hand a logger to `parse` or
 * the field accessors when they want to see compatibility fallbacks and
 * parse timings. loggerFromConfig() takes its level from SEXPR_LOG_LEVEL.
 */

import type { EngineConfig, LogLevel } from '../config/constants.js';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context: LogContext;
  spanId?: string;
  /** Milliseconds, on span:end entries */
  duration?: number;
}

/** Timing span; writes span:start when opened and span:end once when ended */
export interface Span {
  readonly id: string;
  addContext(context: LogContext): void;
  /** Duration in ms; 0 when the span had already ended */
  end(): number;
}

export interface LogOutput {
  write(entry: LogEntry): void;
}

export interface StructuredLogger {
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger sharing outputs and level, with extra context on every entry */
  child(context: LogContext): StructuredLogger;
  span(name: string): Span;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let spanSequence = 0;

function nextSpanId(): string {
  spanSequence += 1;
  return `span-${spanSequence.toString(36)}`;
}

class Logger implements StructuredLogger {
  constructor(
    readonly level: LogLevel,
    private readonly outputs: readonly LogOutput[],
    private readonly context: LogContext
  ) {}

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  child(context: LogContext): StructuredLogger {
    return new Logger(this.level, this.outputs, { ...this.context, ...context });
  }

  span(name: string): Span {
    const id = nextSpanId();
    const startedAt = Date.now();
    const spanContext: LogContext = { spanName: name };
    let ended = false;

    this.emit('debug', 'span:start', { spanName: name }, { spanId: id });

    return {
      id,
      addContext: (context) => {
        Object.assign(spanContext, context);
      },
      end: () => {
        if (ended) return 0;
        ended = true;
        const duration = Date.now() - startedAt;
        this.emit('debug', 'span:end', spanContext, { spanId: id, duration });
        return duration;
      },
    };
  }

  private emit(
    level: LogLevel,
    message: string,
    context: LogContext = {},
    extra: Pick<LogEntry, 'spanId' | 'duration'> = {}
  ): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
      ...extra,
    };
    for (const output of this.outputs) {
      try {
        output.write(entry);
      } catch {
        // A failing output must not break parsing
      }
    }
  }
}

// ============================================================================
// Outputs
// ============================================================================

/** One human-readable line per entry: `[prefix] LEVEL message key=value (Nms)` */
export class ConsoleOutput implements LogOutput {
  private readonly prefix: string;

  constructor(options: { prefix?: string } = {}) {
    this.prefix = options.prefix ?? 'sexpr';
  }

  write(entry: LogEntry): void {
    const parts = [`[${this.prefix}]`, entry.level.toUpperCase().padEnd(5), entry.message];
    const fields = Object.entries(entry.context)
      .filter(([key]) => !key.startsWith('_'))
      .map(([key, value]) => `${key}=${typeof value === 'number' || typeof value === 'boolean' ? value : JSON.stringify(value)}`);
    if (fields.length > 0) parts.push(fields.join(' '));
    if (entry.duration !== undefined) parts.push(`(${entry.duration}ms)`);

    const line = parts.join(' ');
    if (entry.level === 'error') console.error(line);
    else if (entry.level === 'warn') console.warn(line);
    else if (entry.level === 'debug') console.debug(line);
    else console.log(line);
  }
}

/** Keeps entries in memory */
export class BufferOutput implements LogOutput {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }

  find(predicate: (entry: LogEntry) => boolean): LogEntry | undefined {
    return this.entries.find(predicate);
  }

  filter(predicate: (entry: LogEntry) => boolean): LogEntry[] {
    return this.entries.filter(predicate);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export interface CreateLoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Prefix of the default console output */
  prefix?: string;
  /** Context added to every entry */
  context?: LogContext;
  /** Replaces the default console output */
  outputs?: LogOutput[];
}

export function createStructuredLogger(options: CreateLoggerOptions = {}): StructuredLogger {
  const outputs = options.outputs ?? [new ConsoleOutput({ prefix: options.prefix })];
  return new Logger(options.level ?? 'info', outputs, options.context ?? {});
}

/**
 * Logger at the level of an EngineConfig (see resolveEngineConfig)
 */
export function loggerFromConfig(
  config: Pick<EngineConfig, 'logLevel'>,
  options: Omit<CreateLoggerOptions, 'level'> = {}
): StructuredLogger {
  return createStructuredLogger({ ...options, level: config.logLevel });
}
