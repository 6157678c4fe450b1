import createDebug from 'debug';
import type { Debugger } from 'debug';

export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

// Plain text output.
if (createDebug.inspectOpts) {
  createDebug.inspectOpts.colors = false;
}

// LSP_PIPE_DEBUG enables namespaces on top of whatever DEBUG already enables.
if (process.env.LSP_PIPE_DEBUG) {
  createDebug.enable(
    [process.env.DEBUG, process.env.LSP_PIPE_DEBUG]
      .filter((value): value is string => Boolean(value))
      .join(','),
  );
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LSP_PIPE_DEBUG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'debug';
}

export interface DebugLoggerOptions {
  /** Replaces the stderr writer of the underlying debug instance. */
  output?: (...args: unknown[]) => void;
  level?: LogLevel;
  enabled?: boolean;
}

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private _level: LogLevel;

  /** One logger per namespace; later calls return the cached instance. */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static resetForTesting(): void {
    DebugLogger.instances.clear();
  }

  constructor(namespace: string, options: DebugLoggerOptions = {}) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    if (options.output) {
      this.debugInstance.log = options.output;
    }
    if (options.enabled !== undefined) {
      this.debugInstance.enabled = options.enabled;
    }
    this._level = options.level ?? levelFromEnv();
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this.debugInstance.enabled;
  }

  set enabled(value: boolean) {
    this.debugInstance.enabled = value;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(value: LogLevel) {
    this._level = value;
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this.debugInstance.enabled) {
      return; // message functions are never evaluated while disabled
    }
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this._level]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    const tag = level === 'warn' || level === 'error' ? `${level.toUpperCase()} ` : '';
    // '%s' keeps debug from interpreting format directives inside the message.
    this.debugInstance('%s', `${tag}${message}`, ...args);
  }
}
