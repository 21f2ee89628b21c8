// api/_lib/logger.ts
import { env } from './env';

export type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: Record<Level, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

function isLevel(input: string): input is Level {
  return input in LEVELS;
}

function normalizeLevel(input?: string): Level {
  const v = (input || '').toLowerCase();
  return isLevel(v) ? v : 'info';
}

function pickConsole(level: Level, stderrOnly: boolean): (line: string) => void {
  if (stderrOnly) return console.error;
  switch (level) {
    case 'trace': return console.debug;
    case 'debug': return console.debug;
    case 'info':  return console.info;
    case 'warn':  return console.warn;
    case 'error': return console.error;
    case 'fatal': return console.error;
    default:      return console.log;
  }
}

function isErrorLike(x: unknown): x is Error {
  return x instanceof Error;
}

const DEFAULT_REDACTIONS = ['authorization', 'password', 'token', 'api_key', 'apikey', 'secret'];

function redact(obj: unknown, extraKeys: string[] = []): unknown {
  const keys = new Set([...DEFAULT_REDACTIONS, ...extraKeys].map(k => k.toLowerCase()));
  const seen = new WeakSet<object>();

  function walk(value: unknown): unknown {
    if (value == null) return value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (typeof value === 'function') return undefined;
    if (isErrorLike(value)) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }
    if (value instanceof RegExp) return value.source;
    if (typeof value !== 'object') return value;
    if (seen.has(value)) return '[Circular]';
    seen.add(value);

    if (Array.isArray(value)) return value.map(walk);

    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = keys.has(k.toLowerCase()) ? '[REDACTED]' : walk(v);
    }
    return out;
  }

  return walk(obj);
}

function safeStringify(obj: unknown, limit = 8 * 1024): string {
  try {
    const s = JSON.stringify(obj);
    if (s === undefined) return '"[Unserializable]"';
    if (s.length <= limit) return s;
    return s.slice(0, limit) + '…';
  } catch {
    return '"[Unserializable]"';
  }
}

export interface Logger {
  trace(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  fatal(message: string, data?: unknown): void;
  child(bindings: Record<string, unknown>): Logger;
  /** Route every level to stderr, keeping stdout for command output. */
  logToStderr(): void;
}

interface LoggerConfig {
  level: Level;
  service: string;
  env: string;
  pretty: boolean;
  silent: boolean;
  stderrOnly: boolean;
  redactKeys: string[];
}

function defaultConfig(): LoggerConfig {
  return {
    level: normalizeLevel(env.LOG_LEVEL),
    service: 'spiral-markers',
    env: env.NODE_ENV,
    pretty: env.NODE_ENV !== 'production' || process.env.PRETTY_LOGS === '1',
    silent: process.env.LOG_SILENT === '1',
    stderrOnly: false,
    redactKeys: [],
  };
}

class ConsoleLogger implements Logger {
  private config: LoggerConfig;
  private bindings: Record<string, unknown>;

  // Children hold the root's config object, so settings changed later reach them too
  constructor(config: LoggerConfig = defaultConfig(), bindings: Record<string, unknown> = {}) {
    this.config = config;
    this.bindings = bindings;
  }

  logToStderr(): void {
    this.config.stderrOnly = true;
  }

  private shouldLog(level: Level): boolean {
    if (this.config.silent) return false;
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private baseEntry(level: Level, message: string, data?: unknown): Record<string, unknown> {
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      service: this.config.service,
      env: this.config.env,
      message,
      ...this.bindings,
    };

    if (isErrorLike(data)) {
      entry.error = { name: data.name, message: data.message, stack: data.stack };
    } else if (data !== undefined) {
      const redacted = redact(typeof data === 'object' && data !== null ? data : { data }, this.config.redactKeys);
      if (redacted && typeof redacted === 'object') Object.assign(entry, redacted);
    }
    return entry;
  }

  private log(level: Level, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    const writer = pickConsole(level, this.config.stderrOnly);

    if (this.config.pretty) {
      const ctx = Object.keys(this.bindings).length
        ? ` [${Object.entries(this.bindings).map(([k, v]) => `${k}=${String(v)}`).join(', ')}]`
        : '';
      const tail = data !== undefined ? ' ' + safeStringify(redact(data, this.config.redactKeys)) : '';
      writer(`[${new Date().toISOString()}] ${level.toUpperCase()}${ctx}: ${message}${tail}`);
    } else {
      writer(safeStringify(this.baseEntry(level, message, data)));
    }
  }

  trace(msg: string, data?: unknown) { this.log('trace', msg, data); }
  debug(msg: string, data?: unknown) { this.log('debug', msg, data); }
  info (msg: string, data?: unknown) { this.log('info',  msg, data); }
  warn (msg: string, data?: unknown) { this.log('warn',  msg, data); }
  error(msg: string, data?: unknown) { this.log('error', msg, data); }
  fatal(msg: string, data?: unknown) { this.log('fatal', msg, data); }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.bindings, ...bindings });
  }
}

// Base logger instance
export const logger: Logger = new ConsoleLogger();

// Module-scoped child helper
export function withModule(moduleName: string, extra: Record<string, unknown> = {}): Logger {
  return logger.child({ module: moduleName, ...extra });
}

// Time a synchronous engine step and log its duration
export function timeOperation<T>(
  log: Logger,
  operationName: string,
  operation: () => T,
  extra?: Record<string, unknown>
): T {
  const startTime = Date.now();
  try {
    log.debug(`Starting ${operationName}`, extra);
    const result = operation();
    log.info(`Completed ${operationName}`, { duration_ms: Date.now() - startTime, ...extra });
    return result;
  } catch (error) {
    log.error(`Failed ${operationName}`, { duration_ms: Date.now() - startTime, error, ...extra });
    throw error;
  }
}
