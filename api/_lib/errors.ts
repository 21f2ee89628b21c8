// api/_lib/errors.ts
import type { ZodError } from 'zod';
import type { Category, MarkerKind, Polarity } from './types/markerTypes';

export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string = 'ERR_UNKNOWN', isOperational: boolean = true, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/** Structurally invalid marker configuration. Fatal at load time. */
export class ConfigError extends AppError {
  public readonly issues: readonly ConfigIssue[];

  constructor(message: string, issues: readonly ConfigIssue[] = [], options?: { cause?: unknown }) {
    super(message, 'ERR_CONFIG', true, options);
    this.issues = issues;
  }
}

export type PatternOrigin =
  | { kind: 'category'; category: Category; polarity: Polarity }
  | { kind: 'drift'; group: string };

export interface PatternFailure {
  origin: PatternOrigin;
  markerKind: MarkerKind;
  pattern: string;
  reason: string;
}

function describeOrigin(origin: PatternOrigin): string {
  return origin.kind === 'category'
    ? `${origin.category}/${origin.polarity}`
    : `drift group ${origin.group}`;
}

/**
 * One or more markers failed to compile. `failures` is never empty; the
 * category/polarity/pattern accessors describe the first failure.
 */
export class PatternCompileError extends AppError {
  public readonly failures: readonly PatternFailure[];

  constructor(failures: readonly PatternFailure[]) {
    const [first] = failures;
    const head = first
      ? `Invalid ${first.markerKind} "${first.pattern}" in ${describeOrigin(first.origin)}: ${first.reason}`
      : 'Pattern compilation failed';
    const more = failures.length > 1 ? ` (and ${failures.length - 1} more)` : '';
    super(head + more, 'ERR_PATTERN_COMPILE');
    this.failures = failures;
  }

  get category(): Category | undefined {
    const origin = this.failures[0]?.origin;
    return origin?.kind === 'category' ? origin.category : undefined;
  }

  get polarity(): Polarity | undefined {
    const origin = this.failures[0]?.origin;
    return origin?.kind === 'category' ? origin.polarity : undefined;
  }

  get pattern(): string | undefined {
    return this.failures[0]?.pattern;
  }
}

export class EmptyTranscriptError extends AppError {
  constructor(message: string = 'Cannot aggregate an empty transcript') {
    super(message, 'ERR_EMPTY_TRANSCRIPT');
  }
}

export class AnalysisCancelledError extends AppError {
  public readonly processedUnits: number;

  constructor(processedUnits: number, reason?: unknown) {
    super(`Analysis cancelled after ${processedUnits} unit(s)`, 'ERR_CANCELLED', true, { cause: reason });
    this.processedUnits = processedUnits;
  }
}

export function formatZodError(error: ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function serializeError(e: unknown): { name: string; message: string; code?: string; stack?: string[] } {
  if (e instanceof AppError) {
    return { name: e.name, message: e.message, code: e.code, stack: e.stack?.split('\n').slice(0, 5) };
  }
  if (e instanceof Error) {
    return { name: e.name, message: e.message, stack: e.stack?.split('\n').slice(0, 5) };
  }
  return { name: 'UnknownError', message: String(e) };
}
