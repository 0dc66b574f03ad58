import { createEmptyReport, type RunReport } from '../types/index.js';

export enum ErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  SOURCE = 'SOURCE',
  SUMMARIZE = 'SUMMARIZE',
  DELIVERY = 'DELIVERY',
}

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Missing credentials or invalid settings. Raised before any channel is
 * processed; the run aborts without touching the processed-state file.
 */
export class ConfigurationError extends AppError {
  readonly problems: string[];
  readonly report: RunReport = createEmptyReport();

  constructor(problems: string[] | string) {
    const list = Array.isArray(problems) ? problems : [problems];
    super(ErrorCode.CONFIGURATION, `Invalid configuration: ${list.join('; ')}`);
    this.problems = list;
  }
}

export class SourceError extends AppError {
  readonly channelId?: string;
  readonly videoId?: string;

  constructor(
    message: string,
    context: { channelId?: string; videoId?: string; cause?: unknown } = {}
  ) {
    super(ErrorCode.SOURCE, message, { cause: context.cause });
    this.channelId = context.channelId;
    this.videoId = context.videoId;
  }
}

export class SummarizeError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.SUMMARIZE, message, options);
  }
}

export class DeliveryError extends AppError {
  /** HTTP status or Telegram `error_code`, when the API answered. */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(ErrorCode.DELIVERY, message, { cause: options.cause });
    this.status = options.status;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function toErrorMessage(value: unknown): string {
  return toError(value).message;
}

/**
 * Flattens an error with its cause chain and `code` into one line,
 * e.g. `fetch failed [cause: connect ECONNREFUSED] [code: ECONNREFUSED]`.
 */
export function describeError(error: Error): string {
  const parts: string[] = [error.message];

  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    parts.push(`[cause: ${cause.message}]`);
    const deepCause: unknown = cause.cause;
    if (deepCause instanceof Error) {
      parts.push(`[root: ${deepCause.message}]`);
    }
  } else if (cause !== undefined) {
    parts.push(`[cause: ${String(cause)}]`);
  }

  const code = 'code' in error ? error.code : undefined;
  if (!(error instanceof AppError) && typeof code === 'string') {
    parts.push(`[code: ${code}]`);
  }

  return parts.join(' ');
}
