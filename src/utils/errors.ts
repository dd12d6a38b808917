/**
 * Errors that abort a run. Per-file problems never become exceptions; they are
 * recorded as file results instead.
 */

export class LocalegateError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'LocalegateError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ConfigurationError extends LocalegateError {
  constructor(message: string, cause?: unknown) {
    super(`Invalid configuration: ${message}`, cause);
    this.name = 'ConfigurationError';
  }
}

export class InputEnumerationError extends LocalegateError {
  constructor(source: string, cause?: unknown) {
    const suffix = cause !== undefined ? `: ${toErrorMessage(cause)}` : '';
    super(`Cannot enumerate candidate files from ${source}${suffix}`, cause);
    this.name = 'InputEnumerationError';
  }
}

export class ReportWriteError extends LocalegateError {
  constructor(path: string, cause?: unknown) {
    const suffix = cause !== undefined ? `: ${toErrorMessage(cause)}` : '';
    super(`Cannot write report to ${path}${suffix}`, cause);
    this.name = 'ReportWriteError';
  }
}

export class ReportReadError extends LocalegateError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(`Cannot read report ${path}: ${reason}`, cause);
    this.name = 'ReportReadError';
  }
}

export class GatewayError extends LocalegateError {
  constructor(operation: string, cause?: unknown) {
    const suffix = cause !== undefined ? `: ${toErrorMessage(cause)}` : '';
    super(`Pull request ${operation} failed${suffix}`, cause);
    this.name = 'GatewayError';
  }
}

/**
 * Normalize unknown error-like values to a human-readable message.
 */
export function toErrorMessage(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (value !== null && typeof value === 'object' && 'error' in value) {
    const candidate: unknown = value.error;
    if (typeof candidate === 'string') {
      return candidate;
    }
  }
  try {
    return String(value);
  } catch {
    return 'Unknown error';
  }
}
