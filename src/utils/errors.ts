export const ErrorCode = {
  ReadTimeout: 'READ_TIMEOUT',
  ExpectTimeout: 'EXPECT_TIMEOUT',
  SessionClosed: 'SESSION_CLOSED',
  SessionBusy: 'SESSION_BUSY',
  LaunchFailed: 'LAUNCH_FAILED',
  EndOfStream: 'END_OF_STREAM',
  ReaderFault: 'READER_FAULT',
  InvalidConfig: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PtyExpectError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly data?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ReadTimeoutError extends PtyExpectError {
  constructor(readonly timeout: number) {
    super(ErrorCode.ReadTimeout, `Timeout ${formatSeconds(timeout)}`, { timeout });
  }
}

export class ExpectTimeoutError extends PtyExpectError {
  constructor(
    readonly pattern: RegExp,
    readonly timeout: number | undefined,
    readonly buffer: string
  ) {
    let message = `Timeout ${formatSeconds(timeout ?? Number.POSITIVE_INFINITY)} for ${pattern}`;
    if (buffer) {
      message += ` buffer ${JSON.stringify(buffer)}`;
    }
    super(ErrorCode.ExpectTimeout, message, { pattern: pattern.source, timeout, buffer });
  }
}

export class SessionClosedError extends PtyExpectError {
  constructor(operation: string) {
    super(ErrorCode.SessionClosed, `Session is closed: cannot ${operation}`, { operation });
  }
}

export class SessionBusyError extends PtyExpectError {
  constructor(operation: string) {
    super(ErrorCode.SessionBusy, `Another read is in progress: cannot ${operation}`, { operation });
  }
}

export class LaunchError extends PtyExpectError {
  constructor(readonly command: string[], reason: string, cause?: unknown) {
    super(ErrorCode.LaunchFailed, `Failed to launch ${command.join(' ')}: ${reason}`, { command }, { cause });
  }
}

/**
 * The child went away. Expected when the process exits or is killed.
 */
export class EndOfStreamError extends PtyExpectError {
  constructor(
    readonly exitCode: number,
    readonly signal: number | null
  ) {
    super(
      ErrorCode.EndOfStream,
      signal ? `End of stream: process killed by signal ${signal}` : `End of stream: process exited with code ${exitCode}`,
      { exitCode, signal }
    );
  }
}

export class ReaderFaultError extends PtyExpectError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.ReaderFault, message, undefined, { cause });
  }
}

export class ConfigError extends PtyExpectError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.InvalidConfig, message, details);
  }
}

/**
 * Wrap any error into a PtyExpectError
 */
export function wrapError(error: unknown, context: string): PtyExpectError {
  if (error instanceof PtyExpectError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new ReaderFaultError(`${context}: ${message}`, error);
}

function formatSeconds(ms: number): string {
  return Number.isFinite(ms) ? `${(ms / 1000).toFixed(3)}s` : 'unbounded';
}
