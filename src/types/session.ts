import type { IDisposable } from 'node-pty';
import type { PtyExpectError } from '../utils/errors.js';

export interface PtyExitEvent {
  exitCode: number;
  signal?: number;
}

/**
 * The part of a pty process a session relies on. Data arrives as raw bytes;
 * decoding is the reader's job.
 */
export interface PtyProcess {
  readonly pid: number;
  onData(listener: (data: Buffer) => void): IDisposable;
  onExit(listener: (event: PtyExitEvent) => void): IDisposable;
  write(data: string): void;
  kill(signal?: string): void;
}

/** Item travelling from the reader to the session, in production order */
export type QueueItem =
  | { kind: 'data'; text: string }
  | { kind: 'fault'; error: PtyExpectError };

export interface MatchResult {
  pattern: RegExp;
  match: RegExpExecArray;
  /** Buffered text preceding the match */
  before: string;
  /** The matched text itself */
  after: string;
}

/** Destination for mirrored terminal output (e.g. a test reporter) */
export interface LogSink {
  write(text: string): void;
  flush(): void;
}

export interface ExitStatus {
  exitCode: number;
  signal: number | null;
}

export interface ExpectOptions {
  /** Milliseconds; falls back to the session default, then to no limit */
  timeout?: number;
  /** Treat a string pattern as literal text */
  literal?: boolean;
  /** Report exhaustion as `null` and keep the buffer instead of throwing */
  probe?: boolean;
}

export interface ReadOptions {
  raiseOnTimeout?: boolean;
}

export interface SendOptions {
  eol?: string;
  /** Milliseconds to wait before writing */
  delay?: number;
}
