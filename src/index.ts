export { spawn, attach, withSession, parseCommand, resolveExecutable } from './terminal/launcher.js';
export type { Command, SpawnOptions, AttachOptions } from './terminal/launcher.js';
export { Session } from './terminal/session.js';
export { IncrementalDecoder } from './terminal/decoder.js';
export { HandoffQueue } from './terminal/queue.js';
export { PrefixedLogSink, createStreamSink } from './terminal/log-sink.js';
export { compilePattern, escapeRegExp } from './terminal/pattern.js';
export { loadConfig, parseConfig, CONFIG_ENV_VAR } from './config/load.js';
export { SessionOptionsSchema } from './types/config.js';
export type { Config, SessionOptionsInput } from './types/config.js';
export type {
  ExitStatus,
  ExpectOptions,
  LogSink,
  MatchResult,
  PtyExitEvent,
  PtyProcess,
  QueueItem,
  ReadOptions,
  SendOptions,
} from './types/session.js';
export {
  ErrorCode,
  PtyExpectError,
  ReadTimeoutError,
  ExpectTimeoutError,
  SessionClosedError,
  SessionBusyError,
  LaunchError,
  EndOfStreamError,
  ReaderFaultError,
  ConfigError,
  wrapError,
} from './utils/errors.js';
export { createLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
