import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';
import { spawn as spawnPty } from 'node-pty';
import type { IPty } from 'node-pty';
import { HandoffQueue } from './queue.js';
import { PtyReader } from './reader.js';
import { Session } from './session.js';
import { loadConfig, mergeConfig, parseConfig } from '../config/load.js';
import type { SessionOptionsInput } from '../types/config.js';
import type { PtyProcess, QueueItem } from '../types/session.js';
import { LaunchError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type Command = string | readonly string[];

export interface AttachOptions extends SessionOptionsInput {
  /** Diagnostics logger; defaults to a pino logger on stderr */
  log?: Logger;
}

export interface SpawnOptions extends AttachOptions {
  /** JSON file with session defaults (falls back to PTY_EXPECT_CONFIG) */
  configPath?: string;
}

/**
 * Start `command` on a fresh pty and return the session driving it.
 */
export function spawn(command: Command, options: SpawnOptions = {}): Session {
  const { log: providedLog, configPath, ...overrides } = options;
  const config = mergeConfig(loadConfig(configPath), overrides);
  const log = providedLog ?? createLogger(config);

  const argv = parseCommand(command);
  const [file, ...args] = argv;
  const env = buildEnv(config.env);
  const cwd = config.cwd ?? process.cwd();

  const executable = resolveExecutable(file, env.PATH);
  if (!executable) {
    log.error({ command: argv }, 'Executable not found');
    throw new LaunchError(argv, `executable not found: ${file}`);
  }

  let pty: IPty;
  try {
    pty = spawnPty(executable, args, {
      name: config.name,
      cols: config.cols,
      rows: config.rows,
      cwd,
      env,
      encoding: null, // raw bytes; the reader decodes
    });
  } catch (error) {
    log.error({ error, command: argv, cwd }, 'Failed to launch');
    const reason = error instanceof Error ? error.message : String(error);
    throw new LaunchError(argv, reason, error);
  }

  log.info({ pid: pty.pid, command: argv, cwd }, 'Session spawned');

  return attach(adaptPty(pty), { ...config, log });
}

/**
 * Build a session around an already running pty process and start reading.
 */
export function attach(pty: PtyProcess, options: AttachOptions = {}): Session {
  const { log: providedLog, ...rest } = options;
  const config = parseConfig(rest);
  const log = providedLog ?? createLogger(config);

  const queue = new HandoffQueue<QueueItem>();
  const reader = new PtyReader(pty, queue, log, config.chunkSize);
  reader.start();

  return new Session({ pty, queue, reader, config, log });
}

/**
 * Scoped use of a session: it is closed however `fn` finishes.
 */
export async function withSession<T>(
  command: Command,
  fn: (session: Session) => Promise<T> | T,
  options: SpawnOptions = {}
): Promise<T> {
  const session = spawn(command, options);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}

export function parseCommand(command: Command): string[] {
  const argv = typeof command === 'string'
    ? command.trim().split(/\s+/).filter(Boolean)
    : [...command];

  if (argv.length === 0 || !argv[0]) {
    throw new LaunchError(argv, 'empty command');
  }
  return argv;
}

/**
 * Locate an executable the way a shell would: paths containing a slash are
 * checked as given, bare names are looked up in PATH.
 */
export function resolveExecutable(file: string, searchPath = process.env.PATH ?? ''): string | null {
  if (process.platform === 'win32') {
    return file;
  }

  const candidates = file.includes('/')
    ? [file]
    : searchPath.split(delimiter).filter(Boolean).map(dir => join(dir, file));

  return candidates.find(isExecutable) ?? null;
}

/**
 * Narrow a node-pty process to what a session needs, normalising data to
 * Buffers (node-pty only emits Buffers when spawned with `encoding: null`).
 */
export function adaptPty(pty: IPty): PtyProcess {
  return {
    pid: pty.pid,
    onData: (listener) =>
      pty.onData((data: string | Buffer) => listener(typeof data === 'string' ? Buffer.from(data, 'utf8') : data)),
    onExit: (listener) => pty.onExit(listener),
    write: (data) => pty.write(data),
    kill: (signal) => pty.kill(signal),
  };
}

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function buildEnv(extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return { ...env, ...extra };
}
