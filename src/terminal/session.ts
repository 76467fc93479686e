import { compilePattern } from './pattern.js';
import { PrefixedLogSink } from './log-sink.js';
import type { HandoffQueue } from './queue.js';
import type { PtyReader } from './reader.js';
import type { Config } from '../types/config.js';
import type {
  ExitStatus,
  ExpectOptions,
  LogSink,
  MatchResult,
  PtyProcess,
  QueueItem,
  ReadOptions,
  SendOptions,
} from '../types/session.js';
import {
  ExpectTimeoutError,
  ReadTimeoutError,
  SessionBusyError,
  SessionClosedError,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { listDescendants, signalProcess } from '../utils/process-tree.js';

export interface SessionParts {
  pty: PtyProcess;
  queue: HandoffQueue<QueueItem>;
  reader: PtyReader;
  config: Config;
  log: Logger;
}

/**
 * Controller for one interactive child on a pty.
 *
 * Output decoded by the reader is retained in a buffer until an expect()
 * consumes it. Everything runs on the event loop, so the closed flag and
 * pty writes are only touched from synchronous sections; read() and
 * expect() are additionally limited to one in flight at a time.
 */
export class Session {
  private isClosed = false;
  private busy = false;
  private pending = '';
  private mirrored = 0; // how much of `pending` the log sink has seen
  private sink: PrefixedLogSink | null = null;
  private defaultTimeout: number | undefined;
  private lineEnding: string;
  private lastBefore: string | null = null;
  private lastAfter: string | null = null;
  private lastMatch: RegExpExecArray | null = null;

  constructor(private readonly parts: SessionParts) {
    this.defaultTimeout = parts.config.timeout;
    this.lineEnding = parts.config.eol;
  }

  get pid(): number {
    return this.parts.pty.pid;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Output received but not yet consumed by a match */
  get buffer(): string {
    return this.pending;
  }

  get before(): string | null {
    return this.lastBefore;
  }

  get after(): string | null {
    return this.lastAfter;
  }

  get match(): RegExpExecArray | null {
    return this.lastMatch;
  }

  get exitStatus(): ExitStatus | null {
    return this.parts.reader.exitStatus;
  }

  timeout(value?: number): number | undefined {
    if (value) {
      this.defaultTimeout = value;
    }
    return this.defaultTimeout;
  }

  eol(value?: string): string {
    if (value) {
      this.lineEnding = value;
    }
    return this.lineEnding;
  }

  /**
   * Attach a sink that mirrors everything expect() consumes.
   * Passing the sink that is already attached keeps the existing wrapper.
   */
  logger(sink?: LogSink, prefix = ''): LogSink | null {
    if (sink && this.sink?.sink !== sink) {
      this.sink = new PrefixedLogSink(sink, prefix);
    }
    return this.sink;
  }

  write(text: string): number {
    this.assertOpen('write');
    this.parts.pty.write(text);
    return Buffer.byteLength(text, 'utf8');
  }

  async send(text: string, options: SendOptions = {}): Promise<number> {
    this.assertOpen('send');
    const eol = options.eol ?? this.lineEnding;
    const delay = options.delay ?? this.parts.config.sendDelay;
    if (delay > 0) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }
    return this.write(text + eol);
  }

  /**
   * Wait up to `timeout` ms for output. Resolves with everything available
   * once something arrives, or null (or a ReadTimeoutError) if nothing did.
   */
  async read(timeout = 0, options: ReadOptions = {}): Promise<string | null> {
    this.assertOpen('read');
    this.acquire('read');
    try {
      const data = await this.readChunk(timeout);
      if (data === null && options.raiseOnTimeout) {
        throw new ReadTimeoutError(timeout);
      }
      return data;
    } finally {
      this.busy = false;
    }
  }

  async expect(pattern: string | RegExp, options: ExpectOptions = {}): Promise<MatchResult | null> {
    this.assertOpen('expect');
    this.acquire('expect');
    try {
      return await this.runExpect(compilePattern(pattern, options.literal), options);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Shut the session down. Safe to call more than once.
   * `force` kills the child with SIGKILL; otherwise it gets SIGTERM and then
   * the hangup a closed terminal delivers.
   */
  close(force = true): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    const { pty, reader, queue, log } = this.parts;
    reader.stop();

    // Collected first: once the child dies its jobs are reparented
    const descendants = listDescendants(pty.pid);
    if (pty.pid > 0) {
      signalProcess(-pty.pid, 'SIGTERM', log);
    }
    for (const pid of descendants) {
      signalProcess(pid, 'SIGTERM', log);
    }

    killPty(pty, force ? 'SIGKILL' : 'SIGTERM', log);
    if (!force) {
      // An interactive shell ignores SIGTERM but exits on hangup
      if (pty.pid > 0) {
        signalProcess(-pty.pid, 'SIGHUP', log);
      }
      killPty(pty, 'SIGHUP', log);
    }

    queue.interrupt();

    if (this.sink) {
      this.sink.write('\n');
      this.sink.flush();
    }

    log.info({ pid: pty.pid, force, descendants: descendants.length }, 'Session closed');
  }

  private async runExpect(pattern: RegExp, options: ExpectOptions): Promise<MatchResult | null> {
    const timeout = options.timeout ?? this.defaultTimeout;
    const probe = options.probe ?? false;
    let timeLeft = timeout ?? Number.POSITIVE_INFINITY;
    let expired = false;

    this.lastMatch = null;
    this.lastBefore = null;
    this.lastAfter = null;

    for (;;) {
      if (this.pending) {
        const match = pattern.exec(this.pending);
        if (match) {
          return this.finishMatch(pattern, match);
        }
        if (!probe) {
          this.mirror(this.pending.length);
        }
      }

      if (expired) {
        return this.finishTimeout(pattern, timeout, probe);
      }

      // Poll in short slices so elapsed time is accounted precisely
      const startedAt = Date.now();
      const data = await this.readChunk(Math.min(timeLeft, this.parts.config.sliceMs));
      timeLeft = Math.max(timeLeft - (Date.now() - startedAt), 0);
      expired = timeLeft <= 0;

      if (data) {
        this.pending += data;
      }
    }
  }

  private finishMatch(pattern: RegExp, match: RegExpExecArray): MatchResult {
    const end = match.index + match[0].length;
    this.mirror(end);

    const before = this.pending.slice(0, match.index);
    const after = match[0];
    this.pending = this.pending.slice(end);
    // Zero unless a lookahead let the match end before already mirrored text
    this.mirrored = Math.max(this.mirrored - end, 0);

    this.lastMatch = match;
    this.lastBefore = before;
    this.lastAfter = after;

    return { pattern, match, before, after };
  }

  private finishTimeout(pattern: RegExp, timeout: number | undefined, probe: boolean): null {
    const buffer = this.pending;
    this.lastBefore = buffer;
    this.lastAfter = null;

    if (probe) {
      this.parts.log.debug({ pid: this.pid, pattern: pattern.source, timeout }, 'Probe expect found no match');
      return null;
    }

    if (this.sink) {
      this.sink.write(`${buffer.slice(this.mirrored)}\n`);
      this.sink.flush();
    }
    this.pending = '';
    this.mirrored = 0;

    this.parts.log.debug({ pid: this.pid, pattern: pattern.source, timeout }, 'Expect timed out');
    throw new ExpectTimeoutError(pattern, timeout, buffer);
  }

  private mirror(upTo: number): void {
    if (!this.sink || upTo <= this.mirrored) {
      return;
    }
    this.sink.write(this.pending.slice(this.mirrored, upTo));
    this.mirrored = upTo;
  }

  /**
   * Collect the next text from the queue, waiting at most `timeout` ms.
   * A fault from the reader is rethrown here, in the caller's context.
   */
  private async readChunk(timeout: number): Promise<string | null> {
    const { queue } = this.parts;
    let timeLeft = timeout;

    for (;;) {
      const startedAt = Date.now();
      const item = await queue.get(timeLeft);
      if (this.isClosed) {
        throw new SessionClosedError('read');
      }
      if (item === undefined) {
        return null;
      }
      if (item.kind === 'fault') {
        throw item.error;
      }

      const data = item.text + this.drainText();
      if (data) {
        return data;
      }
      timeLeft = Math.max(timeLeft - (Date.now() - startedAt), 0);
    }
  }

  // Text chunks that are already queued; stops short of a fault so it
  // surfaces on the next read
  private drainText(): string {
    let text = '';
    for (;;) {
      const item = this.parts.queue.takeIf(candidate => candidate.kind === 'data');
      if (item === undefined || item.kind !== 'data') {
        return text;
      }
      text += item.text;
    }
  }

  private assertOpen(operation: string): void {
    if (this.isClosed) {
      throw new SessionClosedError(operation);
    }
  }

  private acquire(operation: string): void {
    if (this.busy) {
      throw new SessionBusyError(operation);
    }
    this.busy = true;
  }
}

function killPty(pty: PtyProcess, signal: NodeJS.Signals, log: Logger): void {
  try {
    pty.kill(signal);
  } catch (error) {
    log.debug({ pid: pty.pid, signal, error }, 'Failed to signal process (may already be dead)');
  }
}
