import type { IDisposable } from 'node-pty';
import { IncrementalDecoder } from './decoder.js';
import type { HandoffQueue } from './queue.js';
import type { ExitStatus, PtyExitEvent, PtyProcess, QueueItem } from '../types/session.js';
import { EndOfStreamError, wrapError, type PtyExpectError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Background half of a session: turns pty output into queue items.
 *
 * Faults never escape the pty's event handlers; they are handed to the
 * consumer through the queue, after which the reader detaches and delivers
 * nothing more.
 */
export class PtyReader {
  private readonly decoder = new IncrementalDecoder();
  private dataSubscription: IDisposable | null = null;
  private exitSubscription: IDisposable | null = null;
  private stopRequested = false;
  private finished = false;
  private status: ExitStatus | null = null;

  constructor(
    private readonly pty: PtyProcess,
    private readonly queue: HandoffQueue<QueueItem>,
    private readonly logger: Logger,
    private readonly chunkSize: number = 64 * 1024
  ) {}

  start(): void {
    if (this.exitSubscription || this.finished) {
      return;
    }
    this.dataSubscription = this.pty.onData((data) => this.handleData(data));
    this.exitSubscription = this.pty.onExit((event) => this.handleExit(event));
  }

  /**
   * Stop taking output and mark the upcoming shutdown fault as expected.
   * The exit subscription stays until the child is gone, to record its status.
   */
  stop(): void {
    this.stopRequested = true;
    this.dataSubscription?.dispose();
    this.dataSubscription = null;
  }

  get stopped(): boolean {
    return this.stopRequested;
  }

  get done(): boolean {
    return this.finished;
  }

  get exitStatus(): ExitStatus | null {
    return this.status;
  }

  private handleData(data: Buffer): void {
    if (this.finished || this.stopRequested) {
      return;
    }
    try {
      for (let offset = 0; offset < data.length; offset += this.chunkSize) {
        const text = this.decoder.decode(data.subarray(offset, offset + this.chunkSize));
        if (text) {
          this.queue.put({ kind: 'data', text });
        }
      }
    } catch (error) {
      this.fail(wrapError(error, 'pty reader'));
    }
  }

  private handleExit({ exitCode, signal }: PtyExitEvent): void {
    if (this.finished) {
      return;
    }
    this.status = { exitCode, signal: signal || null };

    try {
      const tail = this.decoder.decode(new Uint8Array(0), true);
      if (tail) {
        this.queue.put({ kind: 'data', text: tail });
      }
    } catch (error) {
      this.fail(wrapError(error, 'pty reader'));
      return;
    }

    this.fail(new EndOfStreamError(exitCode, signal || null));
  }

  private fail(error: PtyExpectError): void {
    this.queue.put({ kind: 'fault', error });
    this.finished = true;

    if (this.stopRequested || error instanceof EndOfStreamError) {
      this.logger.debug({ pid: this.pty.pid, code: error.code, stopRequested: this.stopRequested }, 'Reader finished');
    } else {
      this.logger.error({ pid: this.pty.pid, error }, 'Reader failed');
    }

    this.dataSubscription?.dispose();
    this.exitSubscription?.dispose();
    this.dataSubscription = null;
    this.exitSubscription = null;
  }
}
