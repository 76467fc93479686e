import type { IDisposable } from 'node-pty';
import type { PtyExitEvent, PtyProcess } from '../../src/types/session.js';

/**
 * In-process stand-in for a pty child. Tests push output with emit()
 * and end the child with exit().
 */
export class FakePty implements PtyProcess {
  readonly written: string[] = [];
  readonly signals: Array<string | undefined> = [];
  private dataListeners: Array<(data: Buffer) => void> = [];
  private exitListeners: Array<(event: PtyExitEvent) => void> = [];

  constructor(readonly pid = 4242) {}

  onData(listener: (data: Buffer) => void): IDisposable {
    this.dataListeners.push(listener);
    return { dispose: () => { this.dataListeners = this.dataListeners.filter(l => l !== listener); } };
  }

  onExit(listener: (event: PtyExitEvent) => void): IDisposable {
    this.exitListeners.push(listener);
    return { dispose: () => { this.exitListeners = this.exitListeners.filter(l => l !== listener); } };
  }

  write(data: string): void {
    this.written.push(data);
  }

  kill(signal?: string): void {
    this.signals.push(signal);
  }

  emit(data: string | Uint8Array): void {
    const chunk = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    for (const listener of [...this.dataListeners]) {
      listener(chunk);
    }
  }

  /** Emit after `ms` milliseconds */
  emitLater(data: string, ms: number): void {
    setTimeout(() => this.emit(data), ms);
  }

  exit(exitCode = 0, signal?: number): void {
    for (const listener of [...this.exitListeners]) {
      listener({ exitCode, signal });
    }
  }

  get listenerCount(): number {
    return this.dataListeners.length + this.exitListeners.length;
  }
}

/** Sink recording what a session mirrors */
export class MemorySink {
  chunks: string[] = [];
  flushes = 0;

  write(text: string): void {
    this.chunks.push(text);
  }

  flush(): void {
    this.flushes++;
  }

  get text(): string {
    return this.chunks.join('');
  }
}
