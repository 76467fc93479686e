import type { Writable } from 'node:stream';
import type { LogSink } from '../types/session.js';

/**
 * Mirrors terminal output into a sink, indenting every line with `prefix`.
 */
export class PrefixedLogSink implements LogSink {
  constructor(
    readonly sink: LogSink,
    readonly prefix = ''
  ) {
    this.sink.write(prefix);
  }

  write(text: string): void {
    if (!text) {
      return;
    }
    this.sink.write(text.replaceAll('\n', `\n${this.prefix}`));
  }

  flush(): void {
    this.sink.flush();
  }
}

/**
 * Adapt a writable stream such as process.stdout to the sink contract.
 * Streams flush on their own, so flush() only exists to satisfy callers.
 */
export function createStreamSink(stream: Writable): LogSink {
  return {
    write: (text) => {
      stream.write(text);
    },
    flush: () => {},
  };
}
