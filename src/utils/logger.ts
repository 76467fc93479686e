import pino from 'pino';
import type { Config } from '../types/config.js';

type Destination = ReturnType<typeof pino.destination>;

let stderrDestination: Destination | null = null;

/**
 * The one stderr stream every diagnostics logger in the process writes to.
 * Opened on first use.
 */
export function sharedDestination(): Destination {
  stderrDestination ??= pino.destination({ dest: 2, sync: false }); // fd 2 = stderr
  return stderrDestination;
}

/**
 * Create the diagnostics logger.
 * Writes to stderr so that a script's own stdout stays untouched.
 */
export function createLogger(config: Pick<Config, 'logLevel'>) {
  return pino(
    {
      name: 'pty-expect',
      level: config.logLevel,
    },
    sharedDestination()
  );
}

export type Logger = ReturnType<typeof createLogger>;
