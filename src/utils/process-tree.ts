import { execFileSync } from 'node:child_process';
import type { Logger } from './logger.js';

const PGREP_TIMEOUT_MS = 2000;

/**
 * All descendants of `pid`, children before grandchildren.
 * Jobs a shell started under job control live in their own process groups,
 * so they are only reachable through the parent chain.
 */
export function listDescendants(pid: number): number[] {
  if (process.platform === 'win32' || pid <= 0) {
    return [];
  }

  const pids: number[] = [];
  for (const childPid of listChildren(pid)) {
    pids.push(childPid, ...listDescendants(childPid));
  }
  return pids;
}

function listChildren(pid: number): number[] {
  let output: string;
  try {
    output = execFileSync('pgrep', ['-P', String(pid)], {
      encoding: 'utf-8',
      timeout: PGREP_TIMEOUT_MS,
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  } catch {
    // pgrep exits 1 when there are no children
    return [];
  }
  return output
    .split('\n')
    .map(line => parseInt(line, 10))
    .filter(childPid => !Number.isNaN(childPid));
}

/**
 * Best-effort signal; a process that is already gone is not an error.
 */
export function signalProcess(pid: number, signal: NodeJS.Signals, log: Logger): void {
  if (process.platform === 'win32' || pid === 0) {
    return;
  }
  try {
    process.kill(pid, signal);
  } catch (error) {
    log.debug({ pid, signal, error }, 'Failed to signal process (may not exist)');
  }
}
