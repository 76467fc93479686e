import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { spawn, withSession } from '../../src/terminal/launcher.js';
import { createLogger } from '../../src/utils/logger.js';
import { MemorySink } from '../helpers/fake-pty.js';

const log = createLogger({ logLevel: 'silent' });
const BASH = '/bin/bash';
const prompt = /[#$] /;

const BASH_ARGV = [BASH, '--noediting', '--norc', '--noprofile'];

// A zombie left for a non-reaping init counts as gone
function isRunning(pid: number): boolean {
  const statPath = `/proc/${pid}/stat`;
  if (existsSync('/proc/self/stat')) {
    if (!existsSync(statPath)) {
      return false;
    }
    const stat = readFileSync(statPath, 'utf-8');
    const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
    return state !== 'Z' && state !== 'X';
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function waitForExit(pid: number, timeoutMs = 3000): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isRunning(pid)) {
      return true;
    }
    await new Promise(resolve => setTimeout(resolve, 50));
  }
  return !isRunning(pid);
}

const shellOptions = {
  log,
  eol: '\r',
  timeout: 10000,
  env: { PS1: 'test$ ', TERM: 'dumb' },
};

describe.skipIf(process.platform === 'win32' || !existsSync(BASH))('bash over a real pty', () => {
  it('captures command output between prompts', async () => {
    await withSession([BASH, '--noediting', '--norc', '--noprofile'], async (terminal) => {
      const sink = new MemorySink();
      terminal.logger(sink, 'bash> ');

      await terminal.expect(prompt);
      await terminal.send('echo foo');
      const result = await terminal.expect(prompt);

      expect(result?.before).toContain('foo');
      expect(sink.text).toContain('foo');
    }, shellOptions);
  });

  it('keeps two sessions apart', async () => {
    const first = spawn([BASH, '--noediting', '--norc', '--noprofile'], shellOptions);
    const second = spawn([BASH, '--noediting', '--norc', '--noprofile'], shellOptions);

    try {
      await first.expect(prompt);
      await second.expect(prompt);

      await second.send('echo only-second');
      await second.expect(prompt);

      await first.send('echo first');
      expect(await first.expect('only-second', { timeout: 300, probe: true })).toBeNull();
      const result = await first.expect(prompt);
      expect(result?.before).toContain('first');
      expect(result?.before).not.toContain('only-second');
    } finally {
      first.close();
      second.close();
    }
  });

  it('round-trips non-ASCII text', async () => {
    await withSession([BASH, '--noediting', '--norc', '--noprofile'], async (terminal) => {
      await terminal.expect(prompt);
      await terminal.send('echo Gãńdåłf');
      await terminal.expect('Gãńdåłf\r\n', { literal: true });
      await terminal.expect(prompt);

      expect(terminal.buffer).toBe('');
    }, { ...shellOptions, env: { ...shellOptions.env, LANG: 'C.UTF-8', LC_ALL: 'C.UTF-8' } });
  });

  it.each([true, false])('ends the shell on close(%s)', async (force) => {
    const terminal = spawn(BASH_ARGV, shellOptions);
    await terminal.expect(prompt);
    const pid = terminal.pid;

    terminal.close(force);

    expect(await waitForExit(pid)).toBe(true);
  });

  it('ends background jobs started by the shell', async () => {
    const terminal = spawn(BASH_ARGV, shellOptions);
    let jobPid = 0;

    try {
      await terminal.expect(prompt);
      await terminal.send('sleep 300 & echo JOB=$!');
      const result = await terminal.expect(/JOB=(\d+)/);
      jobPid = Number(result?.match[1]);
      await terminal.expect(prompt);
      expect(isRunning(jobPid)).toBe(true);
    } finally {
      terminal.close();
    }

    expect(await waitForExit(jobPid)).toBe(true);
  });
});
