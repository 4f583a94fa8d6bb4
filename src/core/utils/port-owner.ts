/**
 * Port owner lookup and process termination, per platform.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type TerminationSignal = 'SIGTERM' | 'SIGKILL';

/** Resolves the ids of processes listening on a TCP port. */
export type PortOwnerLookup = (port: number) => Promise<number[]>;

/** Sends a termination signal; resolves false when the process could not be signalled. */
export type ProcessTerminator = (pid: number, signal: TerminationSignal) => Promise<boolean>;

function uniquePids(values: number[]): number[] {
  return Array.from(new Set(values.filter((pid) => Number.isInteger(pid) && pid > 0)));
}

export function parseLsofOutput(stdout: string): number[] {
  return uniquePids(
    stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
      .map((line) => Number(line)),
  );
}

/**
 * Picks LISTENING rows bound to `port` out of `netstat -ano` output. The
 * owning pid is the last column.
 */
export function parseNetstatOutput(stdout: string, port: number): number[] {
  const pids: number[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const columns = line.trim().split(/\s+/);
    if (columns.length < 5 || columns[0].toUpperCase() !== 'TCP') continue;
    if (!columns[1].endsWith(`:${port}`)) continue;
    if (columns[3].toUpperCase() !== 'LISTENING') continue;
    pids.push(Number(columns[columns.length - 1]));
  }
  return uniquePids(pids);
}

function hasExitCode(error: unknown, code: number): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function createPortOwnerLookup(platform: NodeJS.Platform = process.platform): PortOwnerLookup {
  if (platform === 'win32') {
    return async (port) => {
      const { stdout } = await execFileAsync('netstat', ['-ano'], { windowsHide: true });
      return parseNetstatOutput(stdout, port);
    };
  }

  return async (port) => {
    try {
      const { stdout } = await execFileAsync('lsof', ['-nP', `-iTCP:${port}`, '-sTCP:LISTEN', '-t']);
      return parseLsofOutput(stdout);
    } catch (error) {
      // lsof exits 1 when nothing matches.
      if (hasExitCode(error, 1)) {
        return [];
      }
      throw error;
    }
  };
}

export function createProcessTerminator(platform: NodeJS.Platform = process.platform): ProcessTerminator {
  if (platform === 'win32') {
    return async (pid) => {
      try {
        await execFileAsync('taskkill', ['/PID', String(pid), '/T', '/F'], { windowsHide: true });
        return true;
      } catch {
        return false;
      }
    };
  }

  return async (pid, signal) => {
    try {
      process.kill(pid, signal);
      return true;
    } catch {
      // already gone
      return false;
    }
  };
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
