import { spawn } from 'node:child_process';

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type RunCommandOptions = {
  timeoutMs: number;
};

export class CommandNotFoundError extends Error {
  constructor(readonly command: string) {
    super(`"${command}" not found on PATH`);
    this.name = 'CommandNotFoundError';
  }
}

export class CommandTimeoutError extends Error {
  constructor(readonly command: string, readonly args: string[], readonly timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms (${command} ${args.join(' ')})`);
    this.name = 'CommandTimeoutError';
  }
}

/** Time a process gets to exit after SIGTERM before it is sent SIGKILL. */
export const KILL_GRACE_MS = 2000;

/**
 * Run a short-lived process and collect its output.
 *
 * Resolves with the exit code whatever it is; rejects only when the process
 * cannot be started or outlives `timeoutMs`. A timed-out process is sent
 * SIGTERM, then SIGKILL after `KILL_GRACE_MS`, and the promise rejects once it
 * has closed.
 */
export function runCommand(command: string, args: string[], options: RunCommandOptions): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: process.env
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timedOut = false;
    let killTimeoutId: NodeJS.Timeout | undefined;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      clearTimeout(killTimeoutId);
      settle();
    };

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      killTimeoutId = setTimeout(() => {
        child.kill('SIGKILL');
      }, KILL_GRACE_MS);
    }, options.timeoutMs);

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      if (timedOut) return;
      finish(() => {
        if ('code' in error && error.code === 'ENOENT') {
          reject(new CommandNotFoundError(command));
          return;
        }
        reject(error);
      });
    });

    child.on('close', (code) => {
      finish(() => {
        if (timedOut) {
          reject(new CommandTimeoutError(command, args, options.timeoutMs));
          return;
        }
        resolve({ code, stdout, stderr });
      });
    });
  });
}
