/**
 * Command Execution Wrapper
 *
 * Runs external tools (ffmpeg, ffprobe) with:
 * - Timeout handling (SIGTERM, then SIGKILL after a grace period)
 * - Bounded output capture
 * - A classified result instead of a thrown error for non-zero exits
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
  killGracePeriod?: number; // milliseconds between SIGTERM and SIGKILL
  maxOutputSize?: number; // bytes
}

/**
 * Anything that can run a command the way `executeCommand` does.
 * Injected by callers that need to be exercised without the real binary.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 *
 * Resolves with the exit code once the process closes, including after a
 * timeout. Rejects only when the process cannot be spawned at all.
 */
export const executeCommand: CommandRunner = (command, args, options = {}) => {
  const {
    timeout = 300000,
    killGracePeriod = 10000,
    maxOutputSize = 10 * 1024 * 1024,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = (): void => {
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), killGracePeriod);
    };

    const timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeout);

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) {
        clearTimeout(killTimer);
      }
    };

    child.on('close', (code, exitSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
};
