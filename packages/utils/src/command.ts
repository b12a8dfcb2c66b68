/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Line-by-line output callbacks
 * - Cancellation through AbortSignal
 */

import { spawn, SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
  killGracePeriod?: number; // milliseconds between SIGTERM and SIGKILL
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

/**
 * Anything that can run an external command the way executeCommand does.
 * Media wrappers take one of these so tests can substitute a fake.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Split a chunked stream into complete lines
 */
function createLineSplitter(onLine: (line: string) => void): {
  push: (chunk: string) => void;
  flush: () => void;
} {
  let buffer = '';
  return {
    push(chunk: string) {
      buffer += chunk;
      const lines = buffer.split(/\r?\n|\r/);
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        onLine(line);
      }
    },
    flush() {
      if (buffer.length > 0) {
        onLine(buffer);
        buffer = '';
      }
    },
  };
}

/**
 * Execute an external command safely
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    killGracePeriod = 10000,
    signal,
    onStdoutLine,
    onStderrLine,
  } = options;

  const startTime = Date.now();
  let timedOut = false;
  let aborted = false;

  if (signal?.aborted) {
    return {
      exitCode: 130,
      stdout: '',
      stderr: '',
      duration: 0,
      timedOut: false,
      aborted: true,
    };
  }

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

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

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    const stdoutLines = onStdoutLine ? createLineSplitter(onStdoutLine) : undefined;
    const stderrLines = onStderrLine ? createLineSplitter(onStderrLine) : undefined;

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      stdoutLines?.push(chunk);
      if (stdoutSize < maxOutputSize) {
        stdout += chunk;
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      const chunk = data.toString();
      stderrLines?.push(chunk);
      if (stderrSize < maxOutputSize) {
        stderr += chunk;
        stderrSize += data.length;
      }
    });

    const release = (): void => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    child.on('close', (code, exitSignal) => {
      release();
      stdoutLines?.flush();
      stderrLines?.flush();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
        aborted,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      release();
      reject(error);
    });
  });
}
