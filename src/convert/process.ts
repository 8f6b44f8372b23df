import { spawn, ChildProcess } from 'child_process';

export type ProcessFailureReason = 'timeout' | 'aborted' | 'spawn' | 'exit';

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  /** Kill the process group with SIGKILL after this many milliseconds */
  timeout: number;
  /** Kill the process group when aborted */
  signal?: AbortSignal;
  /** Max bytes buffered per stream (default 10MB) */
  maxBuffer?: number;
}

export interface ProcessFailureDetails {
  exitCode?: number;
  signal?: string;
  /** errno code when the process could not be started (ENOENT, EACCES) */
  errno?: string;
  stdout: string;
  stderr: string;
}

/**
 * A child process that could not be started, was killed, or exited non-zero
 */
export class ProcessError extends Error {
  constructor(
    readonly reason: ProcessFailureReason,
    message: string,
    readonly details: ProcessFailureDetails
  ) {
    super(message);
    this.name = 'ProcessError';
  }
}

const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024;

function errnoOf(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * SIGKILL the child and everything it started
 *
 * soffice is a wrapper that starts soffice.bin; killing only the direct
 * child would leave soffice.bin running.
 */
function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    if (process.platform === 'win32') {
      child.kill('SIGKILL');
    } else {
      process.kill(-child.pid, 'SIGKILL');
    }
  } catch {
    // Group already gone; make sure the direct child is too
    child.kill('SIGKILL');
  }
}

/**
 * Run a command to completion without a shell
 *
 * The command runs as the leader of its own process group. Resolves with the
 * captured output when it exits 0. Rejects with a ProcessError otherwise; on
 * timeout, abort or output overflow the whole group is killed with SIGKILL
 * before the promise settles.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions
): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const maxBuffer = options.maxBuffer ?? DEFAULT_MAX_BUFFER;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let stdoutSize = 0;
    let stderrSize = 0;
    let killedFor: 'timeout' | 'aborted' | 'maxBuffer' | undefined;
    let settled = false;

    const output = (): ProcessResult => ({
      stdout: Buffer.concat(stdoutChunks).toString('utf8'),
      stderr: Buffer.concat(stderrChunks).toString('utf8'),
    });

    if (options.signal?.aborted) {
      reject(new ProcessError('aborted', `${command} was aborted`, { stdout: '', stderr: '' }));
      return;
    }

    const child = spawn(command, args, {
      detached: process.platform !== 'win32',
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const stop = (reason: 'timeout' | 'aborted' | 'maxBuffer') => {
      if (killedFor === undefined) {
        killedFor = reason;
        killProcessGroup(child);
      }
    };

    const timer = setTimeout(() => stop('timeout'), options.timeout);
    const onAbort = () => stop('aborted');
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (error: ProcessError | undefined) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else {
        resolve(output());
      }
    };

    child.stdout?.on('data', (chunk: Buffer) => {
      stdoutSize += chunk.length;
      if (stdoutSize > maxBuffer) {
        stop('maxBuffer');
        return;
      }
      stdoutChunks.push(chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderrSize += chunk.length;
      if (stderrSize > maxBuffer) {
        stop('maxBuffer');
        return;
      }
      stderrChunks.push(chunk);
    });

    child.on('error', (error) => {
      if (child.pid !== undefined) {
        // Started, but killing or piping failed; 'close' reports the outcome
        return;
      }
      finish(
        new ProcessError('spawn', `${command} could not be started: ${error.message}`, {
          errno: errnoOf(error),
          ...output(),
        })
      );
    });

    child.on('close', (code, signal) => {
      const details: ProcessFailureDetails = {
        exitCode: code ?? undefined,
        signal: signal ?? undefined,
        ...output(),
      };

      switch (killedFor) {
        case 'timeout':
          finish(
            new ProcessError('timeout', `${command} timed out after ${options.timeout}ms`, {
              ...details,
              signal: 'SIGKILL',
            })
          );
          return;
        case 'aborted':
          finish(new ProcessError('aborted', `${command} was aborted`, details));
          return;
        case 'maxBuffer':
          finish(new ProcessError('exit', `${command} output exceeded the buffer limit`, details));
          return;
      }

      if (code === 0) {
        finish(undefined);
        return;
      }

      const how = code !== null ? `exit code ${code}` : `signal ${signal ?? 'unknown'}`;
      finish(new ProcessError('exit', `${command} failed with ${how}`, details));
    });
  });
}
