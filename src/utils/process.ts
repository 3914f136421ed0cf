/**
 * Subprocess Utilities
 *
 * One-shot command execution with timeouts, newline framing for streaming
 * output, and graceful-then-forced termination of long-lived processes.
 */

import { execFile, spawn, type ExecFileException } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';

export interface CommandResult<T extends string | Buffer = string> {
  /** Exit code, -1 when the command timed out or could not be started */
  code: number;
  stdout: T;
  stderr: string;
}

/**
 * The subset of ChildProcess the streaming components depend on
 */
export interface StreamingProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type ProcessSpawner = () => StreamingProcess;

/**
 * Command execution seam used by the platform drivers
 */
export interface CommandRunner {
  run(file: string, args: string[], timeout?: number): Promise<CommandResult>;
  runBinary(file: string, args: string[], timeout?: number): Promise<CommandResult<Buffer>>;
  /** Long-lived process with piped stdout; stdin and stderr are discarded */
  spawn(file: string, args: string[]): StreamingProcess;
}

const MAX_BUFFER = 50 * 1024 * 1024;

const describeFailure = (error: ExecFileException, timeout: number): string => {
  if (error.code === 'ENOENT') return 'command not found';
  if (error.killed) return `timeout after ${timeout}ms`;
  return error.message;
};

const exitCodeOf = (error: ExecFileException): number =>
  typeof error.code === 'number' ? error.code : -1;

/**
 * Run a command to completion. Never rejects: failures are reported through `code`.
 */
export function runCommand(file: string, args: string[], timeout = 10000): Promise<CommandResult> {
  return new Promise((resolve) => {
    execFile(file, args, { timeout, maxBuffer: MAX_BUFFER, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error) {
        resolve({ code: exitCodeOf(error), stdout, stderr: stderr || describeFailure(error, timeout) });
        return;
      }
      resolve({ code: 0, stdout, stderr });
    });
  });
}

/**
 * Run a command whose stdout is binary (e.g. screencap)
 */
export function runBinaryCommand(file: string, args: string[], timeout = 10000): Promise<CommandResult<Buffer>> {
  return new Promise((resolve) => {
    execFile(file, args, { timeout, maxBuffer: MAX_BUFFER, encoding: 'buffer' }, (error, stdout, stderr) => {
      const stderrText = stderr.toString();
      if (error) {
        resolve({ code: exitCodeOf(error), stdout, stderr: stderrText || describeFailure(error, timeout) });
        return;
      }
      resolve({ code: 0, stdout, stderr: stderrText });
    });
  });
}

/**
 * Split a stream into trimmed lines. Returns a function that detaches the reader.
 */
export function attachLineReader(stream: Readable, onLine: (line: string) => void): () => void {
  let leftover = '';

  const onData = (data: unknown) => {
    const chunk = typeof data === 'string' ? data : Buffer.isBuffer(data) ? data.toString('utf8') : '';
    const combined = leftover + chunk;
    const segments = combined.split(/\r?\n/);
    leftover = segments.pop() ?? '';
    for (const segment of segments) {
      onLine(segment.trimEnd());
    }
  };

  const onEnd = () => {
    if (leftover.length > 0) {
      onLine(leftover.trimEnd());
    }
    leftover = '';
  };

  stream.on('data', onData);
  stream.on('end', onEnd);

  return () => {
    stream.removeListener('data', onData);
    stream.removeListener('end', onEnd);
  };
}

/**
 * Resolve once the process has spawned, or reject with the spawn error.
 */
export function waitForSpawn(proc: StreamingProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      proc.removeListener('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      proc.removeListener('spawn', onSpawn);
      reject(error);
    };
    proc.once('spawn', onSpawn);
    proc.once('error', onError);
  });
}

export const hasExited = (proc: StreamingProcess): boolean =>
  proc.exitCode !== null || proc.signalCode !== null;

function waitForExit(proc: StreamingProcess, timeoutMs: number): Promise<boolean> {
  if (hasExited(proc)) {
    return Promise.resolve(true);
  }
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      proc.removeListener('exit', onExit);
      resolve(false);
    }, timeoutMs);
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    proc.once('exit', onExit);
  });
}

/**
 * Terminate a process: SIGTERM, then SIGKILL if it is still alive after `graceMs`.
 */
export async function terminateProcess(proc: StreamingProcess, graceMs = 2000): Promise<void> {
  if (hasExited(proc)) {
    return;
  }

  const exited = waitForExit(proc, graceMs);
  proc.kill('SIGTERM');
  if (await exited) {
    return;
  }

  const killed = waitForExit(proc, graceMs);
  proc.kill('SIGKILL');
  await killed;
}

export const systemCommandRunner: CommandRunner = {
  run: runCommand,
  runBinary: runBinaryCommand,
  spawn: (file, args) => spawn(file, args, { stdio: ['ignore', 'pipe', 'ignore'] })
};
