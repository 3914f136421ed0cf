import { LogBuffer } from './logBuffer';
import { classifyLine } from './severity';
import { createServiceLogger, ServiceLogger } from './logger';
import { describeError } from './errors';
import {
  attachLineReader,
  terminateProcess,
  waitForSpawn,
  type ProcessSpawner,
  type StreamingProcess
} from '../utils/process';
import type { DeviceLogEntry, LogProfile } from '../types/logs';

/**
 * Log Collector
 *
 * Tails a device log stream in the background, keeps the lines matching the
 * platform profile (or the app id) and buffers them with their severity until
 * a caller drains them.
 */

export interface LogCollectorOptions {
  /** Launches the log-streaming subprocess */
  spawn: ProcessSpawner;
  /** Interest patterns, severity rules and banner lines of the stream */
  profile: LogProfile;
  /** Lines containing this id are always kept */
  appId?: string;
  /** Buffer size (default: 200) */
  maxLines?: number;
  /** Grace period before SIGKILL on stop (default: 2000ms) */
  stopGraceMs?: number;
  /** Runs before every launch, e.g. to clear the device-side backlog */
  prepare?: () => Promise<void>;
  now?: () => Date;
  logger?: ServiceLogger;
}

export class LogCollector {
  private readonly buffer: LogBuffer;
  private readonly logger: ServiceLogger;
  private readonly now: () => Date;
  private proc: StreamingProcess | null = null;
  private detachReader: (() => void) | null = null;
  private starting: Promise<boolean> | null = null;

  constructor(private readonly options: LogCollectorOptions) {
    this.buffer = new LogBuffer(options.maxLines ?? 200);
    this.logger = options.logger ?? createServiceLogger('log-collector');
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.proc !== null;
  }

  /**
   * Launch the stream if it is not running. Resolves to false when the
   * subprocess could not be started; the collector then stays stopped and
   * start() may be called again later.
   */
  start(): Promise<boolean> {
    if (this.proc) {
      return Promise.resolve(true);
    }
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async launch(): Promise<boolean> {
    if (this.options.prepare) {
      try {
        await this.options.prepare();
      } catch (error) {
        this.logger.warn('log_prepare_failed', `Log backlog clear failed: ${describeError(error)}`);
      }
    }

    let proc: StreamingProcess;
    try {
      proc = this.options.spawn();
    } catch (error) {
      this.reportSpawnFailure(error);
      return false;
    }

    this.watch(proc);
    try {
      await waitForSpawn(proc);
    } catch {
      // already reported by the 'error' listener
      this.release(proc);
      return false;
    }

    this.logger.debug('log_stream_started', 'Log stream started');
    return true;
  }

  private watch(proc: StreamingProcess): void {
    this.proc = proc;
    this.detachReader = proc.stdout
      ? attachLineReader(proc.stdout, line => this.ingest(line))
      : null;

    proc.on('error', (error: Error) => {
      if (this.proc === proc) {
        this.logger.warn('log_stream_error', `Log stream failed: ${error.message}`);
        this.release(proc);
      }
    });

    proc.on('close', (code: number | null) => {
      if (this.proc === proc) {
        this.logger.warn('log_stream_exited', `Log stream exited with code ${code}`);
        this.release(proc);
      }
    });
  }

  private release(proc: StreamingProcess): void {
    if (this.proc !== proc) {
      return;
    }
    this.detachReader?.();
    this.detachReader = null;
    this.proc = null;
  }

  private reportSpawnFailure(error: unknown): void {
    this.logger.warn(
      'log_stream_unavailable',
      `Failed to start log stream: ${describeError(error)}`
    );
  }

  private ingest(line: string): void {
    const severity = classifyLine(line, this.options.profile, this.options.appId);
    if (!severity) {
      return;
    }
    this.buffer.push({
      line: line.trimEnd(),
      timestamp: this.now().toISOString(),
      severity
    });
  }

  /**
   * Return and clear buffered entries.
   */
  drain(): DeviceLogEntry[] {
    return this.buffer.drain();
  }

  /**
   * Last `n` entries without clearing.
   */
  recent(n = 50): DeviceLogEntry[] {
    return this.buffer.recent(n);
  }

  /**
   * Terminate the stream (SIGTERM, then SIGKILL). Safe when never started.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      await this.starting;
    }
    const proc = this.proc;
    if (!proc) {
      return;
    }
    this.release(proc);
    await terminateProcess(proc, this.options.stopGraceMs ?? 2000);
  }
}
