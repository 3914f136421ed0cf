/**
 * Watch Loop
 *
 * Drives snapshot captures for a watch session. With a UI event stream the
 * loop records the latest recognised event and captures once no newer event
 * arrived for `debounceMs`; the stream is stopped for the capture and
 * restarted afterwards. Without one it polls.
 *
 *   INIT -> EVENT_CONNECTED | POLLING -> CAPTURING -> ... -> STOPPED
 *
 * Every spawned process (event stream, log stream) is terminated on every
 * exit path.
 */

import { setTimeout as delay } from 'timers/promises';
import { createServiceLogger, ServiceLogger } from './logger';
import { describeError, WatchInterruptedError, WatchRetriesExhaustedError } from './errors';
import {
  attachLineReader,
  terminateProcess,
  waitForSpawn,
  type ProcessSpawner,
  type StreamingProcess
} from '../utils/process';
import {
  INITIAL_TRIGGER,
  POLL_TRIGGER,
  RECOGNISED_EVENTS,
  type CaptureOutcome,
  type WatchState
} from '../types/watch';

export interface WatchClock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolves after `ms`; rejects once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: WatchClock = {
  now: () => Date.now(),
  sleep: (ms, signal) => delay(ms, undefined, { signal })
};

export interface SnapshotTaker {
  reset(): Promise<void>;
  capture(trigger: string, sequence: number): Promise<CaptureOutcome>;
}

export interface BackgroundLogs {
  start(): Promise<boolean>;
  stop(): Promise<void>;
}

export interface WatchLoopOptions {
  capture: SnapshotTaker;
  /** UI event stream; polling mode when absent */
  eventStream?: ProcessSpawner;
  logs?: BackgroundLogs;
  debounceMs: number;
  pollFloorMs: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Session length; unlimited when absent */
  timeoutMs?: number;
  /** Supervisor check interval (default: 100ms) */
  tickMs?: number;
  stopGraceMs?: number;
  signal?: AbortSignal;
  clock?: WatchClock;
  logger?: ServiceLogger;
}

export interface WatchSummary {
  /** Capture attempts, including skipped duplicates */
  attempts: number;
  /** Persisted snapshots */
  snapshots: number;
  mode: 'events' | 'poll';
}

type StreamOutcome = 'captured' | 'deadline' | 'disconnected';

/**
 * First recognised event type named on a stream line
 */
export function parseEventLine(line: string): string | null {
  return RECOGNISED_EVENTS.find(event => line.includes(event)) ?? null;
}

export class WatchLoop {
  private readonly clock: WatchClock;
  private readonly logger: ServiceLogger;
  private readonly tickMs: number;
  private currentState: WatchState = 'INIT';
  private sequence = 0;
  private snapshots = 0;
  private deadline: number | null = null;
  private running = false;

  constructor(private readonly options: WatchLoopOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createServiceLogger('watch-loop');
    this.tickMs = options.tickMs ?? 100;
  }

  get state(): WatchState {
    return this.currentState;
  }

  private setState(next: WatchState): void {
    if (next !== this.currentState) {
      this.logger.debug('state_changed', `${this.currentState} -> ${next}`);
      this.currentState = next;
    }
  }

  /**
   * Run the session until the deadline, an abort or exhausted reconnects.
   * Resolves on the deadline; rejects with WatchInterruptedError on abort and
   * WatchRetriesExhaustedError when the event stream cannot be kept alive.
   */
  async run(): Promise<WatchSummary> {
    if (this.running) {
      throw new Error('Watch loop is already running');
    }
    this.running = true;
    const mode = this.options.eventStream ? 'events' : 'poll';

    try {
      this.throwIfAborted();
      await this.options.capture.reset();
      await this.options.logs?.start();

      await this.captureNext(INITIAL_TRIGGER);
      if (this.options.timeoutMs !== undefined) {
        this.deadline = this.clock.now() + this.options.timeoutMs;
      }

      if (this.options.eventStream) {
        await this.runEventMode(this.options.eventStream);
      } else {
        await this.runPollMode();
      }

      this.logger.info('watch_finished', `Watch finished after ${this.snapshots} snapshot(s)`, undefined, {
        attempts: this.sequence
      });
      return { attempts: this.sequence, snapshots: this.snapshots, mode };
    } finally {
      this.setState('STOPPED');
      await this.options.logs?.stop();
      this.running = false;
    }
  }

  private deadlineReached(): boolean {
    return this.deadline !== null && this.clock.now() >= this.deadline;
  }

  private throwIfAborted(): void {
    if (this.options.signal?.aborted) {
      throw new WatchInterruptedError(this.snapshots);
    }
  }

  private async pause(ms: number): Promise<void> {
    this.throwIfAborted();
    try {
      await this.clock.sleep(ms, this.options.signal);
    } catch (error) {
      this.throwIfAborted();
      throw error;
    }
    this.throwIfAborted();
  }

  private async captureNext(trigger: string): Promise<void> {
    const previous = this.currentState;
    this.setState('CAPTURING');
    this.sequence++;

    // restarts a log stream that died since the last capture
    await this.options.logs?.start();

    const outcome = await this.options.capture.capture(trigger, this.sequence);
    if (outcome.status === 'captured') {
      this.snapshots++;
    }
    this.setState(previous);
  }

  private async runPollMode(): Promise<void> {
    const interval = Math.max(this.options.debounceMs, this.options.pollFloorMs);
    this.setState('POLLING');
    this.logger.info('poll_mode', `Polling every ${interval}ms`);

    for (;;) {
      if (this.deadlineReached()) break;
      await this.pause(interval);
      if (this.deadlineReached()) break;
      await this.captureNext(POLL_TRIGGER);
    }
    this.logger.info('deadline_reached', 'Timeout reached');
  }

  private async runEventMode(spawnStream: ProcessSpawner): Promise<void> {
    const { maxRetries, retryDelayMs } = this.options;
    let failures = 0;
    let lastError = '';

    while (failures < maxRetries) {
      if (this.deadlineReached()) {
        this.logger.info('deadline_reached', 'Timeout reached');
        return;
      }
      this.throwIfAborted();

      const proc = await this.connect(spawnStream);
      let outcome: StreamOutcome;
      if (typeof proc === 'string') {
        lastError = proc;
        outcome = 'disconnected';
      } else {
        try {
          outcome = await this.superviseStream(proc);
        } finally {
          await terminateProcess(proc, this.options.stopGraceMs ?? 2000);
        }
      }

      if (outcome === 'deadline') {
        this.logger.info('deadline_reached', 'Timeout reached');
        return;
      }
      if (outcome === 'captured') {
        failures = 0;
        continue;
      }

      failures++;
      if (failures < maxRetries) {
        this.logger.warn('events_reconnecting', `Reconnecting (${failures}/${maxRetries})`);
        await this.pause(retryDelayMs);
      }
    }

    this.logger.error('retries_exhausted', 'Max retries reached, exiting');
    throw new WatchRetriesExhaustedError(failures, lastError || undefined);
  }

  /**
   * Spawn the event stream. Returns the failure message when it did not start.
   */
  private async connect(spawnStream: ProcessSpawner): Promise<StreamingProcess | string> {
    let proc: StreamingProcess;
    try {
      proc = spawnStream();
      await waitForSpawn(proc);
    } catch (error) {
      const message = describeError(error);
      this.logger.warn('events_unavailable', `Failed to start event stream: ${message}`);
      return message;
    }

    proc.on('error', (error: Error) => {
      this.logger.warn('events_error', `Event stream error: ${error.message}`);
    });
    this.setState('EVENT_CONNECTED');
    this.logger.info('events_connected', 'Event stream connected');
    return proc;
  }

  /**
   * Watch one stream connection until it yields a settled event, ends, or the
   * deadline passes.
   */
  private async superviseStream(proc: StreamingProcess): Promise<StreamOutcome> {
    const stream = { alive: true, event: '', since: 0 };

    const detach = proc.stdout
      ? attachLineReader(proc.stdout, line => {
          const event = parseEventLine(line);
          if (event) {
            stream.event = event;
            stream.since = this.clock.now();
          }
        })
      : null;
    const onClose = () => {
      stream.alive = false;
    };
    proc.once('close', onClose);

    try {
      while (stream.alive) {
        if (this.deadlineReached()) {
          return 'deadline';
        }
        if (stream.event && this.clock.now() - stream.since >= this.options.debounceMs) {
          const trigger = stream.event;
          stream.event = '';
          detach?.();
          proc.removeListener('close', onClose);
          await terminateProcess(proc, this.options.stopGraceMs ?? 2000);
          await this.captureNext(trigger);
          return 'captured';
        }
        await this.pause(this.tickMs);
      }
      this.logger.warn('events_disconnected', 'Event stream ended');
      return 'disconnected';
    } finally {
      detach?.();
      proc.removeListener('close', onClose);
    }
  }
}
