/**
 * Command implementations behind the uiscope CLI. Each command writes its
 * output through the context and resolves to a process exit code.
 */

import { setTimeout as delay } from 'timers/promises';
import * as path from 'path';
import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigSummary, type UiscopeConfig } from '../config/environment';
import { requireDevice } from '../services/platforms';
import { SnapshotCapture } from '../services/snapshotCapture';
import { WatchLoop } from '../services/watchLoop';
import { WatchInterruptedError, WatchRetriesExhaustedError } from '../services/errors';
import { createLineReporter, formatElementLine, formatLogLine } from '../services/reporter';
import { classifyLine, LOG_PROFILES } from '../services/severity';
import { canonicalElement, serializeElements } from '../utils/hash';
import type { DevicePlatform } from '../types/platform';
import type { UIElement } from '../types/elements';

export interface CliContext {
  config: UiscopeConfig;
  platform: DevicePlatform;
  out: (line: string) => void;
  err: (line: string) => void;
  /** Aborted on Ctrl+C */
  signal?: AbortSignal;
}

/** Time the log stream gets to deliver lines before `inspect` drains it */
export const INSPECT_SETTLE_MS = 300;
export const FOLLOW_INTERVAL_MS = 500;

const isAbortError = (error: unknown, signal?: AbortSignal): boolean =>
  signal?.aborted === true && error instanceof Error && error.name === 'AbortError';

export async function statusCommand(ctx: CliContext): Promise<number> {
  const probe = await ctx.platform.probe();
  const table = new Table({ head: ['Setting', 'Value'] });

  for (const [key, value] of Object.entries(getConfigSummary(ctx.config))) {
    if (value !== undefined) {
      table.push([key, String(value)]);
    }
  }
  table.push(['device', probe.ok ? chalk.green(probe.detail) : chalk.red(probe.detail)]);

  ctx.out(table.toString());
  return probe.ok ? 0 : 1;
}

export async function screenCommand(ctx: CliContext, outputPath?: string): Promise<number> {
  await requireDevice(ctx.platform);
  const target = path.resolve(outputPath ?? ctx.config.watch.screenPath);
  if (!(await ctx.platform.screenshot(target))) {
    ctx.err(chalk.red('Screenshot failed'));
    return 1;
  }
  ctx.out(target);
  return 0;
}

export interface ElementsOptions {
  json: boolean;
  refs: boolean;
}

export async function elementsCommand(ctx: CliContext, options: ElementsOptions): Promise<number> {
  await requireDevice(ctx.platform);
  const raw = await ctx.platform.dumpRawTree();
  if (!raw) {
    ctx.err(chalk.red('UI dump failed'));
    return 1;
  }

  const elements = ctx.platform.parseTree(raw, options.refs);
  if (options.json) {
    ctx.out(serializeElements(elements, 2));
  } else {
    elements.forEach(element => ctx.out(formatElementLine(element)));
  }
  return 0;
}

export interface InspectResult {
  screenshot: string;
  elements: UIElement[];
  crashes?: string[];
  errors?: string[];
  logLines?: number;
}

/**
 * Screenshot, elements and the logs collected meanwhile, as one JSON document
 */
export async function inspectCommand(ctx: CliContext, settleMs = INSPECT_SETTLE_MS): Promise<number> {
  await requireDevice(ctx.platform);
  const collector = ctx.platform.createLogCollector();

  try {
    await collector.start();
    await delay(settleMs);

    const screenshot = ctx.config.watch.screenPath;
    if (!(await ctx.platform.screenshot(screenshot))) {
      ctx.err('Screenshot failed');
    }

    const raw = await ctx.platform.dumpRawTree();
    const entries = collector.drain();
    const crashes = entries.filter(entry => entry.severity === 'crash').map(entry => entry.line);
    const errors = entries.filter(entry => entry.severity === 'error').map(entry => entry.line);

    const result: InspectResult = {
      screenshot,
      elements: raw ? ctx.platform.parseTree(raw).map(canonicalElement) : []
    };
    if (crashes.length > 0) result.crashes = crashes;
    if (errors.length > 0) result.errors = errors.slice(-10);
    if (entries.length > 0 && crashes.length === 0 && errors.length === 0) result.logLines = entries.length;

    ctx.out(JSON.stringify(result, null, 2));
    return 0;
  } finally {
    await collector.stop();
  }
}

export interface WatchOptions {
  /** Seconds */
  timeout?: number;
  /** Seconds */
  debounce?: number;
  json: boolean;
}

export async function watchCommand(ctx: CliContext, options: WatchOptions): Promise<number> {
  await requireDevice(ctx.platform);
  const { watch, logs } = ctx.config;
  const debounceMs = options.debounce !== undefined ? Math.round(options.debounce * 1000) : watch.debounceMs;

  const collector = ctx.platform.createLogCollector();
  const capture = new SnapshotCapture({
    platform: ctx.platform,
    paths: watch,
    logs: collector,
    reporter: createLineReporter(options.json ? 'json' : 'human', ctx.out)
  });
  const loop = new WatchLoop({
    capture,
    eventStream: ctx.platform.startEventStream,
    logs: collector,
    debounceMs,
    pollFloorMs: watch.pollFloorMs,
    maxRetries: watch.maxRetries,
    retryDelayMs: watch.retryDelayMs,
    timeoutMs: options.timeout !== undefined ? Math.round(options.timeout * 1000) : undefined,
    stopGraceMs: logs.stopGraceMs,
    signal: ctx.signal
  });

  ctx.err(chalk.gray('watching for UI changes...'));
  if (options.timeout !== undefined) ctx.err(chalk.gray(`timeout: ${options.timeout}s`));
  ctx.err(chalk.gray(`debounce: ${debounceMs / 1000}s`));

  try {
    const summary = await loop.run();
    ctx.err(chalk.gray(`timeout reached, ${summary.snapshots} snapshot(s) in ${watch.manifestPath}`));
    return 0;
  } catch (error) {
    if (error instanceof WatchInterruptedError) {
      ctx.err(chalk.gray(`\nstopped, ${error.snapshots} snapshot(s) in ${watch.manifestPath}`));
      return 130;
    }
    if (error instanceof WatchRetriesExhaustedError) {
      ctx.err(chalk.red(`max retries reached, exiting: ${error.message}`));
      return 1;
    }
    throw error;
  }
}

export interface LogcatOptions {
  lines: number;
  follow: boolean;
}

export async function logcatCommand(ctx: CliContext, options: LogcatOptions): Promise<number> {
  await requireDevice(ctx.platform);
  const profile = LOG_PROFILES[ctx.platform.name];
  const appId = ctx.config.device.appId;

  if (!options.follow) {
    const output = await ctx.platform.readRecentLogs(options.lines);
    if (!output) {
      ctx.err(chalk.red('log retrieval failed'));
      return 1;
    }
    for (const line of output.trim().split('\n')) {
      const severity = classifyLine(line, profile, appId);
      if (severity) {
        ctx.out(formatLogLine(severity, line.trimEnd()));
      }
    }
    return 0;
  }

  const collector = ctx.platform.createLogCollector();
  ctx.err(chalk.gray('streaming logs (Ctrl+C to stop)...'));
  try {
    await collector.start();
    for (;;) {
      for (const entry of collector.drain()) {
        ctx.out(formatLogLine(entry.severity, entry.line));
      }
      await delay(FOLLOW_INTERVAL_MS, undefined, { signal: ctx.signal });
    }
  } catch (error) {
    if (isAbortError(error, ctx.signal)) {
      ctx.err(chalk.gray('\nstopped'));
      return 0;
    }
    throw error;
  } finally {
    await collector.stop();
  }
}
