/**
 * Snapshot Capture Service
 *
 * Takes one observation (screenshot, element tree, drained logs), drops it
 * when the element fingerprint matches the previous persisted one, and
 * otherwise writes the per-sequence files and the manifest.
 *
 * Files for sequence N in the watch directory:
 *   NNN-screen.png, NNN-elements.json, NNN-logs.json (only with log entries)
 */

import { copyFile, mkdir, readdir, rename, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { createServiceLogger, ServiceLogger } from './logger';
import { describeError } from './errors';
import { fingerprintElements, serializeElements } from '../utils/hash';
import type { WatchConfig } from '../config/environment';
import type { UIElement } from '../types/elements';
import type { DeviceLogEntry } from '../types/logs';
import type { DevicePlatform } from '../types/platform';
import {
  SETTLED_TRIGGERS,
  type CaptureOutcome,
  type ScreenSummary,
  type SnapshotFiles,
  type SnapshotManifestEntry
} from '../types/watch';
import type { SnapshotReporter } from './reporter';

export type CapturePaths = Pick<WatchConfig, 'dir' | 'manifestPath' | 'screenPath' | 'elementsPath'>;

export interface SnapshotCaptureOptions {
  platform: Pick<DevicePlatform, 'screenshot' | 'dumpRawTree' | 'parseTree'>;
  paths: CapturePaths;
  /** Drained once per persisted snapshot */
  logs?: { drain(): DeviceLogEntry[] };
  reporter?: SnapshotReporter;
  now?: () => Date;
  logger?: ServiceLogger;
}

/**
 * Title, selected tab and clickable count for the manifest
 */
export function summarizeScreen(elements: readonly UIElement[]): ScreenSummary {
  let screenTitle = '';
  let selectedTab = '';
  let clickableCount = 0;

  for (const element of elements) {
    if (element.selected && element.type === 'View') {
      selectedTab = element.id ?? '';
    }
    if (!screenTitle && element.type === 'TextView') {
      const text = element.text ?? '';
      if (text.length > 1 && text[0] !== text[0].toLowerCase()) {
        screenTitle = text;
      }
    }
    if (element.clickable) {
      clickableCount++;
    }
  }

  return { screenTitle, selectedTab, clickableCount };
}

export const sequencePrefix = (sequence: number): string => String(sequence).padStart(3, '0');

/** Per-sequence files, including a pending screenshot left by an interrupted capture */
const SESSION_FILE = /^\.?\d{3,}-(?:screen\.png|elements\.json|logs\.json)$/;

export class SnapshotCapture {
  private readonly logger: ServiceLogger;
  private readonly now: () => Date;
  private readonly entries: SnapshotManifestEntry[] = [];
  private lastFingerprint = '';

  constructor(private readonly options: SnapshotCaptureOptions) {
    this.logger = options.logger ?? createServiceLogger('snapshot-capture');
    this.now = options.now ?? (() => new Date());
  }

  get manifest(): readonly SnapshotManifestEntry[] {
    return this.entries;
  }

  /**
   * Start a fresh session: remove the previous session's files and manifest
   * and forget prior snapshots. Anything else in the watch directory stays.
   */
  async reset(): Promise<void> {
    const { dir, manifestPath } = this.options.paths;
    await mkdir(dir, { recursive: true });

    const stale = (await readdir(dir)).filter(name => SESSION_FILE.test(name));
    await Promise.all(stale.map(name => rm(path.join(dir, name), { force: true })));
    await rm(manifestPath, { force: true });
    await rm(`${manifestPath}.tmp`, { force: true });

    this.entries.length = 0;
    this.lastFingerprint = '';
  }

  async capture(trigger: string, sequence: number): Promise<CaptureOutcome> {
    const { platform, paths } = this.options;
    const timer = this.logger.startTimer('capture', undefined, { trigger, sequence });
    const timestamp = this.now().toISOString();
    const prefix = sequencePrefix(sequence);

    await mkdir(paths.dir, { recursive: true });
    const pendingScreen = path.join(paths.dir, `.${prefix}-screen.png`);

    let screenshotTaken = false;
    try {
      screenshotTaken = await platform.screenshot(pendingScreen);
    } catch (error) {
      this.logger.warn('screenshot_failed', `Screenshot failed: ${describeError(error)}`);
    }

    let elements: UIElement[] | null = null;
    try {
      const raw = await platform.dumpRawTree();
      if (raw) {
        elements = platform.parseTree(raw);
      } else {
        this.logger.warn('dump_skipped', 'UI dump unavailable');
      }
    } catch (error) {
      this.logger.warn('dump_failed', `Element dump failed: ${describeError(error)}`);
    }

    const fingerprint = elements ? fingerprintElements(elements) : '';
    if (!SETTLED_TRIGGERS.includes(trigger) && fingerprint && fingerprint === this.lastFingerprint) {
      await rm(pendingScreen, { force: true });
      this.logger.debug('snapshot_skipped', `Snapshot #${sequence} unchanged`, undefined, { trigger });
      timer.end({ skipped: true });
      return { status: 'skipped', sequence, trigger };
    }
    if (fingerprint) {
      this.lastFingerprint = fingerprint;
    }

    const files: SnapshotFiles = {};

    if (screenshotTaken) {
      files.screen = path.join(paths.dir, `${prefix}-screen.png`);
      await rename(pendingScreen, files.screen);
      await copyFile(files.screen, paths.screenPath);
    } else {
      await rm(pendingScreen, { force: true });
    }

    if (elements) {
      const elementsJson = serializeElements(elements, 2);
      files.elements = path.join(paths.dir, `${prefix}-elements.json`);
      await writeFile(files.elements, elementsJson);
      await writeFile(paths.elementsPath, elementsJson);
    }

    const logEntries = this.options.logs?.drain() ?? [];
    if (logEntries.length > 0) {
      files.logs = path.join(paths.dir, `${prefix}-logs.json`);
      await writeFile(files.logs, JSON.stringify(logEntries, null, 2));
    }

    const crashes = logEntries.filter(entry => entry.severity === 'crash').map(entry => entry.line);
    const entry: SnapshotManifestEntry = {
      sequence,
      timestamp,
      trigger,
      elementCount: elements ? elements.length : -1,
      ...summarizeScreen(elements ?? []),
      logLines: logEntries.length,
      ...(crashes.length > 0 ? { crashes } : {}),
      files
    };

    this.entries.push(entry);
    await this.writeManifest();

    timer.end({ elementCount: entry.elementCount, logLines: entry.logLines });
    this.options.reporter?.(entry);
    return { status: 'captured', entry };
  }

  /**
   * Replace the manifest atomically (write to .tmp, then rename)
   */
  private async writeManifest(): Promise<void> {
    const { manifestPath } = this.options.paths;
    const tmpPath = `${manifestPath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(this.entries, null, 2));
    await rename(tmpPath, manifestPath);
  }
}
