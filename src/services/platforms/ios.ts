/**
 * iOS Platform Driver
 *
 * xcrun simctl + AXe. Screenshots prefer `axe screenshot` and fall back to
 * `simctl io`; the element tree comes from `axe describe-ui`. There is no UI
 * event stream, so watch sessions poll.
 */

import { stat } from 'fs/promises';
import { parseIosTree } from '../elements/iosTree';
import { LogCollector } from '../logCollector';
import { IOS_LOG_PROFILE } from '../severity';
import { createServiceLogger } from '../logger';
import { describeError } from '../errors';
import { systemCommandRunner, type CommandRunner } from '../../utils/process';
import { MIN_SCREENSHOT_BYTES } from './android';
import type { DeviceConfig, LogCollectionConfig, TimeoutConfig } from '../../config/environment';
import type { FilterLists, UIElement } from '../../types/elements';
import type { DevicePlatform, ProbeResult } from '../../types/platform';

const BOOTED = 'booted';

export interface IOSPlatformOptions {
  device: DeviceConfig;
  timeouts: TimeoutConfig;
  logs: LogCollectionConfig;
  filters: FilterLists['ios'];
  runner?: CommandRunner;
}

/**
 * `log stream` predicate: UIKit, faults, React Native, maestro and, with an
 * app id, errors from the app's own process.
 */
export function buildLogPredicate(appId: string): string {
  const clauses = [
    'subsystem == "com.apple.UIKit"',
    'messageType == 21',
    'subsystem CONTAINS "ReactNative"',
    'process == "maestro"'
  ];
  if (appId) {
    clauses.push(`(processImagePath CONTAINS "${appId}" AND messageType >= 16)`);
  }
  return clauses.join(' OR ');
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * UDID of the first booted simulator in `simctl list devices booted -j` output
 */
export function findBootedUdid(listJson: string): string {
  let data: unknown;
  try {
    data = JSON.parse(listJson);
  } catch {
    return '';
  }
  if (!isRecord(data) || !isRecord(data['devices'])) {
    return '';
  }

  for (const devices of Object.values(data['devices'])) {
    if (!Array.isArray(devices)) continue;
    for (const device of devices) {
      if (isRecord(device) && device['state'] === 'Booted' && typeof device['udid'] === 'string') {
        return device['udid'];
      }
    }
  }
  return '';
}

export class IOSPlatform implements DevicePlatform {
  readonly name = 'ios' as const;
  private readonly runner: CommandRunner;
  private readonly logger = createServiceLogger('ios-platform');

  constructor(private readonly options: IOSPlatformOptions) {
    this.runner = options.runner ?? systemCommandRunner;
  }

  private get simulatorId(): string {
    return this.options.device.simulator || BOOTED;
  }

  /**
   * AXe needs a concrete UDID; `booted` is resolved through simctl
   */
  private async resolveUdid(): Promise<string> {
    if (this.simulatorId !== BOOTED) {
      return this.simulatorId;
    }
    const result = await this.runner.run('xcrun', ['simctl', 'list', 'devices', BOOTED, '-j'], 5000);
    return result.code === 0 ? findBootedUdid(result.stdout) : '';
  }

  async probe(): Promise<ProbeResult> {
    const result = await this.runner.run('xcrun', ['simctl', 'list', 'devices', BOOTED], 5000);
    if (result.code !== 0) {
      return { ok: false, detail: `simctl failed: ${result.stderr.trim() || `exit ${result.code}`}` };
    }

    const lines = result.stdout.split('\n').filter(line => line.includes('Booted'));
    if (this.simulatorId === BOOTED) {
      return lines.length > 0
        ? { ok: true, detail: BOOTED }
        : { ok: false, detail: 'no simulator booted' };
    }
    return lines.some(line => line.includes(this.simulatorId))
      ? { ok: true, detail: this.simulatorId }
      : { ok: false, detail: `simulator ${this.simulatorId} not booted` };
  }

  private async hasScreenshot(outputPath: string): Promise<boolean> {
    try {
      return (await stat(outputPath)).size > MIN_SCREENSHOT_BYTES;
    } catch (error) {
      this.logger.debug('screenshot_missing', describeError(error));
      return false;
    }
  }

  async screenshot(outputPath: string): Promise<boolean> {
    const timeout = this.options.timeouts.screenshot;
    const udid = await this.resolveUdid();

    if (udid) {
      const axe = await this.runner.run('axe', ['screenshot', '--output', outputPath, '--udid', udid], timeout);
      if (axe.code === 0 && await this.hasScreenshot(outputPath)) {
        return true;
      }
      this.logger.debug('axe_screenshot_failed', 'Falling back to simctl io', undefined, { code: axe.code });
    }

    const simctl = await this.runner.run('xcrun', ['simctl', 'io', this.simulatorId, 'screenshot', outputPath], timeout);
    if (simctl.code === 0 && await this.hasScreenshot(outputPath)) {
      return true;
    }
    this.logger.warn('screenshot_failed', `simctl screenshot exited with ${simctl.code}`, undefined, {
      stderr: simctl.stderr.trim()
    });
    return false;
  }

  async dumpRawTree(): Promise<string> {
    const udid = await this.resolveUdid();
    if (!udid) {
      this.logger.warn('dump_unavailable', 'No booted simulator UDID for axe describe-ui');
      return '';
    }
    const result = await this.runner.run('axe', ['describe-ui', '--udid', udid], this.options.timeouts.dump);
    return result.code === 0 ? result.stdout : '';
  }

  parseTree(raw: string, assignRefs = true): UIElement[] {
    return parseIosTree(raw, this.options.filters, assignRefs);
  }

  createLogCollector(): LogCollector {
    const predicate = buildLogPredicate(this.options.device.appId);
    return new LogCollector({
      spawn: () => this.runner.spawn('xcrun', [
        'simctl', 'spawn', this.simulatorId, 'log', 'stream', '--style', 'compact', '--predicate', predicate
      ]),
      profile: IOS_LOG_PROFILE,
      appId: this.options.device.appId,
      maxLines: this.options.logs.maxLines,
      stopGraceMs: this.options.logs.stopGraceMs
    });
  }

  async readRecentLogs(lines: number): Promise<string> {
    const result = await this.runner.run(
      'xcrun',
      ['simctl', 'spawn', this.simulatorId, 'log', 'show', '--style', 'compact', '--last', '30s'],
      20000
    );
    if (result.code !== 0) {
      return '';
    }
    return result.stdout.split('\n').slice(-lines).join('\n');
  }
}
