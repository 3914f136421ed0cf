/**
 * Android Platform Driver
 *
 * adb + uiautomator: screencap for screenshots, `uiautomator dump` for the
 * element tree, `uiautomator events` for UI change events and logcat for
 * device logs.
 */

import { writeFile } from 'fs/promises';
import { parseAndroidTree } from '../elements/androidTree';
import { LogCollector } from '../logCollector';
import { ANDROID_LOG_PROFILE } from '../severity';
import { createServiceLogger } from '../logger';
import { systemCommandRunner, type CommandRunner, type StreamingProcess } from '../../utils/process';
import type { DeviceConfig, LogCollectionConfig, TimeoutConfig } from '../../config/environment';
import type { FilterLists, UIElement } from '../../types/elements';
import type { DevicePlatform, ProbeResult } from '../../types/platform';

const DEVICE_DUMP_PATH = '/sdcard/ui.xml';

/** screencap output shorter than this is an error message, not a PNG */
export const MIN_SCREENSHOT_BYTES = 1000;

export interface AndroidPlatformOptions {
  device: DeviceConfig;
  timeouts: TimeoutConfig;
  logs: LogCollectionConfig;
  filters: FilterLists['android'];
  runner?: CommandRunner;
}

export class AndroidPlatform implements DevicePlatform {
  readonly name = 'android' as const;
  private readonly runner: CommandRunner;
  private readonly logger = createServiceLogger('android-platform');

  constructor(private readonly options: AndroidPlatformOptions) {
    this.runner = options.runner ?? systemCommandRunner;
  }

  /**
   * adb arguments, targeting the configured serial when there is one
   */
  private adbArgs(...args: string[]): string[] {
    const serial = this.options.device.deviceSerial;
    return serial ? ['-s', serial, ...args] : args;
  }

  async probe(): Promise<ProbeResult> {
    const result = await this.runner.run('adb', ['devices'], 5000);
    if (result.code !== 0) {
      return { ok: false, detail: `adb failed: ${result.stderr.trim() || `exit ${result.code}`}` };
    }

    const serial = this.options.device.deviceSerial;
    const attached = result.stdout
      .split('\n')
      .slice(1)
      .map(line => line.trim().split(/\s+/))
      .filter(([id, state]) => Boolean(id) && state === 'device')
      .map(([id]) => id);

    const match = serial ? attached.find(id => id === serial) : attached[0];
    if (!match) {
      return { ok: false, detail: serial ? `device ${serial} not attached` : 'no device attached' };
    }
    return { ok: true, detail: match };
  }

  async screenshot(outputPath: string): Promise<boolean> {
    const result = await this.runner.runBinary(
      'adb',
      this.adbArgs('exec-out', 'screencap', '-p'),
      this.options.timeouts.screenshot
    );
    if (result.code !== 0 || result.stdout.length <= MIN_SCREENSHOT_BYTES) {
      this.logger.warn('screenshot_failed', `screencap returned ${result.stdout.length} bytes`, undefined, {
        code: result.code,
        stderr: result.stderr.trim()
      });
      return false;
    }
    await writeFile(outputPath, result.stdout);
    return true;
  }

  async dumpRawTree(): Promise<string> {
    const timeout = this.options.timeouts.dump;
    const dump = await this.runner.run('adb', this.adbArgs('shell', 'uiautomator', 'dump', DEVICE_DUMP_PATH), timeout);
    if (dump.code !== 0) {
      this.logger.debug('dump_failed', `uiautomator dump exited with ${dump.code}`, undefined, {
        stderr: dump.stderr.trim()
      });
    }

    const read = await this.runner.run('adb', this.adbArgs('shell', 'cat', DEVICE_DUMP_PATH), timeout);
    return read.code === 0 ? read.stdout : '';
  }

  parseTree(raw: string, assignRefs = true): UIElement[] {
    return parseAndroidTree(raw, this.options.filters, assignRefs);
  }

  createLogCollector(): LogCollector {
    return new LogCollector({
      spawn: () => this.runner.spawn('adb', this.adbArgs('logcat', '-v', 'time')),
      prepare: async () => {
        await this.runner.run('adb', this.adbArgs('logcat', '-c'), 5000);
      },
      profile: ANDROID_LOG_PROFILE,
      appId: this.options.device.appId,
      maxLines: this.options.logs.maxLines,
      stopGraceMs: this.options.logs.stopGraceMs
    });
  }

  async readRecentLogs(lines: number): Promise<string> {
    const result = await this.runner.run(
      'adb',
      this.adbArgs('logcat', '-d', '-v', 'time', '-t', String(lines * 10)),
      10000
    );
    return result.code === 0 ? result.stdout : '';
  }

  startEventStream = (): StreamingProcess =>
    this.runner.spawn('adb', this.adbArgs('shell', 'uiautomator', 'events'));
}
