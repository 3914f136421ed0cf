/**
 * Domain Types: Device Platforms
 */

import type { LogCollector } from '../services/logCollector';
import type { StreamingProcess } from '../utils/process';
import type { PlatformName, UIElement } from './elements';

export interface ProbeResult {
  ok: boolean;
  /** Device serial, simulator UDID or a short explanation when not ok */
  detail: string;
}

/**
 * Everything the observation pipeline needs from one mobile platform
 */
export interface DevicePlatform {
  readonly name: PlatformName;

  /** Check that the tooling is installed and a device is attached/booted */
  probe(): Promise<ProbeResult>;

  /** Write a PNG screenshot to `outputPath`; false on failure */
  screenshot(outputPath: string): Promise<boolean>;

  /** Raw accessibility dump (XML or JSON); empty string when unavailable */
  dumpRawTree(): Promise<string>;

  parseTree(raw: string, assignRefs?: boolean): UIElement[];

  createLogCollector(): LogCollector;

  /** Recent log output, one line per entry, unfiltered */
  readRecentLogs(lines: number): Promise<string>;

  /** UI event stream; only platforms that expose one implement it */
  startEventStream?: () => StreamingProcess;
}
