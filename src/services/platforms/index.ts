import { AndroidPlatform } from './android';
import { IOSPlatform } from './ios';
import { DeviceUnavailableError } from '../errors';
import type { UiscopeConfig } from '../../config/environment';
import type { CommandRunner } from '../../utils/process';
import type { DevicePlatform } from '../../types/platform';

export { AndroidPlatform, MIN_SCREENSHOT_BYTES } from './android';
export { IOSPlatform, buildLogPredicate, findBootedUdid } from './ios';

export function createPlatform(config: UiscopeConfig, runner?: CommandRunner): DevicePlatform {
  const { device, timeouts, logs, filters } = config;
  return device.platform === 'ios'
    ? new IOSPlatform({ device, timeouts, logs, filters: filters.ios, runner })
    : new AndroidPlatform({ device, timeouts, logs, filters: filters.android, runner });
}

/**
 * Probe the platform and fail with DeviceUnavailableError when it is not reachable
 */
export async function requireDevice(platform: DevicePlatform): Promise<string> {
  const probe = await platform.probe();
  if (!probe.ok) {
    throw new DeviceUnavailableError(`${platform.name} device unavailable: ${probe.detail}`, {
      platform: platform.name
    });
  }
  return probe.detail;
}
