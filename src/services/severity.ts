/**
 * Log Severity Classification
 *
 * Interest filtering and crash/error/info classification for device log
 * lines, one profile per platform.
 */

import type { LogProfile, LogSeverity } from '../types/logs';
import type { PlatformName } from '../types/elements';

export const ANDROID_LOG_PROFILE: LogProfile = {
  interestPatterns: [
    /ReactNativeJS/i,
    /FATAL|ANR|CRASH/i,
    /AndroidRuntime.*Exception/i,
    /maestro/i,
    /E\/\S+\s*:\s*(?:Error|Exception|Fatal|Crash)/i
  ],
  crashPattern: /FATAL|ANR|CRASH|AndroidRuntime/i,
  errorPattern: /Error|Exception|E\//i,
  bannerPrefixes: ['--------- beginning of']
};

export const IOS_LOG_PROFILE: LogProfile = {
  // the `log stream` predicate already selects the lines
  interestPatterns: [],
  crashPattern: /fault|crash|SIGABRT|EXC_BAD_ACCESS/i,
  errorPattern: /error|exception/i,
  bannerPrefixes: ['Filtering the log data']
};

export const LOG_PROFILES: Record<PlatformName, LogProfile> = {
  android: ANDROID_LOG_PROFILE,
  ios: IOS_LOG_PROFILE
};

export function classifySeverity(line: string, profile: LogProfile = ANDROID_LOG_PROFILE): LogSeverity {
  if (profile.crashPattern.test(line)) return 'crash';
  if (profile.errorPattern.test(line)) return 'error';
  return 'info';
}

/**
 * Whether a line is worth keeping: it contains the app id or matches an
 * interest pattern. A profile without patterns keeps everything.
 */
export function isInteresting(line: string, profile: LogProfile, appId = ''): boolean {
  if (profile.interestPatterns.length === 0 || (appId && line.includes(appId))) {
    return true;
  }
  return profile.interestPatterns.some(pattern => pattern.test(line));
}

export function isBanner(line: string, profile: LogProfile): boolean {
  return profile.bannerPrefixes.some(prefix => line.startsWith(prefix));
}

/**
 * Filter and classify one raw line; null when the line is dropped.
 */
export function classifyLine(line: string, profile: LogProfile, appId = ''): LogSeverity | null {
  const trimmed = line.trimEnd();
  if (trimmed.length === 0 || isBanner(trimmed, profile) || !isInteresting(trimmed, profile, appId)) {
    return null;
  }
  return classifySeverity(trimmed, profile);
}
