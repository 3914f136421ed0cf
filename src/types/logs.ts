/**
 * Domain Types: Device Log Collection
 */

export type LogSeverity = 'info' | 'error' | 'crash';

/**
 * Device Log Entry - one captured line that matched an interest pattern
 */
export interface DeviceLogEntry {
  /** Raw log line */
  line: string;
  /** ISO timestamp at capture */
  timestamp: string;
  severity: LogSeverity;
}

/**
 * Platform log profile - how lines of one platform's log stream are filtered and classified
 */
export interface LogProfile {
  /** Lines kept when any of these match (or the app id is contained); empty keeps all */
  interestPatterns: RegExp[];
  /** Lines classified as `crash` */
  crashPattern: RegExp;
  /** Lines classified as `error` (checked after crash) */
  errorPattern: RegExp;
  /** Stream banner lines to skip */
  bannerPrefixes: string[];
}
