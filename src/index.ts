export * from './types/elements';
export * from './types/logs';
export * from './types/watch';
export type { DevicePlatform, ProbeResult } from './types/platform';

export {
  loadConfig,
  findConfigFile,
  ConfigValidationError,
  DEFAULT_FILTER_LISTS,
  type UiscopeConfig
} from './config';

export { normalizeTree, parseAndroidTree, parseIosTree, parseBounds } from './services/elements';
export { classifySeverity, classifyLine, ANDROID_LOG_PROFILE, IOS_LOG_PROFILE, LOG_PROFILES } from './services/severity';
export { LogBuffer } from './services/logBuffer';
export { LogCollector, type LogCollectorOptions } from './services/logCollector';
export { SnapshotCapture, summarizeScreen, type SnapshotCaptureOptions } from './services/snapshotCapture';
export { WatchLoop, parseEventLine, systemClock, type WatchLoopOptions, type WatchClock, type WatchSummary } from './services/watchLoop';
export { AndroidPlatform, IOSPlatform, createPlatform, requireDevice } from './services/platforms';
export { formatElementLine, formatSnapshotLine, formatLogLine, createLineReporter } from './services/reporter';
export {
  UiscopeError,
  DeviceUnavailableError,
  WatchRetriesExhaustedError,
  WatchInterruptedError
} from './services/errors';
export { createServiceLogger } from './services/logger';
export { canonicalElement, serializeElements, fingerprintElements } from './utils/hash';
