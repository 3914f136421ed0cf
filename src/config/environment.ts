/**
 * Environment Configuration
 *
 * Loads the uiscope configuration with priority: environment variables >
 * `uiscope.json` (searched from the working directory upwards) > defaults.
 * The project file is validated with zod; invalid values raise
 * ConfigValidationError with a hint for the operator.
 */

import * as path from 'path';
import { existsSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { z } from 'zod';
import defaultFilterLists from './filter-lists.json';
import type { FilterLists, PlatformName } from '../types/elements';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * Device Configuration Interface
 */
export interface DeviceConfig {
  /** Target platform */
  platform: PlatformName;
  /** Application identifier used for log filtering */
  appId: string;
  /** adb serial; empty means the single attached device */
  deviceSerial: string;
  /** iOS simulator UDID or name; empty means `booted` */
  simulator: string;
}

/**
 * Timeout Configuration Interface (milliseconds)
 */
export interface TimeoutConfig {
  screenshot: number;
  dump: number;
}

/**
 * Watch Configuration Interface
 */
export interface WatchConfig {
  /** Directory for per-snapshot files */
  dir: string;
  /** Manifest (timeline) file */
  manifestPath: string;
  /** Latest screenshot, overwritten on every capture */
  screenPath: string;
  /** Latest element list, overwritten on every capture */
  elementsPath: string;
  /** Settle time before an event triggers a capture (ms) */
  debounceMs: number;
  /** Minimum polling interval (ms) */
  pollFloorMs: number;
  /** Event stream reconnect ceiling */
  maxRetries: number;
  /** Delay between reconnect attempts (ms) */
  retryDelayMs: number;
}

/**
 * Log Collection Configuration Interface
 */
export interface LogCollectionConfig {
  /** Ring buffer size */
  maxLines: number;
  /** Grace period before SIGKILL (ms) */
  stopGraceMs: number;
}

/**
 * Complete Configuration Interface
 */
export interface UiscopeConfig {
  device: DeviceConfig;
  timeouts: TimeoutConfig;
  watch: WatchConfig;
  logs: LogCollectionConfig;
  filters: FilterLists;
  /** Config file used, if any */
  configFile: string | null;
}

// =============================================================================
// VALIDATION UTILITIES
// =============================================================================

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly variable?: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

const filterListsSchema = z.object({
  android: z.object({
    noiseClasses: z.array(z.string()),
    systemResourceIds: z.array(z.string())
  }),
  ios: z.object({
    noiseRoles: z.array(z.string()),
    systemIds: z.array(z.string())
  })
});

const projectFileSchema = z.object({
  platform: z.enum(['android', 'ios']).optional(),
  appId: z.string().optional(),
  deviceSerial: z.string().optional(),
  simulator: z.string().optional(),
  timeouts: z.object({
    screenshot: z.number().positive().optional(),
    dump: z.number().positive().optional()
  }).optional(),
  watch: z.object({
    dir: z.string().min(1).optional(),
    debounce: z.number().positive().optional(),
    pollFloor: z.number().positive().optional(),
    maxRetries: z.number().int().min(1).optional(),
    retryDelay: z.number().min(0).optional()
  }).optional(),
  logs: z.object({
    maxLines: z.number().int().min(1).optional()
  }).optional(),
  filters: filterListsSchema.partial().optional()
});

export type ProjectFile = z.infer<typeof projectFileSchema>;

/**
 * Validate platform name
 */
function validatePlatform(value: string, variableName: string): PlatformName {
  const normalized = value.toLowerCase().trim();
  if (normalized === 'android' || normalized === 'ios') {
    return normalized;
  }

  throw new ConfigValidationError(
    `Invalid platform for ${variableName}: ${value}`,
    variableName,
    'Please use android or ios'
  );
}

/**
 * Validate file path is non-empty and resolve it
 */
function validatePath(value: string, variableName: string): string {
  if (!value || value.trim() === '') {
    throw new ConfigValidationError(
      `Empty path for ${variableName}`,
      variableName,
      'Please provide a valid file system path'
    );
  }

  return path.resolve(value);
}

// =============================================================================
// LOADING
// =============================================================================

export const CONFIG_FILE_NAME = 'uiscope.json';

export const DEFAULT_FILTER_LISTS: FilterLists = filterListsSchema.parse(defaultFilterLists);

/**
 * Walk up from `startDir` looking for uiscope.json
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Read and validate a project file
 */
export function readProjectFile(filePath: string): ProjectFile {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      CONFIG_FILE_NAME,
      'Please make sure the file contains valid JSON'
    );
  }

  const result = projectFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : CONFIG_FILE_NAME;
    throw new ConfigValidationError(
      `Invalid ${CONFIG_FILE_NAME} value at ${field}: ${issue ? issue.message : 'unknown error'}`,
      field,
      'Please check the field type and range'
    );
  }
  return result.data;
}

const seconds = (value: number | undefined, fallbackMs: number): number =>
  value === undefined ? fallbackMs : Math.round(value * 1000);

/**
 * Build the configuration from defaults, an optional project file and the environment
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  configFile: string | null = findConfigFile()
): UiscopeConfig {
  const file: ProjectFile = configFile ? readProjectFile(configFile) : {};

  const platform = env.UISCOPE_PLATFORM
    ? validatePlatform(env.UISCOPE_PLATFORM, 'UISCOPE_PLATFORM')
    : file.platform ?? 'android';

  const watchDir = validatePath(
    env.UISCOPE_WATCH_DIR ?? file.watch?.dir ?? path.join(tmpdir(), 'uiscope-watch'),
    'UISCOPE_WATCH_DIR'
  );

  return {
    device: {
      platform,
      appId: env.UISCOPE_APP_ID ?? file.appId ?? '',
      deviceSerial: env.UISCOPE_DEVICE_SERIAL ?? file.deviceSerial ?? '',
      simulator: env.UISCOPE_SIMULATOR ?? file.simulator ?? ''
    },
    timeouts: {
      screenshot: seconds(file.timeouts?.screenshot, 10000),
      dump: seconds(file.timeouts?.dump, 10000)
    },
    watch: {
      dir: watchDir,
      manifestPath: `${watchDir}.json`,
      screenPath: path.join(path.dirname(watchDir), 'uiscope-screen.png'),
      elementsPath: path.join(path.dirname(watchDir), 'uiscope-elements.json'),
      debounceMs: seconds(file.watch?.debounce, 1000),
      pollFloorMs: seconds(file.watch?.pollFloor, 2000),
      maxRetries: file.watch?.maxRetries ?? 3,
      retryDelayMs: seconds(file.watch?.retryDelay, 2000)
    },
    logs: {
      maxLines: file.logs?.maxLines ?? 200,
      stopGraceMs: 2000
    },
    filters: {
      android: file.filters?.android ?? DEFAULT_FILTER_LISTS.android,
      ios: file.filters?.ios ?? DEFAULT_FILTER_LISTS.ios
    },
    configFile
  };
}

/**
 * Get configuration summary for diagnostics
 */
export function getConfigSummary(config: UiscopeConfig): Record<string, unknown> {
  return {
    platform: config.device.platform,
    appId: config.device.appId || undefined,
    configFile: config.configFile,
    watchDir: config.watch.dir,
    debounceMs: config.watch.debounceMs
  };
}
