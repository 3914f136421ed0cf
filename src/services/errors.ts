// ============================================================================
// Error Types
// ============================================================================

export class UiscopeError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'UiscopeError';
  }
}

/**
 * The device, emulator or simulator (or its tooling) is not reachable
 */
export class DeviceUnavailableError extends UiscopeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DEVICE_UNAVAILABLE', details);
    this.name = 'DeviceUnavailableError';
  }
}

export class WatchRetriesExhaustedError extends UiscopeError {
  constructor(public readonly attempts: number, lastError?: string) {
    super(
      `Event stream failed ${attempts} time(s) in a row${lastError ? `: ${lastError}` : ''}`,
      'WATCH_RETRIES_EXHAUSTED',
      { attempts, lastError }
    );
    this.name = 'WatchRetriesExhaustedError';
  }
}

export class WatchInterruptedError extends UiscopeError {
  constructor(public readonly snapshots: number) {
    super(`Watch interrupted after ${snapshots} snapshot(s)`, 'WATCH_INTERRUPTED', { snapshots });
    this.name = 'WatchInterruptedError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
