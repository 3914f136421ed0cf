import type { DeviceLogEntry } from '../types/logs';

/**
 * Bounded buffer of device log entries. Keeps only the latest `limit` entries.
 *
 * All operations are synchronous, so an append can never interleave with a
 * drain on the event loop.
 */
export class LogBuffer {
  private entries: DeviceLogEntry[] = [];

  constructor(private readonly limit = 200) {}

  push(entry: DeviceLogEntry) {
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
  }

  /**
   * Return all buffered entries and empty the buffer.
   */
  drain(): DeviceLogEntry[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  /**
   * Last `n` entries, without clearing.
   */
  recent(n = 50): DeviceLogEntry[] {
    if (n <= 0) {
      return [];
    }
    return this.entries.slice(-n);
  }

  get size() {
    return this.entries.length;
  }
}
