/**
 * Domain Types: Watch Sessions & Snapshot Manifest
 */

/** Trigger for the capture taken right after a watch starts */
export const INITIAL_TRIGGER = 'INITIAL';

/** Trigger used by polling mode */
export const POLL_TRIGGER = 'POLL';

export const WINDOW_STATE_CHANGED = 'TYPE_WINDOW_STATE_CHANGED';
export const WINDOW_CONTENT_CHANGED = 'TYPE_WINDOW_CONTENT_CHANGED';

/** Event types recognised on the UI event stream, in match priority */
export const RECOGNISED_EVENTS = [WINDOW_STATE_CHANGED, WINDOW_CONTENT_CHANGED] as const;

/** Triggers that always persist, even with an unchanged element fingerprint */
export const SETTLED_TRIGGERS: readonly string[] = [INITIAL_TRIGGER, WINDOW_STATE_CHANGED];

export type WatchState =
  | 'INIT'
  | 'EVENT_CONNECTED'
  | 'POLLING'
  | 'CAPTURING'
  | 'STOPPED';

export interface ScreenSummary {
  screenTitle: string;
  selectedTab: string;
  clickableCount: number;
}

export interface SnapshotFiles {
  screen?: string;
  elements?: string;
  logs?: string;
}

/**
 * Snapshot Manifest Entry - one row of the watch timeline
 */
export interface SnapshotManifestEntry extends ScreenSummary {
  /** Sequence number, starting at 1 */
  sequence: number;
  /** ISO timestamp of the capture */
  timestamp: string;
  /** Trigger or event type */
  trigger: string;
  /** Number of elements, -1 when the tree dump was unavailable */
  elementCount: number;
  /** Number of log entries drained for this snapshot */
  logLines: number;
  /** Crash lines drained for this snapshot */
  crashes?: string[];
  files: SnapshotFiles;
}

export type CaptureOutcome =
  | { status: 'captured'; entry: SnapshotManifestEntry }
  | { status: 'skipped'; sequence: number; trigger: string };

export type OutputMode = 'human' | 'json';
