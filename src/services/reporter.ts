/**
 * Output formatting for the command surface: timeline lines, compact
 * element lines and prefixed log lines. Pure string builders; the CLI
 * decides where they go and how they are coloured.
 */

import type { UIElement } from '../types/elements';
import type { LogSeverity } from '../types/logs';
import type { OutputMode, SnapshotManifestEntry } from '../types/watch';

export type SnapshotReporter = (entry: SnapshotManifestEntry) => void;

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Local wall-clock `HH:MM:SS`
 */
export const shortTime = (date: Date): string =>
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

/**
 * `[HH:MM:SS] #N (trigger) K elements [tab] title`, or the entry as one JSON line
 */
export function formatSnapshotLine(entry: SnapshotManifestEntry, mode: OutputMode): string {
  if (mode === 'json') {
    return JSON.stringify(entry);
  }

  const tab = entry.selectedTab ? ` [${entry.selectedTab}]` : '';
  const title = entry.screenTitle ? ` ${entry.screenTitle}` : '';
  const time = shortTime(new Date(entry.timestamp));
  return `[${time}] #${entry.sequence} (${entry.trigger}) ${entry.elementCount} elements${tab}${title}`;
}

export function createLineReporter(mode: OutputMode, write: (line: string) => void): SnapshotReporter {
  return entry => write(formatSnapshotLine(entry, mode));
}

/**
 * `@e1   "text" id="…" res=…  [flags]`
 */
export function formatElementLine(element: UIElement): string {
  const parts: string[] = [];
  const label = element.name ?? element.text;
  if (label !== undefined) parts.push(`"${label}"`);
  if (element.id !== undefined) parts.push(`id="${element.id}"`);
  if (element.resourceId !== undefined) parts.push(`res=${element.resourceId}`);
  if (parts.length === 0) parts.push(element.type ?? 'element');

  const flags: string[] = [];
  if (element.clickable) flags.push('clickable');
  if (element.enabled === false) flags.push('DISABLED');
  if (element.checked) flags.push('checked');
  if (element.selected) flags.push('selected');
  if (element.scrollable) flags.push('scrollable');

  let line = element.ref ? `${element.ref.padEnd(5)} ` : '';
  line += parts.join(' ');
  if (flags.length > 0) {
    line += `  [${flags.join(', ')}]`;
  }
  return line;
}

const SEVERITY_PREFIX: Record<LogSeverity, string> = {
  crash: '!!!',
  error: 'ERR',
  info: '   '
};

export const formatLogLine = (severity: LogSeverity, line: string): string =>
  `${SEVERITY_PREFIX[severity]} ${line}`;
