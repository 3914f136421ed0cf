import {
  createLineReporter,
  formatElementLine,
  formatLogLine,
  formatSnapshotLine,
  shortTime
} from '../reporter';
import type { SnapshotManifestEntry } from '../../types/watch';

const localIso = (hours: number, minutes: number, seconds: number): string =>
  new Date(2026, 0, 1, hours, minutes, seconds).toISOString();

const entry = (overrides: Partial<SnapshotManifestEntry> = {}): SnapshotManifestEntry => ({
  sequence: 4,
  timestamp: localIso(9, 5, 7),
  trigger: 'TYPE_WINDOW_STATE_CHANGED',
  elementCount: 12,
  screenTitle: 'Settings',
  selectedTab: 'Profile',
  clickableCount: 5,
  logLines: 0,
  files: {},
  ...overrides
});

describe('Reporter', () => {
  describe('shortTime', () => {
    test('should zero-pad local time', () => {
      expect(shortTime(new Date(2026, 0, 1, 7, 3, 9))).toBe('07:03:09');
    });
  });

  describe('formatSnapshotLine', () => {
    test('should summarise a snapshot on one line', () => {
      expect(formatSnapshotLine(entry(), 'human')).toBe(
        '[09:05:07] #4 (TYPE_WINDOW_STATE_CHANGED) 12 elements [Profile] Settings'
      );
    });

    test('should leave out an empty tab and title', () => {
      expect(formatSnapshotLine(entry({ screenTitle: '', selectedTab: '', elementCount: -1 }), 'human')).toBe(
        '[09:05:07] #4 (TYPE_WINDOW_STATE_CHANGED) -1 elements'
      );
    });

    test('should print the whole entry in JSON mode', () => {
      const snapshot = entry({ crashes: ['E/AndroidRuntime: FATAL EXCEPTION'] });
      expect(JSON.parse(formatSnapshotLine(snapshot, 'json'))).toEqual(snapshot);
    });

    test('should write through the line reporter', () => {
      const lines: string[] = [];
      const report = createLineReporter('human', line => lines.push(line));

      report(entry({ sequence: 1, trigger: 'INITIAL' }));

      expect(lines).toEqual(['[09:05:07] #1 (INITIAL) 12 elements [Profile] Settings']);
    });
  });

  describe('formatElementLine', () => {
    test('should show label, identifiers and flags', () => {
      expect(
        formatElementLine({
          ref: '@e12',
          type: 'CheckBox',
          text: 'Remember me',
          id: 'remember',
          resourceId: 'com.example.app:id/remember',
          clickable: true,
          checked: true
        })
      ).toBe('@e12  "Remember me" id="remember" res=com.example.app:id/remember  [clickable, checked]');
    });

    test('should prefer the composed name', () => {
      expect(formatElementLine({ ref: '@e3', name: 'Account | Manage', text: 'Account', selected: true })).toBe(
        '@e3   "Account | Manage"  [selected]'
      );
    });

    test('should fall back to the type without refs', () => {
      expect(formatElementLine({ type: 'RecyclerView', scrollable: true, enabled: false })).toBe(
        'RecyclerView  [DISABLED, scrollable]'
      );
      expect(formatElementLine({})).toBe('element');
    });
  });

  describe('formatLogLine', () => {
    test('should prefix by severity', () => {
      expect(formatLogLine('crash', 'FATAL EXCEPTION')).toBe('!!! FATAL EXCEPTION');
      expect(formatLogLine('error', 'E/Net: Error')).toBe('ERR E/Net: Error');
      expect(formatLogLine('info', 'D/maestro: tap')).toBe('    D/maestro: tap');
    });
  });
});
