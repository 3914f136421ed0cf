/**
 * Snapshot Capture Service Tests
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { SnapshotCapture, summarizeScreen, sequencePrefix, type CapturePaths } from '../snapshotCapture';
import { parseAndroidTree } from '../elements/androidTree';
import { DEFAULT_FILTER_LISTS } from '../../config/environment';
import { serializeElements } from '../../utils/hash';
import type { DeviceLogEntry } from '../../types/logs';
import type { SnapshotManifestEntry } from '../../types/watch';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

const HOME_SCREEN =
  '<hierarchy>' +
  '<node class="android.widget.TextView" text="Welcome back" bounds="[0,0][500,100]"/>' +
  '<node class="android.widget.Button" text="Login" clickable="true" bounds="[50,200][300,260]"/>' +
  '<node class="android.view.View" content-desc="Home" selected="true" clickable="true" bounds="[0,900][200,1000]"/>' +
  '</hierarchy>';

const PROFILE_SCREEN =
  '<hierarchy><node class="android.widget.TextView" text="Profile" bounds="[0,0][500,100]"/></hierarchy>';

class FakeDevice {
  tree = HOME_SCREEN;
  screenshotResult: boolean | Error = true;

  async screenshot(outputPath: string): Promise<boolean> {
    if (this.screenshotResult instanceof Error) {
      throw this.screenshotResult;
    }
    if (this.screenshotResult) {
      writeFileSync(outputPath, Buffer.alloc(2048, 1));
    }
    return this.screenshotResult;
  }

  async dumpRawTree(): Promise<string> {
    return this.tree;
  }

  parseTree(raw: string, assignRefs = true) {
    return parseAndroidTree(raw, DEFAULT_FILTER_LISTS.android, assignRefs);
  }
}

class FakeLogs {
  pending: DeviceLogEntry[] = [];
  drains = 0;

  drain(): DeviceLogEntry[] {
    this.drains++;
    const drained = this.pending;
    this.pending = [];
    return drained;
  }
}

describe('SnapshotCapture', () => {
  let workDir: string;
  let paths: CapturePaths;
  let device: FakeDevice;
  let logs: FakeLogs;
  let reported: SnapshotManifestEntry[];
  let capture: SnapshotCapture;

  const readManifest = (): SnapshotManifestEntry[] => JSON.parse(readFileSync(paths.manifestPath, 'utf-8'));

  beforeEach(async () => {
    workDir = mkdtempSync(path.join(tmpdir(), 'uiscope-capture-'));
    paths = {
      dir: path.join(workDir, 'watch'),
      manifestPath: path.join(workDir, 'watch.json'),
      screenPath: path.join(workDir, 'screen.png'),
      elementsPath: path.join(workDir, 'elements.json')
    };
    device = new FakeDevice();
    logs = new FakeLogs();
    reported = [];
    capture = new SnapshotCapture({
      platform: device,
      paths,
      logs,
      reporter: entry => reported.push(entry),
      now: () => new Date(TIMESTAMP)
    });
    await capture.reset();
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  test('should persist files, manifest and report for the initial capture', async () => {
    const drained: DeviceLogEntry[] = [
      { line: 'E/AndroidRuntime: FATAL EXCEPTION', timestamp: TIMESTAMP, severity: 'crash' },
      { line: 'I/ReactNativeJS: Running application', timestamp: TIMESTAMP, severity: 'info' }
    ];
    logs.pending = drained;

    const outcome = await capture.capture('INITIAL', 1);

    const expected: SnapshotManifestEntry = {
      sequence: 1,
      timestamp: TIMESTAMP,
      trigger: 'INITIAL',
      elementCount: 3,
      screenTitle: 'Welcome back',
      selectedTab: 'Home',
      clickableCount: 2,
      logLines: 2,
      crashes: ['E/AndroidRuntime: FATAL EXCEPTION'],
      files: {
        screen: path.join(paths.dir, '001-screen.png'),
        elements: path.join(paths.dir, '001-elements.json'),
        logs: path.join(paths.dir, '001-logs.json')
      }
    };
    expect(outcome).toEqual({ status: 'captured', entry: expected });
    expect(reported).toEqual([expected]);
    expect(readManifest()).toEqual([expected]);

    const elementsJson = serializeElements(device.parseTree(HOME_SCREEN), 2);
    expect(readFileSync(path.join(paths.dir, '001-elements.json'), 'utf-8')).toBe(elementsJson);
    expect(readFileSync(paths.elementsPath, 'utf-8')).toBe(elementsJson);
    expect(readFileSync(paths.screenPath)).toHaveLength(2048);
    expect(JSON.parse(readFileSync(path.join(paths.dir, '001-logs.json'), 'utf-8'))).toEqual(drained);
    expect(existsSync(`${paths.manifestPath}.tmp`)).toBe(false);
  });

  test('should omit crashes and the log file when nothing was drained', async () => {
    const outcome = await capture.capture('INITIAL', 1);

    expect(outcome.status).toBe('captured');
    if (outcome.status === 'captured') {
      expect(outcome.entry.crashes).toBeUndefined();
      expect(outcome.entry.logLines).toBe(0);
      expect(outcome.entry.files.logs).toBeUndefined();
    }
  });

  test('should drop an unchanged capture for a non-settled trigger', async () => {
    await capture.capture('INITIAL', 1);
    logs.pending = [{ line: 'D/maestro: tap', timestamp: TIMESTAMP, severity: 'info' }];

    const outcome = await capture.capture('TYPE_WINDOW_CONTENT_CHANGED', 2);

    expect(outcome).toEqual({ status: 'skipped', sequence: 2, trigger: 'TYPE_WINDOW_CONTENT_CHANGED' });
    expect(readManifest()).toHaveLength(1);
    expect(readdirSync(paths.dir).sort()).toEqual(['001-elements.json', '001-screen.png']);
    expect(logs.pending).toHaveLength(1);
    expect(reported).toHaveLength(1);
  });

  test('should always persist settled triggers', async () => {
    await capture.capture('INITIAL', 1);

    const outcome = await capture.capture('TYPE_WINDOW_STATE_CHANGED', 2);

    expect(outcome.status).toBe('captured');
    expect(readManifest().map(entry => entry.trigger)).toEqual(['INITIAL', 'TYPE_WINDOW_STATE_CHANGED']);
  });

  test('should persist a changed element set', async () => {
    await capture.capture('INITIAL', 1);
    device.tree = PROFILE_SCREEN;

    const outcome = await capture.capture('POLL', 2);

    expect(outcome.status).toBe('captured');
    if (outcome.status === 'captured') {
      expect(outcome.entry.screenTitle).toBe('Profile');
      expect(outcome.entry.files.elements).toBe(path.join(paths.dir, '002-elements.json'));
    }
  });

  test('should compare against the last persisted fingerprint', async () => {
    await capture.capture('INITIAL', 1);
    device.tree = PROFILE_SCREEN;
    await capture.capture('POLL', 2);
    device.tree = HOME_SCREEN;

    expect((await capture.capture('POLL', 3)).status).toBe('captured');
    expect((await capture.capture('POLL', 4)).status).toBe('skipped');
  });

  test('should record an unavailable dump as -1 elements and never dedupe it', async () => {
    device.tree = '';

    const first = await capture.capture('INITIAL', 1);
    const second = await capture.capture('POLL', 2);

    expect(first.status).toBe('captured');
    expect(second.status).toBe('captured');
    if (second.status === 'captured') {
      expect(second.entry).toMatchObject({ elementCount: -1, screenTitle: '', selectedTab: '', clickableCount: 0 });
      expect(second.entry.files.elements).toBeUndefined();
    }
  });

  test('should keep capturing when the screenshot fails', async () => {
    device.screenshotResult = false;
    const failed = await capture.capture('INITIAL', 1);

    device.screenshotResult = new Error('adb: device offline');
    const thrown = await capture.capture('TYPE_WINDOW_STATE_CHANGED', 2);

    for (const outcome of [failed, thrown]) {
      expect(outcome.status).toBe('captured');
      if (outcome.status === 'captured') {
        expect(outcome.entry.files.screen).toBeUndefined();
        expect(outcome.entry.elementCount).toBe(3);
      }
    }
    expect(readdirSync(paths.dir).filter(name => name.endsWith('.png'))).toEqual([]);
  });

  test('should start over after reset', async () => {
    await capture.capture('INITIAL', 1);
    await capture.reset();

    expect(readdirSync(paths.dir)).toEqual([]);
    expect(capture.manifest).toEqual([]);
    expect((await capture.capture('POLL', 1)).status).toBe('captured');
  });

  test('should leave files it did not write in the watch directory', async () => {
    logs.pending = [{ line: 'D/maestro: tap', timestamp: TIMESTAMP, severity: 'info' }];
    await capture.capture('INITIAL', 1);
    writeFileSync(path.join(paths.dir, 'notes.txt'), 'keep me');
    writeFileSync(path.join(paths.dir, '.007-screen.png'), 'pending');
    mkdirSync(path.join(paths.dir, '001-archive'));

    await capture.reset();

    expect(readdirSync(paths.dir).sort()).toEqual(['001-archive', 'notes.txt']);
    expect(readFileSync(path.join(paths.dir, 'notes.txt'), 'utf-8')).toBe('keep me');
    expect(existsSync(paths.manifestPath)).toBe(false);
  });
});

describe('summarizeScreen', () => {
  test('should pick the first capitalised TextView as title', () => {
    expect(
      summarizeScreen([
        { type: 'TextView', text: 'a' },
        { type: 'TextView', text: 'lowercase' },
        { type: 'Button', text: 'Submit', clickable: true },
        { type: 'TextView', text: 'Settings' },
        { type: 'TextView', text: 'Later' }
      ])
    ).toEqual({ screenTitle: 'Settings', selectedTab: '', clickableCount: 1 });
  });

  test('should use the last selected View id as tab', () => {
    expect(
      summarizeScreen([
        { type: 'View', id: 'Home', selected: true, clickable: true },
        { type: 'View', id: 'Search', selected: true, clickable: true },
        { type: 'Button', id: 'Other', selected: true }
      ])
    ).toEqual({ screenTitle: '', selectedTab: 'Search', clickableCount: 2 });
  });

  test('should zero-pad sequence numbers to three digits', () => {
    expect(sequencePrefix(7)).toBe('007');
    expect(sequencePrefix(1234)).toBe('1234');
  });
});
