import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { IOSPlatform, buildLogPredicate, findBootedUdid } from '../ios';
import { DEFAULT_FILTER_LISTS, type DeviceConfig } from '../../../config/environment';
import { FakeRunner, ok } from './fakeRunner';
import type { DevicePlatform } from '../../../types/platform';

const BOOTED_LIST = JSON.stringify({
  devices: {
    'com.apple.CoreSimulator.SimRuntime.iOS-17-0': [
      { name: 'iPhone SE', udid: 'SIM-UDID-0', state: 'Shutdown' },
      { name: 'iPhone 15', udid: 'SIM-UDID-1', state: 'Booted' }
    ]
  }
});

const createIos = (runner: FakeRunner, device: Partial<DeviceConfig> = {}) =>
  new IOSPlatform({
    device: { platform: 'ios', appId: '', deviceSerial: '', simulator: '', ...device },
    timeouts: { screenshot: 10000, dump: 10000 },
    logs: { maxLines: 200, stopGraceMs: 20 },
    filters: DEFAULT_FILTER_LISTS.ios,
    runner
  });

describe('buildLogPredicate', () => {
  test('should select UIKit, faults, React Native and maestro', () => {
    expect(buildLogPredicate('')).toBe(
      'subsystem == "com.apple.UIKit" OR messageType == 21 OR subsystem CONTAINS "ReactNative" OR process == "maestro"'
    );
  });

  test('should add app errors when an app id is set', () => {
    expect(buildLogPredicate('com.example.app')).toMatch(
      / OR \(processImagePath CONTAINS "com\.example\.app" AND messageType >= 16\)$/
    );
  });
});

describe('findBootedUdid', () => {
  test('should return the first booted simulator', () => {
    expect(findBootedUdid(BOOTED_LIST)).toBe('SIM-UDID-1');
  });

  test('should return an empty id for unusable output', () => {
    expect(findBootedUdid('not json')).toBe('');
    expect(findBootedUdid('{"devices":{"runtime":[{"udid":"X","state":"Shutdown"}]}}')).toBe('');
    expect(findBootedUdid('[]')).toBe('');
  });
});

describe('IOSPlatform', () => {
  test('should not offer a UI event stream', () => {
    const platform: DevicePlatform = createIos(new FakeRunner(() => undefined));
    expect(platform.startEventStream).toBeUndefined();
  });

  describe('probe', () => {
    const listing = '== Devices ==\n-- iOS 17.0 --\n    iPhone 15 (SIM-UDID-1) (Booted) \n';

    test('should accept any booted simulator by default', async () => {
      const runner = new FakeRunner(() => ok(listing));

      await expect(createIos(runner).probe()).resolves.toEqual({ ok: true, detail: 'booted' });
      expect(runner.commandLines()).toEqual(['xcrun simctl list devices booted']);
    });

    test('should look for the configured simulator', async () => {
      const runner = new FakeRunner(() => ok(listing));

      await expect(createIos(runner, { simulator: 'SIM-UDID-1' }).probe()).resolves.toEqual({
        ok: true,
        detail: 'SIM-UDID-1'
      });
      await expect(createIos(runner, { simulator: 'SIM-UDID-9' }).probe()).resolves.toEqual({
        ok: false,
        detail: 'simulator SIM-UDID-9 not booted'
      });
    });

    test('should fail with nothing booted', async () => {
      const runner = new FakeRunner(() => ok('== Devices ==\n'));

      await expect(createIos(runner).probe()).resolves.toEqual({ ok: false, detail: 'no simulator booted' });
    });
  });

  describe('screenshot', () => {
    let workDir: string;
    let output: string;

    beforeEach(() => {
      workDir = mkdtempSync(join(tmpdir(), 'uiscope-ios-'));
      output = join(workDir, 'screen.png');
    });

    afterEach(() => {
      rmSync(workDir, { recursive: true, force: true });
    });

    test('should use axe with the resolved UDID', async () => {
      const runner = new FakeRunner(command => {
        if (command.endsWith('-j')) return ok(BOOTED_LIST);
        if (command.startsWith('axe screenshot')) {
          writeFileSync(output, Buffer.alloc(2048));
          return ok();
        }
        return undefined;
      });

      await expect(createIos(runner).screenshot(output)).resolves.toBe(true);
      expect(runner.commandLines()).toEqual([
        'xcrun simctl list devices booted -j',
        `axe screenshot --output ${output} --udid SIM-UDID-1`
      ]);
    });

    test('should fall back to simctl when axe fails', async () => {
      const runner = new FakeRunner(command => {
        if (command.endsWith('-j')) return ok(BOOTED_LIST);
        if (command.startsWith('xcrun simctl io')) {
          writeFileSync(output, Buffer.alloc(2048));
          return ok();
        }
        return undefined;
      });

      await expect(createIos(runner).screenshot(output)).resolves.toBe(true);
      expect(runner.commandLines()[2]).toBe(`xcrun simctl io booted screenshot ${output}`);
    });

    test('should fail when neither tool leaves an image', async () => {
      const runner = new FakeRunner(command => (command.endsWith('-j') ? ok(BOOTED_LIST) : ok()));

      await expect(createIos(runner).screenshot(output)).resolves.toBe(false);
    });
  });

  describe('element tree', () => {
    test('should describe the UI of the configured simulator', async () => {
      const tree = JSON.stringify([{ type: 'Button', AXLabel: 'Sign in', frame: { x: 0, y: 0, width: 100, height: 40 } }]);
      const runner = new FakeRunner(command => (command === 'axe describe-ui --udid SIM-UDID-7' ? ok(tree) : undefined));
      const ios = createIos(runner, { simulator: 'SIM-UDID-7' });

      const raw = await ios.dumpRawTree();

      expect(ios.parseTree(raw)).toEqual([
        { ref: '@e1', type: 'Button', text: 'Sign in', clickable: true, bounds: '[0,0][100,40]' }
      ]);
      expect(runner.commandLines()).toEqual(['axe describe-ui --udid SIM-UDID-7']);
    });

    test('should return an empty dump without a booted simulator', async () => {
      const runner = new FakeRunner(() => ok('{"devices":{}}'));

      await expect(createIos(runner).dumpRawTree()).resolves.toBe('');
      expect(runner.commandLines()).toEqual(['xcrun simctl list devices booted -j']);
    });
  });

  describe('logs', () => {
    test('should keep the last lines of the recent log window', async () => {
      const runner = new FakeRunner(() => ok('one\ntwo\nthree\nfour'));

      await expect(createIos(runner).readRecentLogs(2)).resolves.toBe('three\nfour');
      expect(runner.commandLines()).toEqual([
        'xcrun simctl spawn booted log show --style compact --last 30s'
      ]);
    });

    test('should stream the unified log with the predicate', async () => {
      const runner = new FakeRunner(() => undefined);
      const collector = createIos(runner).createLogCollector();

      await collector.start();
      await collector.stop();

      expect(runner.calls).toEqual([
        {
          file: 'xcrun',
          args: ['simctl', 'spawn', 'booted', 'log', 'stream', '--style', 'compact', '--predicate', buildLogPredicate('')]
        }
      ]);
    });
  });
});
