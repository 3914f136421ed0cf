#!/usr/bin/env node

/**
 * uiscope CLI
 *
 * Live view of a running mobile app for test automation: screenshot,
 * element list, change-triggered snapshots and filtered device logs.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigValidationError, loadConfig } from '../config/environment';
import { createPlatform } from '../services/platforms';
import { DeviceUnavailableError, describeError } from '../services/errors';
import { createServiceLogger } from '../services/logger';
import {
  elementsCommand,
  inspectCommand,
  logcatCommand,
  screenCommand,
  statusCommand,
  watchCommand,
  type CliContext
} from './commands';

const log = createServiceLogger('cli');

interface GlobalOptions {
  platform?: string;
}

const parsePositive = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
};

const parseCount = (value: string): number => {
  const parsed = parsePositive(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return parsed;
};

const program = new Command();

program
  .name('uiscope')
  .description('Observe a running mobile app: screen, elements, UI changes and device logs')
  .version('0.1.0')
  .option('-p, --platform <platform>', 'android or ios (overrides UISCOPE_PLATFORM)');

function createContext(signal?: AbortSignal): CliContext {
  const { platform } = program.opts<GlobalOptions>();
  const env = platform ? { ...process.env, UISCOPE_PLATFORM: platform } : process.env;
  const config = loadConfig(env);
  log.debug('config_loaded', `Using ${config.device.platform}`, undefined, { configFile: config.configFile });

  return {
    config,
    platform: createPlatform(config),
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
    signal
  };
}

/**
 * Run a command and exit with its code. `interruptible` commands get an
 * AbortSignal that fires on Ctrl+C.
 */
async function execute(
  command: (ctx: CliContext) => Promise<number>,
  interruptible = false
): Promise<void> {
  let signal: AbortSignal | undefined;
  if (interruptible) {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());
    signal = controller.signal;
  }

  try {
    const code = await command(createContext(signal));
    process.exit(code);
  } catch (error) {
    if (error instanceof DeviceUnavailableError) {
      console.error(chalk.red(`Device not running: ${error.message}`));
    } else if (error instanceof ConfigValidationError) {
      console.error(chalk.red(`Configuration error: ${error.message}`));
      if (error.suggestion) {
        console.error(chalk.yellow(error.suggestion));
      }
    } else {
      log.error('command_failed', describeError(error), error instanceof Error ? error : undefined);
      console.error(chalk.red('Error:'), describeError(error));
    }
    process.exit(1);
  }
}

program
  .command('status')
  .description('Show configuration and whether a device is reachable')
  .action(() => execute(statusCommand));

program
  .command('screen')
  .description('Take a screenshot')
  .argument('[path]', 'Output PNG path (default: latest screenshot path)')
  .action((outputPath: string | undefined) => execute(ctx => screenCommand(ctx, outputPath)));

program
  .command('elements')
  .description('List visible UI elements')
  .option('--json', 'Print the element list as JSON', false)
  .option('--no-refs', 'Omit @e references')
  .action((options: { json: boolean; refs: boolean }) => execute(ctx => elementsCommand(ctx, options)));

program
  .command('inspect')
  .description('Screenshot, elements and recent crashes/errors as one JSON document')
  .action(() => execute(ctx => inspectCommand(ctx)));

program
  .command('watch')
  .description('Capture a snapshot every time the UI settles')
  .option('--timeout <seconds>', 'Stop after this many seconds', parsePositive)
  .option('--debounce <seconds>', 'Settle time before capturing', parsePositive)
  .option('--json', 'One JSON object per snapshot', false)
  .action((options: { timeout?: number; debounce?: number; json: boolean }) =>
    execute(ctx => watchCommand(ctx, options), true));

program
  .command('logcat')
  .description('Show filtered device logs')
  .option('--lines <n>', 'Number of lines to look back', parseCount, 50)
  .option('-f, --follow', 'Stream continuously', false)
  .action((options: { lines: number; follow: boolean }) =>
    execute(ctx => logcatCommand(ctx, options), options.follow));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), describeError(error));
  process.exit(1);
});
