/**
 * Command-line program
 *
 * One invocation performs one comparison run and returns an exit code:
 * 0 when the run completed (whether or not an alert went out), 1 when it
 * failed.
 */

import { Command, CommanderError } from 'commander';
import * as dotenv from 'dotenv';
import { APP_NAME, APP_VERSION, DEFAULTS } from '@utils/constants';
import { compareTemperatures } from '@system/control';
import { resolveRuntimeSettings, loadConfiguration } from './config';
import { createAppLogger, initialize } from './init';
import { describeFailure } from './helpers';
import type { RuntimeSettings } from '$types/config';
import type { CliOptions, MainDependencies } from './types';

/**
 * Build the commander program
 *
 * @param deps - Console used for help, version and usage errors
 */
export function createProgram(deps: Pick<MainDependencies, 'consoleApi'>): Command {
  const program = new Command();

  program
    .name('temperature-notifier')
    .description('Alert when the outdoor temperature drops below the indoor temperature')
    .version(APP_VERSION, '-v, --version', 'Print the version and exit')
    .option('--debug', 'Enable debug logging')
    .option('-c, --config <path>', 'Configuration file (default: ' + DEFAULTS.CONFIG_FILE + ')')
    .option('-s, --state <path>', 'State file (default: ' + DEFAULTS.STATE_FILE + ')')
    .option('--log-file <path>', 'Log file (default: ' + DEFAULTS.LOG_FILE + ')')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.consoleApi.log(str.replace(/\n$/, '')),
      writeErr: (str) => deps.consoleApi.error(str.replace(/\n$/, ''))
    });

  return program;
}

/**
 * Default process-level collaborators
 */
export function defaultDependencies(): MainDependencies {
  return {
    env: process.env,
    fetchFn: fetch,
    consoleApi: console,
    now: Date.now,
    colors: process.stdout.isTTY === true && process.env.NO_COLOR === undefined,
    loadDotenv: true
  };
}

/**
 * Parse arguments and perform one comparison run
 *
 * @param argv - Arguments after the executable and script name
 * @param deps - Process-level collaborators
 * @returns Process exit code
 */
export async function main(argv: readonly string[], deps: MainDependencies = defaultDependencies()): Promise<number> {
  const program = createProgram(deps);
  try {
    program.parse(argv.slice(), { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
  const options = program.opts<CliOptions>();

  if (deps.loadDotenv) {
    dotenv.config();
  }

  let settings: RuntimeSettings;
  try {
    settings = resolveRuntimeSettings(deps.env, options);
  } catch (err) {
    deps.consoleApi.error(describeFailure(err));
    return 1;
  }

  const logger = createAppLogger(settings, deps.consoleApi, deps.colors);
  logger.info(APP_NAME + ' started.');

  try {
    const loaded = await loadConfiguration(settings.configPath);
    for (const warning of loaded.warnings) {
      logger.warning('Configuration warning [' + warning.field + ']: ' + warning.message);
    }

    const controller = initialize(loaded.config, settings, logger, deps.fetchFn);
    const result = await compareTemperatures(controller, deps.now());
    logger.debug('Run outcome: ' + result.outcome);
    return 0;
  } catch (err) {
    logger.error(describeFailure(err));
    return 1;
  } finally {
    logger.info(APP_NAME + ' finished.');
  }
}
