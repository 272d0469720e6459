/**
 * Configuration and runtime settings loading
 *
 * Settings come from three layers, highest priority first:
 *   1. CLI options (--config, --state, --log-file, --debug)
 *   2. Environment (TEMPERATURE_NOTIFIER_*), optionally seeded from .env
 *   3. Defaults (files in the working directory)
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import YAML from 'yaml';
import type { Configuration, RuntimeSettings } from '$types/config';
import { ConfigurationError, errorMessage } from '$types/errors';
import { validateConfig } from '@validation';
import type { ValidationWarning } from '@validation';
import { DEFAULTS } from '@utils/constants';
import type { CliOptions } from './types';

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  TEMPERATURE_NOTIFIER_CONFIG: z.string().min(1).optional(),
  TEMPERATURE_NOTIFIER_STATE: z.string().min(1).optional(),
  TEMPERATURE_NOTIFIER_LOG_FILE: z.string().min(1).optional(),
  TEMPERATURE_NOTIFIER_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

/**
 * Merge CLI options over environment over defaults
 *
 * @param env - Process environment
 * @param options - Parsed CLI options
 * @throws {ConfigurationError} If an environment variable is malformed
 */
export function resolveRuntimeSettings(
  env: Record<string, string | undefined>,
  options: CliOptions
): RuntimeSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(issue.path.join('.') + ': ' + issue.message);
  }
  const vars = parsed.data;

  return {
    configPath: options.config ?? vars.TEMPERATURE_NOTIFIER_CONFIG ?? DEFAULTS.CONFIG_FILE,
    statePath: options.state ?? vars.TEMPERATURE_NOTIFIER_STATE ?? DEFAULTS.STATE_FILE,
    logFilePath: options.logFile ?? vars.TEMPERATURE_NOTIFIER_LOG_FILE ?? DEFAULTS.LOG_FILE,
    requestTimeoutMs: vars.TEMPERATURE_NOTIFIER_TIMEOUT_MS ?? DEFAULTS.REQUEST_TIMEOUT_MS,
    debug: options.debug === true
  };
}

// ─────────────────────────────────────────────────────────────
// CONFIGURATION FILE
// ─────────────────────────────────────────────────────────────

export interface LoadedConfiguration {
  config: Configuration;
  warnings: ValidationWarning[];
}

/**
 * Read and validate the configuration file
 *
 * @param path - YAML (or JSON) configuration file
 * @param readText - File reader, node:fs by default
 * @throws {ConfigurationError} If the file is missing, unreadable, not YAML or invalid
 */
export async function loadConfiguration(
  path: string,
  readText: (path: string) => Promise<string> = (p) => readFile(p, 'utf8')
): Promise<LoadedConfiguration> {
  let content: string;
  try {
    content = await readText(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigurationError('Configuration file not found: ' + path, { cause: err });
    }
    throw new ConfigurationError('Cannot read configuration file ' + path + ': ' + errorMessage(err), { cause: err });
  }

  // YAML 1.2, so JSON files load as well
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ConfigurationError('Configuration file ' + path + ' is not valid YAML: ' + errorMessage(err), { cause: err });
  }

  const validation = validateConfig(raw);
  if (!validation.valid) {
    const details = validation.errors.map(function(e) {
      return '[' + e.field + ']: ' + e.message;
    });
    throw new ConfigurationError('Invalid configuration in ' + path + ': ' + details.join('; '));
  }

  return { config: validation.config, warnings: validation.warnings };
}
