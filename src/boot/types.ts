/**
 * Boot type definitions
 */

import type { ConsoleAPI } from '@logging';
import type { FetchFn } from '@utils/http';

/**
 * Options parsed from the command line
 */
export type CliOptions = {
  debug?: boolean;
  config?: string;
  state?: string;
  logFile?: string;
};

/**
 * Process-level collaborators, replaced in tests
 */
export interface MainDependencies {
  env: Record<string, string | undefined>;
  fetchFn: FetchFn;
  consoleApi: ConsoleAPI;
  /** Current time, epoch ms */
  now: () => number;
  /** Colour console output */
  colors: boolean;
  /** Seed process.env from .env in the working directory */
  loadDotenv: boolean;
}

// Re-export Controller from control module
export type { Controller } from '@system/control/types';
