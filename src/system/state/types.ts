/**
 * Persisted notifier state
 */

import type { Timestamp } from '$types/common';
import type { RollingWindowState } from '@core/rolling-window';
import type { Logger } from '@logging';

/**
 * Cross-invocation memory of the notifier
 */
export interface NotifierState {
  /** When the last alert went out (epoch ms), null if none since the last reset */
  lastNotificationTime: Timestamp | null;

  /** When the last rapid rise-and-drop was detected (epoch ms) */
  lastSignificantEventTime: Timestamp | null;

  /** Whether the arming rule has fired today */
  armed: boolean;

  /** Recent outdoor samples */
  rollingWindow: RollingWindowState;

  /** Outdoor values seen since the last alert, oldest first */
  tempsSinceLastNotification: number[];
}

/**
 * File system calls used by the store
 */
export interface StateFileApi {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
}

/**
 * State store options
 */
export interface StateStoreOptions {
  /** Path of the JSON state file */
  filePath: string;
  /** Span of the rolling window, from configuration */
  windowMinutes: number;
}

/**
 * Loads and saves the notifier state
 */
export interface StateStore {
  /**
   * Read the state file
   * @throws {StateStoreError} On I/O failure other than a missing file
   */
  load(): Promise<NotifierState>;
  /** Persist the whole state; failures are logged, never thrown */
  save(state: NotifierState): Promise<void>;
}

/**
 * Store dependencies
 */
export interface StateStoreDependencies {
  logger: Logger;
  fileApi?: StateFileApi;
}
