/**
 * Notifier type definitions
 */

import type { Logger } from '@logging';
import type { FetchFn } from '@utils/http';

/**
 * A push channel able to deliver an alert
 */
export interface Notifier {
  /** Channel name used in logs and errors, e.g. "simplepush" */
  readonly name: string;
  /**
   * Deliver one alert
   * @throws {NotifierError} If the channel rejects or cannot be reached
   */
  sendNotification(title: string, message: string): Promise<void>;
}

/**
 * Notifier external dependencies
 */
export interface NotifierDependencies {
  fetchFn: FetchFn;
  /** Abort each request after this many milliseconds */
  timeoutMs: number;
  logger: Logger;
}

/**
 * Outcome of sending one alert to every notifier
 */
export interface DispatchResult {
  /** Names of channels that accepted the alert */
  delivered: string[];
  /** Failures by channel */
  failed: { name: string; error: unknown }[];
}
