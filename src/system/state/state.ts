/**
 * State management functions
 */

import type { NotifierState } from './types';
import { createRollingWindow } from '@core/rolling-window';
import { isSameLocalDay } from '@utils/time';

/**
 * Create a fresh state: unarmed, no history, empty window
 *
 * @param windowMinutes - Span of the rolling window
 */
export function createInitialState(windowMinutes: number): NotifierState {
  return {
    lastNotificationTime: null,
    lastSignificantEventTime: null,
    armed: false,
    rollingWindow: createRollingWindow(windowMinutes),
    tempsSinceLastNotification: []
  };
}

/**
 * Check whether the calendar day has changed since the last alert
 *
 * @param state - Current state
 * @param now - Current time, epoch ms
 * @returns True iff an alert was sent and it was on another local date
 */
export function isNewDay(state: NotifierState, now: number): boolean {
  if (state.lastNotificationTime === null) {
    return false;
  }
  return !isSameLocalDay(state.lastNotificationTime, now);
}

/**
 * Start a new day (MUTABLE): forget the last alert and disarm
 */
export function resetForNewDay(state: NotifierState): void {
  state.lastNotificationTime = null;
  state.armed = false;
}

/**
 * Record that an alert went out (MUTABLE)
 */
export function recordNotification(state: NotifierState, now: number): void {
  state.lastNotificationTime = now;
  state.tempsSinceLastNotification = [];
}
