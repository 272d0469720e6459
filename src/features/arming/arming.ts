/**
 * Arming logic
 */

import type { ArmingConfig } from '$types/config';
import type { ArmingInput, ArmingResult } from './types';
import { isAtOrAfterTimeOfDay, formatTimeOfDay } from '@utils/time';
import { fmtTemp } from '@utils/number';

export type { ArmingInput, ArmingResult };

/**
 * Check whether any arming condition is configured
 */
export function isArmingConfigured(config: ArmingConfig): boolean {
  return config.temperatureDelta !== null || config.time !== null;
}

/**
 * Evaluate the arming rule
 *
 * @param input - Current readings, time and arm state
 * @param config - Arming configuration
 * @returns Which conditions hold and whether the state should become armed
 *
 * @remarks
 * An already armed state stays armed until the daily reset; `shouldArm` is
 * only true for the unarmed to armed transition.
 */
export function evaluateArming(input: ArmingInput, config: ArmingConfig): ArmingResult {
  const reasons: string[] = [];

  let armByTemp = false;
  if (config.temperatureDelta !== null) {
    armByTemp = input.outdoorTemp >= input.indoorTemp + config.temperatureDelta;
    if (armByTemp) {
      reasons.push(
        'outdoor ' + fmtTemp(input.outdoorTemp) + ' >= indoor ' + fmtTemp(input.indoorTemp) +
        ' + ' + fmtTemp(config.temperatureDelta)
      );
    }
  }

  let armByTime = false;
  if (config.time !== null) {
    armByTime = isAtOrAfterTimeOfDay(input.now, config.time);
    if (armByTime) {
      reasons.push('time of day >= ' + formatTimeOfDay(config.time));
    }
  }

  return {
    configured: isArmingConfigured(config),
    armByTemp: armByTemp,
    armByTime: armByTime,
    shouldArm: !input.armed && (armByTemp || armByTime),
    reasons: reasons
  };
}
