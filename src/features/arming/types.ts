/**
 * Arming feature type definitions
 *
 * An alert can only fire once the day's arming rule has been met: either the
 * house got noticeably warmer outside than inside (so a later crossover is
 * worth reporting), or the configured time of day has passed.
 */

/**
 * Inputs to one arming evaluation
 */
export interface ArmingInput {
  indoorTemp: number;
  outdoorTemp: number;
  /** Current time, epoch ms */
  now: number;
  /** Arm state before this evaluation */
  armed: boolean;
}

/**
 * Outcome of an arming evaluation
 */
export interface ArmingResult {
  /** At least one arming condition is configured */
  configured: boolean;
  /** outdoor >= indoor + delta */
  armByTemp: boolean;
  /** Local time of day has reached the configured time */
  armByTime: boolean;
  /** Was unarmed and a condition holds */
  shouldArm: boolean;
  /** Human-readable description of each condition that holds */
  reasons: string[];
}
