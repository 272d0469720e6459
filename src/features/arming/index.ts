export { evaluateArming, isArmingConfigured } from './arming';
export type { ArmingInput, ArmingResult } from './types';
