export { compareTemperatures } from './control';
export { ALERT_TITLE, formatAlertMessage } from './helpers';
export type { Controller, ComparisonOutcome, ComparisonResult, Readings } from './types';
