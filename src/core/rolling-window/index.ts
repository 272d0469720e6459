export {
  createRollingWindow,
  appendSample,
  measureRiseAndDrop,
  hasSignificantRiseAndDrop,
  isWithinWindow,
  MIN_SAMPLES_FOR_DETECTION
} from './rolling-window';
export { toRecords, fromRecords } from './serialization';
export { validateWindowMinutes, validateSample } from './helpers';
export type * from './types';
