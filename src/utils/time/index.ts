export { now } from './time';
export {
  minutesToMs,
  parseTimeOfDay,
  timeOfDayToMinutes,
  getTimeOfDay,
  isAtOrAfterTimeOfDay,
  formatTimeOfDay,
  isSameLocalDay,
  toIsoString,
  parseIsoTimestamp
} from './helpers';
