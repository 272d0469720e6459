export { createInitialState, isNewDay, resetForNewDay, recordNotification } from './state';
export {
  StateRecordSchema,
  serializeState,
  deserializeState,
  parseStateRecord
} from './serialization';
export type { StateRecord } from './serialization';
export { createStateStore, nodeStateFileApi } from './store';
export type * from './types';
