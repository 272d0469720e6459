export { createNotifier, createNotifiers } from './factory';
export { dispatchNotification } from './dispatch';
export { createSimplePushNotifier, SIMPLEPUSH_API_URL } from './simplepush';
export { createSlackNotifier, formatSlackText } from './slack';
export type { Notifier, NotifierDependencies, DispatchResult } from './types';
