export { createSimplePushNotifier, SIMPLEPUSH_API_URL } from './simplepush-notifier';
