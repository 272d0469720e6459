export { createSlackNotifier, formatSlackText } from './slack-notifier';
