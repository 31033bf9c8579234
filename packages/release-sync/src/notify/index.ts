export { SlackNotifier } from './slack-notifier.js';
export type { SlackNotifierOptions } from './slack-notifier.js';
export type { Notifier } from './types.js';
