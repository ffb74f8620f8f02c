export { sendSlackAlert } from './slack.js';
export type { SlackConfig } from './slack.js';
export { createAlertDispatcher } from './dispatcher.js';
export type { AlertConfig } from './dispatcher.js';
