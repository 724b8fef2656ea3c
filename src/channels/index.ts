// Slack Events API channel
export * from './slack/index.js';
