export { toSlackMrkdwn, stripMentions } from './formatter.js';
export {
  computeSlackSignature,
  verifySlackSignature,
  SIGNATURE_MAX_AGE_SECONDS,
} from './signature.js';
export type { SignatureCheck } from './signature.js';
export { createSlackClient, SlackApiError, REPLIES_PAGE_LIMIT } from './slack-client.js';
export type {
  SlackClient,
  SlackClientConfig,
  SlackThreadMessage,
  PostMessageParams,
} from './slack-client.js';
export { createMentionHandler, PLACEHOLDER_TEXT, EMPTY_MENTION_QUERY } from './mention-handler.js';
export type { AppMentionEvent, MentionHandler, MentionHandlerOptions } from './mention-handler.js';
