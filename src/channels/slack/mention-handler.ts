/**
 * Handles `app_mention` events: acknowledge in the thread, gather the thread
 * as prior context, ask the orchestrator, reply with the answer.
 */
import type { ThreadEntry } from '@/core/types.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { Orchestrator } from '@/orchestration/orchestrator.js';
import { stripMentions, toSlackMrkdwn } from './formatter.js';
import type { SlackClient, SlackThreadMessage } from './slack-client.js';

const defaultLogger = createLogger({ name: 'slack' });

export const PLACEHOLDER_TEXT = ':robot_face: Analyzing with my specialized agents...';

/** Query used when a mention carries no text besides the mention itself. */
export const EMPTY_MENTION_QUERY = 'Analyze this conversation';

export interface AppMentionEvent {
  channel: string;
  ts: string;
  text: string;
  user?: string;
  thread_ts?: string;
}

export interface MentionHandlerOptions {
  client: SlackClient;
  orchestrator: Pick<Orchestrator, 'submit'>;
  logger?: Logger;
}

export interface MentionHandler {
  handle(event: AppMentionEvent): Promise<void>;
}

export function createMentionHandler(options: MentionHandlerOptions): MentionHandler {
  const { client, orchestrator } = options;
  const logger = options.logger ?? defaultLogger;
  const userNames = new Map<string, string>();

  async function resolveUserName(userId: string): Promise<string> {
    const cached = userNames.get(userId);
    if (cached) return cached;
    try {
      const name = (await client.getUserName(userId)) ?? userId;
      userNames.set(userId, name);
      return name;
    } catch (error) {
      logger.warn('Could not resolve Slack user name', {
        component: 'slack',
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      return userId;
    }
  }

  async function loadThread(event: AppMentionEvent, threadTs: string): Promise<ThreadEntry[]> {
    let messages: SlackThreadMessage[];
    try {
      messages = await client.fetchThread(event.channel, threadTs);
    } catch (error) {
      logger.error('Failed to fetch thread messages', {
        component: 'slack',
        channel: event.channel,
        threadTs,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const earlier = messages.filter((message) => message.ts !== event.ts && !message.botId);
    return Promise.all(
      earlier.map(async (message) => ({
        author: message.user ? await resolveUserName(message.user) : 'Unknown',
        text: stripMentions(message.text),
      })),
    );
  }

  return {
    async handle(event) {
      const threadTs = event.thread_ts ?? event.ts;
      logger.info('Handling app mention', {
        component: 'slack',
        channel: event.channel,
        threadTs,
      });

      await client.postMessage({ channel: event.channel, text: PLACEHOLDER_TEXT, threadTs });

      const priorContext = await loadThread(event, threadTs);
      const query = stripMentions(event.text) || EMPTY_MENTION_QUERY;
      const answer = await orchestrator.submit(query, priorContext);

      await client.postMessage({
        channel: event.channel,
        text: toSlackMrkdwn(answer),
        threadTs,
      });
    },
  };
}
