/**
 * Minimal Slack Web API client: thread history, user names, and replies.
 */
import { z } from 'zod';
import { HuddleError } from '@/core/errors.js';

const DEFAULT_BASE_URL = 'https://slack.com/api';

/** Page size for `conversations.replies`. */
export const REPLIES_PAGE_LIMIT = 200;

// ─── Errors ─────────────────────────────────────────────────────

export class SlackApiError extends HuddleError {
  constructor(method: string, error: string) {
    super({
      message: `Slack API ${method} failed: ${error}`,
      code: 'SLACK_API_ERROR',
      statusCode: 502,
      context: { method, error },
    });
    this.name = 'SlackApiError';
  }
}

// ─── Response Schemas ───────────────────────────────────────────

const slackResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

const threadMessageSchema = z.object({
  ts: z.string(),
  text: z.string().default(''),
  user: z.string().optional(),
  bot_id: z.string().optional(),
});

const repliesResponseSchema = z.object({
  messages: z.array(threadMessageSchema).default([]),
  response_metadata: z.object({ next_cursor: z.string().optional() }).optional(),
});

const postMessageResponseSchema = z.object({ ts: z.string() });

const userInfoResponseSchema = z.object({
  user: z.object({
    name: z.string().optional(),
    real_name: z.string().optional(),
    profile: z.object({ real_name: z.string().optional() }).optional(),
  }),
});

// ─── Client ─────────────────────────────────────────────────────

export interface SlackThreadMessage {
  ts: string;
  text: string;
  user?: string;
  botId?: string;
}

export interface PostMessageParams {
  channel: string;
  text: string;
  threadTs?: string;
}

export interface SlackClient {
  /** Every message of a thread, root first, across all pages. */
  fetchThread(channel: string, threadTs: string): Promise<SlackThreadMessage[]>;
  /** Display name of a user; undefined when Slack has none. */
  getUserName(userId: string): Promise<string | undefined>;
  /** Post a message; resolves with its `ts`. */
  postMessage(params: PostMessageParams): Promise<string>;
}

export interface SlackClientConfig {
  botToken: string;
  baseUrl?: string;
}

export function createSlackClient(config: SlackClientConfig): SlackClient {
  const baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;

  async function call<S extends z.ZodType>(
    method: string,
    schema: S,
    init: { query?: Record<string, string>; body?: Record<string, unknown> },
  ): Promise<z.output<S>> {
    const url = new URL(`${baseUrl}/${method}`);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url, {
      method: init.body ? 'POST' : 'GET',
      headers: {
        'Authorization': `Bearer ${config.botToken}`,
        ...(init.body ? { 'Content-Type': 'application/json; charset=utf-8' } : {}),
      },
      body: init.body ? JSON.stringify(init.body) : undefined,
    });

    if (!response.ok) {
      throw new SlackApiError(method, `HTTP ${response.status}`);
    }

    const json: unknown = await response.json();
    const status = slackResponseSchema.safeParse(json);
    if (!status.success) throw new SlackApiError(method, 'malformed response');
    if (!status.data.ok) throw new SlackApiError(method, status.data.error ?? 'unknown_error');

    const parsed = schema.safeParse(json);
    if (!parsed.success) throw new SlackApiError(method, 'malformed response');
    return parsed.data;
  }

  return {
    async fetchThread(channel, threadTs) {
      const messages: SlackThreadMessage[] = [];
      let cursor: string | undefined;

      do {
        const page = await call('conversations.replies', repliesResponseSchema, {
          query: {
            channel,
            ts: threadTs,
            inclusive: 'true',
            limit: String(REPLIES_PAGE_LIMIT),
            ...(cursor ? { cursor } : {}),
          },
        });
        for (const message of page.messages) {
          messages.push({
            ts: message.ts,
            text: message.text,
            user: message.user,
            botId: message.bot_id,
          });
        }
        cursor = page.response_metadata?.next_cursor || undefined;
      } while (cursor);

      return messages;
    },

    async getUserName(userId) {
      const info = await call('users.info', userInfoResponseSchema, { query: { user: userId } });
      return info.user.real_name ?? info.user.profile?.real_name ?? info.user.name;
    },

    async postMessage(params) {
      const result = await call('chat.postMessage', postMessageResponseSchema, {
        body: {
          channel: params.channel,
          text: params.text,
          mrkdwn: true,
          unfurl_links: false,
          unfurl_media: false,
          ...(params.threadTs ? { thread_ts: params.threadTs } : {}),
        },
      });
      return result.ts;
    },
  };
}
