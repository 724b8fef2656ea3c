/**
 * Slack Events API endpoint.
 *
 * Flow:
 * 1. Verify the v0 signature over the raw body (when a signing secret is set)
 * 2. Answer URL verification challenges
 * 3. Ack retries without reprocessing
 * 4. Hand `app_mention` events to the mention handler in the background
 * 5. Return 200 immediately (Slack expects an ack within 3 seconds)
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { verifySlackSignature } from '@/channels/slack/signature.js';
import type { MentionHandler } from '@/channels/slack/mention-handler.js';
import type { Logger } from '@/observability/logger.js';
import { sendError } from '../error-handler.js';

// ─── Payload Schemas ────────────────────────────────────────────

const urlVerificationSchema = z.object({
  type: z.literal('url_verification'),
  challenge: z.string(),
});

const slackEventSchema = z.object({
  type: z.string(),
  channel: z.string().optional(),
  ts: z.string().optional(),
  text: z.string().optional(),
  user: z.string().optional(),
  bot_id: z.string().optional(),
  thread_ts: z.string().optional(),
});

const eventCallbackSchema = z.object({
  type: z.literal('event_callback'),
  event_id: z.string().optional(),
  event: slackEventSchema,
});

const envelopeSchema = z.union([urlVerificationSchema, eventCallbackSchema]);

// ─── Route Plugin ───────────────────────────────────────────────

export interface SlackEventRouteOptions {
  mentionHandler: MentionHandler;
  signingSecret?: string;
  logger: Logger;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Register POST /slack/events. Runs as its own plugin so the raw-body JSON
 * parser stays scoped to this route.
 */
export async function slackEventRoutes(
  fastify: FastifyInstance,
  options: SlackEventRouteOptions,
): Promise<void> {
  const { mentionHandler, signingSecret, logger } = options;

  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post('/slack/events', async (request, reply) => {
    const raw = typeof request.body === 'string' ? request.body : '';

    if (signingSecret) {
      const valid = verifySlackSignature({
        signingSecret,
        timestamp: headerValue(request.headers['x-slack-request-timestamp']),
        signature: headerValue(request.headers['x-slack-signature']),
        body: raw,
      });
      if (!valid) {
        logger.warn('Rejected Slack request with invalid signature', { component: 'slack-events' });
        return sendError(reply, 'INVALID_SIGNATURE', 'Invalid Slack signature', 401);
      }
    }

    const parsed = envelopeSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      return reply.status(200).send({ ok: true, ignored: true, reason: 'unsupported_payload' });
    }

    const envelope = parsed.data;
    if (envelope.type === 'url_verification') {
      logger.info('Slack URL verification challenge', { component: 'slack-events' });
      return reply.send({ challenge: envelope.challenge });
    }

    const retryNum = headerValue(request.headers['x-slack-retry-num']);
    if (retryNum !== undefined) {
      logger.debug('Ignoring Slack retry', {
        component: 'slack-events',
        eventId: envelope.event_id,
        retryNum,
      });
      return reply.status(200).send({ ok: true, ignored: true, reason: 'retry' });
    }

    const { event } = envelope;
    if (event.type !== 'app_mention' || event.bot_id || !event.channel || !event.ts) {
      return reply.status(200).send({ ok: true, ignored: true, reason: 'unhandled_event' });
    }

    void mentionHandler
      .handle({
        channel: event.channel,
        ts: event.ts,
        text: event.text ?? '',
        user: event.user,
        thread_ts: event.thread_ts,
      })
      .catch((error: unknown) => {
        logger.error('Failed to handle app mention', {
          component: 'slack-events',
          channel: event.channel,
          error: error instanceof Error ? error.message : String(error),
        });
      });

    return reply.status(200).send({ ok: true });
  });
}
