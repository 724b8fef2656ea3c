import { createHmac, timingSafeEqual } from 'node:crypto';

/** Requests older than this are rejected as replays. */
export const SIGNATURE_MAX_AGE_SECONDS = 5 * 60;

export interface SignatureCheck {
  signingSecret: string;
  /** `X-Slack-Request-Timestamp` header, in seconds. */
  timestamp: string | undefined;
  /** `X-Slack-Signature` header, `v0=<hex>`. */
  signature: string | undefined;
  /** Raw request body, exactly as received. */
  body: string;
  /** Current time in milliseconds. */
  now?: number;
}

export function computeSlackSignature(signingSecret: string, timestamp: string, body: string): string {
  const digest = createHmac('sha256', signingSecret).update(`v0:${timestamp}:${body}`).digest('hex');
  return `v0=${digest}`;
}

/** Verify a Slack request signature (v0 scheme). */
export function verifySlackSignature(check: SignatureCheck): boolean {
  const { signingSecret, timestamp, signature, body } = check;
  if (!timestamp || !signature) return false;

  const seconds = Number(timestamp);
  if (!Number.isInteger(seconds)) return false;
  const nowSeconds = Math.floor((check.now ?? Date.now()) / 1000);
  if (Math.abs(nowSeconds - seconds) > SIGNATURE_MAX_AGE_SECONDS) return false;

  const expected = Buffer.from(computeSlackSignature(signingSecret, timestamp, body));
  const received = Buffer.from(signature);
  return expected.length === received.length && timingSafeEqual(expected, received);
}
