/**
 * Webhook signature verification.
 *
 * Requests carry `X-Webhook-Signature: sha256=<hex hmac of raw body>` and
 * `X-Webhook-Timestamp: <unix seconds>`. A request is authentic when the
 * timestamp is within the replay window and the signature matches the
 * HMAC-SHA256 of the raw body under the shared secret.
 */

import { createHmac, timingSafeEqual } from 'crypto';

export const SIGNATURE_HEADER = 'x-webhook-signature';
export const TIMESTAMP_HEADER = 'x-webhook-timestamp';
export const SIGNATURE_PREFIX = 'sha256=';
export const DEFAULT_MAX_TIMESTAMP_DRIFT_SECONDS = 300;

export type SignatureCheck =
  | { valid: true }
  | { valid: false; reason: string };

/**
 * Computes the signature header value for a body: `sha256=<hex>`.
 */
export function signPayload(rawBody: Buffer | string, secret: string): string {
  const digest = createHmac('sha256', secret).update(rawBody).digest('hex');
  return `${SIGNATURE_PREFIX}${digest}`;
}

/**
 * Verifies signature and timestamp, returning why verification failed.
 * The reason is for operator logs only; callers must not echo it back.
 *
 * @param now - Current time in unix seconds
 */
export function checkWebhookSignature(
  rawBody: Buffer | string,
  signatureHeader: string | undefined,
  timestampHeader: string | undefined,
  secret: string,
  now: number,
  maxDriftSeconds: number = DEFAULT_MAX_TIMESTAMP_DRIFT_SECONDS
): SignatureCheck {
  const timestampText = timestampHeader?.trim() ?? '';
  if (!/^\d+(\.\d+)?$/.test(timestampText)) {
    return { valid: false, reason: 'Missing or non-numeric timestamp' };
  }

  // Fractional seconds are truncated
  const timestamp = Math.trunc(Number(timestampText));
  if (Math.abs(now - timestamp) > maxDriftSeconds) {
    return { valid: false, reason: 'Timestamp outside replay window' };
  }

  if (!secret) {
    return { valid: false, reason: 'Webhook secret not configured' };
  }

  if (!signatureHeader || !signatureHeader.startsWith(SIGNATURE_PREFIX)) {
    return { valid: false, reason: 'Missing or malformed signature' };
  }

  const received = Buffer.from(signatureHeader, 'utf8');
  const expected = Buffer.from(signPayload(rawBody, secret), 'utf8');

  // timingSafeEqual requires equal lengths
  if (received.length !== expected.length || !timingSafeEqual(received, expected)) {
    return { valid: false, reason: 'Signature mismatch' };
  }

  return { valid: true };
}

export function verifyWebhookSignature(
  rawBody: Buffer | string,
  signatureHeader: string | undefined,
  timestampHeader: string | undefined,
  secret: string,
  now: number,
  maxDriftSeconds: number = DEFAULT_MAX_TIMESTAMP_DRIFT_SECONDS
): boolean {
  return checkWebhookSignature(
    rawBody,
    signatureHeader,
    timestampHeader,
    secret,
    now,
    maxDriftSeconds
  ).valid;
}
