import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getWebhookEndpoint } from '../../src/services';
import { buildResponse, WebhookEndpoint } from '../../src/services/webhook-endpoint';
import {
  dispatchWebhook,
  IncomingRequestLike,
  OutgoingResponseLike,
  writeResponse,
} from '../../src/utils/http';
import { logger } from '../../src/utils/logger';

export async function handleWebhookRequest(
  req: IncomingRequestLike,
  res: OutgoingResponseLike,
  endpoint: WebhookEndpoint
): Promise<void> {
  try {
    const handled = await dispatchWebhook(req, res, endpoint);
    if (!handled) {
      writeResponse(res, buildResponse(404, { error: 'Not found' }));
    }
  } catch (error) {
    logger.error('Error handling job sync webhook', error);
    writeResponse(res, buildResponse(500, { error: 'Internal server error' }));
  }
}

/**
 * Job sync webhook endpoint
 * Receives job snapshots and reconciles them against the listing store.
 * The body is read from the raw stream (never `req.body`) because the
 * signature covers the exact request bytes.
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  await handleWebhookRequest(req, res, getWebhookEndpoint());
}
