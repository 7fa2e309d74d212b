import type { IncomingHttpHeaders } from 'http';
import { WebhookEndpoint, WebhookResponse } from '../services/webhook-endpoint';
import { PayloadTooLargeError } from '../services/errors';

export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * What the adapter needs from a Node (or Vercel) request
 */
export interface IncomingRequestLike extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  socket?: { remoteAddress?: string };
}

export interface OutgoingResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

export async function readRawBody(
  req: AsyncIterable<Buffer | string>,
  maxBytes: number = MAX_BODY_BYTES
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of req) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    total += buffer.length;
    if (total > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks);
}

export function writeResponse(res: OutgoingResponseLike, response: WebhookResponse): void {
  res.statusCode = response.status;
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  res.end(JSON.stringify(response.body));
}

/**
 * Runs a native request through the webhook endpoint.
 * Returns false when the request is not for the webhook path. The body is
 * streamed only when the endpoint asks for it, so requests rejected before
 * the signature check are never read.
 */
export async function dispatchWebhook(
  req: IncomingRequestLike,
  res: OutgoingResponseLike,
  endpoint: WebhookEndpoint
): Promise<boolean> {
  const response = await endpoint.handle({
    method: req.method ?? 'GET',
    url: req.url ?? '/',
    headers: req.headers,
    readBody: () => readRawBody(req),
    remoteAddress: req.socket?.remoteAddress,
  });

  if (!response) {
    return false;
  }

  writeResponse(res, response);
  return true;
}
