import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { handleWebhookRequest } from './drivehr-sync';
import { createWebhookEndpoint } from '../../src/services';
import { WebhookEndpoint } from '../../src/services/webhook-endpoint';
import { loadConfig } from '../../src/config';
import { signPayload } from '../../src/security/signature';
import { MemoryCounterStore } from '../../src/security/memory-counter-store';
import { IncomingRequestLike, MAX_BODY_BYTES, OutgoingResponseLike } from '../../src/utils/http';
import { InMemoryListingStore } from '../../src/test-utils/in-memory-listing-store';

const NOW = new Date('2024-05-01T12:00:00.000Z');

class FakeResponse implements OutgoingResponseLike {
  statusCode = 200;
  headers: Record<string, string> = {};
  body = '';

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  end(body: string): void {
    this.body = body;
  }
}

interface FakeRequestInit {
  method?: string;
  url: string;
  headers?: Record<string, string>;
  chunks?: Buffer[];
  failWith?: Error;
}

function fakeRequest(init: FakeRequestInit): IncomingRequestLike & { bodyRead: boolean } {
  const request = {
    method: init.method ?? 'POST',
    url: init.url,
    headers: init.headers ?? {},
    socket: { remoteAddress: '8.8.8.8' },
    bodyRead: false,
    async *[Symbol.asyncIterator](): AsyncGenerator<Buffer> {
      request.bodyRead = true;
      if (init.failWith) throw init.failWith;
      yield* init.chunks ?? [];
    },
  };
  return request;
}

function signedHeaders(body: string): Record<string, string> {
  return {
    'content-type': 'application/json',
    'x-webhook-signature': signPayload(body, 'test-secret'),
    'x-webhook-timestamp': String(Math.floor(NOW.getTime() / 1000)),
  };
}

describe('handleWebhookRequest', () => {
  let store: InMemoryListingStore;
  let endpoint: WebhookEndpoint;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new InMemoryListingStore();
    endpoint = createWebhookEndpoint(
      loadConfig({ WEBHOOK_SECRET: 'test-secret', WEBHOOK_ENABLED: 'true' }),
      {
        listingStore: store,
        counterStore: new MemoryCounterStore({ now: () => NOW.getTime() }),
        clock: () => NOW,
      }
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reconcile a signed request streamed in chunks', async () => {
    const body = '{"jobs":[{"id":"1","title":"Engineer"}]}';
    const req = fakeRequest({
      url: '/webhook/drivehr-sync',
      headers: signedHeaders(body),
      chunks: [Buffer.from(body.slice(0, 10)), Buffer.from(body.slice(10))],
    });
    const res = new FakeResponse();

    await handleWebhookRequest(req, res, endpoint);

    expect(res.statusCode).toBe(200);
    expect(res.headers['Content-Type']).toBe('application/json; charset=utf-8');
    expect(JSON.parse(res.body)).toMatchObject({ success: true, processed: 1, total: 1 });
    expect(store.activeExternalIds()).toEqual(['1']);
  });

  it('should respond 404 without reading the body for other paths', async () => {
    const req = fakeRequest({ url: '/elsewhere', chunks: [Buffer.from('{}')] });
    const res = new FakeResponse();

    await handleWebhookRequest(req, res, endpoint);

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body)).toEqual({ error: 'Not found', timestamp: expect.any(String) });
    expect(req.bodyRead).toBe(false);
  });

  it('should respond 413 to an oversized body that passes the earlier checks', async () => {
    const req = fakeRequest({
      url: '/webhook/drivehr-sync',
      chunks: [Buffer.alloc(MAX_BODY_BYTES), Buffer.alloc(1)],
    });
    const res = new FakeResponse();

    await handleWebhookRequest(req, res, endpoint);

    expect(res.statusCode).toBe(413);
    expect(JSON.parse(res.body).error).toBe('Payload too large');
  });

  it('should answer earlier checks before enforcing the body size', async () => {
    const disabled = createWebhookEndpoint(loadConfig({ WEBHOOK_SECRET: 'test-secret' }), {
      listingStore: store,
      counterStore: new MemoryCounterStore({ now: () => NOW.getTime() }),
      clock: () => NOW,
    });
    const chunks = [Buffer.alloc(2 * MAX_BODY_BYTES)];
    const post = fakeRequest({ url: '/webhook/drivehr-sync', chunks });
    const get = fakeRequest({ method: 'GET', url: '/webhook/drivehr-sync', chunks });
    const postRes = new FakeResponse();
    const getRes = new FakeResponse();

    await handleWebhookRequest(post, postRes, disabled);
    await handleWebhookRequest(get, getRes, endpoint);

    expect(postRes.statusCode).toBe(503);
    expect(getRes.statusCode).toBe(405);
    expect(post.bodyRead).toBe(false);
    expect(get.bodyRead).toBe(false);
  });

  it('should respond 500 when the request stream fails', async () => {
    const req = fakeRequest({ url: '/webhook/drivehr-sync', failWith: new Error('socket hang up') });
    const res = new FakeResponse();

    await handleWebhookRequest(req, res, endpoint);

    expect(res.statusCode).toBe(500);
    expect(JSON.parse(res.body).error).toBe('Internal server error');
    expect(res.headers['Cache-Control']).toBe('no-cache, no-store, must-revalidate');
  });
});
