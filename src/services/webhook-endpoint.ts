import { ReconciliationResult } from '../types/listing';
import { RateLimiter } from '../security/rate-limiter';
import {
  checkWebhookSignature,
  SIGNATURE_HEADER,
  TIMESTAMP_HEADER,
} from '../security/signature';
import { getHeader, RequestHeaders, resolveClientIp } from '../security/client-ip';
import { PayloadValidator } from '../validation/payload-validator';
import { ReconciliationEngine } from './reconciliation';
import { errorMessage, PayloadTooLargeError } from './errors';
import { logger } from '../utils/logger';

export interface WebhookRequest {
  method: string;
  /** Request target; a query string is ignored */
  url: string;
  headers: RequestHeaders;
  /** Reads the raw body; not called until the request passes the rate limit */
  readBody(): Promise<Buffer>;
  remoteAddress?: string;
}

export type ResponseBody = Record<string, unknown>;

export interface WebhookResponse {
  status: number;
  headers: Record<string, string>;
  body: ResponseBody;
}

export interface WebhookEndpointSettings {
  path: string;
  enabled: boolean;
  secret: string;
  maxTimestampDriftSeconds: number;
  rateLimit: {
    maxRequests: number;
    windowSeconds: number;
  };
}

export interface WebhookHooks {
  onWebhookStart?(): void;
  onWebhookEnd?(outcome: ReconciliationResult | { error: string }): void;
}

export interface WebhookEndpointDeps {
  settings: WebhookEndpointSettings;
  rateLimiter: RateLimiter;
  validator: PayloadValidator;
  engine: ReconciliationEngine;
  hooks?: WebhookHooks;
  clock?: () => Date;
}

const SECURITY_HEADERS: Record<string, string> = {
  'Content-Type': 'application/json; charset=utf-8',
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-Robots-Tag': 'noindex, nofollow, noarchive, nosnippet',
};

const NO_CACHE_HEADERS: Record<string, string> = {
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
};

/**
 * Builds a JSON response with the security headers, cache-disabling
 * headers for errors, and a timestamp when the body has none
 */
export function buildResponse(status: number, body: ResponseBody, now: Date = new Date()): WebhookResponse {
  const headers = status >= 400
    ? { ...SECURITY_HEADERS, ...NO_CACHE_HEADERS }
    : { ...SECURITY_HEADERS };

  return {
    status,
    headers,
    body: body.timestamp === undefined ? { ...body, timestamp: now.toISOString() } : body,
  };
}

export function pathnameOf(url: string): string {
  try {
    return new URL(url, 'http://localhost').pathname;
  } catch {
    return url.split('?')[0];
  }
}

/**
 * Webhook request pipeline:
 * path → enabled → method → rate limit → body → signature → JSON → payload → reconcile.
 * Each failed check responds immediately. Lifecycle hooks are observers:
 * an exception thrown by one is logged and does not change the response.
 */
export class WebhookEndpoint {
  private readonly settings: WebhookEndpointSettings;
  private readonly hooks: WebhookHooks;
  private readonly clock: () => Date;

  constructor(private readonly deps: WebhookEndpointDeps) {
    this.settings = deps.settings;
    this.hooks = deps.hooks ?? {};
    this.clock = deps.clock ?? (() => new Date());
  }

  matches(url: string): boolean {
    return pathnameOf(url) === this.settings.path;
  }

  /**
   * Returns null for requests outside the webhook path, which the host
   * application handles as usual
   */
  async handle(request: WebhookRequest): Promise<WebhookResponse | null> {
    if (!this.matches(request.url)) {
      return null;
    }

    this.notify('onWebhookStart', hooks => hooks.onWebhookStart?.());

    if (!this.settings.enabled) {
      logger.debug('Webhook disabled', { uri: pathnameOf(request.url) });
      return this.respond(503, { error: 'Service temporarily unavailable' });
    }

    if (request.method.toUpperCase() !== 'POST') {
      logger.debug('Invalid method', { method: request.method });
      return this.respond(405, {
        error: 'Method not allowed',
        allowed_methods: ['POST'],
      });
    }

    const clientIp = resolveClientIp(request.headers, request.remoteAddress);
    const { maxRequests, windowSeconds } = this.settings.rateLimit;

    let allowed: boolean;
    try {
      allowed = await this.deps.rateLimiter.allow(clientIp, maxRequests, windowSeconds);
    } catch (error) {
      logger.error('Rate limit check failed', error);
      return this.respond(500, { error: 'Internal server error' });
    }

    if (!allowed) {
      logger.debug('Rate limit exceeded', { ip: clientIp });
      return this.respond(429, {
        error: 'Rate limit exceeded',
        retry_after: windowSeconds,
      });
    }

    let rawBody: Buffer;
    try {
      rawBody = await request.readBody();
    } catch (error) {
      if (!(error instanceof PayloadTooLargeError)) throw error;
      logger.debug('Payload too large', { ip: clientIp, limit: error.limit });
      return this.respond(413, { error: 'Payload too large' });
    }

    const signature = checkWebhookSignature(
      rawBody,
      getHeader(request.headers, SIGNATURE_HEADER),
      getHeader(request.headers, TIMESTAMP_HEADER),
      this.settings.secret,
      Math.floor(this.clock().getTime() / 1000),
      this.settings.maxTimestampDriftSeconds
    );
    if (!signature.valid) {
      logger.debug('Invalid signature', { ip: clientIp, reason: signature.reason });
      return this.respond(401, { error: 'Unauthorized - Invalid signature' });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody.toString('utf8'));
    } catch (error) {
      logger.debug('Invalid JSON', { error: errorMessage(error) });
      return this.respond(400, { error: 'Invalid JSON format' });
    }

    const validation = this.deps.validator.validate(payload);
    if (!validation.valid) {
      logger.debug('Invalid data structure', { check: validation.check, reason: validation.reason });
      return this.respond(400, {
        error: 'Invalid webhook data structure',
        reason: validation.reason,
        expected: { jobs: 'array' },
      });
    }

    let result: ReconciliationResult;
    try {
      result = await this.deps.engine.reconcile(validation.jobs);
    } catch (error) {
      logger.error('Webhook processing failed', error);
      const failure = { error: errorMessage(error) };
      this.notify('onWebhookEnd', hooks => hooks.onWebhookEnd?.(failure));
      return this.respond(500, { error: 'Internal server error' });
    }

    const completed = result;
    logger.debug('Jobs processed successfully', { ...completed });
    this.notify('onWebhookEnd', hooks => hooks.onWebhookEnd?.(completed));
    return this.respond(200, { ...completed });
  }

  private notify(name: keyof WebhookHooks, call: (hooks: WebhookHooks) => void): void {
    try {
      call(this.hooks);
    } catch (error) {
      logger.error(`Webhook hook ${name} failed`, error);
    }
  }

  private respond(status: number, body: ResponseBody): WebhookResponse {
    return buildResponse(status, body, this.clock());
  }
}
