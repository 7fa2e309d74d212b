import { createServer } from 'http';
import { loadConfig } from '../config';
import { closePool } from '../db/client';
import { createWebhookEndpoint } from '../services';
import { buildResponse } from '../services/webhook-endpoint';
import { dispatchWebhook, writeResponse } from '../utils/http';
import { logger } from '../utils/logger';

/**
 * Standalone HTTP server for running the webhook outside Vercel
 */
function serve() {
  const config = loadConfig();
  const endpoint = createWebhookEndpoint(config);

  const server = createServer((req, res) => {
    dispatchWebhook(req, res, endpoint)
      .then((handled) => {
        if (!handled) {
          writeResponse(res, buildResponse(404, { error: 'Not found' }));
        }
      })
      .catch((error: unknown) => {
        logger.error('Unhandled error serving request', error, { url: req.url });
        if (!res.headersSent) {
          writeResponse(res, buildResponse(500, { error: 'Internal server error' }));
        } else {
          res.end();
        }
      });
  });

  server.listen(config.port, () => {
    logger.info(`Job sync webhook listening on port ${config.port}`, {
      path: config.webhook.path,
      enabled: config.webhook.enabled,
      rateLimitStore: config.rateLimit.store,
    });
  });

  const shutdown = () => {
    logger.info('Shutting down job sync webhook');
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database pool', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

serve();
