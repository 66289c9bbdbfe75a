import express, { type Request, type Response } from 'express';
import helmet from 'helmet';
import type { Server } from 'http';
import type { RelayConfig } from './config/index.js';
import { createEventStore, type EventStore } from './storage/index.js';
import { WebhookReceiver } from './services/WebhookReceiver.js';
import { asyncHandler, errorHandler, notFoundHandler, requestTracking, sendError, sendSuccess } from './utils/http.js';
import { logger } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

/**
 * HTTP server for push notifications from target agents. Runs as its own
 * process; shares nothing with the executor but the event store.
 */
export class WebhookHttpServer {
  private app: express.Application;
  private server: Server | undefined;
  private store: EventStore | undefined;
  private receiver: WebhookReceiver | undefined;

  constructor(
    private readonly config: RelayConfig,
    store?: EventStore
  ) {
    this.store = store;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  async initialize(): Promise<void> {
    logger.setLogLevel(this.config.logging.level);

    const store = this.store ?? createEventStore(this.config);
    await store.initialize();
    this.store = store;
    this.receiver = new WebhookReceiver(store);
  }

  async start(): Promise<void> {
    const { host, port } = this.config.receiver;
    try {
      if (!this.receiver) {
        await this.initialize();
      }

      await new Promise<void>((resolve, reject) => {
        const server = this.app.listen(port, host, () => {
          logger.info('Webhook receiver started', { host, port, protocol: this.config.proxy.protocol });
          resolve();
        });
        server.once('error', reject);
        this.server = server;
      });
    } catch (error) {
      logger.error('Failed to start webhook receiver', { host, port }, error instanceof Error ? error : undefined);
      throw error;
    }
  }

  async stop(): Promise<void> {
    logger.info('Stopping webhook receiver...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      this.server = undefined;
    }

    if (this.store) {
      await this.store.close();
    }
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(requestTracking());
    this.app.use(helmet());
    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', asyncHandler(this.handleHealthCheck.bind(this)));
    this.app.get('/metrics', (_req: Request, res: Response) => {
      res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
      res.send(metrics.getPrometheusMetrics());
    });

    const handleNotification = asyncHandler(this.handleNotification.bind(this));
    this.app.post('/webhook/:protocol/todolist/:todolistId', handleNotification);
    // A missing id is rejected like a malformed one, not a 404
    this.app.post('/webhook/:protocol/todolist', handleNotification);

    this.app.use(notFoundHandler());
    this.app.use(errorHandler());
  }

  private async handleNotification(req: Request, res: Response): Promise<void> {
    if (!this.receiver) {
      throw new Error('Webhook receiver not initialized. Call initialize() first.');
    }

    const { protocol, todolistId } = req.params;
    if (protocol !== this.config.proxy.protocol) {
      logger.warn('Webhook for unsupported protocol', { correlationId: req.correlationId, protocol });
      sendError(res, `Unsupported protocol: ${protocol}`, 400, { status: 'rejected', reason: `Unsupported protocol: ${protocol}` });
      return;
    }

    const outcome = await this.receiver.receive(todolistId, req.body);
    if (outcome.status === 'rejected') {
      sendError(res, outcome.reason, 400, outcome);
      return;
    }
    sendSuccess(res, outcome);
  }

  private async handleHealthCheck(req: Request, res: Response): Promise<void> {
    const health = this.store ? await this.store.healthCheck() : { healthy: false, message: 'Event store not initialized' };
    const responseData = {
      status: health.healthy ? 'healthy' : 'unhealthy',
      storage: health,
    };

    if (!health.healthy) {
      logger.warn('Health check failed - storage unhealthy', { correlationId: req.correlationId, storage: health });
      sendError(res, 'Service unhealthy', 503, responseData);
      return;
    }
    sendSuccess(res, responseData);
  }
}
