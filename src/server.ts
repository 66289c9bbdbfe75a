import express, { type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { Server } from 'http';
import { isRecord, type TaskEvent } from './types/index.js';
import type { RelayConfig } from './config/index.js';
import { createEventStore, type EventStore } from './storage/index.js';
import { EndpointResolver } from './services/EndpointResolver.js';
import { ForwardingClient } from './services/ForwardingClient.js';
import { ProxyExecutor } from './services/ProxyExecutor.js';
import { BufferedEventQueue, type EventQueue } from './services/EventQueue.js';
import { isValidTodolistId, taskSubmissionSchema, validate } from './utils/validation.js';
import { asyncHandler, errorHandler, notFoundHandler, requestTracking, sendError, sendSuccess } from './utils/http.js';
import { logger } from './utils/logger.js';
import { metrics } from './utils/metrics.js';

function wantsEventStream(req: Request): boolean {
  return (req.headers.accept ?? '').includes('text/event-stream');
}

function writeSse(res: Response, event: string, data: unknown): void {
  if (res.writableEnded || res.destroyed) return;
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

/**
 * Abort signal that fires when the caller goes away before the response
 * has been written in full
 */
function callerGone(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * HTTP server for the executor side of the relay: accepts tasks from
 * callers and streams or returns the events the executor publishes
 */
export class RelayHttpServer {
  private app: express.Application;
  private server: Server | undefined;
  private store: EventStore | undefined;
  private executor: ProxyExecutor | undefined;

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

    const { proxy } = this.config;
    const client = new ForwardingClient({
      eventTimeoutMs: proxy.eventTimeoutMs,
      submitTimeoutMs: proxy.submitTimeoutMs,
      agentCardTimeoutMs: proxy.agentCardTimeoutMs,
    });
    this.executor = new ProxyExecutor(store, client, new EndpointResolver(proxy.defaultEndpoint), {
      publicBaseUrl: proxy.publicBaseUrl,
      protocol: proxy.protocol,
    });
  }

  async start(): Promise<void> {
    const { host, port } = this.config.server;
    try {
      if (!this.executor) {
        await this.initialize();
      }

      await new Promise<void>((resolve, reject) => {
        const server = this.app.listen(port, host, () => {
          logger.info('Relay executor server started', { host, port, url: `http://${host}:${port}` });
          resolve();
        });
        server.once('error', reject);
        this.server = server;
      });
    } catch (error) {
      logger.error(
        'Failed to start relay executor server',
        { host, port },
        error instanceof Error ? error : undefined
      );
      throw error;
    }
  }

  async stop(): Promise<void> {
    logger.info('Stopping relay executor server...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
        // Open SSE responses would otherwise hold the server up
        server.closeAllConnections();
      });
      this.server = undefined;
    }

    if (this.store) {
      await this.store.close();
      logger.info('Event store closed');
    }
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(requestTracking());

    this.app.use(helmet());
    this.app.use(
      cors({
        origin: process.env.CORS_ORIGIN || '*',
        credentials: true,
      })
    );

    this.app.use(
      '/api/',
      rateLimit({
        windowMs: 15 * 60 * 1000,
        limit: 1000,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
        message: 'Too many requests from this IP, please try again later.',
      })
    );

    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', asyncHandler(this.handleHealthCheck.bind(this)));
    this.app.get('/metrics', this.handleMetrics.bind(this));

    const router = express.Router();
    router.post('/tasks', asyncHandler(this.handleSubmitTask.bind(this)));
    router.post('/tasks/:taskId/cancel', asyncHandler(this.handleCancelTask.bind(this)));
    router.get('/tasks/:taskId/events', asyncHandler(this.handleListEvents.bind(this)));
    this.app.use('/api', router);

    this.app.use(notFoundHandler());
    this.app.use(errorHandler());
  }

  private requireExecutor(): ProxyExecutor {
    if (!this.executor) {
      throw new Error('Server not initialized. Call initialize() first.');
    }
    return this.executor;
  }

  private requireStore(): EventStore {
    if (!this.store) {
      throw new Error('Server not initialized. Call initialize() first.');
    }
    return this.store;
  }

  private async handleSubmitTask(req: Request, res: Response): Promise<void> {
    const context = validate(taskSubmissionSchema, req.body);
    const executor = this.requireExecutor();
    const signal = callerGone(res);

    if (wantsEventStream(req)) {
      res.status(200);
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();

      const queue: EventQueue = {
        enqueue: (event: TaskEvent) => writeSse(res, event.kind, event),
      };
      const task = await executor.execute(context, queue, signal);
      writeSse(res, 'done', { task });
      res.end();
      return;
    }

    const queue = new BufferedEventQueue();
    const task = await executor.execute(context, queue, signal);
    queue.close();

    if (res.destroyed) {
      logger.info('Caller disconnected before the task returned', {
        correlationId: req.correlationId,
        taskId: task.taskId,
        status: task.status,
      });
      return;
    }
    sendSuccess(res, { task, events: queue.snapshot() }, task.status === 'awaiting_callback' ? 202 : 200);
  }

  private async handleCancelTask(req: Request, res: Response): Promise<void> {
    const { taskId } = req.params;
    if (!isValidTodolistId(taskId)) {
      sendError(res, `Invalid task id: ${taskId}`, 400);
      return;
    }

    const body: unknown = req.body;
    const contextId = isRecord(body) && typeof body.contextId === 'string' ? body.contextId : undefined;

    const queue = new BufferedEventQueue();
    const cancelled = await this.requireExecutor().cancel({ taskId, contextId }, queue);
    queue.close();

    sendSuccess(res, { taskId, cancelled, events: queue.snapshot() });
  }

  private async handleListEvents(req: Request, res: Response): Promise<void> {
    const { taskId } = req.params;
    if (!isValidTodolistId(taskId)) {
      sendError(res, `Invalid task id: ${taskId}`, 400);
      return;
    }

    const store = this.requireStore();
    const events = await store.listEvents(taskId);
    const terminal = await store.getTerminalEvent(taskId);
    sendSuccess(res, { taskId, events, terminal });
  }

  private async handleHealthCheck(req: Request, res: Response): Promise<void> {
    const health = this.store ? await this.store.healthCheck() : { healthy: false, message: 'Event store not initialized' };
    const responseData = {
      status: health.healthy ? 'healthy' : 'unhealthy',
      version: process.env.npm_package_version || '0.1.0',
      storage: health,
    };

    if (!health.healthy) {
      logger.warn('Health check failed - storage unhealthy', {
        correlationId: req.correlationId,
        storage: health,
      });
      sendError(res, 'Service unhealthy', 503, responseData);
      return;
    }
    sendSuccess(res, responseData);
  }

  private handleMetrics(_req: Request, res: Response): void {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(metrics.getPrometheusMetrics());
  }
}
