import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { ApiResponse } from '../types/index.js';
import { ValidationError } from './errors.js';
import { logger, logHttpRequest } from './logger.js';
import { metrics, RelayMetrics } from './metrics.js';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

const CORRELATION_HEADER = 'x-correlation-id';

function readCorrelationId(req: Request): string {
  const header = req.headers[CORRELATION_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() !== '' ? value : uuidv4();
}

/**
 * Assigns a correlation id and records request logs and metrics on finish.
 * Mounted first so every route, 404 included, is covered.
 */
export function requestTracking(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const correlationId = readCorrelationId(req);

    req.correlationId = correlationId;
    res.setHeader(CORRELATION_HEADER, correlationId);

    metrics.incrementCounter(RelayMetrics.httpRequestsTotal, { method: req.method, path: req.path });
    metrics.incrementGauge(RelayMetrics.httpRequestsInFlight);

    let settled = false;
    const settle = (): void => {
      if (settled) return;
      settled = true;
      const duration = Date.now() - startTime;

      logHttpRequest(req.method, req.path, res.statusCode, duration, {
        correlationId,
        userAgent: req.headers['user-agent'],
        ip: req.ip,
      });
      metrics.observeHistogram(RelayMetrics.httpRequestDuration, duration / 1000, {
        method: req.method,
        path: req.path,
        status: res.statusCode.toString(),
      });
      metrics.decrementGauge(RelayMetrics.httpRequestsInFlight);
    };

    // 'close' covers SSE responses the caller abandons before they finish
    res.on('finish', settle);
    res.on('close', settle);
    next();
  };
}

/**
 * Express 4 does not forward rejected handler promises; route them to the
 * error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    timestamp: new Date(),
  };
  res.status(statusCode).json(response);
}

export function sendError(res: Response, message: string, statusCode: number = 500, details?: unknown): void {
  const response: ApiResponse<null> = {
    success: false,
    error: message,
    timestamp: new Date(),
  };
  if (details !== undefined) {
    response.details = details;
  }
  res.status(statusCode).json(response);
}

export function notFoundHandler(): RequestHandler {
  return (req: Request, res: Response) => {
    logger.warn('Route not found', {
      correlationId: req.correlationId,
      method: req.method,
      path: req.path,
    });
    sendError(res, 'Not Found', 404);
  };
}

// body-parser attaches the HTTP status it wants on its errors
function clientErrorStatus(error: Error): number | undefined {
  const status: unknown = Reflect.get(error, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(): ErrorRequestHandler {
  return (error: Error, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof ValidationError) {
      logger.warn('Request validation failed', {
        correlationId: req.correlationId,
        path: req.path,
        details: error.details,
      });
      sendError(res, error.message, 400, error.details);
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== undefined) {
      logger.warn('Malformed request', {
        correlationId: req.correlationId,
        path: req.path,
        errorMessage: error.message,
      });
      sendError(res, error.message, clientStatus);
      return;
    }

    logger.error(
      'Unhandled exception in HTTP request',
      {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
      },
      error
    );

    // Never expose internal error details to clients in production
    const isProduction = process.env.NODE_ENV === 'production';
    sendError(res, isProduction ? 'Internal Server Error' : error.message, 500);
  };
}
