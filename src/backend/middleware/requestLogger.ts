/**
 * Request Logging Middleware
 *
 * Logs HTTP requests with method, path, duration, and status code.
 * Uses pino-http for automatic request/response logging with timing.
 */

import pinoHttp from 'pino-http';
import { randomUUID } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import type { LevelWithSilent } from 'pino';
import { config } from '../../shared/config';
import { loggers } from '../../shared/logging';

/**
 * Reuse an incoming request ID header (from a proxy) or mint one
 */
function genReqId(req: IncomingMessage): string {
  const existingId = req.headers['x-request-id'] || req.headers['x-correlation-id'];
  if (typeof existingId === 'string') {
    return existingId;
  }
  return randomUUID();
}

const serializers = {
  req(req: IncomingMessage & { id?: unknown }) {
    return {
      id: req.id,
      method: req.method,
      url: req.url,
      headers: {
        host: req.headers.host,
        'user-agent': req.headers['user-agent'],
        'content-type': req.headers['content-type'],
        'content-length': req.headers['content-length'],
      },
    };
  },
  res(res: ServerResponse) {
    return {
      statusCode: res.statusCode,
    };
  },
};

function customLogLevel(req: IncomingMessage, res: ServerResponse, err?: Error): LevelWithSilent {
  if (err || res.statusCode >= 500) {
    return 'error';
  }
  if (res.statusCode >= 400) {
    return 'warn';
  }
  // Health checks are noise at info level
  if (req.url === '/api/health') {
    return 'debug';
  }
  return 'info';
}

function customSuccessMessage(req: IncomingMessage, res: ServerResponse, responseTime: number): string {
  return `${req.method} ${req.url} ${res.statusCode} ${responseTime.toFixed(0)}ms`;
}

function customErrorMessage(req: IncomingMessage, res: ServerResponse, err: Error): string {
  return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
}

export const requestLogger = pinoHttp({
  logger: loggers.http,
  genReqId,
  serializers,
  customLogLevel,
  customSuccessMessage,
  customErrorMessage,
  autoLogging: {
    ignore: (req) => config.server.isProduction && req.url === '/api/health',
  },
  customAttributeKeys: {
    req: 'req',
    res: 'res',
    err: 'err',
    responseTime: 'responseTime',
    reqId: 'requestId',
  },
});

export default requestLogger;
