/**
 * Request Logging Middleware with Correlation IDs
 * Integrates with AsyncLocalStorage so every log line of a request carries its ids
 */

import { Request, Response, NextFunction } from 'express';
import Logger, { LogContext, requestContext } from '../utils/logger';

declare global {
  namespace Express {
    interface Request {
      startTime?: number;
      requestId?: string;
      correlationId?: string;
    }
  }
}

const SLOW_RESPONSE_MS = 2000;

const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'key', 'apikey', 'api_key', 'authorization'];

/**
 * Initializes the request context and correlation ids
 */
export const initializeRequestContext = (req: Request, res: Response, next: NextFunction): void => {
  req.requestId = Logger.generateRequestId();
  req.startTime = Date.now();

  const correlationHeader = req.headers['x-correlation-id'];
  req.correlationId = typeof correlationHeader === 'string' ? correlationHeader : req.requestId;

  const context: LogContext = {
    requestId: req.requestId,
    traceId: Logger.generateTraceId(),
    endpoint: req.path,
    method: req.method,
    ip: req.ip
  };

  res.setHeader('X-Correlation-ID', req.correlationId);
  res.setHeader('X-Request-ID', req.requestId);

  requestContext.run(context, () => {
    next();
  });
};

export const logIncomingRequest = (req: Request, res: Response, next: NextFunction): void => {
  const logger = Logger.getInstance();

  logger.info('Incoming request', {
    method: req.method,
    path: req.path,
    userAgent: req.headers['user-agent'],
    contentLength: req.headers['content-length']
  });

  if (req.method !== 'GET' && isRecord(req.body) && Object.keys(req.body).length > 0) {
    logger.debug('Request body', { body: sanitizeRequestBody(req.body) });
  }

  next();
};

export const logOutgoingResponse = (req: Request, res: Response, next: NextFunction): void => {
  const logger = Logger.getInstance();

  res.on('finish', () => {
    const duration = req.startTime ? Date.now() - req.startTime : 0;
    const isError = res.statusCode >= 500;
    const isSlowResponse = duration > SLOW_RESPONSE_MS;

    const logLevel = isError ? 'error' : isSlowResponse || res.statusCode >= 400 ? 'warn' : 'info';

    logger.log(logLevel, `${req.method} ${req.path} - ${res.statusCode}`, {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration
    });

    if (isSlowResponse) {
      Logger.logPerformance({
        operation: `${req.method} ${req.path}`,
        duration,
        status: isError ? 'error' : 'warning',
        details: { statusCode: res.statusCode }
      });
    }
  });

  next();
};

/**
 * Logs errors that escaped the route handlers, then hands them to the error responder
 */
export const errorLoggingMiddleware = (error: Error, req: Request, res: Response, next: NextFunction): void => {
  Logger.logError(error, {
    path: req.path,
    method: req.method,
    body: sanitizeRequestBody(req.body),
    duration: req.startTime ? Date.now() - req.startTime : 0
  });

  next(error);
};

export const securityLoggingMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const suspiciousPatterns = [/<script[^>]*>/i, /javascript:/i, /vbscript:/i];
  const payload = JSON.stringify(req.body ?? {});

  if (suspiciousPatterns.some((pattern) => pattern.test(payload))) {
    Logger.logSecurityEvent('suspicious_request_body', {
      path: req.path,
      ip: req.ip,
      userAgent: req.headers['user-agent']
    });
  }

  next();
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sanitize request body for logging (remove sensitive information)
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }
  if (!isRecord(body)) {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.includes(key.toLowerCase()) ? '***REDACTED***' : sanitizeRequestBody(value);
  }

  return sanitized;
}

export default {
  initializeRequestContext,
  logIncomingRequest,
  logOutgoingResponse,
  errorLoggingMiddleware,
  securityLoggingMiddleware
};
