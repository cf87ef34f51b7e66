import { Request, Response, NextFunction, RequestHandler } from 'express';
import { config } from '../config';
import { ApiError } from '../types/api';
import Logger from '../utils/logger';

export interface AuthenticatedRequest extends Request {
  apiKey?: string;
  clientId?: string;
}

function rejectRequest(req: Request, res: Response, code: string, message: string): void {
  const error: ApiError = {
    error: {
      code,
      message,
      requestId: req.requestId ?? Logger.generateRequestId()
    }
  };
  res.status(401).json(error);
}

export function clientIdFor(apiKey: string): string {
  return `client_${apiKey.substring(0, 8)}`;
}

/**
 * Requires an `X-API-Key` header holding one of `apiKeys`.
 * With no key configured, every request is refused.
 */
export function createApiKeyAuth(apiKeys: readonly string[]): RequestHandler {
  const validApiKeys = new Set(apiKeys);

  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const header = req.headers['x-api-key'];
    const apiKey = typeof header === 'string' ? header : undefined;

    if (!apiKey) {
      rejectRequest(req, res, 'MISSING_API_KEY', 'API key is required. Please provide X-API-Key header.');
      return;
    }

    if (!validApiKeys.has(apiKey)) {
      Logger.logSecurityEvent('invalid_api_key', { path: req.path, ip: req.ip });
      rejectRequest(req, res, 'INVALID_API_KEY', 'Invalid API key provided.');
      return;
    }

    req.apiKey = apiKey;
    req.clientId = clientIdFor(apiKey);
    next();
  };
}

export const authenticateApiKey = createApiKeyAuth(config.auth.apiKeys);
