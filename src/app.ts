import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import config from './config';
import placeRoutes from './routes/places';
import stringRoutes from './routes/strings';
import healthRoutes from './routes/healthRoutes';
import {
  initializeRequestContext,
  logIncomingRequest,
  logOutgoingResponse,
  errorLoggingMiddleware,
  securityLoggingMiddleware
} from './middleware/loggingMiddleware';
import { ApiError } from './types/api';
import { errorMessage } from './utils/errors';
import Logger from './utils/logger';

const logger = Logger.createServiceLogger('App');

const app = express();

app.use(helmet({
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
    preload: true
  }
}));

app.use(cors({
  origin: config.corsOrigin,
  credentials: false,
  optionsSuccessStatus: 200
}));

app.use(compression({
  threshold: 1024,
  level: 6,
  filter: (req, res) => {
    if (req.headers['x-no-compression']) {
      return false;
    }
    return compression.filter(req, res);
  }
}));

app.use(express.json({ limit: '1mb' }));

// Logging middleware first so every later log line carries the request context
app.use(initializeRequestContext);
app.use(logIncomingRequest);
app.use(logOutgoingResponse);
app.use(securityLoggingMiddleware);

const morganFormat = process.env.NODE_ENV === 'production'
  ? 'combined'
  : ':method :url :status :res[content-length] - :response-time ms';

app.use(morgan(morganFormat, {
  stream: {
    write: (message: string) => {
      logger.http(message.trim());
    }
  }
}));

app.use('/api/v1/places', placeRoutes);
app.use('/api/v1/strings', stringRoutes);
app.use('/api/v1', healthRoutes);

app.use('*', (req, res) => {
  const error: ApiError = {
    error: {
      code: 'ENDPOINT_NOT_FOUND',
      message: `The endpoint ${req.method} ${req.originalUrl} was not found.`,
      requestId: req.requestId ?? Logger.generateRequestId()
    }
  };
  res.status(404).json(error);
});

app.use(errorLoggingMiddleware);

app.use((error: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
  // Malformed JSON bodies surface here from express.json()
  const isBadJson = error instanceof SyntaxError && 'body' in error;

  const apiError: ApiError = {
    error: {
      code: isBadJson ? 'INVALID_JSON' : 'INTERNAL_SERVER_ERROR',
      message: isBadJson || process.env.NODE_ENV !== 'production'
        ? errorMessage(error)
        : 'An internal server error occurred.',
      requestId: req.requestId ?? Logger.generateRequestId()
    }
  };

  res.status(isBadJson ? 400 : 500).json(apiError);
});

export default app;
