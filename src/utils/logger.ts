import winston from 'winston';
import fs from 'fs';
import os from 'os';
import { v4 as uuidv4 } from 'uuid';
import { AsyncLocalStorage } from 'async_hooks';

export interface LogContext {
  requestId?: string;
  clientId?: string;
  traceId?: string;
  endpoint?: string;
  method?: string;
  ip?: string;
}

interface PerformanceLogData {
  operation: string;
  duration: number;
  status: 'success' | 'error' | 'warning';
  details?: Record<string, unknown>;
}

const SERVICE_NAME = 'place-reconciliation-service';

// AsyncLocalStorage for request context
export const requestContext = new AsyncLocalStorage<LogContext>();

class Logger {
  private static instance: winston.Logger;
  private static readonly logLevel = process.env.LOG_LEVEL || 'warn';
  private static isProduction = process.env.NODE_ENV === 'production';

  public static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: Logger.logLevel,
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
          winston.format.errors({ stack: true }),
          // Add request context to all log entries
          winston.format((info) => {
            const context = requestContext.getStore();
            return context ? Object.assign(info, context) : info;
          })(),
          Logger.isProduction
            ? winston.format.json()
            : winston.format.combine(
                winston.format.colorize({ all: true }),
                winston.format.printf(Logger.formatDevLog)
              )
        ),
        transports: Logger.createTransports(),
        defaultMeta: {
          service: SERVICE_NAME,
          version: process.env.npm_package_version || '0.1.0',
          environment: process.env.NODE_ENV || 'development',
          hostname: process.env.HOSTNAME || os.hostname(),
          pid: process.pid
        }
      });
    }

    return Logger.instance;
  }

  private static createTransports(): winston.transport[] {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: Logger.logLevel
      })
    ];

    if (Logger.isProduction || process.env.LOG_TO_FILE === 'true') {
      if (!fs.existsSync('logs')) {
        fs.mkdirSync('logs');
      }

      transports.push(
        new winston.transports.File({
          filename: 'logs/application.log',
          level: 'info',
          maxsize: 50 * 1024 * 1024, // 50MB
          maxFiles: 5,
          tailable: true
        }),
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
          maxsize: 50 * 1024 * 1024, // 50MB
          maxFiles: 5,
          tailable: true
        })
      );
    }

    return transports;
  }

  private static formatDevLog(info: winston.Logform.TransformableInfo): string {
    const { timestamp, level, message, service, requestId, duration, operation, ...meta } = info;

    let logLine = `${String(timestamp)} [${level}]`;

    if (typeof service === 'string' && service !== SERVICE_NAME) {
      logLine += ` [${service}]`;
    }

    if (typeof requestId === 'string') {
      logLine += ` [${requestId.substring(0, 8)}...]`;
    }

    if (operation && duration !== undefined) {
      logLine += ` [${String(operation)}:${String(duration)}ms]`;
    }

    logLine += ` ${String(message)}`;

    const hidden = ['timestamp', 'level', 'message', 'service', 'serviceContext', 'version', 'environment', 'hostname', 'pid'];
    const cleanMeta = Object.keys(meta).reduce<Record<string, unknown>>((acc, key) => {
      if (!hidden.includes(key)) {
        acc[key] = meta[key];
      }
      return acc;
    }, {});

    if (Object.keys(cleanMeta).length > 0) {
      logLine += ` ${JSON.stringify(cleanMeta)}`;
    }

    return logLine;
  }

  public static createServiceLogger(serviceName: string): winston.Logger {
    return Logger.getInstance().child({
      service: serviceName,
      serviceContext: serviceName
    });
  }

  public static generateRequestId(): string {
    return uuidv4();
  }

  public static generateTraceId(): string {
    return uuidv4();
  }

  public static logPerformance(data: PerformanceLogData): void {
    const logger = Logger.getInstance();
    const level = data.status === 'error' ? 'error' :
                 data.status === 'warning' ? 'warn' : 'info';

    logger.log(level, `Performance: ${data.operation}`, {
      operation: data.operation,
      duration: data.duration,
      status: data.status,
      performanceLog: true,
      ...data.details
    });
  }

  // Structured error logging
  public static logError(error: Error, context?: Record<string, unknown>): void {
    Logger.getInstance().error('Application error', {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
      errorLog: true,
      ...context
    });
  }

  public static logSecurityEvent(event: string, details?: Record<string, unknown>): void {
    Logger.getInstance().warn(`Security event: ${event}`, {
      securityEvent: event,
      securityLog: true,
      timestamp: new Date().toISOString(),
      ...details
    });
  }

  // Upstream (Google Maps) call logging, with the API key stripped from the parameters
  public static logUpstreamCall(endpoint: string, duration: number, status: string, params?: Record<string, unknown>): void {
    const logger = Logger.getInstance();
    const { key: _key, ...safeParams } = params || {};
    logger.debug('Upstream call', {
      endpoint,
      duration,
      upstreamStatus: status,
      params: safeParams,
      upstreamLog: true
    });
  }
}

export default Logger;
