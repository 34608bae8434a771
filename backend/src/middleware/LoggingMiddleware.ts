import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/Logger';
import { MetricsCollector } from '../utils/MetricsCollector';

// Extend Request interface to include logging context
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
      clientId?: string;
    }
  }
}

export class LoggingMiddleware {
  private logger: Logger;
  private metricsCollector: MetricsCollector;

  constructor(logger?: Logger, metrics?: MetricsCollector) {
    this.logger = logger || Logger.getInstance();
    this.metricsCollector = metrics || MetricsCollector.getInstance();
  }

  public requestLogger = (req: Request, res: Response, next: NextFunction): void => {
    req.requestId = uuidv4();
    req.startTime = Date.now();

    const header = req.headers['x-client-id'];
    req.clientId = typeof header === 'string' ? header : 'anonymous';

    this.logger.info('Incoming request', {
      requestId: req.requestId,
      method: req.method,
      url: req.url,
      userAgent: req.headers['user-agent'],
      ip: req.ip,
      clientId: req.clientId
    });

    res.on('finish', () => {
      const duration = Date.now() - (req.startTime || 0);

      this.logger.info('Request completed', {
        requestId: req.requestId,
        method: req.method,
        url: req.url,
        statusCode: res.statusCode,
        duration,
        clientId: req.clientId
      });

      this.metricsCollector.incrementCounter('http.requests.total', 1, {
        method: req.method,
        status: res.statusCode.toString()
      });
      this.metricsCollector.recordHistogram('http.request.duration', duration, {
        method: req.method
      });
    });

    next();
  };

  public errorLogger = (error: Error, req: Request, res: Response, next: NextFunction): void => {
    this.logger.error('Request error', {
      requestId: req.requestId,
      method: req.method,
      url: req.url,
      error: error.message,
      stack: error.stack,
      duration: Date.now() - (req.startTime || 0),
      clientId: req.clientId
    });

    this.metricsCollector.incrementCounter('http.errors.total', 1, {
      method: req.method,
      error: error.name
    });

    next(error);
  };

  public performanceMonitor = (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - startTime;

      if (duration > 1000) {
        this.logger.warn('Slow request detected', {
          requestId: req.requestId,
          method: req.method,
          url: req.url,
          duration
        });
      }

      this.logger.logPerformance(`HTTP ${req.method} ${req.path}`, duration, {
        requestId: req.requestId,
        statusCode: res.statusCode
      });
    });

    next();
  };
}
