import express, { Express } from 'express';
import cors from 'cors';
import { DocumentController } from './controllers/DocumentController';
import { HealthController, PingTarget } from './controllers/HealthController';
import { LoggingMiddleware } from './middleware/LoggingMiddleware';
import { DocumentManager } from './services/DocumentManager';
import { Logger } from './utils/Logger';
import { MetricsCollector } from './utils/MetricsCollector';

export interface AppDependencies {
  documentManager: DocumentManager;
  frontendUrl: string;
  store?: PingTarget;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();
  const loggingMiddleware = new LoggingMiddleware(deps.logger, deps.metrics);
  const healthController = new HealthController({
    documentManager: deps.documentManager,
    store: deps.store,
    logger: deps.logger,
    metrics: deps.metrics
  });
  const documentController = new DocumentController(deps.documentManager, deps.logger);

  app.use(cors({ origin: deps.frontendUrl, credentials: true }));
  app.use(express.json());
  app.use(loggingMiddleware.requestLogger);
  app.use(loggingMiddleware.performanceMonitor);

  app.get('/health', healthController.healthCheck.bind(healthController));
  app.get('/health/ready', healthController.readinessCheck.bind(healthController));
  app.get('/health/live', healthController.livenessCheck.bind(healthController));
  app.get('/metrics', healthController.getMetrics.bind(healthController));
  app.get('/metrics/performance', healthController.getPerformanceMetrics.bind(healthController));

  app.get('/documents/:id/snapshot', documentController.getSnapshot.bind(documentController));
  app.get('/documents/:id/operations', documentController.getOperations.bind(documentController));

  app.use(loggingMiddleware.errorLogger);

  return app;
}
