import dotenv from 'dotenv';
dotenv.config();
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { loadConfig } from './config';
import { DocumentManager } from './services/DocumentManager';
import { SessionRegistry } from './services/SessionRegistry';
import { SnapshotStore } from './services/SnapshotStore';
import { WebSocketHandler } from './services/WebSocketHandler';
import { Logger } from './utils/Logger';
import { MetricsCollector } from './utils/MetricsCollector';

const config = loadConfig();

const logger = Logger.getInstance();
logger.setLevel(config.logLevel);
const metricsCollector = MetricsCollector.getInstance();

const sessions = new SessionRegistry({ sessionTimeout: config.sessionTimeoutSeconds });
const documentManager = new DocumentManager({ sessions, logger, metrics: metricsCollector });
const snapshotStore = new SnapshotStore(
  { redisUrl: config.redisUrl, snapshotTTLSeconds: config.snapshotTTLSeconds },
  logger
);

const app = createApp({
  documentManager,
  frontendUrl: config.frontendUrl,
  store: snapshotStore,
  logger,
  metrics: metricsCollector
});
const server = createServer(app);

const io = new SocketIOServer(server, {
  cors: {
    origin: config.frontendUrl,
    methods: ['GET', 'POST'],
    credentials: true
  }
});
const webSocketHandler = new WebSocketHandler(documentManager, {
  loader: snapshotStore,
  logger,
  metrics: metricsCollector
});

async function startServer(): Promise<void> {
  try {
    logger.info('Starting server initialization');

    await snapshotStore.initialize();
    snapshotStore.start(documentManager, config.checkpointIntervalMs);
    logger.info('Snapshot store connected', { checkpointIntervalMs: config.checkpointIntervalMs });

    sessions.startExpiry(session => {
      logger.logSessionEvent('expired', session.clientId, session.documentId);
      webSocketHandler.expireSession(session);
    });

    webSocketHandler.initialize(io);
    logger.info('WebSocket handler initialized');

    server.listen(config.port, () => {
      logger.info(`Server running on port ${config.port}`, { port: config.port });
      metricsCollector.recordGauge('server.status', 1);
    });

    process.on('SIGTERM', () => {
      void gracefulShutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void gracefulShutdown('SIGINT');
    });
  } catch (error) {
    logger.logError(error instanceof Error ? error : new Error(String(error)), 'Failed to start server');
    process.exit(1);
  }
}

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, starting graceful shutdown`);

  try {
    server.close(() => {
      logger.info('HTTP server closed');
    });
    io.close();
    sessions.stopExpiry();

    // Persist whatever was committed since the last checkpoint
    await snapshotStore.checkpointAll(documentManager);
    await snapshotStore.disconnect();

    metricsCollector.stop();
    logger.info('Graceful shutdown completed');
    logger.close();
    process.exit(0);
  } catch (error) {
    logger.logError(error instanceof Error ? error : new Error(String(error)), 'Error during graceful shutdown');
    process.exit(1);
  }
}

void startServer();
