import { Request, Response } from 'express';
import { HealthController, PingTarget } from '../HealthController';
import { DocumentManager } from '../../services/DocumentManager';
import { Logger } from '../../utils/Logger';
import { MetricsCollector } from '../../utils/MetricsCollector';

const MB = 1024 * 1024;

function mockMemory(heapUsedMB: number): void {
  jest.spyOn(process, 'memoryUsage').mockReturnValue({
    rss: 200 * MB,
    heapTotal: 600 * MB,
    heapUsed: heapUsedMB * MB,
    external: MB,
    arrayBuffers: 0
  });
}

describe('HealthController', () => {
  let healthController: HealthController;
  let documentManager: DocumentManager;
  let metrics: MetricsCollector;
  let store: PingTarget;
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;

  beforeEach(() => {
    MetricsCollector.resetInstance();
    Logger.resetInstance();
    metrics = MetricsCollector.getInstance();
    documentManager = new DocumentManager();
    store = { ping: jest.fn().mockResolvedValue('PONG') };
    healthController = new HealthController({ documentManager, store, metrics });

    mockRequest = {
      query: {}
    };

    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
      set: jest.fn().mockReturnThis(),
      send: jest.fn().mockReturnThis()
    };

    mockMemory(64);
  });

  afterAll(() => {
    MetricsCollector.resetInstance();
    Logger.resetInstance();
  });

  describe('healthCheck', () => {
    it('should return healthy status when all checks pass', async () => {
      documentManager.createDocument({ id: 'doc-1', title: 'Notes', ownerId: 'alice' });

      await healthController.healthCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.status).toHaveBeenCalledWith(200);
      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          status: 'healthy',
          timestamp: expect.any(String),
          uptime: expect.any(Number),
          checks: {
            memory: { status: 'pass', message: 'Memory usage: 64.00MB' },
            process: expect.objectContaining({ status: 'pass' }),
            documents: { status: 'pass', message: '1 documents, 0 sessions' },
            store: expect.objectContaining({ status: 'pass', message: 'Redis connection successful' })
          }
        })
      );
    });

    it('should report degraded status when memory usage is elevated', async () => {
      mockMemory(300);

      await healthController.healthCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.status).toHaveBeenCalledWith(200);
      expect(mockResponse.json).toHaveBeenCalledWith(expect.objectContaining({ status: 'degraded' }));
    });

    it('should report degraded status when persistence is disabled', async () => {
      healthController = new HealthController({ documentManager, metrics });

      await healthController.healthCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          status: 'degraded',
          checks: expect.objectContaining({ store: { status: 'warn', message: 'Persistence disabled' } })
        })
      );
    });

    it('should return 503 when Redis is unreachable', async () => {
      store.ping = jest.fn().mockRejectedValue(new Error('Connection refused'));

      await healthController.healthCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.status).toHaveBeenCalledWith(503);
      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          status: 'unhealthy',
          checks: expect.objectContaining({
            store: expect.objectContaining({ status: 'fail', message: 'Redis connection failed: Connection refused' })
          })
        })
      );
    });

    it('should include system metrics when detailed is requested', async () => {
      metrics.recordConnection(true);
      mockRequest.query = { detailed: 'true' };

      await healthController.healthCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          metrics: expect.objectContaining({ connections: { active: 1, total: 1 } })
        })
      );
    });
  });

  describe('readinessCheck', () => {
    it('should be ready when the store answers', async () => {
      await healthController.readinessCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.status).toHaveBeenCalledWith(200);
      expect(mockResponse.json).toHaveBeenCalledWith(expect.objectContaining({ status: 'ready' }));
    });

    it('should not be ready when memory is exhausted', async () => {
      mockMemory(600);

      await healthController.readinessCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.status).toHaveBeenCalledWith(503);
      expect(mockResponse.json).toHaveBeenCalledWith(
        expect.objectContaining({
          status: 'not_ready',
          checks: expect.objectContaining({
            memory: { status: 'fail', message: 'High memory usage: 600.00MB' }
          })
        })
      );
    });
  });

  describe('livenessCheck', () => {
    it('should always report alive', () => {
      healthController.livenessCheck(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.status).toHaveBeenCalledWith(200);
      expect(mockResponse.json).toHaveBeenCalledWith({
        status: 'alive',
        uptime: expect.any(Number),
        memory: 64 * MB
      });
    });
  });

  describe('getMetrics', () => {
    it('should return metrics as JSON', () => {
      metrics.recordCommit('doc-1', 4, 0);

      healthController.getMetrics(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.json).toHaveBeenCalledWith({
        timestamp: expect.any(String),
        metrics: expect.objectContaining({
          documents: { active: 0, commits: 1, rejections: 0 }
        })
      });
    });

    it('should return Prometheus text when asked', () => {
      metrics.incrementCounter('document.commits.total');
      mockRequest.query = { format: 'prometheus' };

      healthController.getMetrics(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.set).toHaveBeenCalledWith('Content-Type', 'text/plain');
      expect(mockResponse.send).toHaveBeenCalledWith(
        '# TYPE document_commits_total counter\ndocument_commits_total 1\n'
      );
    });
  });

  describe('getPerformanceMetrics', () => {
    it('should summarise recent performance entries over the requested window', () => {
      const logger = Logger.getInstance();
      logger.logPerformance('commit', 10);
      logger.logPerformance('commit', 30);
      mockRequest.query = { window: '60000' };

      healthController.getPerformanceMetrics(mockRequest as Request, mockResponse as Response);

      expect(mockResponse.json).toHaveBeenCalledWith({
        timestamp: expect.any(String),
        timeWindow: 60000,
        performance: {
          timeWindow: 60000,
          totalOperations: 2,
          operationStats: { commit: { count: 2, totalDuration: 40, avgDuration: 20 } }
        }
      });
    });
  });
});
