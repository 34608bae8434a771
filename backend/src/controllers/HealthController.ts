import { Request, Response } from 'express';
import { Logger } from '../utils/Logger';
import { MetricsCollector, SystemMetrics } from '../utils/MetricsCollector';
import { DocumentManager } from '../services/DocumentManager';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface HealthCheck {
  status: CheckStatus;
  message?: string;
  duration?: number;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks: Record<string, HealthCheck>;
  metrics?: SystemMetrics;
}

/**
 * Anything that can confirm the persistence backend is reachable.
 */
export interface PingTarget {
  ping(): Promise<string>;
}

export interface HealthControllerOptions {
  documentManager?: DocumentManager;
  store?: PingTarget;
  logger?: Logger;
  metrics?: MetricsCollector;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class HealthController {
  private logger: Logger;
  private metricsCollector: MetricsCollector;
  private documentManager?: DocumentManager;
  private store?: PingTarget;
  private startTime: number;

  constructor(options: HealthControllerOptions = {}) {
    this.logger = options.logger || Logger.getInstance();
    this.metricsCollector = options.metrics || MetricsCollector.getInstance();
    this.documentManager = options.documentManager;
    this.store = options.store;
    this.startTime = Date.now();
  }

  public async healthCheck(req: Request, res: Response): Promise<void> {
    try {
      const health = await this.performHealthChecks(req.query.detailed === 'true');
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);

      this.logger.debug('Health check performed', {
        status: health.status,
        checks: Object.keys(health.checks).length
      });
    } catch (error) {
      this.logger.error('Health check failed', { error: errorMessage(error) });
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: 'Health check system failure'
      });
    }
  }

  // Readiness: persistence reachable and memory within bounds
  public async readinessCheck(req: Request, res: Response): Promise<void> {
    const checks: Record<string, HealthCheck> = {
      memory: this.checkMemory(),
      store: await this.checkStore()
    };
    const ready = Object.values(checks).every(check => check.status !== 'fail');
    res.status(ready ? 200 : 503).json({ status: ready ? 'ready' : 'not_ready', checks });
  }

  public livenessCheck(req: Request, res: Response): void {
    res.status(200).json({
      status: 'alive',
      uptime: Date.now() - this.startTime,
      memory: process.memoryUsage().heapUsed
    });
  }

  public getMetrics(req: Request, res: Response): void {
    try {
      if (req.query.format === 'prometheus') {
        res.set('Content-Type', 'text/plain');
        res.send(this.metricsCollector.exportPrometheusMetrics());
        return;
      }

      res.json({
        timestamp: new Date().toISOString(),
        metrics: this.metricsCollector.getSystemMetrics()
      });
    } catch (error) {
      this.logger.error('Metrics retrieval failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Failed to retrieve metrics' });
    }
  }

  public getPerformanceMetrics(req: Request, res: Response): void {
    const window = typeof req.query.window === 'string' ? parseInt(req.query.window, 10) : NaN;
    const timeWindow = Number.isNaN(window) ? 300000 : window;

    res.json({
      timestamp: new Date().toISOString(),
      timeWindow,
      performance: this.logger.getPerformanceMetrics(timeWindow)
    });
  }

  private async performHealthChecks(includeMetrics: boolean): Promise<HealthStatus> {
    const checks: Record<string, HealthCheck> = {
      memory: this.checkMemory(),
      process: this.checkProcess(),
      documents: this.checkDocuments(),
      store: await this.checkStore()
    };

    const results = Object.values(checks);
    const status = results.some(check => check.status === 'fail')
      ? 'unhealthy'
      : results.some(check => check.status === 'warn')
        ? 'degraded'
        : 'healthy';

    const health: HealthStatus = {
      status,
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: Date.now() - this.startTime,
      checks
    };

    if (includeMetrics) {
      health.metrics = this.metricsCollector.getSystemMetrics();
    }
    return health;
  }

  private checkMemory(): HealthCheck {
    const heapUsedMB = process.memoryUsage().heapUsed / 1024 / 1024;

    if (heapUsedMB > 512) {
      return { status: 'fail', message: `High memory usage: ${heapUsedMB.toFixed(2)}MB` };
    }
    if (heapUsedMB > 256) {
      return { status: 'warn', message: `Elevated memory usage: ${heapUsedMB.toFixed(2)}MB` };
    }
    return { status: 'pass', message: `Memory usage: ${heapUsedMB.toFixed(2)}MB` };
  }

  private checkProcess(): HealthCheck {
    return { status: 'pass', message: `Process uptime: ${Math.floor(process.uptime())}s` };
  }

  private checkDocuments(): HealthCheck {
    if (!this.documentManager) {
      return { status: 'pass', message: 'No document manager attached' };
    }
    const documents = this.documentManager.listDocuments().length;
    const sessions = this.documentManager.sessions.size;
    return { status: 'pass', message: `${documents} documents, ${sessions} sessions` };
  }

  private async checkStore(): Promise<HealthCheck> {
    if (!this.store) {
      return { status: 'warn', message: 'Persistence disabled' };
    }

    const startTime = Date.now();
    try {
      await this.store.ping();
      return { status: 'pass', message: 'Redis connection successful', duration: Date.now() - startTime };
    } catch (error) {
      return {
        status: 'fail',
        message: `Redis connection failed: ${errorMessage(error)}`,
        duration: Date.now() - startTime
      };
    }
  }
}
