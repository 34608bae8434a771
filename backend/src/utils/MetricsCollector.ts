import { EventEmitter } from 'events';

export type MetricTags = Record<string, string>;

export interface Metric {
  name: string;
  value: number;
  timestamp: number;
  tags?: MetricTags;
}

export interface HistogramStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p95: number;
}

export interface SystemMetrics {
  memory: {
    heapUsed: number;
    heapTotal: number;
    external: number;
    rss: number;
  };
  connections: {
    active: number;
    total: number;
  };
  documents: {
    active: number;
    commits: number;
    rejections: number;
  };
  sessions: {
    active: number;
  };
  commitLatency: HistogramStats | null;
}

export class MetricsCollector extends EventEmitter {
  private static instance: MetricsCollector | undefined;
  private metrics: Map<string, Metric[]> = new Map();
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private readonly maxMetricsPerType = 1000;
  private collectionInterval: NodeJS.Timeout | null = null;

  private constructor() {
    super();
    this.startCollection();
  }

  public static getInstance(): MetricsCollector {
    if (!MetricsCollector.instance) {
      MetricsCollector.instance = new MetricsCollector();
    }
    return MetricsCollector.instance;
  }

  public static resetInstance(): void {
    MetricsCollector.instance?.stop();
    MetricsCollector.instance = undefined;
  }

  private startCollection(): void {
    // Collect process metrics every 30 seconds
    this.collectionInterval = setInterval(() => {
      this.collectSystemMetrics();
    }, 30000);
    this.collectionInterval.unref();
  }

  private collectSystemMetrics(): void {
    const memUsage = process.memoryUsage();

    this.recordGauge('system.memory.heap_used', memUsage.heapUsed);
    this.recordGauge('system.memory.heap_total', memUsage.heapTotal);
    this.recordGauge('system.memory.external', memUsage.external);
    this.recordGauge('system.memory.rss', memUsage.rss);

    this.emit('system_metrics_collected', {
      memory: memUsage,
      timestamp: Date.now()
    });
  }

  // Counter methods
  public incrementCounter(name: string, value: number = 1, tags?: MetricTags): void {
    const current = this.counters.get(name) || 0;
    this.counters.set(name, current + value);

    this.recordMetric(name, current + value, tags);
    this.emit('counter_incremented', { name, value: current + value, tags });
  }

  public getCounter(name: string): number {
    return this.counters.get(name) || 0;
  }

  // Gauge methods
  public recordGauge(name: string, value: number, tags?: MetricTags): void {
    this.gauges.set(name, value);
    this.recordMetric(name, value, tags);
    this.emit('gauge_recorded', { name, value, tags });
  }

  public getGauge(name: string): number | undefined {
    return this.gauges.get(name);
  }

  // Histogram methods
  public recordHistogram(name: string, value: number, tags?: MetricTags): void {
    let values = this.histograms.get(name);
    if (!values) {
      values = [];
      this.histograms.set(name, values);
    }

    values.push(value);
    if (values.length > this.maxMetricsPerType) {
      values.shift();
    }

    this.recordMetric(name, value, tags);
    this.emit('histogram_recorded', { name, value, tags });
  }

  public getHistogramStats(name: string): HistogramStats | null {
    const values = this.histograms.get(name);
    if (!values || values.length === 0) return null;

    const sorted = [...values].sort((a, b) => a - b);
    const count = sorted.length;
    const min = sorted[0];
    const max = sorted[count - 1];
    const avg = sorted.reduce((sum, val) => sum + val, 0) / count;
    const p95 = sorted[Math.min(count - 1, Math.floor(count * 0.95))];

    return { count, min, max, avg, p95 };
  }

  private recordMetric(name: string, value: number, tags?: MetricTags): void {
    let metricArray = this.metrics.get(name);
    if (!metricArray) {
      metricArray = [];
      this.metrics.set(name, metricArray);
    }

    metricArray.push({
      name,
      value,
      timestamp: Date.now(),
      tags
    });

    if (metricArray.length > this.maxMetricsPerType) {
      metricArray.shift();
    }
  }

  // Application-specific metrics
  public recordConnection(connected: boolean): void {
    if (connected) {
      this.incrementCounter('websocket.connections.total');
      this.incrementCounter('websocket.connections.active');
    } else {
      this.incrementCounter('websocket.connections.active', -1);
    }
  }

  public recordCommit(documentId: string, duration: number, retransformed: number): void {
    this.incrementCounter('document.commits.total');
    this.recordHistogram('document.commit.duration', duration, { documentId });
    if (retransformed > 0) {
      this.incrementCounter('document.commits.retransformed', 1, { documentId });
    }
  }

  public recordRejection(reason: string, documentId: string): void {
    this.incrementCounter('document.rejections.total');
    this.incrementCounter(`document.rejections.${reason.toLowerCase()}`, 1, { documentId });
  }

  public recordDocumentCount(count: number): void {
    this.recordGauge('documents.active', count);
  }

  public recordSessionCount(count: number): void {
    this.recordGauge('sessions.active', count);
  }

  public getSystemMetrics(): SystemMetrics {
    const memUsage = process.memoryUsage();

    return {
      memory: {
        heapUsed: memUsage.heapUsed,
        heapTotal: memUsage.heapTotal,
        external: memUsage.external,
        rss: memUsage.rss
      },
      connections: {
        active: this.getCounter('websocket.connections.active'),
        total: this.getCounter('websocket.connections.total')
      },
      documents: {
        active: this.getGauge('documents.active') || 0,
        commits: this.getCounter('document.commits.total'),
        rejections: this.getCounter('document.rejections.total')
      },
      sessions: {
        active: this.getGauge('sessions.active') || 0
      },
      commitLatency: this.getHistogramStats('document.commit.duration')
    };
  }

  // Export metrics in Prometheus format
  public exportPrometheusMetrics(): string {
    let output = '';

    this.counters.forEach((value, name) => {
      output += `# TYPE ${name.replace(/\./g, '_')} counter\n`;
      output += `${name.replace(/\./g, '_')} ${value}\n`;
    });

    this.gauges.forEach((value, name) => {
      output += `# TYPE ${name.replace(/\./g, '_')} gauge\n`;
      output += `${name.replace(/\./g, '_')} ${value}\n`;
    });

    this.histograms.forEach((values, name) => {
      const stats = this.getHistogramStats(name);
      if (stats) {
        const metricName = name.replace(/\./g, '_');
        output += `# TYPE ${metricName} histogram\n`;
        output += `${metricName}_count ${stats.count}\n`;
        output += `${metricName}_sum ${stats.avg * stats.count}\n`;
        output += `${metricName}_bucket{le="1"} ${values.filter(v => v <= 1).length}\n`;
        output += `${metricName}_bucket{le="10"} ${values.filter(v => v <= 10).length}\n`;
        output += `${metricName}_bucket{le="100"} ${values.filter(v => v <= 100).length}\n`;
        output += `${metricName}_bucket{le="+Inf"} ${values.length}\n`;
      }
    });

    return output;
  }

  public getMetricsInRange(name: string, startTime: number, endTime: number): Metric[] {
    const metrics = this.metrics.get(name) || [];
    return metrics.filter(metric =>
      metric.timestamp >= startTime && metric.timestamp <= endTime
    );
  }

  public stop(): void {
    if (this.collectionInterval) {
      clearInterval(this.collectionInterval);
      this.collectionInterval = null;
    }
  }
}
