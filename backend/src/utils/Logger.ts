import { createWriteStream, mkdirSync, WriteStream } from 'fs';
import { join } from 'path';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3
}

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  metadata?: LogMetadata;
  clientId?: string;
  documentId?: string;
  operationId?: string;
  duration?: number;
}

export interface PerformanceSummary {
  timeWindow: number;
  totalOperations: number;
  operationStats: Record<string, { count: number; totalDuration: number; avgDuration: number }>;
}

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel;
  private logStreams: Map<string, WriteStream> = new Map();
  private metricsBuffer: LogEntry[] = [];
  private readonly maxBufferSize = 1000;

  private constructor() {
    this.logLevel = Logger.parseLogLevel(process.env.LOG_LEVEL || 'info');
    this.initializeLogStreams();
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Drop the shared instance so the next getInstance() re-reads LOG_LEVEL.
   */
  public static resetInstance(): void {
    Logger.instance?.close();
    Logger.instance = undefined;
  }

  public static parseLogLevel(level: string): LogLevel {
    switch (level.toLowerCase()) {
      case 'error': return LogLevel.ERROR;
      case 'warn': return LogLevel.WARN;
      case 'info': return LogLevel.INFO;
      case 'debug': return LogLevel.DEBUG;
      default: return LogLevel.INFO;
    }
  }

  private initializeLogStreams(): void {
    if (process.env.NODE_ENV !== 'test') {
      const logsDir = process.env.LOG_DIR || join(process.cwd(), 'logs');
      mkdirSync(logsDir, { recursive: true });

      this.logStreams.set('app', createWriteStream(join(logsDir, 'app.log'), { flags: 'a' }));
      this.logStreams.set('error', createWriteStream(join(logsDir, 'error.log'), { flags: 'a' }));
      this.logStreams.set('performance', createWriteStream(join(logsDir, 'performance.log'), { flags: 'a' }));
      this.logStreams.set('audit', createWriteStream(join(logsDir, 'audit.log'), { flags: 'a' }));
    }
  }

  public setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  private formatLogEntry(entry: LogEntry): string {
    return JSON.stringify(entry) + '\n';
  }

  private writeToStream(streamName: string, entry: LogEntry): void {
    const stream = this.logStreams.get(streamName);
    if (stream) {
      stream.write(this.formatLogEntry(entry));
    }
  }

  private createLogEntry(level: string, message: string, metadata?: LogMetadata): LogEntry {
    const pick = (key: string): string | undefined => {
      const value = metadata?.[key];
      return typeof value === 'string' ? value : undefined;
    };
    const duration = metadata?.duration;

    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      metadata,
      clientId: pick('clientId'),
      documentId: pick('documentId'),
      operationId: pick('operationId'),
      duration: typeof duration === 'number' ? duration : undefined
    };
  }

  public error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const entry = this.createLogEntry('ERROR', message, metadata);

    console.error(`[ERROR] ${entry.timestamp} - ${message}`, metadata || '');
    this.writeToStream('app', entry);
    this.writeToStream('error', entry);
  }

  public warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.WARN)) return;

    const entry = this.createLogEntry('WARN', message, metadata);

    console.warn(`[WARN] ${entry.timestamp} - ${message}`, metadata || '');
    this.writeToStream('app', entry);
  }

  public info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    const entry = this.createLogEntry('INFO', message, metadata);

    console.log(`[INFO] ${entry.timestamp} - ${message}`, metadata || '');
    this.writeToStream('app', entry);
  }

  public debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;

    const entry = this.createLogEntry('DEBUG', message, metadata);

    console.log(`[DEBUG] ${entry.timestamp} - ${message}`, metadata || '');
    this.writeToStream('app', entry);
  }

  // Specialized logging methods

  /**
   * Audit trail of committed operations.
   */
  public logOperation(documentId: string, revision: number, operationId: string, authorId: string, metadata?: LogMetadata): void {
    this.debug(`Operation committed at revision ${revision}`, {
      documentId,
      revision,
      operationId,
      authorId,
      ...metadata
    });

    const auditEntry = this.createLogEntry('AUDIT', `${authorId} committed ${operationId}`, {
      documentId,
      revision,
      operationId,
      authorId,
      ...metadata
    });
    this.writeToStream('audit', auditEntry);
  }

  public logPerformance(operation: string, duration: number, metadata?: LogMetadata): void {
    const entry = this.createLogEntry('PERFORMANCE', `${operation} completed`, {
      operation,
      duration,
      ...metadata
    });

    this.debug(`Performance: ${operation} took ${duration}ms`, { operation, duration, ...metadata });
    this.writeToStream('performance', entry);

    this.metricsBuffer.push(entry);
    if (this.metricsBuffer.length > this.maxBufferSize) {
      this.metricsBuffer.shift();
    }
  }

  public logSessionEvent(event: string, clientId?: string, documentId?: string, metadata?: LogMetadata): void {
    this.info(`Session event: ${event}`, {
      event,
      clientId,
      documentId,
      ...metadata
    });
  }

  public logError(error: Error, context?: string, metadata?: LogMetadata): void {
    this.error(`${context ? context + ': ' : ''}${error.message}`, {
      error: error.name,
      stack: error.stack,
      context,
      ...metadata
    });
  }

  public getPerformanceMetrics(timeWindow: number = 300000): PerformanceSummary {
    const cutoff = Date.now() - timeWindow;
    const recentMetrics = this.metricsBuffer.filter(entry =>
      new Date(entry.timestamp).getTime() > cutoff
    );

    const operationStats: PerformanceSummary['operationStats'] = {};

    recentMetrics.forEach(entry => {
      const op = entry.metadata?.operation;
      if (typeof op === 'string' && entry.duration !== undefined) {
        if (!operationStats[op]) {
          operationStats[op] = { count: 0, totalDuration: 0, avgDuration: 0 };
        }
        operationStats[op].count++;
        operationStats[op].totalDuration += entry.duration;
        operationStats[op].avgDuration = operationStats[op].totalDuration / operationStats[op].count;
      }
    });

    return {
      timeWindow,
      totalOperations: recentMetrics.length,
      operationStats
    };
  }

  public close(): void {
    this.logStreams.forEach(stream => stream.end());
    this.logStreams.clear();
  }
}
