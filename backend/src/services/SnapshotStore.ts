import { createClient } from 'redis';
import { Operation } from '../../../shared/types';
import { isOperation, isRecord } from '../../../shared/types/guards';
import { Logger } from '../utils/Logger';
import { DocumentManager, ManagedDocument } from './DocumentManager';
import { DocumentState } from './DocumentState';

export interface SnapshotStoreConfig {
  redisUrl?: string;
  snapshotTTLSeconds?: number;
}

export interface StoredSnapshot {
  documentId: string;
  title: string;
  ownerId: string;
  revision: number;
  content: string;
  createdAt: string;
  checkpointedAt: string;
}

type RedisClient = ReturnType<typeof createClient>;

function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  return (
    isRecord(value) &&
    typeof value.documentId === 'string' &&
    typeof value.title === 'string' &&
    typeof value.ownerId === 'string' &&
    typeof value.revision === 'number' &&
    typeof value.content === 'string' &&
    typeof value.createdAt === 'string'
  );
}

/**
 * Durable checkpoints in Redis. The store pulls from documents; the engine
 * never calls into it.
 */
export class SnapshotStore {
  private redisClient: RedisClient;
  private snapshotTTLSeconds: number | undefined;
  private persistedRevisions: Map<string, number> = new Map();
  private inProgress: Set<string> = new Set();
  private checkpointInterval: NodeJS.Timeout | null = null;
  private logger: Logger;

  constructor(config: SnapshotStoreConfig = {}, logger?: Logger) {
    this.redisClient = createClient({
      url: config.redisUrl || process.env.REDIS_URL || 'redis://localhost:6379'
    });
    this.snapshotTTLSeconds = config.snapshotTTLSeconds;
    this.logger = logger || Logger.getInstance();
  }

  async initialize(): Promise<void> {
    await this.redisClient.connect();
  }

  async disconnect(): Promise<void> {
    this.stop();
    await this.redisClient.disconnect();
  }

  async ping(): Promise<string> {
    return this.redisClient.ping();
  }

  /**
   * Persist everything committed since the last checkpoint of this document.
   * Returns the number of operations written.
   */
  async checkpoint(state: DocumentState): Promise<number> {
    if (this.inProgress.has(state.id)) {
      return 0;
    }

    this.inProgress.add(state.id);
    try {
      const persisted = this.persistedRevisions.get(state.id) || 0;
      const snapshot = state.snapshot();
      const operations = state.appendedSince(persisted).slice(0, snapshot.revision - persisted);

      const stored: StoredSnapshot = {
        documentId: state.id,
        title: state.title,
        ownerId: state.ownerId,
        revision: snapshot.revision,
        content: snapshot.content,
        createdAt: state.createdAt.toISOString(),
        checkpointedAt: new Date().toISOString()
      };
      const value = JSON.stringify(stored);

      // The log and its snapshot move together or not at all
      const transaction = this.redisClient.multi();
      if (operations.length > 0) {
        transaction.rPush(
          logKey(state.id),
          operations.map(op => JSON.stringify(op))
        );
      }
      if (this.snapshotTTLSeconds) {
        transaction.setEx(snapshotKey(state.id), this.snapshotTTLSeconds, value);
        transaction.expire(logKey(state.id), this.snapshotTTLSeconds);
      } else {
        transaction.set(snapshotKey(state.id), value);
      }
      await transaction.exec();

      this.persistedRevisions.set(state.id, snapshot.revision);
      this.logger.debug('Document checkpointed', {
        documentId: state.id,
        revision: snapshot.revision,
        operations: operations.length
      });
      return operations.length;
    } finally {
      this.inProgress.delete(state.id);
    }
  }

  async checkpointAll(manager: DocumentManager): Promise<void> {
    for (const documentId of manager.listDocuments()) {
      const managed = manager.getDocument(documentId);
      if (!managed) continue;
      try {
        await this.checkpoint(managed.state);
      } catch (error) {
        this.logger.logError(
          error instanceof Error ? error : new Error(String(error)),
          'Checkpoint failed',
          { documentId }
        );
      }
    }
  }

  async loadSnapshot(documentId: string): Promise<StoredSnapshot | null> {
    const value = await this.redisClient.get(snapshotKey(documentId));
    if (!value) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(value);
      if (!isStoredSnapshot(parsed)) {
        this.logger.warn('Stored snapshot has an unexpected shape', { documentId });
        return null;
      }
      return parsed;
    } catch (error) {
      this.logger.logError(error instanceof Error ? error : new Error(String(error)), 'Error parsing stored snapshot', { documentId });
      return null;
    }
  }

  async loadOperations(documentId: string): Promise<Operation[]> {
    const values = await this.redisClient.lRange(logKey(documentId), 0, -1);
    return values.map((value, index) => {
      const parsed: unknown = JSON.parse(value);
      if (!isOperation(parsed)) {
        throw new Error(`Entry ${index + 1} of the log for ${documentId} is not an operation`);
      }
      return Object.freeze(parsed);
    });
  }

  /**
   * Rebuild a document from its persisted log and host it in `manager`.
   */
  async restore(manager: DocumentManager, documentId: string): Promise<ManagedDocument | null> {
    const snapshot = await this.loadSnapshot(documentId);
    if (!snapshot) {
      // A log without its snapshot belongs to an expired document
      if ((await this.redisClient.exists(snapshotKey(documentId))) === 0) {
        const removed = await this.redisClient.del(logKey(documentId));
        if (removed > 0) {
          this.logger.warn('Discarded a log left without its snapshot', { documentId });
        }
        this.persistedRevisions.delete(documentId);
      }
      return null;
    }

    const operations = await this.loadOperations(documentId);
    if (operations.length !== snapshot.revision) {
      throw new Error(
        `Log for ${documentId} holds ${operations.length} operations but its snapshot is at revision ${snapshot.revision}`
      );
    }
    const managed = manager.restoreDocument(
      {
        id: snapshot.documentId,
        title: snapshot.title,
        ownerId: snapshot.ownerId,
        createdAt: new Date(snapshot.createdAt)
      },
      operations
    );

    if (managed.state.content !== snapshot.content) {
      this.logger.warn('Replayed content differs from stored snapshot', { documentId });
    }
    this.persistedRevisions.set(documentId, operations.length);
    return managed;
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.redisClient.del([snapshotKey(documentId), logKey(documentId)]);
    this.persistedRevisions.delete(documentId);
  }

  start(manager: DocumentManager, intervalMs: number): void {
    this.stop();
    this.checkpointInterval = setInterval(() => {
      void this.checkpointAll(manager);
    }, intervalMs);
    this.checkpointInterval.unref();
  }

  stop(): void {
    if (this.checkpointInterval) {
      clearInterval(this.checkpointInterval);
      this.checkpointInterval = null;
    }
  }
}

function snapshotKey(documentId: string): string {
  return `document:${documentId}:snapshot`;
}

function logKey(documentId: string): string {
  return `document:${documentId}:log`;
}
