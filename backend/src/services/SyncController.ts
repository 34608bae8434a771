import { EventEmitter } from 'events';
import {
  Capability,
  Cursor,
  DocumentSnapshot,
  Operation,
  RejectionReason,
  SessionEndpoint,
  SubmitMessage
} from '../../../shared/types';
import { validateOperation, withBaseRevision } from '../../../shared/ot/operations';
import { transformAgainst } from '../../../shared/ot/transform';
import {
  CollaborationError,
  isRejection,
  MalformedOperationError,
  StaleRevisionError,
  UnauthorizedError
} from '../../../shared/ot/errors';
import { CommitLock } from '../utils/CommitLock';
import { Logger } from '../utils/Logger';
import { MetricsCollector } from '../utils/MetricsCollector';
import { DocumentState } from './DocumentState';
import { PermissionProvider } from './PermissionRegistry';
import { SessionRegistry } from './SessionRegistry';

export type SyncPhase = 'idle' | 'validating' | 'transforming' | 'committing' | 'broadcasting';

export type RejectionError = CollaborationError<RejectionReason>;

export type SubmitResult =
  | { status: 'committed'; revision: number; operation: Operation; retransformed: number }
  | { status: 'rejected'; error: RejectionError }
  | { status: 'dropped'; reason: string };

export interface SyncControllerOptions {
  permissions: PermissionProvider;
  sessions?: SessionRegistry;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface AttachOptions {
  userName?: string;
  capabilities?: Iterable<Capability>;
}

/**
 * Serializes every change to one document.
 *
 * A submission moves through validating -> transforming -> committing ->
 * broadcasting and back to idle. Transformation runs outside the commit lock;
 * anything committed while the submission waited for the lock is transformed
 * against inside it, so concurrent submissions are never lost.
 */
export class SyncController extends EventEmitter {
  readonly document: DocumentState;
  private readonly permissions: PermissionProvider;
  private readonly sessions: SessionRegistry;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly lock = new CommitLock();
  private readonly endpoints: Map<string, SessionEndpoint> = new Map();
  private currentPhase: SyncPhase = 'idle';

  constructor(document: DocumentState, options: SyncControllerOptions) {
    super();
    this.document = document;
    this.permissions = options.permissions;
    this.sessions = options.sessions || new SessionRegistry();
    this.logger = options.logger || Logger.getInstance();
    this.metrics = options.metrics || MetricsCollector.getInstance();
  }

  get phase(): SyncPhase {
    return this.currentPhase;
  }

  get documentId(): string {
    return this.document.id;
  }

  /**
   * Connect a client. Returns the snapshot the client should start from.
   */
  attach(endpoint: SessionEndpoint, options: AttachOptions = {}): DocumentSnapshot {
    const snapshot = this.document.snapshot();
    this.endpoints.set(endpoint.clientId, endpoint);
    this.sessions.createSession({
      clientId: endpoint.clientId,
      userName: options.userName || endpoint.clientId,
      documentId: this.documentId,
      ackedRevision: snapshot.revision,
      capabilities: options.capabilities || []
    });
    this.logger.logSessionEvent('attached', endpoint.clientId, this.documentId, { revision: snapshot.revision });
    return snapshot;
  }

  /**
   * Disconnect a client. A submission of theirs still waiting for the commit
   * lock is dropped; anything already committed stays.
   *
   * Given an endpoint, only that endpoint is detached: a client that has since
   * reattached through another endpoint stays connected.
   */
  detach(clientId: string, endpoint?: SessionEndpoint): boolean {
    if (endpoint && this.endpoints.get(clientId) !== endpoint) {
      return false;
    }

    const removed = this.endpoints.delete(clientId);
    this.sessions.removeByClient(this.documentId, clientId);
    this.document.removeCursor(clientId);
    if (removed) {
      this.logger.logSessionEvent('detached', clientId, this.documentId);
    }
    return removed;
  }

  isAttached(clientId: string): boolean {
    return this.endpoints.has(clientId);
  }

  attachedClients(): string[] {
    return [...this.endpoints.keys()];
  }

  async submit(message: SubmitMessage): Promise<SubmitResult> {
    const { clientId, operation, baseRevision } = message;
    const startTime = Date.now();

    this.enterPhase('validating', operation.id);
    if (!this.endpoints.has(clientId)) {
      return this.drop(operation, `client ${clientId} is not attached`);
    }

    const rejection = await this.validate(message);
    if (rejection) {
      return this.reject(clientId, operation, rejection);
    }
    if (!this.endpoints.has(clientId)) {
      return this.drop(operation, `client ${clientId} detached during validation`);
    }

    this.enterPhase('transforming', operation.id);
    const transformedAt = this.document.revision;
    const transformed = transformAgainst(operation, this.document.appendedSince(baseRevision));

    return this.lock.runExclusive(() => this.commit(clientId, operation, transformed, transformedAt, startTime));
  }

  /**
   * Send the current snapshot to a client that needs to resync.
   */
  resync(clientId: string): DocumentSnapshot | null {
    const endpoint = this.endpoints.get(clientId);
    if (!endpoint) {
      return null;
    }

    const snapshot = this.document.snapshot();
    this.sessions.advanceAck(this.documentId, clientId, snapshot.revision);
    this.safeDeliver(clientId, 'snapshot', () => endpoint.deliverSnapshot(snapshot));
    return snapshot;
  }

  updateCursor(clientId: string, cursor: Cursor): Cursor | null {
    if (!this.endpoints.has(clientId)) {
      return null;
    }

    const projected = this.document.updateCursor(clientId, cursor);
    this.sessions.touch(this.documentId, clientId);

    for (const [peerId, endpoint] of this.endpoints.entries()) {
      if (peerId !== clientId && endpoint.deliverCursor) {
        const deliverCursor = endpoint.deliverCursor.bind(endpoint);
        this.safeDeliver(peerId, 'cursor', () => deliverCursor({ clientId, cursor: projected }));
      }
    }
    return projected;
  }

  private async validate(message: SubmitMessage): Promise<RejectionError | null> {
    const { clientId, operation, baseRevision } = message;
    const revision = this.document.revision;

    if (!Number.isInteger(baseRevision) || baseRevision < 0 || baseRevision > revision) {
      return new StaleRevisionError(baseRevision, revision);
    }

    if (operation.authorId !== clientId) {
      return new UnauthorizedError(clientId);
    }
    let allowed: boolean;
    try {
      allowed = await this.permissions.hasCapability(clientId, 'write');
    } catch (error) {
      this.logger.logError(
        error instanceof Error ? error : new Error(String(error)),
        'Permission check failed',
        { documentId: this.documentId, clientId }
      );
      return new UnauthorizedError(clientId, `Permission check failed for client ${clientId}`);
    }
    if (!allowed) {
      return new UnauthorizedError(clientId);
    }

    if (operation.baseRevision !== baseRevision) {
      return new MalformedOperationError(
        `Operation ${operation.id} claims base revision ${operation.baseRevision} but was submitted against ${baseRevision}`
      );
    }
    return validateOperation(operation, this.document.lengthAt(baseRevision));
  }

  private commit(
    clientId: string,
    original: Operation,
    transformed: Operation,
    transformedAt: number,
    startTime: number
  ): SubmitResult {
    this.enterPhase('committing', original.id);

    if (!this.endpoints.has(clientId)) {
      return this.drop(original, `client ${clientId} detached before commit`);
    }

    // Catch up with anything committed while this submission waited for the lock
    const gap = this.document.appendedSince(transformedAt);
    const operation = withBaseRevision(transformAgainst(transformed, gap), this.document.revision);

    let revision: number;
    try {
      revision = this.document.commit(operation);
    } catch (error) {
      if (error instanceof CollaborationError && isRejection(error)) {
        return this.reject(clientId, original, error);
      }
      throw error;
    }

    this.enterPhase('broadcasting', original.id);
    this.broadcast(clientId, revision, operation);

    const duration = Date.now() - startTime;
    this.metrics.recordCommit(this.documentId, duration, gap.length);
    this.logger.logOperation(this.documentId, revision, operation.id, clientId, {
      kind: operation.kind,
      position: operation.position,
      retransformed: gap.length
    });
    this.emit('committed', { revision, operation });
    this.enterPhase('idle', original.id);

    return { status: 'committed', revision, operation, retransformed: gap.length };
  }

  private broadcast(originatorId: string, revision: number, operation: Operation): void {
    for (const [clientId, endpoint] of this.endpoints.entries()) {
      if (clientId === originatorId) continue;
      this.safeDeliver(clientId, 'operation', () =>
        endpoint.deliverOperation({ revision, operation, authorId: operation.authorId })
      );
      this.sessions.touch(this.documentId, clientId);
    }

    const originator = this.endpoints.get(originatorId);
    if (originator) {
      this.sessions.advanceAck(this.documentId, originatorId, revision);
      this.safeDeliver(originatorId, 'ack', () =>
        originator.deliverAck({ ackedOpId: operation.id, revision })
      );
    }
  }

  private reject(clientId: string, operation: Operation, error: RejectionError): SubmitResult {
    this.logger.warn(`Operation rejected: ${error.message}`, {
      documentId: this.documentId,
      clientId,
      operationId: operation.id,
      reason: error.code
    });
    this.metrics.recordRejection(error.code, this.documentId);

    const endpoint = this.endpoints.get(clientId);
    if (endpoint) {
      this.safeDeliver(clientId, 'rejection', () =>
        endpoint.deliverRejection({ opId: operation.id, reason: error.code, message: error.message })
      );
    }
    this.enterPhase('idle', operation.id);
    return { status: 'rejected', error };
  }

  private drop(operation: Operation, reason: string): SubmitResult {
    this.logger.info(`Operation dropped: ${reason}`, {
      documentId: this.documentId,
      operationId: operation.id
    });
    this.enterPhase('idle', operation.id);
    return { status: 'dropped', reason };
  }

  /**
   * A failing endpoint is logged and skipped; it never blocks the others.
   */
  private safeDeliver(clientId: string, kind: string, deliver: () => void): void {
    try {
      deliver();
    } catch (error) {
      this.logger.logError(
        error instanceof Error ? error : new Error(String(error)),
        `Delivering ${kind} to ${clientId}`,
        { documentId: this.documentId, clientId }
      );
    }
  }

  private enterPhase(phase: SyncPhase, operationId: string): void {
    this.currentPhase = phase;
    this.emit('phase', phase, operationId);
  }
}
