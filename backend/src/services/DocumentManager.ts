import { v4 as uuidv4 } from 'uuid';
import { Collaborator, Operation } from '../../../shared/types';
import { createInsert } from '../../../shared/ot/operations';
import { DocumentNotFoundError, SessionNotFoundError } from '../../../shared/ot/errors';
import { CollaborationSession, CollaborationSessionCallbacks } from '../../../shared/session/CollaborationSession';
import { Logger } from '../utils/Logger';
import { MetricsCollector } from '../utils/MetricsCollector';
import { DocumentMetadata, DocumentState } from './DocumentState';
import { LocalTransport } from './LocalTransport';
import { PermissionRegistry } from './PermissionRegistry';
import { SessionRegistry } from './SessionRegistry';
import { SyncController } from './SyncController';

export const SYSTEM_AUTHOR = 'system';

export interface ManagedDocument {
  state: DocumentState;
  controller: SyncController;
  permissions: PermissionRegistry;
}

export interface CreateDocumentParams {
  title: string;
  ownerId: string;
  id?: string;
  initialContent?: string;
}

export interface DocumentManagerConfig {
  sessions?: SessionRegistry;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface LocalConnection {
  session: CollaborationSession;
  transport: LocalTransport;
}

/**
 * Registry of the documents hosted by this process. Each document gets its own
 * state, sync controller and permission grants; nothing is shared across
 * documents.
 */
export class DocumentManager {
  readonly sessions: SessionRegistry;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private documents: Map<string, ManagedDocument> = new Map();
  private connections: Map<string, LocalConnection> = new Map();

  constructor(config: DocumentManagerConfig = {}) {
    this.sessions = config.sessions || new SessionRegistry();
    this.logger = config.logger || Logger.getInstance();
    this.metrics = config.metrics || MetricsCollector.getInstance();
  }

  /**
   * Create a new document. Initial content, if any, is recorded as the first
   * revision so the log still replays to the content.
   */
  createDocument(params: CreateDocumentParams): ManagedDocument {
    const id = params.id || uuidv4();
    if (this.documents.has(id)) {
      throw new Error(`Document ${id} already exists`);
    }

    const managed = this.register(new DocumentState({ id, title: params.title, ownerId: params.ownerId }));

    if (params.initialContent) {
      managed.state.commit(
        createInsert({
          id: `${SYSTEM_AUTHOR}:1`,
          authorId: SYSTEM_AUTHOR,
          position: 0,
          text: params.initialContent,
          baseRevision: 0
        })
      );
    }

    this.logger.info('Document created', { documentId: id, ownerId: params.ownerId });
    return managed;
  }

  /**
   * Re-host a document from a persisted operation log.
   */
  restoreDocument(metadata: DocumentMetadata, operations: readonly Operation[]): ManagedDocument {
    if (this.documents.has(metadata.id)) {
      throw new Error(`Document ${metadata.id} already exists`);
    }
    const managed = this.register(DocumentState.restore(metadata, operations));
    this.logger.info('Document restored', { documentId: metadata.id, revision: managed.state.revision });
    return managed;
  }

  getDocument(documentId: string): ManagedDocument | undefined {
    return this.documents.get(documentId);
  }

  requireDocument(documentId: string): ManagedDocument {
    const managed = this.documents.get(documentId);
    if (!managed) {
      throw new DocumentNotFoundError(documentId);
    }
    return managed;
  }

  deleteDocument(documentId: string): boolean {
    const managed = this.documents.get(documentId);
    if (!managed) {
      return false;
    }

    managed.controller.attachedClients().forEach(clientId => this.leaveDocument(documentId, clientId));
    this.documents.delete(documentId);
    this.metrics.recordDocumentCount(this.documents.size);
    return true;
  }

  listDocuments(): string[] {
    return [...this.documents.keys()];
  }

  /**
   * Open an in-process editing session for a client.
   */
  joinDocument(
    documentId: string,
    clientId: string,
    userName: string = clientId,
    callbacks?: CollaborationSessionCallbacks
  ): CollaborationSession {
    const { controller, permissions } = this.requireDocument(documentId);

    this.leaveDocument(documentId, clientId);

    const transport = new LocalTransport(controller, this.logger);
    const capabilities = permissions.capabilitiesOf(clientId);
    const session = new CollaborationSession({ clientId, transport, capabilities, callbacks });
    session.applySnapshot(controller.attach(session, { userName, capabilities }));

    this.connections.set(connectionKey(documentId, clientId), { session, transport });
    this.metrics.recordSessionCount(this.sessions.size);
    return session;
  }

  leaveDocument(documentId: string, clientId: string): boolean {
    const key = connectionKey(documentId, clientId);
    const hadConnection = this.connections.delete(key);
    const detached = this.documents.get(documentId)?.controller.detach(clientId) || false;
    this.metrics.recordSessionCount(this.sessions.size);
    return hadConnection || detached;
  }

  getSession(documentId: string, clientId: string): CollaborationSession | undefined {
    return this.connections.get(connectionKey(documentId, clientId))?.session;
  }

  /**
   * Wait until every in-process submission for the document has been
   * committed, rejected or dropped.
   */
  async settle(documentId: string): Promise<void> {
    const prefix = connectionKey(documentId, '');
    let busy = true;
    while (busy) {
      const transports = [...this.connections.entries()]
        .filter(([key]) => key.startsWith(prefix))
        .map(([, connection]) => connection.transport);
      await Promise.all(transports.map(transport => transport.settle()));
      busy = transports.some(transport => transport.hasInFlight);
    }
  }

  insertText(documentId: string, clientId: string, position: number, text: string): Operation {
    return this.requireSession(documentId, clientId).insert(position, text);
  }

  deleteText(documentId: string, clientId: string, position: number, length: number): Operation {
    return this.requireSession(documentId, clientId).delete(position, length);
  }

  getContent(documentId: string): string | undefined {
    return this.documents.get(documentId)?.state.content;
  }

  getActiveUsers(documentId: string): Collaborator[] {
    const managed = this.documents.get(documentId);
    if (!managed) {
      return [];
    }
    return this.sessions
      .getDocumentSessions(documentId)
      .map(session => this.sessions.sessionToCollaborator(session, managed.state.getCursor(session.clientId)));
  }

  private requireSession(documentId: string, clientId: string): CollaborationSession {
    const session = this.getSession(documentId, clientId);
    if (!session) {
      throw new SessionNotFoundError(clientId);
    }
    return session;
  }

  private register(state: DocumentState): ManagedDocument {
    const permissions = new PermissionRegistry(state.ownerId);
    const controller = new SyncController(state, {
      permissions,
      sessions: this.sessions,
      logger: this.logger,
      metrics: this.metrics
    });
    const managed: ManagedDocument = { state, controller, permissions };
    this.documents.set(state.id, managed);
    this.metrics.recordDocumentCount(this.documents.size);
    return managed;
  }
}

function connectionKey(documentId: string, clientId: string): string {
  return `${documentId}\u0000${clientId}`;
}
