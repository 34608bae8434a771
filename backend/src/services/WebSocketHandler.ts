import { Server as SocketIOServer, Socket } from 'socket.io';
import {
  AckMessage,
  BroadcastMessage,
  Collaborator,
  CursorMessage,
  DocumentSnapshot,
  RejectMessage,
  SessionEndpoint
} from '../../../shared/types';
import { isCursor, isRecord, isSubmitMessage } from '../../../shared/types/guards';
import { Logger } from '../utils/Logger';
import { MetricsCollector } from '../utils/MetricsCollector';
import { DocumentManager, ManagedDocument } from './DocumentManager';
import { Permission } from './PermissionRegistry';
import { SessionRecord } from './SessionRegistry';
import { SubmitResult } from './SyncController';

/**
 * The slice of a socket.io socket the handler relies on.
 */
export interface ClientSocket {
  readonly id: string;
  on(event: string, listener: (...args: unknown[]) => void): void;
  emit(event: string, payload: unknown): void;
  emitToRoom(room: string, event: string, payload: unknown): void;
  join(room: string): void;
  leave(room: string): void;
}

export interface JoinDocumentPayload {
  documentId: string;
  clientId: string;
  userName: string;
}

export type OperationAck =
  | { status: 'committed'; revision: number }
  | { status: 'rejected'; reason: string; message: string }
  | { status: 'dropped'; reason: string };

/**
 * Source of documents that are not hosted yet, such as a snapshot store.
 */
export interface DocumentLoader {
  restore(manager: DocumentManager, documentId: string): Promise<ManagedDocument | null>;
}

export interface WebSocketHandlerOptions {
  /** Permission granted to clients that join a document they do not own. */
  defaultPermission?: Permission;
  /** Content given to documents created on first join. */
  initialContent?: string;
  loader?: DocumentLoader;
  logger?: Logger;
  metrics?: MetricsCollector;
}

interface Connection {
  clientId: string;
  userName: string;
  documentId: string;
  socket: ClientSocket;
  endpoint: SocketSessionEndpoint;
}

/**
 * Delivers sync controller events to one connected socket.
 */
export class SocketSessionEndpoint implements SessionEndpoint {
  constructor(readonly clientId: string, private readonly socket: ClientSocket) {}

  deliverOperation(message: BroadcastMessage): void {
    this.socket.emit('operation', message);
  }

  deliverAck(message: AckMessage): void {
    this.socket.emit('operation_ack', message);
  }

  deliverRejection(message: RejectMessage): void {
    this.socket.emit('operation_rejected', message);
  }

  deliverSnapshot(snapshot: DocumentSnapshot): void {
    this.socket.emit('document_state', { snapshot });
  }

  deliverCursor(message: CursorMessage): void {
    this.socket.emit('cursor', message);
  }
}

export function adaptSocket(socket: Socket): ClientSocket {
  return {
    id: socket.id,
    on: (event, listener) => {
      socket.on(event, listener);
    },
    emit: (event, payload) => {
      socket.emit(event, payload);
    },
    emitToRoom: (room, event, payload) => {
      socket.to(room).emit(event, payload);
    },
    join: room => {
      void socket.join(room);
    },
    leave: room => {
      void socket.leave(room);
    }
  };
}

function isJoinPayload(value: unknown): value is JoinDocumentPayload {
  return (
    isRecord(value) &&
    typeof value.documentId === 'string' &&
    typeof value.clientId === 'string' &&
    typeof value.userName === 'string'
  );
}

function toAck(result: SubmitResult): OperationAck {
  switch (result.status) {
    case 'committed':
      return { status: 'committed', revision: result.revision };
    case 'rejected':
      return { status: 'rejected', reason: result.error.code, message: result.error.message };
    case 'dropped':
      return { status: 'dropped', reason: result.reason };
  }
}

export class WebSocketHandler {
  private readonly documentManager: DocumentManager;
  private readonly defaultPermission: Permission;
  private readonly initialContent: string;
  private readonly loader?: DocumentLoader;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private connections: Map<string, Connection> = new Map();
  private opening: Map<string, Promise<ManagedDocument>> = new Map();

  constructor(documentManager: DocumentManager, options: WebSocketHandlerOptions = {}) {
    this.documentManager = documentManager;
    this.defaultPermission = options.defaultPermission || 'WRITE';
    this.initialContent = options.initialContent || '';
    this.loader = options.loader;
    this.logger = options.logger || Logger.getInstance();
    this.metrics = options.metrics || MetricsCollector.getInstance();
  }

  initialize(io: SocketIOServer): void {
    io.on('connection', (socket: Socket) => {
      this.handleConnection(adaptSocket(socket));
    });
  }

  handleConnection(socket: ClientSocket): void {
    this.logger.logSessionEvent('connected', undefined, undefined, { socketId: socket.id });
    this.metrics.recordConnection(true);

    socket.on('join_document', payload => {
      void this.handleJoinDocument(socket, payload);
    });

    socket.on('leave_document', () => {
      this.handleLeaveDocument(socket);
    });

    socket.on('operation', (message, ack) => {
      const reply =
        typeof ack === 'function'
          ? (response: OperationAck) => {
              ack(response);
            }
          : undefined;
      this.handleOperation(socket, message, reply).catch(error => {
        this.logger.logError(
          error instanceof Error ? error : new Error(String(error)),
          'Error handling operation',
          { socketId: socket.id }
        );
        socket.emit('error', { message: 'Failed to process operation' });
      });
    });

    socket.on('cursor', payload => {
      this.handleCursor(socket, payload);
    });

    socket.on('request_snapshot', () => {
      this.handleSnapshotRequest(socket);
    });

    socket.on('disconnect', () => {
      this.handleDisconnect(socket);
    });
  }

  getConnectedClients(documentId: string): string[] {
    return [...this.connections.values()]
      .filter(connection => connection.documentId === documentId)
      .map(connection => connection.clientId);
  }

  /**
   * End the connection behind an expired session and tell its socket.
   */
  expireSession(session: SessionRecord): void {
    const connection = this.findConnection(session.documentId, session.clientId);
    if (!connection) {
      this.documentManager.getDocument(session.documentId)?.controller.detach(session.clientId);
      return;
    }

    connection.socket.emit('session_expired', { documentId: session.documentId });
    this.handleLeaveDocument(connection.socket);
  }

  private findConnection(documentId: string, clientId: string): Connection | undefined {
    for (const connection of this.connections.values()) {
      if (connection.documentId === documentId && connection.clientId === clientId) {
        return connection;
      }
    }
    return undefined;
  }

  private async handleJoinDocument(socket: ClientSocket, payload: unknown): Promise<void> {
    if (!isJoinPayload(payload)) {
      socket.emit('error', { message: 'Invalid join request' });
      return;
    }

    const { documentId, clientId, userName } = payload;
    const sessions = this.documentManager.sessions;
    if (!sessions.validateUser(clientId, userName)) {
      socket.emit('error', { message: 'Invalid user credentials' });
      return;
    }

    try {
      // One document per socket
      if (this.connections.has(socket.id)) {
        this.handleLeaveDocument(socket);
      }

      const managed = await this.openDocument(documentId, clientId);
      if (!managed.permissions.hasGrant(clientId)) {
        managed.permissions.grant(clientId, this.defaultPermission);
      }

      // A client id is attached through one socket at a time; the newest wins
      const previous = this.findConnection(documentId, clientId);
      if (previous && previous.socket.id !== socket.id) {
        previous.socket.emit('error', { message: 'Session replaced by a newer connection' });
        this.handleLeaveDocument(previous.socket);
      }

      const endpoint = new SocketSessionEndpoint(clientId, socket);
      const snapshot = managed.controller.attach(endpoint, {
        userName,
        capabilities: managed.permissions.capabilitiesOf(clientId)
      });

      this.connections.set(socket.id, { clientId, userName, documentId, socket, endpoint });
      socket.join(documentId);

      const collaborators = this.documentManager.getActiveUsers(documentId);
      socket.emit('document_state', { snapshot, collaborators });

      const collaborator = collaborators.find(entry => entry.clientId === clientId);
      socket.emitToRoom(documentId, 'user_joined', { documentId, collaborator });

      this.metrics.recordSessionCount(sessions.size);
      this.logger.info(`${userName} joined document`, { documentId, clientId, revision: snapshot.revision });
    } catch (error) {
      this.logger.logError(
        error instanceof Error ? error : new Error(String(error)),
        'Error handling join document',
        { documentId, clientId }
      );
      socket.emit('error', { message: 'Failed to join document' });
    }
  }

  private handleLeaveDocument(socket: ClientSocket): void {
    const connection = this.connections.get(socket.id);
    if (!connection) {
      return;
    }

    this.connections.delete(socket.id);
    this.documentManager.getDocument(connection.documentId)?.controller.detach(connection.clientId, connection.endpoint);
    socket.leave(connection.documentId);

    const remaining: Collaborator[] = this.documentManager.getActiveUsers(connection.documentId);
    socket.emitToRoom(connection.documentId, 'user_left', {
      documentId: connection.documentId,
      clientId: connection.clientId,
      collaborators: remaining
    });

    this.metrics.recordSessionCount(this.documentManager.sessions.size);
    this.logger.info(`${connection.userName} left document`, {
      documentId: connection.documentId,
      clientId: connection.clientId
    });
  }

  private async handleOperation(
    socket: ClientSocket,
    message: unknown,
    ack?: (response: OperationAck) => void
  ): Promise<void> {
    const connection = this.connections.get(socket.id);
    if (!connection) {
      socket.emit('error', { message: 'Join a document before sending operations' });
      return;
    }
    if (!isSubmitMessage(message)) {
      socket.emit('error', { message: 'Invalid operation message' });
      return;
    }
    if (message.clientId !== connection.clientId) {
      socket.emit('error', { message: 'Unauthorized operation' });
      return;
    }

    const { controller } = this.documentManager.requireDocument(connection.documentId);
    const result = await controller.submit(message);
    ack?.(toAck(result));
  }

  private handleCursor(socket: ClientSocket, payload: unknown): void {
    const connection = this.connections.get(socket.id);
    if (!connection) {
      return;
    }

    const cursor = isRecord(payload) ? payload.cursor : undefined;
    if (!isCursor(cursor)) {
      socket.emit('error', { message: 'Invalid cursor update' });
      return;
    }

    this.documentManager.getDocument(connection.documentId)?.controller.updateCursor(connection.clientId, cursor);
  }

  private handleSnapshotRequest(socket: ClientSocket): void {
    const connection = this.connections.get(socket.id);
    if (!connection) {
      return;
    }

    this.documentManager.getDocument(connection.documentId)?.controller.resync(connection.clientId);
  }

  private handleDisconnect(socket: ClientSocket): void {
    this.handleLeaveDocument(socket);
    this.metrics.recordConnection(false);
    this.logger.logSessionEvent('disconnected', undefined, undefined, { socketId: socket.id });
  }

  private async openDocument(documentId: string, clientId: string): Promise<ManagedDocument> {
    const hosted = this.documentManager.getDocument(documentId);
    if (hosted) {
      return hosted;
    }

    // Concurrent joins of the same document share one load
    let opening = this.opening.get(documentId);
    if (!opening) {
      opening = this.loadOrCreate(documentId, clientId).finally(() => this.opening.delete(documentId));
      this.opening.set(documentId, opening);
    }
    return opening;
  }

  private async loadOrCreate(documentId: string, clientId: string): Promise<ManagedDocument> {
    const restored = this.loader ? await this.loader.restore(this.documentManager, documentId) : null;
    return (
      restored ||
      this.documentManager.createDocument({
        id: documentId,
        title: documentId,
        ownerId: clientId,
        initialContent: this.initialContent
      })
    );
  }
}
