/**
 * Shared TypeScript interfaces for the collaborative text engine
 */

export type OperationKind = 'insert' | 'delete';

export type Capability = 'read' | 'write' | 'comment';

interface OperationBase {
  id: string;
  authorId: string;
  position: number;
  baseRevision: number;
}

export interface InsertOperation extends OperationBase {
  kind: 'insert';
  text: string;
}

export interface DeleteOperation extends OperationBase {
  kind: 'delete';
  length: number;
}

export type Operation = Readonly<InsertOperation> | Readonly<DeleteOperation>;

export interface Selection {
  start: number;
  end: number;
}

export interface Cursor {
  position: number;
  selection?: Selection;
}

export interface DocumentSnapshot {
  documentId: string;
  revision: number;
  content: string;
}

export interface HistoryEntry {
  revision: number;
  operation: Operation;
}

// Transport messages

export interface SubmitMessage {
  clientId: string;
  operation: Operation;
  baseRevision: number;
}

export interface BroadcastMessage {
  revision: number;
  operation: Operation;
  authorId: string;
}

export interface AckMessage {
  ackedOpId: string;
  revision: number;
}

export type RejectionReason = 'STALE_REVISION' | 'UNAUTHORIZED' | 'MALFORMED_OPERATION';

export interface RejectMessage {
  opId: string;
  reason: RejectionReason;
  message: string;
}

export interface CursorMessage {
  clientId: string;
  cursor: Cursor;
}

export interface Collaborator {
  clientId: string;
  userName: string;
  cursor: Cursor;
  isActive: boolean;
  lastSeen: Date;
}

/**
 * What the sync controller delivers to an attached client. Implemented by
 * in-process sessions and by transport adapters.
 */
export interface SessionEndpoint {
  readonly clientId: string;
  deliverOperation(message: BroadcastMessage): void;
  deliverAck(message: AckMessage): void;
  deliverRejection(message: RejectMessage): void;
  deliverSnapshot(snapshot: DocumentSnapshot): void;
  deliverCursor?(message: CursorMessage): void;
}

/**
 * What a client session uses to reach the sync controller.
 */
export interface OperationTransport {
  send(message: SubmitMessage): void;
  requestSnapshot(clientId: string): void;
  sendCursor?(message: CursorMessage): void;
}
