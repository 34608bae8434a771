/**
 * Client-side replica of a shared document.
 *
 * Local edits are applied immediately and queued in `pendingOps`. Only the
 * head of the queue is on the wire at any time; the rest wait until it is
 * acknowledged, then go out rebased on the revision the ack reports.
 */

import {
  AckMessage,
  BroadcastMessage,
  Capability,
  Cursor,
  CursorMessage,
  DocumentSnapshot,
  Operation,
  OperationTransport,
  RejectMessage,
  SessionEndpoint
} from '../types';
import {
  applyOperation,
  createDelete,
  createInsert,
  OperationIdGenerator,
  StaleRevisionError,
  transform,
  transformCursor,
  UnauthorizedError,
  withBaseRevision
} from '../ot';

export interface CollaborationSessionCallbacks {
  onContentChange?: (content: string, cause: 'local' | 'remote' | 'snapshot') => void;
  onCursorChange?: (cursor: Cursor) => void;
  onRejected?: (message: RejectMessage) => void;
}

export interface CollaborationSessionOptions {
  clientId: string;
  transport: OperationTransport;
  snapshot?: DocumentSnapshot;
  capabilities?: Iterable<Capability>;
  callbacks?: CollaborationSessionCallbacks;
}

export class CollaborationSession implements SessionEndpoint {
  readonly clientId: string;
  readonly capabilities: ReadonlySet<Capability>;
  private readonly transport: OperationTransport;
  private readonly callbacks: CollaborationSessionCallbacks;
  private readonly ids: OperationIdGenerator;

  private text: string;
  private revision: number;
  private pending: Operation[] = [];
  private inFlight = false;
  private awaitingSnapshot = false;
  private caret: Cursor = { position: 0 };
  private readonly peers: Map<string, Cursor> = new Map();
  private readonly applied: Operation[] = [];

  constructor(options: CollaborationSessionOptions) {
    this.clientId = options.clientId;
    this.transport = options.transport;
    this.callbacks = options.callbacks || {};
    this.capabilities = new Set(options.capabilities || ['read', 'write']);
    this.ids = new OperationIdGenerator(options.clientId);
    this.text = options.snapshot?.content || '';
    this.revision = options.snapshot?.revision || 0;
  }

  get content(): string {
    return this.text;
  }

  get ackedRevision(): number {
    return this.revision;
  }

  get pendingOps(): readonly Operation[] {
    return [...this.pending];
  }

  get cursor(): Cursor {
    return this.caret;
  }

  get isResyncing(): boolean {
    return this.awaitingSnapshot;
  }

  /**
   * Operations applied to the local view, in the order they were applied.
   */
  get appliedHistory(): readonly Operation[] {
    return [...this.applied];
  }

  peerCursors(): Map<string, Cursor> {
    return new Map(this.peers);
  }

  insert(position: number, text: string): Operation {
    return this.submitLocalEdit(
      createInsert({ id: this.ids.next(), authorId: this.clientId, position, text, baseRevision: this.revision })
    );
  }

  delete(position: number, length: number): Operation {
    return this.submitLocalEdit(
      createDelete({ id: this.ids.next(), authorId: this.clientId, position, length, baseRevision: this.revision })
    );
  }

  /**
   * Apply a local edit optimistically and queue it for the server.
   * Throws without changing anything if the edit cannot be applied locally.
   */
  submitLocalEdit(op: Operation): Operation {
    if (!this.capabilities.has('write')) {
      throw new UnauthorizedError(this.clientId);
    }
    if (this.awaitingSnapshot) {
      throw new StaleRevisionError(op.baseRevision, this.revision);
    }

    this.text = applyOperation(this.text, op);
    this.project(op);
    this.pending.push(op);
    this.callbacks.onContentChange?.(this.text, 'local');

    this.flush();
    return op;
  }

  setCursor(cursor: Cursor): void {
    this.caret = cursor;
    this.transport.sendCursor?.({ clientId: this.clientId, cursor });
  }

  /**
   * Incorporate an operation another client committed.
   */
  onRemoteOperation(message: BroadcastMessage): void {
    if (this.awaitingSnapshot || message.revision <= this.revision) {
      return;
    }

    // Bring the remote op past our unacknowledged edits, and rebase those
    // edits onto the remote op in the same pass.
    let remote = message.operation;
    this.pending = this.pending.map(local => {
      const rebased = transform(local, remote);
      remote = transform(remote, local);
      return rebased;
    });

    this.text = applyOperation(this.text, remote);
    this.project(remote);
    this.revision = message.revision;
    this.callbacks.onContentChange?.(this.text, 'remote');
  }

  /**
   * The head of the pending queue was committed at `message.revision`.
   */
  onAck(message: AckMessage): boolean {
    const head = this.pending[0];
    if (!head || head.id !== message.ackedOpId) {
      return false;
    }

    this.pending.shift();
    this.inFlight = false;
    this.revision = Math.max(this.revision, message.revision);
    this.flush();
    return true;
  }

  /**
   * The server refused our in-flight edit. Everything queued behind it was
   * built on top of it, so the whole queue is discarded and the view is
   * rebuilt from a fresh snapshot.
   */
  onReject(message: RejectMessage): void {
    const head = this.pending[0];
    if (!head || head.id !== message.opId) {
      return;
    }

    this.pending = [];
    this.inFlight = false;
    this.awaitingSnapshot = true;
    this.callbacks.onRejected?.(message);
    this.transport.requestSnapshot(this.clientId);
  }

  applySnapshot(snapshot: DocumentSnapshot): void {
    if (snapshot.revision < this.revision) {
      return;
    }

    this.text = snapshot.content;
    this.revision = snapshot.revision;
    this.pending = [];
    this.inFlight = false;
    this.awaitingSnapshot = false;
    this.caret = clampCursor(this.caret, this.text.length);
    this.callbacks.onContentChange?.(this.text, 'snapshot');
  }

  // SessionEndpoint

  deliverOperation(message: BroadcastMessage): void {
    this.onRemoteOperation(message);
  }

  deliverAck(message: AckMessage): void {
    this.onAck(message);
  }

  deliverRejection(message: RejectMessage): void {
    this.onReject(message);
  }

  deliverSnapshot(snapshot: DocumentSnapshot): void {
    this.applySnapshot(snapshot);
  }

  deliverCursor(message: CursorMessage): void {
    if (message.clientId !== this.clientId) {
      this.peers.set(message.clientId, message.cursor);
    }
  }

  private flush(): void {
    if (this.inFlight || this.pending.length === 0) {
      return;
    }

    const head = withBaseRevision(this.pending[0], this.revision);
    this.pending[0] = head;
    this.inFlight = true;
    this.transport.send({ clientId: this.clientId, operation: head, baseRevision: this.revision });
  }

  private project(op: Operation): void {
    this.applied.push(op);
    this.caret = transformCursor(this.caret, op);
    for (const [peerId, cursor] of this.peers.entries()) {
      this.peers.set(peerId, transformCursor(cursor, op));
    }
    this.callbacks.onCursorChange?.(this.caret);
  }
}

function clampCursor(cursor: Cursor, length: number): Cursor {
  const clamp = (value: number): number => Math.max(0, Math.min(value, length));
  return cursor.selection
    ? { position: clamp(cursor.position), selection: { start: clamp(cursor.selection.start), end: clamp(cursor.selection.end) } }
    : { position: clamp(cursor.position) };
}
