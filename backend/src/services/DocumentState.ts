import { Cursor, DocumentSnapshot, Operation } from '../../../shared/types';
import { applyOperation, lengthDelta, validateOperation } from '../../../shared/ot/operations';
import { transformCursor } from '../../../shared/ot/transform';
import { RevisionLog } from './RevisionLog';

export interface DocumentMetadata {
  id: string;
  title: string;
  ownerId: string;
  createdAt?: Date;
}

/**
 * Materialized text of one document plus its revision history.
 *
 * Only `commit` mutates content, and it always appends to the log in the same
 * step, so `revision === log.length` and `content === log.replay()` hold
 * between calls.
 */
export class DocumentState {
  readonly id: string;
  readonly title: string;
  readonly ownerId: string;
  readonly createdAt: Date;
  updatedAt: Date;

  private readonly log: RevisionLog;
  private text: string;
  private readonly presence: Map<string, Cursor> = new Map();

  constructor(metadata: DocumentMetadata, log: RevisionLog = new RevisionLog()) {
    this.id = metadata.id;
    this.title = metadata.title;
    this.ownerId = metadata.ownerId;
    this.createdAt = metadata.createdAt || new Date();
    this.updatedAt = this.createdAt;
    this.log = log;
    this.text = log.replay();
  }

  /**
   * Rebuild a document from a persisted operation log.
   */
  static restore(metadata: DocumentMetadata, operations: readonly Operation[]): DocumentState {
    return new DocumentState(metadata, RevisionLog.fromOperations(operations));
  }

  get revision(): number {
    return this.log.length;
  }

  get content(): string {
    return this.text;
  }

  get history(): RevisionLog {
    return this.log;
  }

  /**
   * Apply an operation already expressed against the current revision.
   * Throws MalformedOperationError (leaving state untouched) if it does not fit.
   */
  commit(operation: Operation): number {
    const error = validateOperation(operation, this.text.length);
    if (error) {
      throw error;
    }

    const nextContent = applyOperation(this.text, operation);
    const revision = this.log.append(operation);
    this.text = nextContent;
    this.updatedAt = new Date();

    for (const [clientId, cursor] of this.presence.entries()) {
      this.presence.set(clientId, transformCursor(cursor, operation));
    }

    return revision;
  }

  snapshot(): DocumentSnapshot {
    return {
      documentId: this.id,
      revision: this.revision,
      content: this.text
    };
  }

  appendedSince(revision: number): Operation[] {
    return this.log.entriesSince(revision);
  }

  contentAt(revision: number): string {
    return this.log.replay(revision);
  }

  /**
   * Document length at an earlier revision, without replaying the log.
   */
  lengthAt(revision: number): number {
    return this.log
      .entriesSince(revision)
      .reduce((length, op) => length - lengthDelta(op), this.text.length);
  }

  updateCursor(clientId: string, cursor: Cursor): Cursor {
    const clamped = clampCursor(cursor, this.text.length);
    this.presence.set(clientId, clamped);
    return clamped;
  }

  removeCursor(clientId: string): void {
    this.presence.delete(clientId);
  }

  getCursor(clientId: string): Cursor | undefined {
    return this.presence.get(clientId);
  }

  cursors(): Map<string, Cursor> {
    return new Map(this.presence);
  }
}

function clamp(value: number, max: number): number {
  return Math.max(0, Math.min(value, max));
}

function clampCursor(cursor: Cursor, length: number): Cursor {
  const position = clamp(cursor.position, length);
  if (!cursor.selection) {
    return { position };
  }
  const start = clamp(cursor.selection.start, length);
  const end = clamp(cursor.selection.end, length);
  return { position, selection: { start: Math.min(start, end), end: Math.max(start, end) } };
}
