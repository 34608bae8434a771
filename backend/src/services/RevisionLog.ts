import { EventEmitter } from 'events';
import { HistoryEntry, Operation } from '../../../shared/types';
import { applyOperation } from '../../../shared/ot/operations';

export interface ReplayBase {
  revision: number;
  content: string;
}

const EMPTY_BASE: ReplayBase = { revision: 0, content: '' };

export interface RevisionLogEvents {
  appended: (entry: HistoryEntry) => void;
}

/**
 * Append-only history of accepted operations.
 *
 * Entry `i` (zero-based) produced revision `i + 1`. Entries are never
 * mutated or removed while the log is live.
 */
export class RevisionLog extends EventEmitter {
  private readonly entries: Operation[] = [];

  static fromOperations(operations: readonly Operation[]): RevisionLog {
    const log = new RevisionLog();
    operations.forEach(op => log.entries.push(op));
    return log;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Append an operation and return the revision it produced.
   */
  append(operation: Operation): number {
    this.entries.push(operation);
    const revision = this.entries.length;
    const entry: HistoryEntry = { revision, operation };
    this.emit('appended', entry);
    return revision;
  }

  /**
   * Operations committed after `revision`, in commit order.
   */
  entriesSince(revision: number): Operation[] {
    return this.entries.slice(Math.max(0, revision));
  }

  /**
   * The operation that produced `revision` (1-based).
   */
  entryAt(revision: number): Operation | undefined {
    return revision >= 1 ? this.entries[revision - 1] : undefined;
  }

  toArray(): HistoryEntry[] {
    return this.entries.map((operation, index) => ({ revision: index + 1, operation }));
  }

  /**
   * Rebuild document content at `upTo` (defaults to the head), starting from
   * the empty document or from a snapshot taken at an earlier revision.
   */
  replay(upTo: number = this.entries.length, from: ReplayBase = EMPTY_BASE): string {
    if (upTo < from.revision || upTo > this.entries.length) {
      throw new RangeError(`Revision ${upTo} is outside [${from.revision}, ${this.entries.length}]`);
    }
    return this.entries
      .slice(from.revision, upTo)
      .reduce((content, op) => applyOperation(content, op), from.content);
  }

  on<E extends keyof RevisionLogEvents>(event: E, listener: RevisionLogEvents[E]): this {
    return super.on(event, listener);
  }

  off<E extends keyof RevisionLogEvents>(event: E, listener: RevisionLogEvents[E]): this {
    return super.off(event, listener);
  }
}
