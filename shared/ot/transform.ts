/**
 * Operational Transformation Engine
 *
 * This module implements the core transformation logic for resolving conflicts
 * between concurrent operations in a collaborative editing environment.
 *
 * `transform(a, b)` takes two operations composed against the same document
 * and returns the version of `a` that applies after `b`. For any such pair,
 * `apply(apply(doc, a), transform(b, a)) === apply(apply(doc, b), transform(a, b))`.
 */

import { Cursor, DeleteOperation, InsertOperation, Operation } from '../types';
import { withPosition, withRange, withText } from './operations';

/**
 * Deterministic order for inserts at the same position: the lower author id
 * keeps its position, the higher one is shifted past it.
 */
export function hasPrecedence(a: Operation, b: Operation): boolean {
  if (a.authorId !== b.authorId) {
    return a.authorId < b.authorId;
  }
  return a.id <= b.id;
}

function transformInsertInsert(a: Readonly<InsertOperation>, b: Readonly<InsertOperation>): Operation {
  if (a.position < b.position) {
    return a;
  }
  if (a.position > b.position || !hasPrecedence(a, b)) {
    return withPosition(a, a.position + b.text.length);
  }
  return a;
}

function transformInsertDelete(a: Readonly<InsertOperation>, b: Readonly<DeleteOperation>): Operation {
  const deleteEnd = b.position + b.length;

  if (a.position <= b.position) {
    return a;
  }
  if (a.position >= deleteEnd) {
    return withPosition(a, a.position - b.length);
  }
  // Inside the deleted range: the deletion swallows the insert.
  return withText(a, b.position, '');
}

function transformDeleteInsert(a: Readonly<DeleteOperation>, b: Readonly<InsertOperation>): Operation {
  const deleteEnd = a.position + a.length;
  const inserted = b.text.length;

  if (b.position <= a.position) {
    return withPosition(a, a.position + inserted);
  }
  if (b.position < deleteEnd) {
    return withRange(a, a.position, a.length + inserted);
  }
  return a;
}

function transformDeleteDelete(a: Readonly<DeleteOperation>, b: Readonly<DeleteOperation>): Operation {
  const aEnd = a.position + a.length;
  const bEnd = b.position + b.length;

  if (aEnd <= b.position) {
    return a;
  }
  if (a.position >= bEnd) {
    return withPosition(a, a.position - b.length);
  }

  const overlap = Math.min(aEnd, bEnd) - Math.max(a.position, b.position);
  return withRange(a, Math.min(a.position, b.position), a.length - overlap);
}

/**
 * Rewrite `a` so that it applies after `b` has been applied.
 */
export function transform(a: Operation, b: Operation): Operation {
  if (a.kind === 'insert') {
    return b.kind === 'insert' ? transformInsertInsert(a, b) : transformInsertDelete(a, b);
  }
  return b.kind === 'insert' ? transformDeleteInsert(a, b) : transformDeleteDelete(a, b);
}

/**
 * Transform two concurrent operations against each other.
 *
 * @returns `[a', b']` where `a'` applies after `b` and `b'` applies after `a`
 */
export function transformPair(a: Operation, b: Operation): [Operation, Operation] {
  return [transform(a, b), transform(b, a)];
}

/**
 * Transform an operation against a sequence of operations applied in order.
 */
export function transformAgainst(op: Operation, history: readonly Operation[]): Operation {
  return history.reduce<Operation>((current, applied) => transform(current, applied), op);
}

/**
 * Project a caret offset through an applied operation.
 */
export function transformPosition(position: number, op: Operation): number {
  if (op.kind === 'insert') {
    return op.position <= position ? position + op.text.length : position;
  }

  const deleteEnd = op.position + op.length;
  if (position <= op.position) {
    return position;
  }
  if (position >= deleteEnd) {
    return position - op.length;
  }
  return op.position;
}

export function transformCursor(cursor: Cursor, op: Operation): Cursor {
  const position = transformPosition(cursor.position, op);
  if (!cursor.selection) {
    return { position };
  }
  return {
    position,
    selection: {
      start: transformPosition(cursor.selection.start, op),
      end: transformPosition(cursor.selection.end, op)
    }
  };
}
