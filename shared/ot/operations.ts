/**
 * Operational Transformation (OT) Operations
 *
 * This module implements the operation value type for plain-text editing:
 * - Insert: Inserts text at a specific position
 * - Delete: Removes a run of characters starting at a specific position
 *
 * Operations are frozen on creation. Anything that "changes" an operation
 * returns a new value.
 */

import { DeleteOperation, InsertOperation, Operation } from '../types';
import { MalformedOperationError } from './errors';

export interface InsertParams {
  id: string;
  authorId: string;
  position: number;
  text: string;
  baseRevision: number;
}

export interface DeleteParams {
  id: string;
  authorId: string;
  position: number;
  length: number;
  baseRevision: number;
}

export function createInsert(params: InsertParams): Readonly<InsertOperation> {
  return Object.freeze({ kind: 'insert' as const, ...params });
}

export function createDelete(params: DeleteParams): Readonly<DeleteOperation> {
  return Object.freeze({ kind: 'delete' as const, ...params });
}

/**
 * Copy an operation with a new position (and, for deletes, a new length).
 */
export function withPosition(op: Operation, position: number): Operation {
  return Object.freeze({ ...op, position });
}

export function withRange(op: Readonly<DeleteOperation>, position: number, length: number): Operation {
  return Object.freeze({ ...op, position, length });
}

export function withBaseRevision(op: Operation, baseRevision: number): Operation {
  return Object.freeze({ ...op, baseRevision });
}

export function withText(op: Readonly<InsertOperation>, position: number, text: string): Operation {
  return Object.freeze({ ...op, position, text });
}

/**
 * Issues operation ids of the form `<authorId>:<counter>`.
 */
export class OperationIdGenerator {
  private counter = 0;

  constructor(readonly authorId: string) {}

  next(): string {
    this.counter += 1;
    return `${this.authorId}:${this.counter}`;
  }

  get issued(): number {
    return this.counter;
  }
}

/**
 * Number of characters an operation adds (positive) or removes (negative).
 */
export function lengthDelta(op: Operation): number {
  return op.kind === 'insert' ? op.text.length : -op.length;
}

export function isNoOp(op: Operation): boolean {
  return op.kind === 'insert' ? op.text.length === 0 : op.length === 0;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Check an operation's shape and, when `contentLength` is given, its bounds.
 * Returns the error instead of throwing so callers can report it as a value.
 */
export function validateOperation(op: Operation, contentLength?: number): MalformedOperationError | null {
  if (!isNonNegativeInteger(op.position)) {
    return new MalformedOperationError(`Operation ${op.id} has invalid position ${op.position}`);
  }

  if (op.kind === 'insert') {
    if (typeof op.text !== 'string') {
      return new MalformedOperationError(`Insert ${op.id} has no text`);
    }
    if (contentLength !== undefined && op.position > contentLength) {
      return new MalformedOperationError(
        `Insert ${op.id} at ${op.position} is past the end of the document (length ${contentLength})`
      );
    }
    return null;
  }

  if (op.kind === 'delete') {
    if (!isNonNegativeInteger(op.length)) {
      return new MalformedOperationError(`Delete ${op.id} has invalid length ${op.length}`);
    }
    if (contentLength !== undefined && op.position + op.length > contentLength) {
      return new MalformedOperationError(
        `Delete ${op.id} of [${op.position}, ${op.position + op.length}) exceeds document length ${contentLength}`
      );
    }
    return null;
  }

  return new MalformedOperationError('Unknown operation kind');
}

/**
 * Apply an operation to a document string.
 * Throws MalformedOperationError when the operation does not fit the document.
 */
export function applyOperation(content: string, op: Operation): string {
  const error = validateOperation(op, content.length);
  if (error) {
    throw error;
  }

  if (op.kind === 'insert') {
    return content.slice(0, op.position) + op.text + content.slice(op.position);
  }
  return content.slice(0, op.position) + content.slice(op.position + op.length);
}

export function applyOperations(content: string, ops: readonly Operation[]): string {
  return ops.reduce((doc, op) => applyOperation(doc, op), content);
}

export function describeOperation(op: Operation): string {
  return op.kind === 'insert'
    ? `Insert("${op.text}" @${op.position})`
    : `Delete(${op.length} @${op.position})`;
}
