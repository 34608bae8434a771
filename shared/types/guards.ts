/**
 * Runtime checks for values that arrive from the wire or from storage.
 */

import { Cursor, Operation, SubmitMessage } from './index';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isOperation(value: unknown): value is Operation {
  if (!isRecord(value)) return false;
  if (
    typeof value.id !== 'string' ||
    typeof value.authorId !== 'string' ||
    typeof value.position !== 'number' ||
    typeof value.baseRevision !== 'number'
  ) {
    return false;
  }
  return (
    (value.kind === 'insert' && typeof value.text === 'string') ||
    (value.kind === 'delete' && typeof value.length === 'number')
  );
}

export function isCursor(value: unknown): value is Cursor {
  if (!isRecord(value) || typeof value.position !== 'number') return false;
  if (value.selection === undefined) return true;
  return (
    isRecord(value.selection) &&
    typeof value.selection.start === 'number' &&
    typeof value.selection.end === 'number'
  );
}

export function isSubmitMessage(value: unknown): value is SubmitMessage {
  return (
    isRecord(value) &&
    typeof value.clientId === 'string' &&
    typeof value.baseRevision === 'number' &&
    isOperation(value.operation)
  );
}
