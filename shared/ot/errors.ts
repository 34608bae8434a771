/**
 * Error taxonomy for the collaboration engine.
 *
 * Per-operation rejections (stale revision, unauthorized, malformed) are
 * local to the submitting client and never touch document state.
 */

import { RejectionReason } from '../types';

export type CollaborationErrorCode =
  | RejectionReason
  | 'DOCUMENT_NOT_FOUND'
  | 'SESSION_NOT_FOUND';

export class CollaborationError<C extends CollaborationErrorCode = CollaborationErrorCode> extends Error {
  readonly code: C;

  constructor(code: C, message: string) {
    super(message);
    this.name = 'CollaborationError';
    this.code = code;
  }
}

export class StaleRevisionError extends CollaborationError<'STALE_REVISION'> {
  constructor(baseRevision: number, currentRevision: number) {
    super(
      'STALE_REVISION',
      `Base revision ${baseRevision} is not reachable (current revision ${currentRevision})`
    );
    this.name = 'StaleRevisionError';
  }
}

export class UnauthorizedError extends CollaborationError<'UNAUTHORIZED'> {
  constructor(clientId: string, message: string = `Client ${clientId} lacks write capability`) {
    super('UNAUTHORIZED', message);
    this.name = 'UnauthorizedError';
  }
}

export class MalformedOperationError extends CollaborationError<'MALFORMED_OPERATION'> {
  constructor(message: string) {
    super('MALFORMED_OPERATION', message);
    this.name = 'MalformedOperationError';
  }
}

export class DocumentNotFoundError extends CollaborationError<'DOCUMENT_NOT_FOUND'> {
  constructor(documentId: string) {
    super('DOCUMENT_NOT_FOUND', `Document ${documentId} not found`);
    this.name = 'DocumentNotFoundError';
  }
}

export class SessionNotFoundError extends CollaborationError<'SESSION_NOT_FOUND'> {
  constructor(clientId: string) {
    super('SESSION_NOT_FOUND', `No session attached for client ${clientId}`);
    this.name = 'SessionNotFoundError';
  }
}

export function isRejection(error: CollaborationError): error is CollaborationError<RejectionReason> {
  return (
    error.code === 'STALE_REVISION' ||
    error.code === 'UNAUTHORIZED' ||
    error.code === 'MALFORMED_OPERATION'
  );
}
