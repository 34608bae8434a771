/**
 * Operational Transformation (OT) module exports
 */

export {
  createInsert,
  createDelete,
  withPosition,
  withRange,
  withText,
  withBaseRevision,
  OperationIdGenerator,
  lengthDelta,
  isNoOp,
  validateOperation,
  applyOperation,
  applyOperations,
  describeOperation
} from './operations';

export {
  transform,
  transformPair,
  transformAgainst,
  transformPosition,
  transformCursor,
  hasPrecedence
} from './transform';

export {
  CollaborationError,
  StaleRevisionError,
  UnauthorizedError,
  MalformedOperationError,
  DocumentNotFoundError,
  SessionNotFoundError,
  isRejection
} from './errors';
