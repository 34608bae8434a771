import {
  AckMessage,
  BroadcastMessage,
  CursorMessage,
  DocumentSnapshot,
  RejectMessage,
  SessionEndpoint
} from '../../../../shared/types';

/**
 * Session endpoint that keeps everything delivered to it.
 */
export class RecordingEndpoint implements SessionEndpoint {
  operations: BroadcastMessage[] = [];
  acks: AckMessage[] = [];
  rejections: RejectMessage[] = [];
  snapshots: DocumentSnapshot[] = [];
  cursors: CursorMessage[] = [];

  constructor(readonly clientId: string) {}

  deliverOperation(message: BroadcastMessage): void {
    this.operations.push(message);
  }

  deliverAck(message: AckMessage): void {
    this.acks.push(message);
  }

  deliverRejection(message: RejectMessage): void {
    this.rejections.push(message);
  }

  deliverSnapshot(snapshot: DocumentSnapshot): void {
    this.snapshots.push(snapshot);
  }

  deliverCursor(message: CursorMessage): void {
    this.cursors.push(message);
  }
}
