import { CursorMessage, OperationTransport, RejectMessage, SubmitMessage } from '../../types';
import { createInsert } from '../../ot/operations';
import { StaleRevisionError, UnauthorizedError } from '../../ot/errors';
import { CollaborationSession } from '../CollaborationSession';

class RecordingTransport implements OperationTransport {
  sent: SubmitMessage[] = [];
  snapshotRequests: string[] = [];
  cursors: CursorMessage[] = [];

  send(message: SubmitMessage): void {
    this.sent.push(message);
  }

  requestSnapshot(clientId: string): void {
    this.snapshotRequests.push(clientId);
  }

  sendCursor(message: CursorMessage): void {
    this.cursors.push(message);
  }
}

describe('CollaborationSession', () => {
  let transport: RecordingTransport;
  let session: CollaborationSession;

  beforeEach(() => {
    transport = new RecordingTransport();
    session = new CollaborationSession({
      clientId: 'alice',
      transport,
      snapshot: { documentId: 'doc-1', revision: 3, content: 'hello' }
    });
  });

  describe('local edits', () => {
    it('should apply optimistically and send against the acknowledged revision', () => {
      const op = session.insert(5, ' world');

      expect(session.content).toBe('hello world');
      expect(session.pendingOps).toHaveLength(1);
      expect(transport.sent).toEqual([{ clientId: 'alice', operation: op, baseRevision: 3 }]);
      expect(op.id).toBe('alice:1');
    });

    it('should keep only one operation in flight', () => {
      session.insert(5, ' world');
      session.insert(0, '>');

      expect(session.content).toBe('>hello world');
      expect(session.pendingOps).toHaveLength(2);
      expect(transport.sent).toHaveLength(1);
    });

    it('should send the next operation rebased on the acknowledged revision', () => {
      session.insert(5, ' world');
      session.insert(0, '>');

      expect(session.onAck({ ackedOpId: 'alice:1', revision: 4 })).toBe(true);

      expect(session.ackedRevision).toBe(4);
      expect(transport.sent).toHaveLength(2);
      expect(transport.sent[1].baseRevision).toBe(4);
      expect(transport.sent[1].operation).toMatchObject({ id: 'alice:2', baseRevision: 4 });
    });

    it('should ignore an ack for an operation that is not in flight', () => {
      session.insert(5, '!');

      expect(session.onAck({ ackedOpId: 'alice:9', revision: 4 })).toBe(false);
      expect(session.ackedRevision).toBe(3);
    });

    it('should refuse edits without write capability', () => {
      const reader = new CollaborationSession({ clientId: 'rita', transport, capabilities: ['read'] });

      expect(() => reader.insert(0, 'x')).toThrow(UnauthorizedError);
      expect(reader.content).toBe('');
      expect(transport.sent).toHaveLength(0);
    });

    it('should move the caret past its own insert', () => {
      session.setCursor({ position: 5 });
      session.insert(5, '!!');

      expect(session.cursor).toEqual({ position: 7 });
      expect(transport.cursors).toEqual([{ clientId: 'alice', cursor: { position: 5 } }]);
    });
  });

  describe('remote operations', () => {
    it('should transform through pending edits and rebase them', () => {
      session.insert(5, '!');

      session.onRemoteOperation({
        revision: 4,
        authorId: 'bob',
        operation: createInsert({ id: 'bob:1', authorId: 'bob', position: 0, text: 'Hey ', baseRevision: 3 })
      });

      expect(session.content).toBe('Hey hello!');
      expect(session.ackedRevision).toBe(4);
      expect(session.pendingOps[0].position).toBe(9);
    });

    it('should ignore operations it has already seen', () => {
      session.onRemoteOperation({
        revision: 3,
        authorId: 'bob',
        operation: createInsert({ id: 'bob:1', authorId: 'bob', position: 0, text: 'x', baseRevision: 2 })
      });

      expect(session.content).toBe('hello');
    });

    it('should project peer cursors through applied operations', () => {
      session.deliverCursor({ clientId: 'bob', cursor: { position: 2 } });
      session.deliverOperation({
        revision: 4,
        authorId: 'carol',
        operation: createInsert({ id: 'carol:1', authorId: 'carol', position: 0, text: 'xx', baseRevision: 3 })
      });

      expect(session.peerCursors().get('bob')).toEqual({ position: 4 });
    });

    it('should record applied operations in order', () => {
      session.insert(0, 'a');
      session.deliverOperation({
        revision: 4,
        authorId: 'bob',
        operation: createInsert({ id: 'bob:1', authorId: 'bob', position: 5, text: 'b', baseRevision: 3 })
      });

      expect(session.content).toBe('ahellob');
      expect(session.appliedHistory.map(op => op.id)).toEqual(['alice:1', 'bob:1']);
    });
  });

  describe('rejection and resync', () => {
    it('should discard pending edits and request a snapshot', () => {
      const rejections: RejectMessage[] = [];
      const resyncing = new CollaborationSession({
        clientId: 'alice',
        transport,
        snapshot: { documentId: 'doc-1', revision: 3, content: 'hello' },
        callbacks: { onRejected: message => rejections.push(message) }
      });
      resyncing.insert(0, 'a');
      resyncing.insert(0, 'b');

      const rejection: RejectMessage = { opId: 'alice:1', reason: 'UNAUTHORIZED', message: 'Client alice lacks write capability' };
      resyncing.deliverRejection(rejection);

      expect(resyncing.pendingOps).toHaveLength(0);
      expect(resyncing.isResyncing).toBe(true);
      expect(rejections).toEqual([rejection]);
      expect(transport.snapshotRequests).toEqual(['alice']);
      expect(() => resyncing.insert(0, 'c')).toThrow(StaleRevisionError);
    });

    it('should resume from the snapshot', () => {
      session.insert(0, 'a');
      session.onReject({ opId: 'alice:1', reason: 'STALE_REVISION', message: 'stale' });

      session.deliverSnapshot({ documentId: 'doc-1', revision: 6, content: 'fresh' });

      expect(session.content).toBe('fresh');
      expect(session.ackedRevision).toBe(6);
      expect(session.isResyncing).toBe(false);
    });

    it('should ignore a snapshot older than what it has seen', () => {
      session.applySnapshot({ documentId: 'doc-1', revision: 2, content: 'old' });

      expect(session.content).toBe('hello');
    });
  });
});
