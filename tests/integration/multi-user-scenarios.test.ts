import { createInsert } from '../../shared/ot/operations';
import { CollaborationSession } from '../../shared/session/CollaborationSession';
import { DocumentManager } from '../../backend/src/services/DocumentManager';
import { SnapshotStore } from '../../backend/src/services/SnapshotStore';
import { OperationAck, WebSocketHandler } from '../../backend/src/services/WebSocketHandler';
import { MetricsCollector } from '../../backend/src/utils/MetricsCollector';
import { FakeSocket, flush } from '../support/FakeSocket';
import { InMemoryRedis } from '../support/InMemoryRedis';

const mockRedis = new InMemoryRedis();

jest.mock('redis', () => ({
  createClient: () => mockRedis
}));

// Park-Miller generator so every run replays the same interleaving
function seeded(seed: number): (limit: number) => number {
  let state = seed;
  return limit => {
    state = (state * 48271) % 2147483647;
    return state % limit;
  };
}

function randomEdit(session: CollaborationSession, random: (limit: number) => number, allowDeletes: boolean): void {
  const length = session.content.length;
  if (allowDeletes && length > 0 && random(3) === 0) {
    const position = random(length);
    session.delete(position, 1 + random(Math.min(4, length - position)));
    return;
  }
  session.insert(random(length + 1), String.fromCharCode(97 + random(26)));
}

async function typeConcurrently(
  sessions: CollaborationSession[],
  documentManager: DocumentManager,
  seed: number,
  rounds: number,
  allowDeletes: boolean
): Promise<void> {
  const random = seeded(seed);
  for (let round = 0; round < rounds; round++) {
    for (const session of sessions) {
      const edits = 1 + random(3);
      for (let i = 0; i < edits; i++) {
        randomEdit(session, random, allowDeletes);
      }
      if (random(2) === 0) {
        await flush();
      }
    }
    if (random(3) === 0) {
      await documentManager.settle('doc-1');
    }
  }
  await documentManager.settle('doc-1');
}

afterAll(() => {
  MetricsCollector.resetInstance();
});

describe('Multi-User Scenarios Integration Tests', () => {
  let documentManager: DocumentManager;

  beforeEach(() => {
    mockRedis.clear();
    documentManager = new DocumentManager();
    const { permissions } = documentManager.createDocument({
      id: 'doc-1',
      title: 'Shared notes',
      ownerId: 'client-0',
      initialContent: 'The quick brown fox'
    });
    for (let i = 1; i < 5; i++) {
      permissions.grant(`client-${i}`, 'WRITE');
    }
  });

  describe('Concurrent Editing Scenarios', () => {
    it.each([7, 42, 1234])('should converge when five clients insert concurrently (seed %i)', async seed => {
      const sessions = [0, 1, 2, 3, 4].map(i => documentManager.joinDocument('doc-1', `client-${i}`));

      await typeConcurrently(sessions, documentManager, seed, 8, false);

      const { state } = documentManager.requireDocument('doc-1');
      for (const session of sessions) {
        expect(session.content).toBe(state.content);
        expect(session.pendingOps).toHaveLength(0);
        expect(session.ackedRevision).toBe(state.revision);
      }
      expect(state.contentAt(state.revision)).toBe(state.content);
    });

    it.each([3, 99, 2024])('should converge under concurrent inserts and deletes (seed %i)', async seed => {
      const sessions = [0, 1, 2, 3, 4].map(i => documentManager.joinDocument('doc-1', `client-${i}`));

      await typeConcurrently(sessions, documentManager, seed, 8, true);

      const { state } = documentManager.requireDocument('doc-1');
      for (const session of sessions) {
        expect(session.content).toBe(state.content);
        expect(session.pendingOps).toHaveLength(0);
      }
      expect(state.contentAt(state.revision)).toBe(state.content);
    });

    it('should keep every edit when clients type at the same spot', async () => {
      const alice = documentManager.joinDocument('doc-1', 'client-0');
      const bob = documentManager.joinDocument('doc-1', 'client-1');

      alice.insert(4, 'very ');
      bob.insert(4, 'slow ');
      await documentManager.settle('doc-1');

      expect(documentManager.getContent('doc-1')).toBe('The very slow quick brown fox');
      expect(bob.content).toBe('The very slow quick brown fox');
    });

    it('should drop an insert made inside a range another client deleted', async () => {
      const alice = documentManager.joinDocument('doc-1', 'client-0');
      const bob = documentManager.joinDocument('doc-1', 'client-1');

      alice.delete(4, 6);
      bob.insert(6, 'XX');
      await documentManager.settle('doc-1');

      expect(documentManager.getContent('doc-1')).toBe('The brown fox');
      expect(alice.content).toBe('The brown fox');
      expect(bob.content).toBe('The brown fox');
    });
  });

  describe('Joining mid-session', () => {
    it('should let a late joiner catch up and keep editing', async () => {
      const alice = documentManager.joinDocument('doc-1', 'client-0');
      alice.insert(19, ' jumps');
      await documentManager.settle('doc-1');

      const carol = documentManager.joinDocument('doc-1', 'client-2');
      expect(carol.content).toBe('The quick brown fox jumps');

      carol.insert(0, '> ');
      alice.delete(4, 6);
      await documentManager.settle('doc-1');

      expect(documentManager.getContent('doc-1')).toBe('> The brown fox jumps');
      expect(alice.content).toBe('> The brown fox jumps');
      expect(carol.content).toBe('> The brown fox jumps');
    });
  });

  describe('Socket clients', () => {
    it('should order concurrent inserts at the same position by client id', async () => {
      const handler = new WebSocketHandler(documentManager);
      const sockets = [new FakeSocket('socket-b'), new FakeSocket('socket-a')];
      sockets.forEach(socket => handler.handleConnection(socket));
      sockets[0].receive('join_document', { documentId: 'doc-2', clientId: 'bob', userName: 'Bob' });
      sockets[1].receive('join_document', { documentId: 'doc-2', clientId: 'alice', userName: 'Alice' });
      await flush();

      const submit = (socket: FakeSocket, clientId: string, text: string): Promise<OperationAck> =>
        new Promise(resolve =>
          socket.receive(
            'operation',
            {
              clientId,
              baseRevision: 0,
              operation: createInsert({ id: `${clientId}:1`, authorId: clientId, position: 0, text, baseRevision: 0 })
            },
            resolve
          )
        );

      const acks = await Promise.all([submit(sockets[0], 'bob', 'B'), submit(sockets[1], 'alice', 'A')]);

      expect(acks).toEqual([
        { status: 'committed', revision: 1 },
        { status: 'committed', revision: 2 }
      ]);
      expect(documentManager.getContent('doc-2')).toBe('AB');
    });
  });

  describe('Restart recovery', () => {
    it('should resume a document from its checkpoint', async () => {
      const store = new SnapshotStore();
      await store.initialize();

      const alice = documentManager.joinDocument('doc-1', 'client-0');
      const bob = documentManager.joinDocument('doc-1', 'client-1');
      alice.insert(19, '!');
      bob.insert(0, '# ');
      await documentManager.settle('doc-1');
      await store.checkpointAll(documentManager);

      const restarted = new DocumentManager();
      const restored = await store.restore(restarted, 'doc-1');
      expect(restored?.state.snapshot()).toEqual({
        documentId: 'doc-1',
        revision: 3,
        content: '# The quick brown fox!'
      });

      restored?.permissions.grant('client-1', 'WRITE');
      const rejoined = restarted.joinDocument('doc-1', 'client-1');
      rejoined.insert(2, 'Re: ');
      await restarted.settle('doc-1');
      await store.checkpointAll(restarted);

      expect(restarted.getContent('doc-1')).toBe('# Re: The quick brown fox!');
      expect(mockRedis.lists.get('document:doc-1:log')).toHaveLength(4);
      await store.disconnect();
    });
  });
});
