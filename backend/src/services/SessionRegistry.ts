import { v4 as uuidv4 } from 'uuid';
import { Capability, Collaborator, Cursor } from '../../../shared/types';

export interface SessionRecord {
  id: string;
  clientId: string;
  userName: string;
  documentId: string;
  ackedRevision: number;
  capabilities: Set<Capability>;
  joinedAt: Date;
  lastActivity: Date;
  isActive: boolean;
}

export interface CreateSessionParams {
  clientId: string;
  userName: string;
  documentId: string;
  ackedRevision: number;
  capabilities: Iterable<Capability>;
}

export interface SessionRegistryConfig {
  sessionTimeout?: number; // in seconds
}

/**
 * Server-side record of every client attached to a document.
 */
export class SessionRegistry {
  private sessionTimeout: number;
  private sessions: Map<string, SessionRecord> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(config: SessionRegistryConfig = {}) {
    this.sessionTimeout = config.sessionTimeout || 3600; // 1 hour default
  }

  /**
   * Periodically expire sessions that have been idle longer than the timeout.
   */
  startExpiry(onExpired: (session: SessionRecord) => void, intervalMs: number = 60000): void {
    this.stopExpiry();
    this.cleanupInterval = setInterval(() => {
      this.cleanupExpiredSessions().forEach(session => onExpired(session));
    }, intervalMs);
    this.cleanupInterval.unref();
  }

  stopExpiry(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  createSession(params: CreateSessionParams): SessionRecord {
    // One live session per client per document
    const existing = this.getSessionByClient(params.documentId, params.clientId);
    if (existing) {
      this.sessions.delete(existing.id);
    }

    const now = new Date();
    const session: SessionRecord = {
      id: uuidv4(),
      clientId: params.clientId,
      userName: params.userName,
      documentId: params.documentId,
      ackedRevision: params.ackedRevision,
      capabilities: new Set(params.capabilities),
      joinedAt: now,
      lastActivity: now,
      isActive: true
    };

    this.sessions.set(session.id, session);
    return session;
  }

  getSession(sessionId: string): SessionRecord | null {
    return this.sessions.get(sessionId) || null;
  }

  getSessionByClient(documentId: string, clientId: string): SessionRecord | null {
    for (const session of this.sessions.values()) {
      if (session.documentId === documentId && session.clientId === clientId) {
        return session;
      }
    }
    return null;
  }

  getDocumentSessions(documentId: string): SessionRecord[] {
    return [...this.sessions.values()].filter(
      session => session.documentId === documentId && session.isActive
    );
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Record that a client has incorporated `revision`. Never moves backwards.
   */
  advanceAck(documentId: string, clientId: string, revision: number): number | null {
    const session = this.getSessionByClient(documentId, clientId);
    if (!session) {
      return null;
    }

    session.ackedRevision = Math.max(session.ackedRevision, revision);
    session.lastActivity = new Date();
    return session.ackedRevision;
  }

  touch(documentId: string, clientId: string): void {
    const session = this.getSessionByClient(documentId, clientId);
    if (session) {
      session.lastActivity = new Date();
      session.isActive = true;
    }
  }

  removeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  removeByClient(documentId: string, clientId: string): boolean {
    const session = this.getSessionByClient(documentId, clientId);
    return session ? this.removeSession(session.id) : false;
  }

  sessionToCollaborator(session: SessionRecord, cursor: Cursor = { position: 0 }): Collaborator {
    return {
      clientId: session.clientId,
      userName: session.userName,
      cursor,
      isActive: session.isActive,
      lastSeen: session.lastActivity
    };
  }

  /**
   * Validate user identity (authentication itself is external)
   */
  validateUser(clientId: string, userName: string): boolean {
    return !!(clientId && userName && clientId.trim() && userName.trim());
  }

  /**
   * Remove and return sessions idle for longer than the timeout.
   */
  cleanupExpiredSessions(now: Date = new Date()): SessionRecord[] {
    const expired: SessionRecord[] = [];

    for (const [sessionId, session] of this.sessions.entries()) {
      const timeSinceActivity = (now.getTime() - session.lastActivity.getTime()) / 1000;
      if (timeSinceActivity > this.sessionTimeout) {
        expired.push(session);
        this.sessions.delete(sessionId);
      }
    }

    return expired;
  }
}
