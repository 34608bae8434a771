import { Request, Response } from 'express';
import { CollaborationError } from '../../../shared/ot/errors';
import { Logger } from '../utils/Logger';
import { DocumentManager } from '../services/DocumentManager';

/**
 * Read-only HTTP views of hosted documents, for clients that catch up by
 * pulling instead of holding a socket open.
 */
export class DocumentController {
  private logger: Logger;

  constructor(private readonly documentManager: DocumentManager, logger?: Logger) {
    this.logger = logger || Logger.getInstance();
  }

  public getSnapshot(req: Request, res: Response): void {
    try {
      const { state } = this.documentManager.requireDocument(req.params.id);
      res.json(state.snapshot());
    } catch (error) {
      this.handleError(error, req, res);
    }
  }

  public getOperations(req: Request, res: Response): void {
    const since = typeof req.query.since === 'string' ? Number(req.query.since) : 0;

    try {
      const { state } = this.documentManager.requireDocument(req.params.id);
      if (!Number.isInteger(since) || since < 0 || since > state.revision) {
        res.status(400).json({
          error: `since must be an integer between 0 and ${state.revision}`,
          code: 'STALE_REVISION'
        });
        return;
      }

      res.json({
        documentId: state.id,
        since,
        revision: state.revision,
        operations: state.appendedSince(since)
      });
    } catch (error) {
      this.handleError(error, req, res);
    }
  }

  private handleError(error: unknown, req: Request, res: Response): void {
    if (error instanceof CollaborationError && error.code === 'DOCUMENT_NOT_FOUND') {
      res.status(404).json({ error: error.message, code: error.code });
      return;
    }

    this.logger.logError(
      error instanceof Error ? error : new Error(String(error)),
      `HTTP ${req.method} ${req.url}`,
      { documentId: req.params.id }
    );
    res.status(500).json({ error: 'Internal server error' });
  }
}
