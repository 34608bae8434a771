import { CursorMessage, OperationTransport, SubmitMessage } from '../../../shared/types';
import { Logger } from '../utils/Logger';
import { SubmitResult, SyncController } from './SyncController';

/**
 * Connects an in-process session to a document's sync controller.
 */
export class LocalTransport implements OperationTransport {
  private readonly inFlight: Set<Promise<SubmitResult>> = new Set();
  private readonly logger: Logger;

  constructor(private readonly controller: SyncController, logger?: Logger) {
    this.logger = logger || Logger.getInstance();
  }

  get hasInFlight(): boolean {
    return this.inFlight.size > 0;
  }

  send(message: SubmitMessage): void {
    const submission = this.controller.submit(message);
    this.inFlight.add(submission);
    void submission
      .catch(error => {
        this.logger.logError(
          error instanceof Error ? error : new Error(String(error)),
          'Local submission failed',
          { documentId: this.controller.documentId, clientId: message.clientId, operationId: message.operation.id }
        );
      })
      .finally(() => this.inFlight.delete(submission));
  }

  requestSnapshot(clientId: string): void {
    this.controller.resync(clientId);
  }

  sendCursor(message: CursorMessage): void {
    this.controller.updateCursor(message.clientId, message.cursor);
  }

  /**
   * Resolve once every submission sent through this transport (including ones
   * sent while waiting) has settled.
   */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }
}
