import type { DocumentAccessor, DocumentStore, DocumentTransaction } from './adapters/store';
import { MapperError, MapperErrorCode } from './errors';

/**
 * A store client plus an optional transaction handle.
 *
 * Connections are never mutated: `withTransaction` and `withClient` return a
 * new connection, so callers sharing one never see each other's transaction.
 * The transaction is created, committed and rolled back by its owner; the
 * connection only passes it down.
 */
export class Connection {
  constructor(
    private readonly client: DocumentStore | null,
    private readonly transaction: DocumentTransaction | null = null,
  ) {}

  /** Throws when no store client is bound. */
  validate(): void {
    if (!this.hasClient()) {
      throw new MapperError(MapperErrorCode.NO_CLIENT, 'document store client is required');
    }
  }

  hasClient(): boolean {
    return this.client !== null;
  }

  hasTransaction(): boolean {
    return this.transaction !== null;
  }

  getClient(): DocumentStore {
    if (this.client === null) {
      throw new MapperError(MapperErrorCode.NO_CLIENT, 'document store client is required');
    }
    return this.client;
  }

  getTransaction(): DocumentTransaction | null {
    return this.transaction;
  }

  withTransaction(transaction: DocumentTransaction | null): Connection {
    return new Connection(this.client, transaction);
  }

  withClient(client: DocumentStore | null): Connection {
    return new Connection(client, this.transaction);
  }

  /** The transaction when one is active, the client otherwise. */
  accessor(): DocumentAccessor {
    return this.transaction ?? this.getClient();
  }

  /**
   * Release the store client. Not idempotent: the owner closes a client once.
   */
  async close(): Promise<void> {
    if (this.client !== null) {
      await this.client.close();
    }
  }
}
