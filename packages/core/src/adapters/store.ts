/**
 * @firemapper/core: Document Store Adapter
 *
 * The narrow capability surface the mapper drives. Connection lifecycle,
 * retries and the wire protocol all live behind it.
 * Implementations: FirestoreStore (@firemapper/adapters-firebase).
 */

export type DocumentData = Record<string, unknown>;

export type WhereOperator =
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'in'
  | 'not-in'
  | 'array-contains'
  | 'array-contains-any';

export type OrderDirection = 'asc' | 'desc';

export interface QueryFilter {
  field: string;
  operator: WhereOperator;
  value: unknown;
}

export interface QueryOrder {
  field: string;
  direction: OrderDirection;
}

/**
 * Opaque position marker handed out with every query result. Only the store
 * that produced it knows how to resume after it.
 */
export interface QueryCursor {
  readonly id: string;
}

export interface QueryPlan {
  collection: string;
  filters: readonly QueryFilter[];
  orders: readonly QueryOrder[];
  limit?: number;
  startAfter?: QueryCursor;
}

export interface DocumentSnapshot<T = DocumentData> {
  id: string;
  data: T;
  exists: boolean;
}

export interface QueryDocument<T = DocumentData> extends DocumentSnapshot<T> {
  cursor: QueryCursor;
}

/** A single field-path assignment, e.g. `{ path: 'stats.views', value: 0 }`. */
export interface FieldUpdate {
  path: string;
  value: unknown;
}

export type BatchWrite =
  | { type: 'set'; collection: string; id: string; data: DocumentData }
  | { type: 'update'; collection: string; id: string; updates: FieldUpdate[] }
  | { type: 'delete'; collection: string; id: string };

export interface DocumentAccessor {
  /** Retrieve a single document, or null when it does not exist. */
  get(collection: string, id: string): Promise<DocumentSnapshot | null>;

  /** Create or overwrite a document. */
  set(collection: string, id: string, data: DocumentData): Promise<void>;

  /** Update the given field paths of an existing document. Fails if the document is absent. */
  update(collection: string, id: string, updates: FieldUpdate[]): Promise<void>;

  /** Delete a document. Deleting a missing document succeeds. */
  delete(collection: string, id: string): Promise<void>;

  /** Run a query; results keep the store's ordering. */
  query(plan: QueryPlan): Promise<QueryDocument[]>;
}

/** Transactional variants of the accessor. Handles are created by {@link DocumentStore.runTransaction}. */
export type DocumentTransaction = DocumentAccessor;

export interface DocumentStore extends DocumentAccessor {
  /** Allocate a fresh server-side document identifier. */
  newDocumentId(collection: string): string;

  /** Apply all writes atomically. */
  commitBatch(writes: BatchWrite[]): Promise<void>;

  /** Run `body` inside a store transaction and commit it when the body resolves. */
  runTransaction<T>(body: (tx: DocumentTransaction) => Promise<T>): Promise<T>;

  /** Release the underlying client. */
  close(): Promise<void>;
}
