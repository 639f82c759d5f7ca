/**
 * Firebase Firestore implementation of DocumentStore.
 */
import * as admin from 'firebase-admin';
import { MapperError, MapperErrorCode } from '@firemapper/core';
import type {
  BatchWrite,
  DocumentData,
  DocumentSnapshot,
  DocumentStore,
  DocumentTransaction,
  FieldUpdate,
  QueryCursor,
  QueryDocument,
  QueryPlan,
} from '@firemapper/core';

/** Firestore rejects batches with more writes than this. */
export const MAX_BATCH_WRITES = 500;

const GRPC_NOT_FOUND = 5;

export interface FirestoreStoreConfig {
  /** Firebase app to take Firestore from (defaults to the default app) */
  app?: admin.app.App;
  /** Firestore instance to use; takes precedence over `app` */
  firestore?: admin.firestore.Firestore;
}

/**
 * True for the gRPC NOT_FOUND status Firestore reports when updating a
 * missing document.
 */
export function isGrpcNotFound(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return error.code === GRPC_NOT_FOUND || error.code === 'not-found';
}

// ── Value conversion ───────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toPlainValue(value: unknown): unknown {
  if (value instanceof admin.firestore.Timestamp) return value.toDate();
  if (Array.isArray(value)) return value.map(toPlainValue);
  if (isPlainObject(value)) return toPlainData(value);
  return value;
}

/** Stored data with Timestamps (at any depth) turned into Dates. */
export function toPlainData(data: admin.firestore.DocumentData): DocumentData {
  const out: DocumentData = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = toPlainValue(value);
  }
  return out;
}

function withoutUndefined(value: unknown): unknown {
  if (Array.isArray(value)) return value.filter((item) => item !== undefined).map(withoutUndefined);
  if (isPlainObject(value)) return toWriteData(value);
  return value;
}

/**
 * Data ready for a Firestore write. Firestore rejects `undefined` anywhere in
 * a document, so unset properties and array slots are dropped at any depth.
 */
export function toWriteData(data: DocumentData): admin.firestore.DocumentData {
  const out: admin.firestore.DocumentData = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined) continue;
    out[key] = withoutUndefined(value);
  }
  return out;
}

function toUpdateData(updates: FieldUpdate[]): admin.firestore.DocumentData {
  const data: admin.firestore.DocumentData = {};
  for (const update of updates) {
    if (update.value === undefined) continue;
    data[update.path] = withoutUndefined(update.value);
  }
  return data;
}

// ── Cursors ────────────────────────────────────────────────────────────

/**
 * Hands out opaque cursors and remembers the snapshot each one stands for,
 * so `startAfter` resumes from the values the document had when it was read.
 */
class CursorRegistry {
  private snapshots = new WeakMap<QueryCursor, admin.firestore.QueryDocumentSnapshot>();

  issue(snapshot: admin.firestore.QueryDocumentSnapshot): QueryCursor {
    const cursor: QueryCursor = Object.freeze({ id: snapshot.id });
    this.snapshots.set(cursor, snapshot);
    return cursor;
  }

  resolve(cursor: QueryCursor): admin.firestore.QueryDocumentSnapshot {
    const snapshot = this.snapshots.get(cursor);
    if (!snapshot) {
      throw new Error(`cursor ${cursor.id} was not issued by this store`);
    }
    return snapshot;
  }
}

function buildQuery(
  db: admin.firestore.Firestore,
  plan: QueryPlan,
  cursors: CursorRegistry,
): admin.firestore.Query {
  let ref: admin.firestore.Query = db.collection(plan.collection);

  for (const filter of plan.filters) {
    ref = ref.where(filter.field, filter.operator, filter.value);
  }

  for (const order of plan.orders) {
    ref = ref.orderBy(order.field, order.direction);
  }

  if (plan.startAfter) {
    ref = ref.startAfter(cursors.resolve(plan.startAfter));
  }

  if (plan.limit !== undefined && plan.limit > 0) {
    ref = ref.limit(plan.limit);
  }

  return ref;
}

function toQueryDocuments(snapshot: admin.firestore.QuerySnapshot, cursors: CursorRegistry): QueryDocument[] {
  return snapshot.docs.map((doc) => ({
    id: doc.id,
    data: toPlainData(doc.data()),
    exists: true,
    cursor: cursors.issue(doc),
  }));
}

function toSnapshot(doc: admin.firestore.DocumentSnapshot): DocumentSnapshot | null {
  if (!doc.exists) return null;
  return { id: doc.id, data: toPlainData(doc.data() ?? {}), exists: true };
}

function notFound(collection: string, id: string, error: unknown): MapperError {
  return new MapperError(MapperErrorCode.NOT_FOUND, `document ${collection}/${id} not found`, { cause: error });
}

// ── Store ──────────────────────────────────────────────────────────────

export class FirestoreStore implements DocumentStore {
  private db: admin.firestore.Firestore;
  private cursors = new CursorRegistry();

  constructor(config: FirestoreStoreConfig = {}) {
    this.db = config.firestore ?? (config.app ?? admin.app()).firestore();
  }

  getFirestore(): admin.firestore.Firestore {
    return this.db;
  }

  async get(collection: string, id: string): Promise<DocumentSnapshot | null> {
    return toSnapshot(await this.db.collection(collection).doc(id).get());
  }

  async set(collection: string, id: string, data: DocumentData): Promise<void> {
    await this.db.collection(collection).doc(id).set(toWriteData(data));
  }

  async update(collection: string, id: string, updates: FieldUpdate[]): Promise<void> {
    try {
      await this.db.collection(collection).doc(id).update(toUpdateData(updates));
    } catch (error) {
      if (isGrpcNotFound(error)) throw notFound(collection, id, error);
      throw error;
    }
  }

  async delete(collection: string, id: string): Promise<void> {
    await this.db.collection(collection).doc(id).delete();
  }

  async query(plan: QueryPlan): Promise<QueryDocument[]> {
    const snapshot = await buildQuery(this.db, plan, this.cursors).get();
    return toQueryDocuments(snapshot, this.cursors);
  }

  newDocumentId(collection: string): string {
    return this.db.collection(collection).doc().id;
  }

  async commitBatch(writes: BatchWrite[]): Promise<void> {
    if (writes.length > MAX_BATCH_WRITES) {
      throw new MapperError(
        MapperErrorCode.INVALID_BATCH_SIZE,
        `a batch holds at most ${MAX_BATCH_WRITES} writes, got ${writes.length}`,
      );
    }

    const batch = this.db.batch();
    for (const write of writes) {
      const ref = this.db.collection(write.collection).doc(write.id);
      switch (write.type) {
        case 'set':
          batch.set(ref, toWriteData(write.data));
          break;
        case 'update':
          batch.update(ref, toUpdateData(write.updates));
          break;
        case 'delete':
          batch.delete(ref);
          break;
      }
    }
    await batch.commit();
  }

  async runTransaction<T>(body: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    return this.db.runTransaction((tx) => body(this.wrap(tx)));
  }

  /** Adapt a transaction started directly on the Firestore instance. */
  wrap(tx: admin.firestore.Transaction): DocumentTransaction {
    return new FirestoreTransaction(this.db, tx, this.cursors);
  }

  async close(): Promise<void> {
    await this.db.terminate();
  }
}

/**
 * Reads run inside the transaction; writes are queued on it and committed
 * by Firestore when the transaction body resolves.
 */
class FirestoreTransaction implements DocumentTransaction {
  constructor(
    private db: admin.firestore.Firestore,
    private tx: admin.firestore.Transaction,
    private cursors: CursorRegistry,
  ) {}

  async get(collection: string, id: string): Promise<DocumentSnapshot | null> {
    return toSnapshot(await this.tx.get(this.db.collection(collection).doc(id)));
  }

  async set(collection: string, id: string, data: DocumentData): Promise<void> {
    this.tx.set(this.db.collection(collection).doc(id), toWriteData(data));
  }

  /**
   * A missing document surfaces when the transaction commits, as the raw
   * gRPC NOT_FOUND error from `runTransaction`; check it with `isGrpcNotFound`.
   */
  async update(collection: string, id: string, updates: FieldUpdate[]): Promise<void> {
    this.tx.update(this.db.collection(collection).doc(id), toUpdateData(updates));
  }

  async delete(collection: string, id: string): Promise<void> {
    this.tx.delete(this.db.collection(collection).doc(id));
  }

  async query(plan: QueryPlan): Promise<QueryDocument[]> {
    const snapshot = await this.tx.get(buildQuery(this.db, plan, this.cursors));
    return toQueryDocuments(snapshot, this.cursors);
  }
}
