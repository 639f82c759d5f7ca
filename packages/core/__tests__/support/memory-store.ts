import type {
  BatchWrite,
  DocumentData,
  DocumentSnapshot,
  DocumentStore,
  DocumentTransaction,
  FieldUpdate,
  QueryCursor,
  QueryDocument,
  QueryFilter,
  QueryPlan,
} from '../../src/adapters/store';

// ─── In-Memory Store ────────────────────────────────────────────────────────
// Mirrors Firestore query semantics closely enough for the mapper: implicit
// ordering on inequality fields then document id, and cursors that remember
// the document's values at read time.

type Entry = [id: string, data: DocumentData];

const INEQUALITY_OPERATORS = new Set(['<', '<=', '>', '>=', '!=', 'not-in']);

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function matches(data: DocumentData, filter: QueryFilter): boolean {
  if (!(filter.field in data)) return false;
  const actual = data[filter.field];
  const expected = filter.value;
  switch (filter.operator) {
    case '==': return compareValues(actual, expected) === 0;
    case '!=': return compareValues(actual, expected) !== 0;
    case '<': return compareValues(actual, expected) < 0;
    case '<=': return compareValues(actual, expected) <= 0;
    case '>': return compareValues(actual, expected) > 0;
    case '>=': return compareValues(actual, expected) >= 0;
    case 'in': return Array.isArray(expected) && expected.includes(actual);
    case 'not-in': return Array.isArray(expected) && !expected.includes(actual);
    case 'array-contains': return Array.isArray(actual) && actual.includes(expected);
    case 'array-contains-any':
      return Array.isArray(actual) && Array.isArray(expected) && expected.some((v) => actual.includes(v));
  }
}

function sortKeys(plan: QueryPlan): { field: string; sign: number }[] {
  const keys = plan.orders.map((o) => ({ field: o.field, sign: o.direction === 'desc' ? -1 : 1 }));
  for (const filter of plan.filters) {
    if (INEQUALITY_OPERATORS.has(filter.operator) && !keys.some((k) => k.field === filter.field)) {
      keys.push({ field: filter.field, sign: 1 });
    }
  }
  return keys;
}

function compareEntries(a: Entry, b: Entry, keys: { field: string; sign: number }[]): number {
  for (const key of keys) {
    const diff = compareValues(a[1][key.field], b[1][key.field]);
    if (diff !== 0) return diff * key.sign;
  }
  return compareValues(a[0], b[0]);
}

export class MemoryStore implements DocumentStore {
  collections = new Map<string, Map<string, DocumentData>>();
  /** Every capability call, in order; transactional calls are prefixed with `tx.` */
  calls: string[] = [];
  plans: QueryPlan[] = [];
  batches: BatchWrite[][] = [];
  /** 1-based commit attempt that should be rejected */
  failCommitOn?: number;
  closed = false;

  private commitAttempts = 0;
  private nextId = 1;
  private cursors = new WeakMap<QueryCursor, DocumentData>();

  seed(collection: string, id: string, data: DocumentData): void {
    this.collectionMap(collection).set(id, { ...data });
  }

  doc(collection: string, id: string): DocumentData | undefined {
    return this.collections.get(collection)?.get(id);
  }

  count(collection: string): number {
    return this.collections.get(collection)?.size ?? 0;
  }

  async get(collection: string, id: string): Promise<DocumentSnapshot | null> {
    this.calls.push('get');
    return this.read(collection, id);
  }

  async set(collection: string, id: string, data: DocumentData): Promise<void> {
    this.calls.push('set');
    this.write({ type: 'set', collection, id, data });
  }

  async update(collection: string, id: string, updates: FieldUpdate[]): Promise<void> {
    this.calls.push('update');
    this.write({ type: 'update', collection, id, updates });
  }

  async delete(collection: string, id: string): Promise<void> {
    this.calls.push('delete');
    this.write({ type: 'delete', collection, id });
  }

  async query(plan: QueryPlan): Promise<QueryDocument[]> {
    this.calls.push('query');
    return this.runQuery(plan);
  }

  newDocumentId(_collection: string): string {
    this.calls.push('newDocumentId');
    return `auto-${this.nextId++}`;
  }

  async commitBatch(writes: BatchWrite[]): Promise<void> {
    this.calls.push('commitBatch');
    this.commitAttempts += 1;
    if (this.failCommitOn === this.commitAttempts) {
      throw new Error('commit rejected');
    }
    this.batches.push(writes);
    for (const w of writes) this.write(w);
  }

  async runTransaction<T>(body: (tx: DocumentTransaction) => Promise<T>): Promise<T> {
    const tx = new MemoryTransaction(this);
    const result = await body(tx);
    tx.commit();
    return result;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  read(collection: string, id: string): DocumentSnapshot | null {
    const data = this.doc(collection, id);
    return data ? { id, data: { ...data }, exists: true } : null;
  }

  runQuery(plan: QueryPlan): QueryDocument[] {
    this.plans.push(plan);
    const keys = sortKeys(plan);
    let entries: Entry[] = [...(this.collections.get(plan.collection)?.entries() ?? [])]
      .filter(([, data]) => plan.filters.every((f) => matches(data, f)))
      .sort((a, b) => compareEntries(a, b, keys));

    if (plan.startAfter) {
      const captured = this.cursors.get(plan.startAfter);
      if (!captured) throw new Error(`unknown cursor ${plan.startAfter.id}`);
      const anchor: Entry = [plan.startAfter.id, captured];
      entries = entries.filter((entry) => compareEntries(entry, anchor, keys) > 0);
    }
    if (plan.limit !== undefined && plan.limit > 0) {
      entries = entries.slice(0, plan.limit);
    }

    return entries.map(([id, data]) => {
      const cursor: QueryCursor = { id };
      this.cursors.set(cursor, { ...data });
      return { id, data: { ...data }, exists: true, cursor };
    });
  }

  write(w: BatchWrite): void {
    const docs = this.collectionMap(w.collection);
    switch (w.type) {
      case 'set':
        docs.set(w.id, { ...w.data });
        break;
      case 'update': {
        const current = docs.get(w.id);
        if (!current) throw new Error(`NOT_FOUND: no document to update: ${w.collection}/${w.id}`);
        for (const u of w.updates) current[u.path] = u.value;
        break;
      }
      case 'delete':
        docs.delete(w.id);
        break;
    }
  }

  private collectionMap(collection: string): Map<string, DocumentData> {
    let docs = this.collections.get(collection);
    if (!docs) {
      docs = new Map();
      this.collections.set(collection, docs);
    }
    return docs;
  }
}

/** Reads go straight to the store; writes are held until commit. */
export class MemoryTransaction implements DocumentTransaction {
  private pending: BatchWrite[] = [];

  constructor(private store: MemoryStore) {}

  async get(collection: string, id: string): Promise<DocumentSnapshot | null> {
    this.store.calls.push('tx.get');
    return this.store.read(collection, id);
  }

  async set(collection: string, id: string, data: DocumentData): Promise<void> {
    this.store.calls.push('tx.set');
    this.pending.push({ type: 'set', collection, id, data });
  }

  async update(collection: string, id: string, updates: FieldUpdate[]): Promise<void> {
    this.store.calls.push('tx.update');
    this.pending.push({ type: 'update', collection, id, updates });
  }

  async delete(collection: string, id: string): Promise<void> {
    this.store.calls.push('tx.delete');
    this.pending.push({ type: 'delete', collection, id });
  }

  async query(plan: QueryPlan): Promise<QueryDocument[]> {
    this.store.calls.push('tx.query');
    return this.store.runQuery(plan);
  }

  commit(): void {
    for (const w of this.pending) this.store.write(w);
    this.pending = [];
  }
}
