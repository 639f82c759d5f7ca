/**
 * @fileoverview Mapper/executor
 * @description Binds a record model to its collection and runs CRUD, queries
 * and paginated bulk updates through a Connection.
 */

import type {
  BatchWrite,
  DocumentTransaction,
  FieldUpdate,
  QueryCursor,
  QueryPlan,
} from './adapters/store';
import { Connection } from './connection';
import { MapperError, MapperErrorCode } from './errors';
import type { ModelDescriptor } from './model';
import { applyQueries, collectionQuery, startingAfter, withLimit } from './query';
import type { Query } from './query';

// ── Types ──────────────────────────────────────────────────────────────

export const DEFAULT_UPDATE_BATCH_SIZE = 100;
/** Writes allowed in one atomic batch. */
export const MAX_UPDATE_BATCH_SIZE = 500;

export type DbEvent =
  | { type: 'document_created'; collection: string; id: string; timestamp: Date }
  | { type: 'bulk_update_page'; collection: string; page: number; size: number; timestamp: Date }
  | { type: 'bulk_update_complete'; collection: string; pages: number; documents: number; timestamp: Date };

export interface DbConfig {
  /** Documents per page for query-mode updates (default: 100) */
  updateBatchSize?: number;
  /** Custom logger (defaults to console.debug) */
  logger?: (event: DbEvent) => void;
}

export interface UpdateResult {
  mode: 'document' | 'query';
  /** Committed pages; 0 in document mode */
  pages: number;
  /** Documents written */
  documents: number;
}

interface DbOptions<T extends object> {
  connection: Connection;
  model: ModelDescriptor<T> | null;
  updateBatchSize: number;
  logger?: (event: DbEvent) => void;
}

function validateBatchSize(size: number): number {
  if (!Number.isInteger(size) || size < 1 || size > MAX_UPDATE_BATCH_SIZE) {
    throw new MapperError(
      MapperErrorCode.INVALID_BATCH_SIZE,
      `update batch size must be an integer between 1 and ${MAX_UPDATE_BATCH_SIZE}, got ${size}`,
    );
  }
  return size;
}

function logToConsole(event: DbEvent): void {
  switch (event.type) {
    case 'document_created':
      console.debug(`[firemapper:db] created ${event.collection}/${event.id}`);
      break;
    case 'bulk_update_page':
      console.debug(`[firemapper:db] committed page ${event.page} of ${event.collection} (${event.size} documents)`);
      break;
    case 'bulk_update_complete':
      console.debug(
        `[firemapper:db] bulk update of ${event.collection} done: ${event.documents} documents in ${event.pages} pages`,
      );
      break;
  }
}

// ── Db ─────────────────────────────────────────────────────────────────

/**
 * Immutable mapper handle. `model`, `withConnection`, `withTransaction` and
 * `setUpdateBatchSize` each return a new instance and leave the receiver as
 * it was, so one base handle can be shared freely.
 */
export class Db<T extends object = object> {
  constructor(private readonly options: DbOptions<T>) {}

  model<U extends object>(descriptor: ModelDescriptor<U>): Db<U> {
    return new Db<U>({ ...this.options, model: descriptor });
  }

  withConnection(connection: Connection): Db<T> {
    return new Db<T>({ ...this.options, connection });
  }

  /** Route every read and write through `tx`. The caller owns commit and rollback. */
  withTransaction(tx: DocumentTransaction | null): Db<T> {
    return this.withConnection(this.options.connection.withTransaction(tx));
  }

  setUpdateBatchSize(size: number): Db<T> {
    return new Db<T>({ ...this.options, updateBatchSize: validateBatchSize(size) });
  }

  getUpdateBatchSize(): number {
    return this.options.updateBatchSize;
  }

  getConnection(): Connection {
    return this.options.connection;
  }

  getModel(): ModelDescriptor<T> | null {
    return this.options.model;
  }

  collectionName(): string {
    return this.requireModel().collectionName();
  }

  getId(record: T): string {
    return this.options.model?.getId(record) ?? '';
  }

  // ── Reads ──────────────────────────────────────────────────────────────

  /** Load the document named by `record`'s identifier into `record`. */
  async getById(record: T): Promise<T> {
    const { model, collection } = this.bind();
    const id = model.getId(record);
    if (!id) {
      throw new MapperError(MapperErrorCode.EMPTY_ID, 'identifier cannot be empty', { model: model.name });
    }

    const snapshot = await this.options.connection.accessor().get(collection, id);
    if (!snapshot) {
      throw new MapperError(MapperErrorCode.NOT_FOUND, `document ${collection}/${id} not found`, {
        model: model.name,
      });
    }
    return model.fromDocument(snapshot, record);
  }

  /** First match of `queries`. The limit is always 1, whatever the queries ask for. */
  async findOne(queries: readonly Query[], dest?: T): Promise<T> {
    const { model, collection } = this.bind();
    const plan = withLimit(await applyQueries(collectionQuery(collection), queries), 1);

    const docs = await this.options.connection.accessor().query(plan);
    if (docs.length === 0) {
      throw new MapperError(MapperErrorCode.NOT_FOUND, `no document found in ${collection}`, {
        model: model.name,
      });
    }
    return model.fromDocument(docs[0], dest ?? model.create());
  }

  /**
   * Every match of `queries` (the whole collection when none are given), in
   * the order the store returns them. Always a new array.
   */
  async findAll(queries: readonly Query[] = []): Promise<T[]> {
    const { model, collection } = this.bind();
    let plan = collectionQuery(collection);
    if (queries.length > 0) {
      plan = await applyQueries(plan, queries);
    }

    const docs = await this.options.connection.accessor().query(plan);
    return docs.map((doc) => model.fromDocument(doc, model.create()));
  }

  // ── Writes ─────────────────────────────────────────────────────────────

  /**
   * Without `fieldsToSave`: write the whole document, allocating and
   * injecting a new identifier when the record has none. With them: update
   * only those stored fields of an existing document.
   */
  async save(record: T, ...fieldsToSave: string[]): Promise<T> {
    const { model, collection } = this.bind();
    const connection = this.options.connection;
    const data = model.toFieldMapping(record);
    let id = model.getId(record);

    if (fieldsToSave.length > 0) {
      if (!id) {
        throw new MapperError(
          MapperErrorCode.EMPTY_ID,
          'cannot update fields on a record with no identifier',
          { model: model.name },
        );
      }

      const updates: FieldUpdate[] = [];
      for (const field of fieldsToSave) {
        if (!Object.prototype.hasOwnProperty.call(data, field)) {
          throw new MapperError(
            MapperErrorCode.FIELD_NOT_FOUND,
            `field ${field} not found in ${model.name} data`,
            { model: model.name, field },
          );
        }
        updates.push({ path: field, value: data[field] });
      }

      await connection.accessor().update(collection, id, updates);
      return record;
    }

    const created = !id;
    if (!id) {
      id = connection.getClient().newDocumentId(collection);
      model.setId(record, id);
    }
    await connection.accessor().set(collection, id, data);
    if (created) {
      this.log({ type: 'document_created', collection, id, timestamp: new Date() });
    }
    return record;
  }

  /**
   * Apply `updates` to the record's document, or, when the record has no
   * identifier, to every document matching `where`.
   *
   * Query mode pages through the matches `updateBatchSize` documents at a
   * time and commits each page as one atomic batch. It is not atomic across
   * pages: when a commit fails the error is thrown and pages committed before
   * it stay written. Query mode refuses to run inside a transaction.
   *
   * Paging resumes after the last document of the previous page. Updating a
   * field the query orders or filters on can move documents across that
   * position; keep such fields out of `updates` unless the store's cursors
   * capture ordering values at read time.
   */
  async update(record: T, updates: FieldUpdate[], where?: readonly Query[]): Promise<UpdateResult> {
    const { model, collection } = this.bind();
    if (updates.length === 0) {
      throw new MapperError(MapperErrorCode.EMPTY_UPDATE, 'no field updates given', { model: model.name });
    }

    const connection = this.options.connection;
    const id = model.getId(record);
    if (id) {
      await connection.accessor().update(collection, id, updates);
      return { mode: 'document', pages: 0, documents: 1 };
    }

    if (!where || where.length === 0) {
      throw new MapperError(
        MapperErrorCode.QUERY_REQUIRED,
        'either an identifier or query conditions must be provided',
        { model: model.name },
      );
    }
    if (connection.hasTransaction()) {
      throw new MapperError(
        MapperErrorCode.TRANSACTION_UNSUPPORTED,
        'transactional batch updates are not supported',
        { model: model.name },
      );
    }

    const plan = await applyQueries(collectionQuery(collection), where);
    return this.updatePages(model, plan, updates);
  }

  /** Delete the record's document. A missing document is not an error. */
  async delete(record: T): Promise<void> {
    const { model, collection } = this.bind();
    const id = model.getId(record);
    if (!id) {
      throw new MapperError(MapperErrorCode.EMPTY_ID, 'identifier cannot be empty for delete', {
        model: model.name,
      });
    }
    await this.options.connection.accessor().delete(collection, id);
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private async updatePages(
    model: ModelDescriptor<T>,
    plan: QueryPlan,
    updates: FieldUpdate[],
  ): Promise<UpdateResult> {
    const client = this.options.connection.getClient();
    const batchSize = this.options.updateBatchSize;
    const collection = plan.collection;

    let cursor: QueryCursor | undefined;
    let pages = 0;
    let documents = 0;

    for (;;) {
      const docs = await client.query(withLimit(startingAfter(plan, cursor), batchSize));
      if (docs.length === 0) break;

      const writes = docs.map(
        (doc): BatchWrite => ({ type: 'update', collection, id: doc.id, updates }),
      );
      try {
        await client.commitBatch(writes);
      } catch (error) {
        throw new MapperError(
          MapperErrorCode.BATCH_COMMIT_FAILED,
          `batch commit failed on page ${pages + 1} of ${collection}: ${error instanceof Error ? error.message : String(error)}`,
          { model: model.name, cause: error },
        );
      }

      pages += 1;
      documents += docs.length;
      this.log({ type: 'bulk_update_page', collection, page: pages, size: docs.length, timestamp: new Date() });
      cursor = docs[docs.length - 1].cursor;
    }

    this.log({ type: 'bulk_update_complete', collection, pages, documents, timestamp: new Date() });
    return { mode: 'query', pages, documents };
  }

  private requireModel(): ModelDescriptor<T> {
    if (this.options.model === null) {
      throw new MapperError(MapperErrorCode.NO_MODEL, 'no model bound, call db.model(descriptor) first');
    }
    return this.options.model;
  }

  private bind(): { model: ModelDescriptor<T>; collection: string } {
    const model = this.requireModel();
    this.options.connection.validate();
    return { model, collection: model.collectionName() };
  }

  private log(event: DbEvent): void {
    (this.options.logger ?? logToConsole)(event);
  }
}

export function createDb(connection: Connection, config: DbConfig = {}): Db {
  return new Db<object>({
    connection,
    model: null,
    updateBatchSize: validateBatchSize(config.updateBatchSize ?? DEFAULT_UPDATE_BATCH_SIZE),
    logger: config.logger,
  });
}
