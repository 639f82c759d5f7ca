/**
 * @firemapper/core: typed records over a schemaless document store
 */

export type {
  BatchWrite,
  DocumentAccessor,
  DocumentData,
  DocumentSnapshot,
  DocumentStore,
  DocumentTransaction,
  FieldUpdate,
  OrderDirection,
  QueryCursor,
  QueryDocument,
  QueryFilter,
  QueryOrder,
  QueryPlan,
  WhereOperator,
} from './adapters/store';

export { MapperError, MapperErrorCode, isMapperError, isNotFoundError } from './errors';
export type { MapperErrorOptions } from './errors';

export { IGNORE_TAG, ModelDescriptor, defineModel, hasCustomCollectionName } from './model';
export type { FieldDescriptor, FieldTags, HasCustomCollectionName, IdKey, ModelClass, ModelOptions } from './model';

export { QUERY_LIMIT_UNLIMITED, applyQueries, collectionQuery, startingAfter, withLimit } from './query';
export type { OrderClause, Query, ValueProvider, WhereClause } from './query';

export { Connection } from './connection';

export { DEFAULT_UPDATE_BATCH_SIZE, Db, MAX_UPDATE_BATCH_SIZE, createDb } from './db';
export type { DbConfig, DbEvent, UpdateResult } from './db';
