/**
 * @fileoverview Predicate builder
 * @description Declarative where/orderBy/limit clauses composed onto a QueryPlan
 */

import type {
  OrderDirection,
  QueryCursor,
  QueryPlan,
  WhereOperator,
} from './adapters/store';
import { MapperError, MapperErrorCode } from './errors';

/** Limit sentinel: no limit is applied. */
export const QUERY_LIMIT_UNLIMITED = -1;

/**
 * Resolves a where-clause value when the query is applied rather than when it
 * is built, e.g. a "last processed" marker kept elsewhere.
 * Called once per application; results are never cached.
 */
export interface ValueProvider {
  getValue(): Promise<unknown>;
}

export interface WhereClause {
  field: string;
  operator: WhereOperator;
  value?: unknown;
  /** Takes precedence over `value` when set */
  valueProvider?: ValueProvider;
}

export interface OrderClause {
  field: string;
  direction: OrderDirection;
}

export interface Query {
  where?: WhereClause[];
  orderBy?: OrderClause[];
  /** Positive limit, or QUERY_LIMIT_UNLIMITED / 0 for none */
  limit?: number;
}

export function collectionQuery(collection: string): QueryPlan {
  return { collection, filters: [], orders: [] };
}

export function withLimit(plan: QueryPlan, limit: number): QueryPlan {
  return { ...plan, limit };
}

export function startingAfter(plan: QueryPlan, cursor: QueryCursor | undefined): QueryPlan {
  if (!cursor) return plan;
  return { ...plan, startAfter: cursor };
}

/**
 * Compose `queries` onto `plan` in order. Within a query: filters, then
 * orderings, then the limit. A later limit replaces an earlier one.
 */
export async function applyQueries(plan: QueryPlan, queries: readonly Query[]): Promise<QueryPlan> {
  const filters = [...plan.filters];
  const orders = [...plan.orders];
  let limit = plan.limit;

  for (const query of queries) {
    for (const clause of query.where ?? []) {
      let value = clause.value;
      if (clause.valueProvider) {
        try {
          value = await clause.valueProvider.getValue();
        } catch (error) {
          throw new MapperError(
            MapperErrorCode.VALUE_PROVIDER_FAILED,
            `failed to get value for field ${clause.field}: ${error instanceof Error ? error.message : String(error)}`,
            { field: clause.field, cause: error },
          );
        }
      }
      filters.push({ field: clause.field, operator: clause.operator, value });
    }

    for (const order of query.orderBy ?? []) {
      orders.push({ field: order.field, direction: order.direction });
    }

    if (query.limit !== undefined && query.limit > 0 && query.limit !== QUERY_LIMIT_UNLIMITED) {
      limit = query.limit;
    }
  }

  return { ...plan, filters, orders, limit };
}
