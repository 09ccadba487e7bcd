import type { ComparisonOperators, Schema, WhereClause, WhereCondition } from './types';
import { isObject } from './merge';

export interface ViewQuery {
  where?: WhereClause;
  schema?: Schema<unknown>;
  limit?: number;
}

export type Projection = { matched: true; value: unknown } | { matched: false };

const OPERATORS = ['gte', 'gt', 'lte', 'lt'] as const;

const CHECKS: Record<(typeof OPERATORS)[number], (cmp: number) => boolean> = {
  gte: (cmp) => cmp >= 0,
  gt: (cmp) => cmp > 0,
  lte: (cmp) => cmp <= 0,
  lt: (cmp) => cmp < 0,
};

export function getNestedValue(obj: unknown, path: readonly string[]): unknown {
  let current: unknown = obj;
  for (const segment of path) {
    if (!isObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function isComparison(condition: WhereCondition): condition is ComparisonOperators {
  return isObject(condition) && OPERATORS.some((op) => op in condition);
}

function compare(value: unknown, bound: number | string): number | null {
  if (typeof value === 'number' && typeof bound === 'number') return value - bound;
  if (typeof value === 'string' && typeof bound === 'string') {
    return value < bound ? -1 : value > bound ? 1 : 0;
  }
  return null;
}

function matchesCondition(value: unknown, condition: WhereCondition): boolean {
  if (!isComparison(condition)) {
    if (condition === null) return value === null || value === undefined;
    return value === condition;
  }

  const operators: ComparisonOperators = condition;
  return OPERATORS.every((op) => {
    const bound = operators[op];
    if (bound === undefined) return true;
    const cmp = compare(value, bound);
    return cmp !== null && CHECKS[op](cmp);
  });
}

export function matchesWhere(entity: unknown, where?: WhereClause): boolean {
  if (!where) return true;
  return Object.entries(where).every(([path, condition]) =>
    matchesCondition(getNestedValue(entity, path.split('.')), condition)
  );
}

/** Applies `where` then `schema`; a passing entity comes back as the schema's output. */
export function projectEntity(entity: unknown, query: ViewQuery): Projection {
  if (!matchesWhere(entity, query.where)) {
    return { matched: false };
  }
  if (!query.schema) {
    return { matched: true, value: entity };
  }
  const result = query.schema.safeParse(entity);
  return result.success ? { matched: true, value: result.data } : { matched: false };
}

export function selectEntries(
  entries: Iterable<[string, unknown]>,
  query: ViewQuery
): Array<[string, unknown]> {
  const selected: Array<[string, unknown]> = [];
  for (const [key, entity] of entries) {
    if (query.limit !== undefined && selected.length >= query.limit) break;
    const projection = projectEntity(entity, query);
    if (projection.matched) {
      selected.push([key, projection.value]);
    }
  }
  return selected;
}

export function isWithinLimit(
  entries: Iterable<[string, unknown]>,
  key: string,
  query: ViewQuery
): boolean {
  if (query.limit === undefined) return true;
  return selectEntries(entries, query).some(([selectedKey]) => selectedKey === key);
}
