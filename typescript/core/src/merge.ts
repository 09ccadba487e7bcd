import type { FieldStrategies } from './types';

export type MergeStrategy =
  | 'LastWrite'
  | 'SetOnce'
  | 'Append'
  | 'Merge'
  | 'Sum'
  | 'Count'
  | 'Min'
  | 'Max'
  | 'UniqueCount';

/** Per-entity accumulator state that outlives a single merge. */
export interface MergeContext {
  /** Distinct values observed so far at a field path. */
  seen(fieldPath: string): Set<unknown>;
}

export type MergeFn = (
  existing: unknown,
  incoming: unknown,
  fieldPath: string,
  context: MergeContext
) => unknown;

export function isObject(item: unknown): item is Record<string, unknown> {
  return item !== null && typeof item === 'object' && !Array.isArray(item);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function toArray(value: unknown): unknown[] {
  if (isAbsent(value)) return [];
  return Array.isArray(value) ? value : [value];
}

function uniqueKey(value: unknown): unknown {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : value;
}

export function deepMerge(target: unknown, source: unknown): unknown {
  if (!isObject(target) || !isObject(source)) {
    return source;
  }

  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    result[key] = deepMerge(result[key], sourceValue);
  }
  return result;
}

function accumulate(
  existing: unknown,
  incoming: unknown,
  pick: (current: number, next: number) => number
): unknown {
  if (!isNumber(incoming)) return existing;
  return isNumber(existing) ? pick(existing, incoming) : incoming;
}

export const MERGE_STRATEGIES: Readonly<Record<MergeStrategy, MergeFn>> = {
  LastWrite: (_existing, incoming) => incoming,
  SetOnce: (existing, incoming) => (isAbsent(existing) ? incoming : existing),
  Append: (existing, incoming) => [...toArray(existing), ...toArray(incoming)],
  Merge: (existing, incoming) => deepMerge(existing, incoming),
  Sum: (existing, incoming) => accumulate(existing, incoming, (a, b) => a + b),
  Count: (existing, incoming) => {
    if (isAbsent(incoming)) return existing;
    return (isNumber(existing) ? existing : 0) + 1;
  },
  Min: (existing, incoming) => accumulate(existing, incoming, Math.min),
  Max: (existing, incoming) => accumulate(existing, incoming, Math.max),
  UniqueCount: (existing, incoming, fieldPath, context) => {
    if (isAbsent(incoming)) return existing;
    const seen = context.seen(fieldPath);
    seen.add(uniqueKey(incoming));
    return seen.size;
  },
};

export interface PatchOptions {
  fields?: FieldStrategies;
  append?: readonly string[];
  context: MergeContext;
}

/**
 * Merges a patch into an entity field by field. Configured paths use their strategy,
 * `append` paths concatenate, nested objects recurse, everything else is last-write.
 */
export function mergePatch(
  target: unknown,
  source: unknown,
  options: PatchOptions,
  currentPath = ''
): unknown {
  if (!isObject(source)) {
    return source;
  }

  const result: Record<string, unknown> = isObject(target) ? { ...target } : {};

  for (const [key, sourceValue] of Object.entries(source)) {
    const fieldPath = currentPath ? `${currentPath}.${key}` : key;
    const strategy: MergeStrategy | undefined =
      options.fields?.[fieldPath] ?? (options.append?.includes(fieldPath) ? 'Append' : undefined);

    if (strategy) {
      result[key] = MERGE_STRATEGIES[strategy](result[key], sourceValue, fieldPath, options.context);
    } else if (isObject(sourceValue)) {
      result[key] = mergePatch(result[key], sourceValue, options, fieldPath);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}
