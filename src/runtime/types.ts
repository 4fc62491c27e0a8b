/**
 * Runtime values produced by generated query builders
 * Consumed by repositories, never by the generator itself
 */

/**
 * Comparison operators a filter can carry
 * Values double as the wire representation of a filter
 */
export enum Operator {
  Equal = '=',
  NotEqual = '!=',
  LessThan = '<',
  LessOrEqual = '<=',
  GreaterThan = '>',
  GreaterOrEqual = '>=',
  Like = 'LIKE',
  NotLike = 'NOT_LIKE',
  IsNull = 'IS_NULL',
  IsNotNull = 'IS_NOT_NULL',
  In = 'IN',
  NotIn = 'NOT_IN',
}

/**
 * A single predicate against a physical column
 * Value is null for IS_NULL/IS_NOT_NULL and an array for IN/NOT_IN
 */
export interface Filter {
  field: string;
  operator: Operator;
  value: unknown;
}

/**
 * Logical field name to new value
 */
export type ChangeSet = Record<string, unknown>;

export enum SortDirection {
  Asc = 'asc',
  Desc = 'desc',
}

export interface SortField {
  field: string;
  direction: SortDirection;
}

export interface QueryOptions {
  limit?: number;
  offset?: number;
  sortFields: SortField[];
}

export type OptionFunc = (options: QueryOptions) => void;

export function withLimit(limit: number): OptionFunc {
  return (options) => {
    options.limit = limit;
  };
}

export function withOffset(offset: number): OptionFunc {
  return (options) => {
    options.offset = offset;
  };
}

/**
 * Anything that can contribute query options
 * Generated <Record>Options classes implement this
 */
export interface OptionSource {
  apply(options: QueryOptions): void;
}

/**
 * Fold option functions and option builders into one QueryOptions value
 */
export function applyOptions(...sources: Array<OptionFunc | OptionSource>): QueryOptions {
  const options: QueryOptions = { sortFields: [] };
  for (const source of sources) {
    if (typeof source === 'function') {
      source(options);
    } else {
      source.apply(options);
    }
  }
  return options;
}

export interface EntityFilter {
  listFilters(): Filter[];
}

export interface EntityUpdater {
  getChangeSet(): ChangeSet;
}
