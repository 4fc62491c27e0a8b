import { EmptyFieldNameError, UnknownOperatorError } from './errors';
import { Operator } from './types';
import type { Filter } from './types';

export type Row = Record<string, unknown>;

/**
 * Compiled form of a filter list
 * expression is a readable rendering for logs
 */
export interface RowMatcher {
  evaluate: (row: Row) => boolean;
  fields: Set<string>;
  expression: string;
}

type Predicate = (value: unknown) => boolean;

/**
 * Compile filters into one predicate over rows keyed by column name
 * Follows SQL semantics: a null on either side of a comparison never matches
 */
export function compileFilters(filters: readonly Filter[]): RowMatcher {
  const fields = new Set<string>();
  const predicates: Array<(row: Row) => boolean> = [];
  const expressions: string[] = [];

  for (const filter of filters) {
    if (!filter.field) {
      throw new EmptyFieldNameError();
    }

    const field = filter.field;
    const predicate = buildPredicate(filter);
    fields.add(field);
    predicates.push(row => predicate(row[field]));
    expressions.push(describeFilter(filter));
  }

  return {
    evaluate: (row) => predicates.every(predicate => predicate(row)),
    fields,
    expression: expressions.length > 0 ? expressions.join(' AND ') : 'true',
  };
}

function buildPredicate(filter: Filter): Predicate {
  const expected = filter.value;

  switch (filter.operator) {
    case Operator.Equal:
      return actual => equals(actual, expected);
    case Operator.NotEqual:
      return actual => !isNullish(actual) && !isNullish(expected) && !equals(actual, expected);
    case Operator.LessThan:
      return actual => compare(actual, expected, result => result < 0);
    case Operator.LessOrEqual:
      return actual => compare(actual, expected, result => result <= 0);
    case Operator.GreaterThan:
      return actual => compare(actual, expected, result => result > 0);
    case Operator.GreaterOrEqual:
      return actual => compare(actual, expected, result => result >= 0);
    case Operator.Like: {
      const pattern = likePattern(filter);
      return actual => typeof actual === 'string' && pattern.test(actual);
    }
    case Operator.NotLike: {
      const pattern = likePattern(filter);
      return actual => typeof actual === 'string' && !pattern.test(actual);
    }
    case Operator.IsNull:
      return actual => isNullish(actual);
    case Operator.IsNotNull:
      return actual => !isNullish(actual);
    case Operator.In: {
      const list = requireList(filter);
      return actual => list.some(candidate => equals(actual, candidate));
    }
    case Operator.NotIn: {
      const list = requireList(filter);
      return actual => !isNullish(actual) && !list.some(candidate => equals(actual, candidate));
    }
    default:
      throw new UnknownOperatorError(String(filter.operator));
  }
}

function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Dates compare by time value, everything else by identity
 */
function normalize(value: unknown): unknown {
  return value instanceof Date ? value.getTime() : value;
}

function equals(actual: unknown, expected: unknown): boolean {
  if (isNullish(actual) || isNullish(expected)) {
    return false;
  }
  return normalize(actual) === normalize(expected);
}

/**
 * Ordered comparison between values of the same primitive kind
 * Mixed kinds never match
 */
function compare(actual: unknown, expected: unknown, accept: (result: number) => boolean): boolean {
  const left = normalize(actual);
  const right = normalize(expected);

  if ((typeof left === 'number' || typeof left === 'bigint') && (typeof right === 'number' || typeof right === 'bigint')) {
    return accept(left < right ? -1 : left > right ? 1 : 0);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return accept(left < right ? -1 : left > right ? 1 : 0);
  }
  return false;
}

/**
 * SQL LIKE to an anchored regular expression: % is any run, _ any one character
 * A backslash escapes the next character
 */
function likePattern(filter: Filter): RegExp {
  if (typeof filter.value !== 'string') {
    throw new Error(`${filter.operator} operator on ${filter.field} requires a string pattern, got ${typeof filter.value}`);
  }

  let source = '';
  const pattern = filter.value;
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\' && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[++i]);
    } else if (char === '%') {
      source += '.*';
    } else if (char === '_') {
      source += '.';
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`, 's');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function requireList(filter: Filter): unknown[] {
  if (!Array.isArray(filter.value)) {
    throw new Error(`${filter.operator} operator on ${filter.field} requires an array, got ${typeof filter.value}`);
  }
  return filter.value;
}

function describeFilter(filter: Filter): string {
  switch (filter.operator) {
    case Operator.IsNull:
      return `${filter.field} IS NULL`;
    case Operator.IsNotNull:
      return `${filter.field} IS NOT NULL`;
    case Operator.NotLike:
      return `${filter.field} NOT LIKE ${formatValue(filter.value)}`;
    case Operator.NotIn:
      return `${filter.field} NOT IN ${formatValue(filter.value)}`;
    default:
      return `${filter.field} ${filter.operator} ${formatValue(filter.value)}`;
  }
}

function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return JSON.stringify(value) ?? String(value);
}
