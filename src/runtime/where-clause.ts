import { EmptyFieldNameError, UnknownOperatorError } from './errors';
import { Operator } from './types';
import type { Filter } from './types';

/**
 * Parameterised SQL text with its positional values
 */
export interface SqlFragment {
  text: string;
  values: unknown[];
}

/**
 * Double-quote an identifier, escaping embedded quotes
 * Dotted names are quoted per segment ("catalog"."products")
 */
export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map(part => `"${part.replace(/"/g, '""')}"`)
    .join('.');
}

/**
 * Translate filters into the conditions of a WHERE clause, joined with AND
 * Placeholders start at $firstParameter so the fragment can follow other parameters
 * Returns empty text when there are no filters
 */
export function buildWhereClause(filters: readonly Filter[], firstParameter: number = 1): SqlFragment {
  const conditions: string[] = [];
  const values: unknown[] = [];

  const placeholder = (value: unknown): string => {
    values.push(value);
    return `$${firstParameter + values.length - 1}`;
  };

  for (const filter of filters) {
    if (!filter.field) {
      throw new EmptyFieldNameError();
    }

    const column = quoteIdentifier(filter.field);

    switch (filter.operator) {
      case Operator.Equal:
        conditions.push(`${column} = ${placeholder(filter.value)}`);
        break;
      case Operator.NotEqual:
        conditions.push(`${column} <> ${placeholder(filter.value)}`);
        break;
      case Operator.LessThan:
        conditions.push(`${column} < ${placeholder(filter.value)}`);
        break;
      case Operator.LessOrEqual:
        conditions.push(`${column} <= ${placeholder(filter.value)}`);
        break;
      case Operator.GreaterThan:
        conditions.push(`${column} > ${placeholder(filter.value)}`);
        break;
      case Operator.GreaterOrEqual:
        conditions.push(`${column} >= ${placeholder(filter.value)}`);
        break;
      case Operator.Like:
        conditions.push(`${column} LIKE ${placeholder(filter.value)}`);
        break;
      case Operator.NotLike:
        conditions.push(`${column} NOT LIKE ${placeholder(filter.value)}`);
        break;
      case Operator.IsNull:
        conditions.push(`${column} IS NULL`);
        break;
      case Operator.IsNotNull:
        conditions.push(`${column} IS NOT NULL`);
        break;
      case Operator.In:
        // Arrays bind as one parameter
        conditions.push(`${column} = ANY(${placeholder(requireList(filter))})`);
        break;
      case Operator.NotIn:
        conditions.push(`${column} <> ALL(${placeholder(requireList(filter))})`);
        break;
      default:
        throw new UnknownOperatorError(String(filter.operator));
    }
  }

  return { text: conditions.join(' AND '), values };
}

function requireList(filter: Filter): unknown[] {
  if (!Array.isArray(filter.value)) {
    throw new Error(`${filter.operator} operator on ${filter.field} requires an array, got ${typeof filter.value}`);
  }
  return filter.value;
}
