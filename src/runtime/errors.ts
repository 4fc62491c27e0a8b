import type { Operator } from './types';

/**
 * A filter reached a repository without a column name
 */
export class EmptyFieldNameError extends Error {
  constructor() {
    super('empty field name in filter');
    this.name = 'EmptyFieldNameError';
  }
}

export class UnknownOperatorError extends Error {
  constructor(readonly operator: Operator | string) {
    super(`unknown operator ${operator} in filter`);
    this.name = 'UnknownOperatorError';
  }
}

/**
 * create() was called without any record
 */
export class NoRecordsProvidedError extends Error {
  constructor() {
    super('no records provided for creation');
    this.name = 'NoRecordsProvidedError';
  }
}

/**
 * An update or delete would have touched every row of the table
 */
export class MissingWhereClauseError extends Error {
  constructor(readonly operation: 'update' | 'delete', readonly table: string) {
    super(`refusing to ${operation} every row of ${table}: no filter given`);
    this.name = 'MissingWhereClauseError';
  }
}

export class HealthCheckError extends Error {
  constructor(detail: string) {
    super(`database ping failed: ${detail}`);
    this.name = 'HealthCheckError';
  }
}
