export {
  Operator,
  SortDirection,
  withLimit,
  withOffset,
  applyOptions,
} from './types';
export type {
  Filter,
  ChangeSet,
  SortField,
  QueryOptions,
  OptionFunc,
  OptionSource,
  EntityFilter,
  EntityUpdater,
} from './types';
export {
  EmptyFieldNameError,
  UnknownOperatorError,
  NoRecordsProvidedError,
  MissingWhereClauseError,
  HealthCheckError,
} from './errors';
export { buildWhereClause, quoteIdentifier } from './where-clause';
export type { SqlFragment } from './where-clause';
export { compileFilters } from './matcher';
export type { Row, RowMatcher } from './matcher';
export { PgRepository, DEFAULT_BATCH_SIZE, HEALTH_CHECK_TIMEOUT_MS } from './pg-repository';
export type { PgPool, QueryOption, RecordSchema, RepositoryOptions } from './pg-repository';
