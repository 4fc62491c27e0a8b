import { Logger } from '@nestjs/common';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { truncateForLog } from '../common/logging.utils';
import { HealthCheckError, MissingWhereClauseError, NoRecordsProvidedError } from './errors';
import { applyOptions, SortDirection } from './types';
import type { ChangeSet, EntityFilter, EntityUpdater, OptionFunc, OptionSource, QueryOptions } from './types';
import { buildWhereClause, quoteIdentifier } from './where-clause';
import type { SqlFragment } from './where-clause';

/**
 * Logical field name to column name, as emitted in <Record>DbSchema
 */
export type RecordSchema = Readonly<Record<string, string>>;

export interface RepositoryOptions {
  table: string;
  schema: RecordSchema;
  primaryKey?: string;   // logical field name, ID when absent
}

export const DEFAULT_BATCH_SIZE = 100;
export const HEALTH_CHECK_TIMEOUT_MS = 5000;

const DEFAULT_PRIMARY_KEY = 'ID';

export type QueryOption = OptionFunc | OptionSource;

/**
 * The parts of a pg Pool the repository uses
 */
export type PgPool = Pick<Pool, 'query' | 'connect'>;

/**
 * PostgreSQL repository driven by generated filters, updaters and options
 * Rows are selected under their logical field names, so Entity mirrors the record
 */
export class PgRepository<Entity extends QueryResultRow> {
  private readonly logger = new Logger(PgRepository.name);
  private readonly table: string;
  private readonly selectList: string;
  private readonly primaryKey: string;
  private readonly primaryKeyColumn: string;

  constructor(
    private readonly pool: PgPool,
    private readonly options: RepositoryOptions,
    private readonly client?: PoolClient,   // set while inside withTransaction
  ) {
    this.table = quoteIdentifier(options.table);
    this.selectList = Object.entries(options.schema)
      .map(([field, column]) => `${quoteIdentifier(column)} AS ${quoteIdentifier(field)}`)
      .join(', ');
    this.primaryKey = options.primaryKey ?? DEFAULT_PRIMARY_KEY;
    this.primaryKeyColumn = this.hasField(this.primaryKey) ? options.schema[this.primaryKey] : 'id';
  }

  /**
   * Insert records keyed by logical field name; omitted fields take the column default
   */
  async create(...records: ChangeSet[]): Promise<Entity[]> {
    if (records.length === 0) {
      throw new NoRecordsProvidedError();
    }
    for (const record of records) {
      this.assertKnownFields(Object.keys(record));
    }

    const fields = Object.keys(this.options.schema).filter(field =>
      records.some(record => record[field] !== undefined),
    );

    if (fields.length === 0) {
      const created: Entity[] = [];
      for (let i = 0; i < records.length; i++) {
        const result = await this.execute<Entity>(`INSERT INTO ${this.table} DEFAULT VALUES RETURNING ${this.selectList}`, []);
        created.push(...result.rows);
      }
      return created;
    }

    const values: unknown[] = [];
    const tuples = records.map(record => {
      const cells = fields.map(field => {
        if (record[field] === undefined) {
          return 'DEFAULT';
        }
        values.push(record[field]);
        return `$${values.length}`;
      });
      return `(${cells.join(', ')})`;
    });

    const columns = fields.map(field => quoteIdentifier(this.options.schema[field])).join(', ');
    const result = await this.execute<Entity>(
      `INSERT INTO ${this.table} (${columns}) VALUES ${tuples.join(', ')} RETURNING ${this.selectList}`,
      values,
    );
    return result.rows;
  }

  /**
   * Insert in chunks of batchSize inside one transaction
   * A batch size of zero or less means DEFAULT_BATCH_SIZE
   */
  async createInBatches(batchSize: number, ...records: ChangeSet[]): Promise<Entity[]> {
    if (records.length === 0) {
      throw new NoRecordsProvidedError();
    }
    const size = batchSize > 0 ? batchSize : DEFAULT_BATCH_SIZE;

    return this.withTransaction(async repository => {
      const created: Entity[] = [];
      for (let start = 0; start < records.length; start += size) {
        created.push(...await repository.create(...records.slice(start, start + size)));
      }
      return created;
    });
  }

  async findOneById(id: number | string | bigint): Promise<Entity | undefined> {
    const result = await this.execute<Entity>(
      `SELECT ${this.selectList} FROM ${this.table} WHERE ${quoteIdentifier(this.primaryKeyColumn)} = $1 LIMIT 1`,
      [id],
    );
    return result.rows[0];
  }

  /**
   * First matching record, or undefined
   */
  async findOne(filter: EntityFilter, ...options: QueryOption[]): Promise<Entity | undefined> {
    const query = applyOptions(...options);
    query.limit = 1;
    const result = await this.select(filter, query);
    return result.rows[0];
  }

  async findAll(filter: EntityFilter, ...options: QueryOption[]): Promise<Entity[]> {
    const result = await this.select(filter, applyOptions(...options));
    return result.rows;
  }

  async count(filter: EntityFilter): Promise<number> {
    const where = this.where(filter);
    const result = await this.execute<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ${this.table}${where.text}`,
      where.values,
    );
    // COUNT is a bigint, which pg returns as a string
    return Number(result.rows[0]?.count ?? 0);
  }

  async exists(filter: EntityFilter): Promise<boolean> {
    const where = this.where(filter);
    const result = await this.execute<{ exists: boolean }>(
      `SELECT EXISTS (SELECT 1 FROM ${this.table}${where.text}) AS exists`,
      where.values,
    );
    return result.rows[0]?.exists === true;
  }

  /**
   * Apply the updater's change set to every matching row
   * An empty change set is a no-op returning 0; an empty filter throws MissingWhereClauseError
   */
  async updateWithFilter(filter: EntityFilter, updater: EntityUpdater): Promise<number> {
    const filters = filter.listFilters();
    if (filters.length === 0) {
      throw new MissingWhereClauseError('update', this.options.table);
    }

    const changes = Object.entries(updater.getChangeSet());
    if (changes.length === 0) {
      return 0;
    }

    const assignments = this.assignments(changes);
    const where = buildWhereClause(filters, assignments.values.length + 1);
    const result = await this.execute(
      `UPDATE ${this.table} SET ${assignments.text} WHERE ${where.text}`,
      [...assignments.values, ...where.values],
    );
    return result.rowCount ?? 0;
  }

  /**
   * Apply the updater to one record, located by its primary key
   */
  async update(record: Entity, updater: EntityUpdater): Promise<number> {
    const changes = Object.entries(updater.getChangeSet());
    if (changes.length === 0) {
      return 0;
    }

    const id: unknown = record[this.primaryKey];
    if (id === undefined || id === null) {
      throw new MissingWhereClauseError('update', this.options.table);
    }

    const assignments = this.assignments(changes);
    const result = await this.execute(
      `UPDATE ${this.table} SET ${assignments.text} WHERE ${quoteIdentifier(this.primaryKeyColumn)} = $${assignments.values.length + 1}`,
      [...assignments.values, id],
    );
    return result.rowCount ?? 0;
  }

  async deleteWithFilter(filter: EntityFilter): Promise<number> {
    if (filter.listFilters().length === 0) {
      throw new MissingWhereClauseError('delete', this.options.table);
    }
    const where = this.where(filter);
    const result = await this.execute(`DELETE FROM ${this.table}${where.text}`, where.values);
    return result.rowCount ?? 0;
  }

  /**
   * Run fn against a repository bound to one connection inside BEGIN/COMMIT
   * Rolls back and rethrows when fn fails; nested calls join the open transaction
   */
  async withTransaction<T>(fn: (repository: PgRepository<Entity>) => Promise<T>): Promise<T> {
    if (this.client) {
      return fn(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PgRepository<Entity>(this.pool, this.options, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      this.logger.warn(`Rolling back transaction on ${this.options.table}`);
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Ping the database, failing after timeoutMs
   */
  async health(timeoutMs = HEALTH_CHECK_TIMEOUT_MS): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`no reply within ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      await Promise.race([this.execute('SELECT 1', []), timeout]);
    } catch (error) {
      throw new HealthCheckError(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
    }
  }

  private async select(filter: EntityFilter, query: QueryOptions): Promise<QueryResult<Entity>> {
    const where = this.where(filter);
    const values = [...where.values];
    let text = `SELECT ${this.selectList} FROM ${this.table}${where.text}`;

    if (query.sortFields.length > 0) {
      const order = query.sortFields.map(sort =>
        `${quoteIdentifier(sort.field)} ${sort.direction === SortDirection.Desc ? 'DESC' : 'ASC'}`,
      );
      text += ` ORDER BY ${order.join(', ')}`;
    }
    if (query.limit !== undefined) {
      values.push(query.limit);
      text += ` LIMIT $${values.length}`;
    }
    if (query.offset !== undefined) {
      values.push(query.offset);
      text += ` OFFSET $${values.length}`;
    }

    return this.execute<Entity>(text, values);
  }

  /**
   * WHERE clause with its leading keyword, or empty text
   */
  private where(filter: EntityFilter): SqlFragment {
    const clause = buildWhereClause(filter.listFilters());
    return { text: clause.text ? ` WHERE ${clause.text}` : '', values: clause.values };
  }

  private assignments(changes: Array<[string, unknown]>): SqlFragment {
    this.assertKnownFields(changes.map(([field]) => field));
    const values = changes.map(([, value]) => value);
    const text = changes
      .map(([field], index) => `${quoteIdentifier(this.options.schema[field])} = $${index + 1}`)
      .join(', ');
    return { text, values };
  }

  private assertKnownFields(fields: string[]): void {
    for (const field of fields) {
      if (!this.hasField(field)) {
        throw new Error(`Unknown field ${field} for table ${this.options.table}`);
      }
    }
  }

  private hasField(field: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.options.schema, field);
  }

  private async execute<R extends QueryResultRow = QueryResultRow>(text: string, values: unknown[]): Promise<QueryResult<R>> {
    this.logger.debug(`${text} ${truncateForLog(values)}`);
    try {
      return this.client
        ? await this.client.query<R>(text, values)
        : await this.pool.query<R>(text, values);
    } catch (error) {
      this.logger.error(`Query failed on ${this.options.table}: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }
}
