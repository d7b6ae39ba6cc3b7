import pg from 'pg';
import { SourceError } from '../errors.js';
import { throwIfCancelled } from '../signal.js';
import type { FieldDefinition, Predicate, SortDirection, SortKey } from '../query/types.js';
import type { IncludableSource, Materializable, OrderedQueryableSource, Projection, QueryableSource } from '../types.js';
import { ProjectedSource } from './projected.js';
import { compileCountQuery, compileRelationQuery, compileSelectQuery } from './sql-compiler.js';
import type { SelectPlan } from './sql-compiler.js';

export type Row = Record<string, unknown>;

/** A one-to-many relation loaded with a second query when its include name is requested. */
export interface RelationConfig {
  table: string;
  /** Column on the related table that points back at the parent. */
  foreignKey: string;
  /** Parent column the foreign key refers to; defaults to the source's keyColumn. */
  localKey?: string;
  /** Property the related rows are attached under; defaults to the include name. */
  as?: string;
  orderBy?: string;
}

export interface PostgresSourceConfig<T> {
  pool: pg.Pool;
  table: string;
  /** Maps a raw row, with any loaded relations attached, to an entity. */
  mapRow: (row: Row) => T;
  /** Unique column appended to ORDER BY so pages are deterministic. */
  keyColumn?: string;
  relations?: Readonly<Record<string, RelationConfig>>;
}

interface SourceState<T> {
  filters: readonly Predicate<T>[];
  order: readonly SortKey<T>[];
  offset?: number;
  limit?: number;
  includes: readonly string[];
}

const EMPTY_STATE = { filters: [], order: [], includes: [] };

/**
 * QueryableSource over one PostgreSQL table. Operations accumulate into an
 * immutable plan; SQL is only compiled and sent on count() or toArray().
 */
export class PostgresSource<T> implements OrderedQueryableSource<T>, IncludableSource<T> {
  private readonly state: SourceState<T>;

  constructor(
    private readonly config: PostgresSourceConfig<T>,
    state?: SourceState<T>,
  ) {
    this.state = state ?? EMPTY_STATE;
  }

  private with(changes: Partial<SourceState<T>>): PostgresSource<T> {
    return new PostgresSource(this.config, { ...this.state, ...changes });
  }

  private assertNotPaged(operation: string): void {
    if (this.state.offset !== undefined || this.state.limit !== undefined) {
      throw new SourceError(`${operation}() cannot follow skip() or take() on table ${this.config.table}`);
    }
  }

  where(predicate: Predicate<T>): QueryableSource<T> {
    this.assertNotPaged('where');
    return this.with({ filters: [...this.state.filters, predicate] });
  }

  orderBy(field: FieldDefinition<T>, direction: SortDirection): OrderedQueryableSource<T> {
    this.assertNotPaged('orderBy');
    return this.with({ order: [{ field, direction }] });
  }

  thenBy(field: FieldDefinition<T>, direction: SortDirection): OrderedQueryableSource<T> {
    this.assertNotPaged('thenBy');
    return this.with({ order: [...this.state.order, { field, direction }] });
  }

  skip(count: number): QueryableSource<T> {
    const n = Math.max(0, Math.trunc(count));
    const { limit } = this.state;
    return this.with({
      offset: (this.state.offset ?? 0) + n,
      ...(limit !== undefined ? { limit: Math.max(0, limit - n) } : {}),
    });
  }

  take(count: number): QueryableSource<T> {
    const n = Math.max(0, Math.trunc(count));
    const { limit } = this.state;
    return this.with({ limit: limit === undefined ? n : Math.min(limit, n) });
  }

  include(names: readonly string[]): QueryableSource<T> {
    const relations = this.config.relations ?? {};
    const added = names.filter(
      (name) => Object.hasOwn(relations, name) && !this.state.includes.includes(name),
    );
    if (added.length === 0) return this;
    return this.with({ includes: [...this.state.includes, ...added] });
  }

  select<R>(projection: Projection<T, R>): Materializable<R> {
    return new ProjectedSource(this, projection);
  }

  async count(signal?: AbortSignal): Promise<number> {
    throwIfCancelled(signal);
    const { sql, params } = compileCountQuery(this.plan());
    const result = await this.run(sql, params, 'count rows in');
    const count = result.rows[0]?.['count'];
    return Number(count ?? 0);
  }

  async toArray(signal?: AbortSignal): Promise<T[]> {
    throwIfCancelled(signal);
    const { sql, params } = compileSelectQuery(this.plan());
    const result = await this.run(sql, params, 'load rows from');
    let rows = result.rows;
    for (const name of this.state.includes) {
      rows = await this.attachRelation(rows, name, signal);
    }
    return rows.map((row) => this.config.mapRow(row));
  }

  private plan(): SelectPlan<T> {
    const { offset, limit } = this.state;
    const { keyColumn } = this.config;
    return {
      table: this.config.table,
      filters: this.state.filters,
      order: this.state.order,
      ...(keyColumn !== undefined ? { keyColumn } : {}),
      ...(offset !== undefined ? { offset } : {}),
      ...(limit !== undefined ? { limit } : {}),
    };
  }

  private async run(sql: string, params: unknown[], action: string): Promise<pg.QueryResult<Row>> {
    try {
      return await this.config.pool.query<Row>(sql, params);
    } catch (err) {
      throw new SourceError(`Failed to ${action} ${this.config.table}: ${String(err)}`, err);
    }
  }

  private async attachRelation(rows: Row[], name: string, signal?: AbortSignal): Promise<Row[]> {
    const relation = this.config.relations?.[name];
    if (relation === undefined) return rows;
    const localKey = relation.localKey ?? this.config.keyColumn;
    if (localKey === undefined) {
      throw new SourceError(`Relation "${name}" on table ${this.config.table} needs a localKey or keyColumn`);
    }
    const property = relation.as ?? name;

    const keys = [...new Set(rows.map((row) => row[localKey]).filter((key) => key !== null && key !== undefined))];
    const groups = new Map<string, Row[]>();
    if (keys.length > 0) {
      throwIfCancelled(signal);
      const { sql, params } = compileRelationQuery(relation, keys);
      const result = await this.run(sql, params, `load relation "${name}" from`);
      for (const related of result.rows) {
        const key = String(related[relation.foreignKey]);
        const group = groups.get(key);
        if (group === undefined) groups.set(key, [related]);
        else group.push(related);
      }
    }

    return rows.map((row) => ({ ...row, [property]: groups.get(String(row[localKey])) ?? [] }));
  }
}
