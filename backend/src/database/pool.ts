import { QueryResult, QueryResultRow } from 'pg';

/**
 * The part of a `pg` pool the repositories rely on. `pg.Pool` and its
 * `PoolClient` satisfy these as they are.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface DatabaseClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface DatabasePool extends Queryable {
  connect(): Promise<DatabaseClient>;
}
