import type pg from 'pg';

export type QueryRow = Record<string, unknown>;

export interface QueryResult {
  readonly rows: ReadonlyArray<QueryRow>;
  readonly rowCount: number;
}

/**
 * Minimal query surface the repositories depend on. Rows come back untyped; callers parse them.
 */
export interface QueryExecutor {
  query(sql: string, params?: ReadonlyArray<unknown>): Promise<QueryResult>;
}

export type PgQueryable = Pick<pg.Pool, 'query'>;

export const createPgQueryExecutor = (queryable: PgQueryable): QueryExecutor => ({
  async query(sql: string, params: ReadonlyArray<unknown> = []): Promise<QueryResult> {
    const result = await queryable.query<QueryRow>(sql, [...params]);
    return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
  },
});
