/**
 * What the seeders need from a database connection. PGlite satisfies this
 * directly; wrap a pg Client, PoolClient or Pool with pgExecutor.
 */
export interface SqlExecutor {
  /** Run one or more statements with no parameters. */
  exec(sql: string): Promise<unknown>;
  /** Run a single parameterised statement ($1, $2, ...). */
  query(sql: string, params?: unknown[]): Promise<unknown>;
}

/** The slice of pg's Client/Pool API used by pgExecutor. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

export function pgExecutor(client: PgQueryable): SqlExecutor {
  return {
    // Without values pg uses the simple query protocol, which accepts multiple statements.
    exec: (sql) => client.query(sql),
    query: (sql, params) => client.query(sql, params),
  };
}
