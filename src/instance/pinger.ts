import pg from "pg";

/** A protocol-level connectivity check; never runs application queries. */
export interface DatabasePinger {
  ping(connectionString: string): Promise<void>;
}

/** Opens a fresh pg connection, runs `SELECT 1` and closes it. */
export class PgPinger implements DatabasePinger {
  constructor(private readonly connectTimeoutMs = 1_000) {}

  async ping(connectionString: string): Promise<void> {
    const client = new pg.Client({ connectionString, connectionTimeoutMillis: this.connectTimeoutMs });
    await client.connect();
    try {
      await client.query("SELECT 1");
    } finally {
      await client.end();
    }
  }
}
