import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Upper bound of the postgres.js pool. */
  maxConnections?: number;
  /** Receives server notices, e.g. "relation already exists, skipping". */
  onNotice?: (message: string) => void;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * `sql` is the raw connection used for table setup and shutdown; `db`
 * is the typed handle the repository queries through.
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const { maxConnections = 10, onNotice } = options;

  const sql = postgres(databaseUrl, {
    max: maxConnections,
    idle_timeout: 20,
    connect_timeout: 10,
    ...(onNotice && { onnotice: (notice: postgres.Notice) => onNotice(notice['message'] ?? '') }),
  });

  return { sql, db: drizzle(sql, { schema }) };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
