import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
import * as schema from './schema';

// Any drizzle Postgres driver; the repositories only use the query builder.
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseHandle {
  db: Database;
  pool: Pool;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString, max: 10 });
  pool.on('error', (err) => {
    console.error('[db] idle client error:', err.message);
  });
  return { db: drizzle(pool, { schema }), pool };
}
