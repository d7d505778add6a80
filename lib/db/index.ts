import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import * as schema from './schema';

export * from './schema';

export type Database = NodePgDatabase<typeof schema>;

/**
 * Create a drizzle client over a pg connection pool.
 *
 * The pool connects lazily, so nothing touches the network until the first query.
 */
export function createDb(connectionString: string): Database {
  const pool = new Pool({ connectionString });
  return drizzle(pool, { schema });
}
