/**
 * packages/db - DB connection helper
 *
 * Builds the `pg` Pool and the schema-bound drizzle `db` in one place.
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = NodePgDatabase<typeof schema> & { $client: Pool };

export function getDb(connectionString: string): Db {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString });
  return drizzle(pool, { schema });
}

/**
 * Release the pool behind a `db` from getDb
 */
export async function closeDb(db: Db): Promise<void> {
  await db.$client.end();
}
