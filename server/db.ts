import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import pg from "pg";
import * as schema from "@shared/schema";

export type Database = NodePgDatabase<typeof schema>;

/** Any Postgres driver's handle, or an open transaction on it. */
export type Executor = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseConnection {
  pool: pg.Pool;
  db: Database;
}

export function createDatabase(databaseUrl: string): DatabaseConnection {
  const pool = new pg.Pool({ connectionString: databaseUrl });

  pool.on("error", (error) => {
    console.error("[Database] Idle client error:", error);
  });

  return { pool, db: drizzle(pool, { schema }) };
}

export async function closeDatabase(connection: DatabaseConnection): Promise<void> {
  await connection.pool.end();
}
