import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import pg from "pg";

import { schemaStatements } from "./ddl";
import * as schema from "./schema";

// Any drizzle Postgres database over this schema: node-postgres at runtime,
// PGlite in tests.
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export type DatabaseHandle = {
  db: Database;
  close: () => Promise<void>;
};

export function connectDatabase(databaseUrl: string, statementTimeoutMs: number): DatabaseHandle {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    connectionTimeoutMillis: statementTimeoutMs,
    statement_timeout: statementTimeoutMs,
  });
  const db = drizzle(pool, { schema });
  return { db, close: () => pool.end() };
}

export async function ensureSchema(db: Database): Promise<void> {
  for (const statement of schemaStatements) {
    await db.execute(sql.raw(statement));
  }
}
