import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import pg from "pg";
import { env } from "../config/env.js";
import * as schema from "./schema.js";

const pool = new pg.Pool({
    connectionString: env.DATABASE_URL,
    max: 10,
});

export const db = drizzle(pool, { schema });
export type Database = typeof db;

/** The root handle or an open transaction; side-effect writes take one so they share the caller's commit. */
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export async function closeDatabase() {
    await pool.end();
}
