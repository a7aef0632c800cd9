import { sql } from "drizzle-orm";
import { db, closeDatabase } from "./index.js";
import { readSchemaSql, SCHEMA_SQL_PATH } from "./ddl.js";

async function runMigrations() {
    console.log(`🔄 Applying ${SCHEMA_SQL_PATH}...`);
    await db.execute(sql.raw(await readSchemaSql()));
    console.log("✅ Migrations complete");
    await closeDatabase();
}

runMigrations().catch((err) => {
    console.error("❌ Migration failed:", err);
    process.exit(1);
});
