import fs from "fs/promises";
import path from "path";

export const SCHEMA_SQL_PATH = path.resolve("sql", "schema.sql");

export async function readSchemaSql(): Promise<string> {
    return fs.readFile(SCHEMA_SQL_PATH, "utf8");
}
