import { readFileSync } from "node:fs";
import { sql } from "drizzle-orm";
import type { PgliteDatabase } from "drizzle-orm/pglite";

import type * as schema from "./schema.js";

const schemaUrl = new URL("../../data/schema.sql", import.meta.url);

/** Creates missing tables and indexes; safe to run on every start. */
export async function ensureSchema(
  db: PgliteDatabase<typeof schema>,
): Promise<void> {
  const statements = readFileSync(schemaUrl, "utf8")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
}
