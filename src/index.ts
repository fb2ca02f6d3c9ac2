import "dotenv/config";
import { serve } from "@hono/node-server";

import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";

import { createApp } from "./app.js";
import { SERVER_PORT } from "./config.js";
import { ensureSchema } from "./db/migrate.js";
import * as schema from "./db/schema.js";

// Without DATABASE_URL, PGlite keeps everything in memory.
const client = new PGlite(process.env.DATABASE_URL);
const db = drizzle({ client, schema: schema });

await ensureSchema(db);

const port = Number(process.env.PORT) || SERVER_PORT;

serve(
  {
    fetch: createApp(db).fetch,
    port,
  },
  (info) => {
    console.log(`Server is running on http://localhost:${info.port}`);
  },
);
