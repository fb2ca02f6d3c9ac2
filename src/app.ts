import { Hono } from "hono";
import { logger } from "hono/logger";
import type { PgliteDatabase } from "drizzle-orm/pglite";

import * as schema from "./db/schema.js";
import { jsonError } from "./routes/_util.js";
import { characterRoutes } from "./routes/characters.js";
import { checkRoutes } from "./routes/checks.js";
import { requirementRoutes } from "./routes/requirements.js";

export function createApp(db: PgliteDatabase<typeof schema>) {
  const app = new Hono();

  // Request logging
  app.use("*", logger());

  app.onError((err, c) => {
    // Standard JSON error envelope for unhandled errors
    console.error("Unhandled error:", err);
    return jsonError(c, err.message || "internal_error", 500, "internal_error");
  });

  app.route("/requirements", requirementRoutes());
  app.route("/characters", characterRoutes(db));
  app.route("/characters/:characterId", checkRoutes(db));

  return app;
}
