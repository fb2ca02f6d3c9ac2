import { Hono } from "hono";
import type { PgliteDatabase } from "drizzle-orm/pglite";
import { z } from "zod";

import { MAX_REQUIREMENT_DEPTH } from "../config.js";
import * as schema from "../db/schema.js";
import type { RequirementDocument } from "../db/schema.js";
import {
  createDatabaseAuditSink,
  evaluateWithAudit,
  listAuditEntries,
} from "../lib/audit.js";
import { evaluateMany, resolveRequirement } from "../lib/batch.js";
import {
  characterIdentity,
  loadCharacterFactProvider,
} from "../lib/character.js";
import { InvalidRequirement } from "../lib/errors.js";
import {
  formatResult,
  getFailureReasons,
  summarizeResult,
} from "../lib/result.js";
import {
  jsonOk,
  jsonRequirementError,
  parseJson,
  parseParamId,
} from "./_util.js";

// Shape only; the codec reports what is wrong inside a document.
const documentSchema = z.custom<RequirementDocument>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  { error: "must be a requirement document" },
);

const checkBodySchema = z.object({ requirement: documentSchema });

const checkManyBodySchema = z.object({
  requirements: z.record(z.string().min(1), documentSchema),
});

export function checkRoutes(db: PgliteDatabase<typeof schema>) {
  const app = new Hono();

  // Evaluate one requirement and record it in the audit log
  app.post("/check", async (c) => {
    const p = parseParamId(c, "characterId");
    if ("error" in p) return p.error;
    const parsed = await parseJson(c, checkBodySchema);
    if ("error" in parsed) return parsed.error;

    try {
      const requirement = resolveRequirement(parsed.data.requirement, {
        maxDepth: MAX_REQUIREMENT_DEPTH,
      });
      const facts = await loadCharacterFactProvider(db, p.id);
      const sink = createDatabaseAuditSink(db);
      const result = evaluateWithAudit(requirement, facts, { sink });
      await sink.flush();

      if (!result.passed && process.env.DEBUG_CHECKS) {
        console.debug(
          `[check] ${characterIdentity(p.id)} failed\n${formatResult(result)}`,
        );
      }

      return jsonOk(c, {
        result,
        reasons: getFailureReasons(result),
        summary: summarizeResult(result),
      });
    } catch (err: unknown) {
      return jsonRequirementError(c, err);
    }
  });

  // Evaluate several keyed requirements; a bad entry does not fail the others
  app.post("/check-many", async (c) => {
    const p = parseParamId(c, "characterId");
    if ("error" in p) return p.error;
    const parsed = await parseJson(c, checkManyBodySchema);
    if ("error" in parsed) return parsed.error;

    try {
      const facts = await loadCharacterFactProvider(db, p.id);
      const outcome = evaluateMany(parsed.data.requirements, facts, {
        maxDepth: MAX_REQUIREMENT_DEPTH,
      });

      const errors = Object.fromEntries(
        Object.entries(outcome.errors).map(([key, err]) => [
          key,
          err instanceof InvalidRequirement
            ? { message: err.message, issues: err.issues }
            : { message: err.message },
        ]),
      );

      return jsonOk(c, { results: outcome.results, errors });
    } catch (err: unknown) {
      return jsonRequirementError(c, err);
    }
  });

  // Audit trail for this character, newest first
  app.get("/audit", async (c) => {
    const p = parseParamId(c, "characterId");
    if ("error" in p) return p.error;
    const rows = await listAuditEntries(db, characterIdentity(p.id));
    return jsonOk(c, rows);
  });

  return app;
}
