import { Hono } from "hono";
import type { PgliteDatabase } from "drizzle-orm/pglite";
import { z } from "zod";

import {
  deleteCharacter,
  deletePossession,
  getCharacterById,
  insertCharacter,
  listPossessions,
  updateTraits,
  upsertPossession,
} from "../db/character-crud.js";
import * as schema from "../db/schema.js";
import { attributesSchema } from "../lib/requirement.js";
import { jsonError, jsonOk, parseJson, parseParamId } from "./_util.js";

const traitsSchema = z.record(z.string().trim().min(1), z.number());

const possessionBodySchema = z.object({
  collection: z.string().trim().min(1),
  objectId: z.int().positive(),
  name: z.string().min(1),
  tags: z.array(z.string().min(1)).default([]),
  attributes: attributesSchema.default({}),
});

export function characterRoutes(db: PgliteDatabase<typeof schema>) {
  const app = new Hono();

  // Create character
  app.post("/", async (c) => {
    const bodySchema = z.object({
      name: z.string().trim().min(1),
      traits: traitsSchema.default({}),
    });
    const parsed = await parseJson(c, bodySchema);
    if ("error" in parsed) return parsed.error;
    const created = await insertCharacter(db, parsed.data);
    return jsonOk(c, created, 201);
  });

  // Read character with possessions
  app.get("/:id", async (c) => {
    const p = parseParamId(c, "id");
    if ("error" in p) return p.error;
    const row = await getCharacterById(db, p.id);
    if (!row) return jsonError(c, "not found", 404, "not_found");
    const possessions = await listPossessions(db, p.id);
    return jsonOk(c, { ...row, possessions });
  });

  // Merge traits
  app.patch("/:id/traits", async (c) => {
    const p = parseParamId(c, "id");
    if ("error" in p) return p.error;
    const parsed = await parseJson(c, traitsSchema);
    if ("error" in parsed) return parsed.error;
    const updated = await updateTraits(db, p.id, parsed.data);
    if (!updated) return jsonError(c, "not found", 404, "not_found");
    return jsonOk(c, updated);
  });

  app.delete("/:id", async (c) => {
    const p = parseParamId(c, "id");
    if ("error" in p) return p.error;
    const deleted = await deleteCharacter(db, p.id);
    if (!deleted) return jsonError(c, "not found", 404, "not_found");
    return jsonOk(c, { ok: true });
  });

  // Add or replace a possessed object
  app.put("/:id/possessions", async (c) => {
    const p = parseParamId(c, "id");
    if ("error" in p) return p.error;
    const parsed = await parseJson(c, possessionBodySchema);
    if ("error" in parsed) return parsed.error;
    const row = await getCharacterById(db, p.id);
    if (!row) return jsonError(c, "not found", 404, "not_found");
    const stored = await upsertPossession(db, p.id, parsed.data);
    return jsonOk(c, stored);
  });

  app.delete("/:id/possessions/:collection/:objectId", async (c) => {
    const p = parseParamId(c, "id");
    if ("error" in p) return p.error;
    const o = parseParamId(c, "objectId");
    if ("error" in o) return o.error;
    const deleted = await deletePossession(
      db,
      p.id,
      c.req.param("collection"),
      o.id,
    );
    if (!deleted) return jsonError(c, "not found", 404, "not_found");
    return jsonOk(c, { ok: true });
  });

  return app;
}
