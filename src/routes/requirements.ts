import { Hono } from "hono";
import { z } from "zod";

import {
  COLLECTION_SUGGESTIONS,
  MAX_REQUIREMENT_DEPTH,
  REQUIREMENT_TEMPLATES,
  TRAIT_SUGGESTIONS,
} from "../config.js";
import {
  serializeRequirement,
  validateRequirementDocument,
} from "../lib/codec.js";
import { countRequirementNodes, requirementDepth } from "../lib/requirement.js";
import { jsonError, jsonOk, jsonZodError } from "./_util.js";

const suggestionQuerySchema = z.object({
  type: z.enum(["trait", "has"]).optional(),
});

export function requirementRoutes() {
  const app = new Hono();

  // Validate a requirement document without evaluating it
  app.post("/validate", async (c) => {
    let document: unknown;
    try {
      document = await c.req.json();
    } catch {
      return jsonError(c, "invalid_json", 400, "invalid_json");
    }

    const outcome = validateRequirementDocument(document, {
      maxDepth: MAX_REQUIREMENT_DEPTH,
    });
    if (!outcome.valid) {
      return jsonOk(c, { valid: false, errors: outcome.errors });
    }
    return jsonOk(c, {
      valid: true,
      requirement: serializeRequirement(outcome.requirement),
      depth: requirementDepth(outcome.requirement),
      nodes: countRequirementNodes(outcome.requirement),
    });
  });

  // Ready-made requirements from data/config.toml
  app.get("/templates", (c) => {
    return jsonOk(
      c,
      REQUIREMENT_TEMPLATES.map((template) => ({
        name: template.name,
        description: template.description,
        requirement: serializeRequirement(template.requirement),
      })),
    );
  });

  // Known trait names and possession collections
  app.get("/suggestions", (c) => {
    const parsed = suggestionQuerySchema.safeParse(c.req.query());
    if (!parsed.success) return jsonZodError(c, parsed.error);

    switch (parsed.data.type) {
      case "trait":
        return jsonOk(c, { traits: TRAIT_SUGGESTIONS });
      case "has":
        return jsonOk(c, { collections: COLLECTION_SUGGESTIONS });
      case undefined:
        return jsonOk(c, {
          traits: TRAIT_SUGGESTIONS,
          collections: COLLECTION_SUGGESTIONS,
        });
    }
  });

  return app;
}
