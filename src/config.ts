import { readFileSync } from "node:fs";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";

import { deserializeRequirement } from "./lib/codec.js";
import { InvalidRequirement } from "./lib/errors.js";
import type { Requirement } from "./lib/requirement.js";

const suggestionSchema = z.object({
  description: z.string().min(1),
});

const configSchema = z
  .object({
    defaults: z.object({
      max_depth: z.int().min(1).max(32),
    }),
    server: z
      .object({
        port: z.int().min(1).max(65535).default(3000),
      })
      .default({ port: 3000 }),
    suggestions: z
      .object({
        traits: z
          .array(suggestionSchema.extend({ name: z.string().min(1) }))
          .default([]),
        collections: z
          .array(suggestionSchema.extend({ field: z.string().min(1) }))
          .default([]),
      })
      .default({ traits: [], collections: [] }),
    templates: z
      .array(
        z.object({
          name: z.string().min(1),
          description: z.string().min(1),
          requirement: z.unknown(),
        }),
      )
      .default([]),
  })
  .transform(({ templates, ...rest }, ctx) => ({
    ...rest,
    templates: templates.map((template, index) => ({
      ...template,
      requirement: readTemplate(template.requirement, index, rest.defaults.max_depth, ctx),
    })),
  }));

export type RequirementTemplate = {
  name: string;
  description: string;
  requirement: Requirement;
};

type ConfigShape = z.infer<typeof configSchema>;

const configUrl = new URL("../data/config.toml", import.meta.url);

function readTemplate(
  document: unknown,
  index: number,
  maxDepth: number,
  ctx: z.RefinementCtx,
): Requirement | null {
  try {
    return deserializeRequirement(document, { maxDepth });
  } catch (err: unknown) {
    if (!(err instanceof InvalidRequirement)) throw err;
    for (const issue of err.issues) {
      ctx.addIssue({
        code: "custom",
        message: issue,
        path: ["templates", index, "requirement"],
      });
    }
    return null;
  }
}

/** Parses TOML config text; throws a ZodError when it does not validate. */
export function parseConfig(source: string): ConfigShape {
  return configSchema.parse(parseToml(source));
}

function loadConfig(): ConfigShape {
  return parseConfig(readFileSync(configUrl, "utf8"));
}

const loadedConfig = loadConfig();

export const MAX_REQUIREMENT_DEPTH = loadedConfig.defaults.max_depth;
export const SERVER_PORT = loadedConfig.server.port;

export const TRAIT_SUGGESTIONS = loadedConfig.suggestions.traits;
export const COLLECTION_SUGGESTIONS = loadedConfig.suggestions.collections;

// Templates that failed to deserialize already failed the parse above.
export const REQUIREMENT_TEMPLATES: RequirementTemplate[] =
  loadedConfig.templates.flatMap(({ requirement, ...template }) =>
    requirement ? [{ ...template, requirement }] : [],
  );
