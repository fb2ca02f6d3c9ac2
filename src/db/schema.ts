import { relations, sql } from "drizzle-orm";
import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  serial,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import z from "zod";

import type { AttributeValue } from "../lib/requirement.js";
import { attributeValueSchema } from "../lib/requirement.js";
import type { CheckResult } from "../lib/result.js";

// ---------------------------------------------------------------------------
// Requirement document format (storage boundary)
// ---------------------------------------------------------------------------

export const REQUIREMENT_DOCUMENT_KEYS = [
  "trait",
  "has",
  "all",
  "any",
  "count_tag",
] as const;

export type RequirementDocumentKey = (typeof REQUIREMENT_DOCUMENT_KEYS)[number];

export type TraitDocument = {
  name: string;
  min?: number;
  max?: number;
  exact?: number;
};

/** Keys other than field/id/name are attribute filters. */
export type HasDocument = {
  field: string;
  id?: number;
  name?: string;
  [attribute: string]: AttributeValue | undefined;
};

export type CountTagDocument = {
  model: string;
  tag: string;
  minimum?: number;
  maximum?: number;
};

export type RequirementDocument =
  | { trait: TraitDocument }
  | { has: HasDocument }
  | { count_tag: CountTagDocument }
  | { all: RequirementDocument[] }
  | { any: RequirementDocument[] };

const documentLabelSchema = z
  .string({
    error: (issue) =>
      issue.input === undefined ? "is required" : "must be a string",
  })
  .refine((s) => s.trim().length > 0, { error: "cannot be empty", abort: true })
  .refine((s) => s === s.trim(), {
    error: "cannot have leading or trailing whitespace",
  });

const documentBoundSchema = z
  .int({ error: "must be an integer" })
  .min(0, { error: "must be non-negative" });

export const traitDocumentSchema = z
  .strictObject({
    name: documentLabelSchema,
    min: documentBoundSchema.optional(),
    max: documentBoundSchema.optional(),
    exact: documentBoundSchema.optional(),
  })
  .refine(
    (v) => v.min !== undefined || v.max !== undefined || v.exact !== undefined,
    { error: "at least one constraint (min, max or exact) is required" },
  )
  .refine(
    (v) => v.min === undefined || v.max === undefined || v.min <= v.max,
    { error: "max cannot be less than min", path: ["max"] },
  );

export const hasDocumentSchema = z
  .object({
    field: documentLabelSchema,
    id: z
      .int({ error: "must be an integer" })
      .positive({ error: "must be positive" })
      .optional(),
    name: z
      .string({ error: "must be a string" })
      .min(1, { error: "cannot be empty" })
      .optional(),
  })
  .catchall(attributeValueSchema)
  .refine((v) => Object.keys(v).some((key) => key !== "field"), {
    error: "must specify id, name or at least one attribute",
  });

export const countTagDocumentSchema = z
  .strictObject({
    model: documentLabelSchema,
    tag: documentLabelSchema,
    minimum: documentBoundSchema.optional(),
    maximum: documentBoundSchema.optional(),
  })
  .refine((v) => v.minimum !== undefined || v.maximum !== undefined, {
    error: "at least one constraint (minimum or maximum) is required",
  })
  .refine(
    (v) =>
      v.minimum === undefined || v.maximum === undefined || v.minimum <= v.maximum,
    { error: "maximum cannot be less than minimum", path: ["maximum"] },
  );

export const requirementListSchema = z.array(z.unknown(), {
  error: "must be a list of requirements",
});

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const character = pgTable("character", {
  id: serial().primaryKey(),
  name: text("name").notNull(),
  traits: jsonb("traits")
    .$type<Record<string, number>>()
    .notNull()
    .default(sql`'{}'::jsonb`),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

export const possession = pgTable(
  "possession",
  {
    characterId: integer("character_id")
      .notNull()
      .references(() => character.id, { onDelete: "cascade" }),
    collection: text("collection").notNull(),
    objectId: integer("object_id").notNull(),
    name: text("name").notNull(),
    tags: jsonb("tags")
      .$type<string[]>()
      .notNull()
      .default(sql`'[]'::jsonb`),
    attributes: jsonb("attributes")
      .$type<Record<string, AttributeValue>>()
      .notNull()
      .default(sql`'{}'::jsonb`),
    createdAt: timestamp("created_at").notNull().defaultNow(),
  },
  (table) => [
    primaryKey({
      columns: [table.characterId, table.collection, table.objectId],
    }),
    index("idx_possession_character").on(table.characterId),
  ],
);

export const requirementAudit = pgTable(
  "requirement_audit",
  {
    id: serial().primaryKey(),
    providerIdentity: text("provider_identity").notNull(),
    requirement: jsonb("requirement").$type<RequirementDocument>().notNull(),
    result: jsonb("result").$type<CheckResult>().notNull(),
    passed: boolean("passed").notNull(),
    checkedAt: timestamp("checked_at").notNull().defaultNow(),
  },
  (table) => [index("idx_requirement_audit_identity").on(table.providerIdentity)],
);

// ---------------------------------------------------------------------------
// Relations
// ---------------------------------------------------------------------------

export const characterRelations = relations(character, ({ many }) => ({
  possessions: many(possession),
}));

export const possessionRelations = relations(possession, ({ one }) => ({
  character: one(character, {
    fields: [possession.characterId],
    references: [character.id],
  }),
}));
