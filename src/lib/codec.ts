import type { z } from "zod";

import {
  countTagDocumentSchema,
  hasDocumentSchema,
  REQUIREMENT_DOCUMENT_KEYS,
  requirementListSchema,
  traitDocumentSchema,
  type HasDocument,
  type RequirementDocument,
  type RequirementDocumentKey,
} from "../db/schema.js";
import { describeError, InvalidRequirement } from "./errors.js";
import {
  allOf,
  anyOf,
  attributesSchema,
  countWithTag,
  formatIssues,
  hasItem,
  trait,
  type Requirement,
} from "./requirement.js";

export const DEFAULT_MAX_DEPTH = 16;

export type DeserializeOptions = {
  /** Deepest allowed nesting; a lone leaf has depth 1. */
  maxDepth?: number;
};

export type DocumentValidation =
  | { valid: true; requirement: Requirement }
  | { valid: false; errors: string[] };

/**
 * Turns a stored requirement document into a requirement tree.
 * Collects every structural issue before failing, each prefixed with its path
 * (`all[1].trait.name: cannot be empty`).
 */
export function deserializeRequirement(
  document: unknown,
  options: DeserializeOptions = {},
): Requirement {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const issues: string[] = [];
  const requirement = readNode(document, "", 1, maxDepth, issues);
  if (!requirement || issues.length > 0) {
    throw new InvalidRequirement(
      issues.length > 0 ? issues : ["requirement: could not be read"],
    );
  }
  return requirement;
}

export function parseRequirementJson(
  text: string,
  options: DeserializeOptions = {},
): Requirement {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err: unknown) {
    throw new InvalidRequirement(`invalid JSON: ${describeError(err)}`);
  }
  return deserializeRequirement(document, options);
}

export function validateRequirementDocument(
  document: unknown,
  options: DeserializeOptions = {},
): DocumentValidation {
  try {
    const requirement = deserializeRequirement(document, options);
    return { valid: true, requirement };
  } catch (err: unknown) {
    if (err instanceof InvalidRequirement) {
      return { valid: false, errors: err.issues };
    }
    throw err;
  }
}

export function serializeRequirement(
  requirement: Requirement,
): RequirementDocument {
  switch (requirement.kind) {
    case "trait":
      return {
        trait: {
          name: requirement.name,
          ...(requirement.minimum !== undefined ? { min: requirement.minimum } : {}),
          ...(requirement.maximum !== undefined ? { max: requirement.maximum } : {}),
          ...(requirement.exact !== undefined ? { exact: requirement.exact } : {}),
        },
      };
    case "possession": {
      const has: HasDocument = {
        field: requirement.collectionField,
        ...(requirement.id !== undefined ? { id: requirement.id } : {}),
        ...(requirement.name !== undefined ? { name: requirement.name } : {}),
        ...requirement.attributes,
      };
      return { has };
    }
    case "tag_count":
      return {
        count_tag: {
          model: requirement.collectionField,
          tag: requirement.tag,
          ...(requirement.minimum !== undefined
            ? { minimum: requirement.minimum }
            : {}),
          ...(requirement.maximum !== undefined
            ? { maximum: requirement.maximum }
            : {}),
        },
      };
    case "all_of":
      return { all: requirement.children.map(serializeRequirement) };
    case "any_of":
      return { any: requirement.children.map(serializeRequirement) };
  }
}

/* ────────────────────────────────────────────────────────────────────────── *
 * Internals
 * ────────────────────────────────────────────────────────────────────────── */

function isDocumentKey(key: string): key is RequirementDocumentKey {
  return (REQUIREMENT_DOCUMENT_KEYS as readonly string[]).includes(key);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNode(
  document: unknown,
  path: string,
  depth: number,
  maxDepth: number,
  issues: string[],
): Requirement | null {
  const where = path || "requirement";

  if (!isPlainObject(document)) {
    issues.push(`${where}: must be an object`);
    return null;
  }

  const keys = Object.keys(document);
  const [key] = keys;
  if (keys.length !== 1 || key === undefined) {
    issues.push(
      `${where}: must contain exactly one requirement type, got ${keys.length}` +
        (keys.length > 0 ? ` (${keys.join(", ")})` : ""),
    );
    return null;
  }
  if (!isDocumentKey(key)) {
    issues.push(`${where}: unknown requirement type "${key}"`);
    return null;
  }
  if (depth > maxDepth) {
    issues.push(`${where}: exceeds maximum depth of ${maxDepth}`);
    return null;
  }

  const body = document[key];
  const at = path ? `${path}.${key}` : key;

  switch (key) {
    case "trait": {
      const data = parseBody(traitDocumentSchema, body, at, issues);
      return data
        ? build(
            () =>
              trait(data.name, {
                minimum: data.min,
                maximum: data.max,
                exact: data.exact,
              }),
            at,
            issues,
          )
        : null;
    }
    case "has": {
      const data = parseBody(hasDocumentSchema, body, at, issues);
      if (!data) return null;
      const { field, id, name, ...rest } = data;
      const attributes = parseBody(attributesSchema, rest, at, issues);
      if (!attributes) return null;
      return build(() => hasItem(field, { id, name, attributes }), at, issues);
    }
    case "count_tag": {
      const data = parseBody(countTagDocumentSchema, body, at, issues);
      return data
        ? build(
            () =>
              countWithTag(data.model, data.tag, {
                minimum: data.minimum,
                maximum: data.maximum,
              }),
            at,
            issues,
          )
        : null;
    }
    case "all":
    case "any": {
      const list = parseBody(requirementListSchema, body, at, issues);
      if (!list) return null;
      const children = list.map((item, index) =>
        readNode(item, `${at}[${index}]`, depth + 1, maxDepth, issues),
      );
      const built = children.filter(
        (child): child is Requirement => child !== null,
      );
      if (built.length !== children.length) return null;
      return build(
        () => (key === "all" ? allOf(built) : anyOf(built)),
        at,
        issues,
      );
    }
  }
}

function parseBody<T>(
  schema: z.ZodType<T>,
  body: unknown,
  at: string,
  issues: string[],
): T | null {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    issues.push(...formatIssues(parsed.error, at));
    return null;
  }
  return parsed.data;
}

function build<T extends Requirement>(
  make: () => T,
  at: string,
  issues: string[],
): T | null {
  try {
    return make();
  } catch (err: unknown) {
    if (!(err instanceof InvalidRequirement)) throw err;
    issues.push(...err.issues.map((issue) => `${at}: ${issue}`));
    return null;
  }
}
