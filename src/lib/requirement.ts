import { z } from "zod";

import { InvalidRequirement } from "./errors.js";

// ---------------------------------------------------------------------------
// Requirement AST
// ---------------------------------------------------------------------------

export type AttributeValue = string | number | boolean | null;

export type TraitRequirement = {
  readonly kind: "trait";
  readonly name: string;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly exact?: number;
};

export type PossessionRequirement = {
  readonly kind: "possession";
  readonly collectionField: string;
  readonly id?: number;
  readonly name?: string;
  readonly attributes?: Readonly<Record<string, AttributeValue>>;
};

export type TagCountRequirement = {
  readonly kind: "tag_count";
  readonly collectionField: string;
  readonly tag: string;
  readonly minimum?: number;
  readonly maximum?: number;
};

export type AllOfRequirement = {
  readonly kind: "all_of";
  readonly children: readonly Requirement[];
};

export type AnyOfRequirement = {
  readonly kind: "any_of";
  readonly children: readonly Requirement[];
};

export type Requirement =
  | TraitRequirement
  | PossessionRequirement
  | TagCountRequirement
  | AllOfRequirement
  | AnyOfRequirement;

export type RequirementKind = Requirement["kind"];

export type TraitBounds = {
  minimum?: number;
  maximum?: number;
  exact?: number;
};

export type CountBounds = {
  minimum?: number;
  maximum?: number;
};

export type PossessionCriteria = {
  id?: number;
  name?: string;
  attributes?: Record<string, AttributeValue>;
};

/** Keys of a stored `has` document that cannot double as attribute names. */
export const RESERVED_POSSESSION_KEYS = ["field", "id", "name"] as const;

// Only nodes produced by the builders below are recognised as requirements.
const builtNodes = new WeakSet<object>();

export function isRequirement(value: unknown): value is Requirement {
  return typeof value === "object" && value !== null && builtNodes.has(value);
}

// ---------------------------------------------------------------------------
// Argument schemas
// ---------------------------------------------------------------------------

const labelSchema = z
  .string({ error: "must be a string" })
  .refine((s) => s.trim().length > 0, { error: "cannot be empty", abort: true })
  .refine((s) => s === s.trim(), {
    error: "cannot have leading or trailing whitespace",
  });

const boundSchema = z
  .int({ error: "must be an integer" })
  .min(0, { error: "must be non-negative" });

export const attributeValueSchema = z.union(
  [z.string(), z.number(), z.boolean(), z.null()],
  { error: "must be a string, number, boolean or null" },
);

export const attributesSchema = z.record(z.string().min(1), attributeValueSchema);

const traitArgsSchema = z
  .object({
    name: labelSchema,
    minimum: boundSchema.optional(),
    maximum: boundSchema.optional(),
    exact: boundSchema.optional(),
  })
  .refine(
    (v) =>
      v.minimum !== undefined || v.maximum !== undefined || v.exact !== undefined,
    { error: "at least one bound (minimum, maximum or exact) is required" },
  )
  .refine(
    (v) =>
      v.minimum === undefined || v.maximum === undefined || v.minimum <= v.maximum,
    { error: "minimum cannot exceed maximum", path: ["maximum"] },
  );

const possessionArgsSchema = z
  .object({
    collectionField: labelSchema,
    id: z
      .int({ error: "must be an integer" })
      .positive({ error: "must be positive" })
      .optional(),
    name: z
      .string({ error: "must be a string" })
      .min(1, { error: "cannot be empty" })
      .optional(),
    attributes: attributesSchema.optional(),
  })
  .refine(
    (v) =>
      v.id !== undefined ||
      v.name !== undefined ||
      (v.attributes !== undefined && Object.keys(v.attributes).length > 0),
    { error: "at least one of id, name or attributes is required" },
  )
  .refine(
    (v) =>
      !RESERVED_POSSESSION_KEYS.some((key) =>
        Object.hasOwn(v.attributes ?? {}, key),
      ),
    {
      error: `attributes cannot use the reserved keys ${RESERVED_POSSESSION_KEYS.join(", ")}`,
      path: ["attributes"],
    },
  );

const tagCountArgsSchema = z
  .object({
    collectionField: labelSchema,
    tag: labelSchema,
    minimum: boundSchema.optional(),
    maximum: boundSchema.optional(),
  })
  .refine((v) => v.minimum !== undefined || v.maximum !== undefined, {
    error: "at least one bound (minimum or maximum) is required",
  })
  .refine(
    (v) =>
      v.minimum === undefined || v.maximum === undefined || v.minimum <= v.maximum,
    { error: "minimum cannot exceed maximum", path: ["maximum"] },
  );

function parseArgs<T>(
  schema: z.ZodType<T>,
  input: unknown,
  label: RequirementKind,
): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequirement(formatIssues(parsed.error, label));
  }
  return parsed.data;
}

/** Flattens zod issues into `prefix.path: message` strings. */
export function formatIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function seal<T extends Requirement>(node: T): T {
  const frozen = Object.freeze(node);
  builtNodes.add(frozen);
  return frozen;
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function trait(name: string, bounds: TraitBounds): TraitRequirement {
  const args = parseArgs(traitArgsSchema, { name, ...bounds }, "trait");
  return seal({
    kind: "trait",
    name: args.name,
    ...(args.minimum !== undefined ? { minimum: args.minimum } : {}),
    ...(args.maximum !== undefined ? { maximum: args.maximum } : {}),
    ...(args.exact !== undefined ? { exact: args.exact } : {}),
  });
}

/** Requires at least one object in `collectionField` matching every criterion. */
export function hasItem(
  collectionField: string,
  criteria: PossessionCriteria,
): PossessionRequirement {
  const args = parseArgs(
    possessionArgsSchema,
    { collectionField, ...criteria },
    "possession",
  );
  const attributes =
    args.attributes && Object.keys(args.attributes).length > 0
      ? Object.freeze({ ...args.attributes })
      : undefined;

  return seal({
    kind: "possession",
    collectionField: args.collectionField,
    ...(args.id !== undefined ? { id: args.id } : {}),
    ...(args.name !== undefined ? { name: args.name } : {}),
    ...(attributes ? { attributes } : {}),
  });
}

export function countWithTag(
  collectionField: string,
  tag: string,
  bounds: CountBounds,
): TagCountRequirement {
  const args = parseArgs(
    tagCountArgsSchema,
    { collectionField, tag, ...bounds },
    "tag_count",
  );
  return seal({
    kind: "tag_count",
    collectionField: args.collectionField,
    tag: args.tag,
    ...(args.minimum !== undefined ? { minimum: args.minimum } : {}),
    ...(args.maximum !== undefined ? { maximum: args.maximum } : {}),
  });
}

export function allOf(children: readonly Requirement[]): AllOfRequirement;
export function allOf(...children: Requirement[]): AllOfRequirement;
export function allOf(...args: unknown[]): AllOfRequirement {
  return seal({ kind: "all_of", children: collectChildren("all_of", args) });
}

export function anyOf(children: readonly Requirement[]): AnyOfRequirement;
export function anyOf(...children: Requirement[]): AnyOfRequirement;
export function anyOf(...args: unknown[]): AnyOfRequirement {
  return seal({ kind: "any_of", children: collectChildren("any_of", args) });
}

/**
 * Accepts either variadic children or a single array of children.
 * Anything that is not a built requirement node is rejected.
 */
function collectChildren(
  label: "all_of" | "any_of",
  args: unknown[],
): readonly Requirement[] {
  const [first] = args;
  let list: readonly unknown[];
  if (args.length === 1 && Array.isArray(first)) {
    list = first;
  } else if (args.length === 1 && !isRequirement(first)) {
    throw new InvalidRequirement(
      `${label}: expected a sequence of requirements`,
    );
  } else {
    list = args;
  }

  const children: Requirement[] = [];
  const issues: string[] = [];
  list.forEach((child, index) => {
    if (isRequirement(child)) {
      children.push(child);
    } else {
      issues.push(`${label}[${index}]: not a requirement`);
    }
  });

  if (issues.length > 0) {
    throw new InvalidRequirement(issues);
  }
  return Object.freeze(children);
}

// ---------------------------------------------------------------------------
// Tree helpers
// ---------------------------------------------------------------------------

/** Depth of the tree; a single leaf has depth 1. */
export function requirementDepth(requirement: Requirement): number {
  switch (requirement.kind) {
    case "trait":
    case "possession":
    case "tag_count":
      return 1;
    case "all_of":
    case "any_of":
      return (
        1 +
        requirement.children.reduce(
          (max, child) => Math.max(max, requirementDepth(child)),
          0,
        )
      );
  }
}

export function countRequirementNodes(requirement: Requirement): number {
  switch (requirement.kind) {
    case "trait":
    case "possession":
    case "tag_count":
      return 1;
    case "all_of":
    case "any_of":
      return requirement.children.reduce(
        (sum, child) => sum + countRequirementNodes(child),
        1,
      );
  }
}
