import { describeError, FactProviderError, InvalidRequirement } from "./errors.js";
import type { FactProvider, PossessionFilter } from "./facts.js";
import {
  isRequirement,
  type AllOfRequirement,
  type AnyOfRequirement,
  type PossessionRequirement,
  type Requirement,
  type TagCountRequirement,
  type TraitRequirement,
} from "./requirement.js";
import { leafResult, type CheckResult } from "./result.js";

type Bounds = {
  minimum?: number;
  maximum?: number;
  exact?: number;
};

/**
 * Evaluates a requirement tree against one character's facts.
 *
 * Depth-first, left to right. Groups evaluate every child so the result tree
 * always reports each sub-requirement. Missing facts yield `passed: false`;
 * a throwing provider surfaces as `FactProviderError`. Only trees built by
 * the builders or the codec are accepted.
 */
export function evaluate(
  requirement: Requirement,
  facts: FactProvider,
): CheckResult {
  if (!isRequirement(requirement)) {
    throw new InvalidRequirement(
      "requirement: not a built requirement; use the builders or deserializeRequirement",
    );
  }
  return evaluateNode(requirement, facts);
}

function evaluateNode(
  requirement: Requirement,
  facts: FactProvider,
): CheckResult {
  switch (requirement.kind) {
    case "trait":
      return evaluateTrait(requirement, facts);
    case "possession":
      return evaluatePossession(requirement, facts);
    case "tag_count":
      return evaluateTagCount(requirement, facts);
    case "all_of":
      return evaluateAllOf(requirement, facts);
    case "any_of":
      return evaluateAnyOf(requirement, facts);
  }
}

export function checkRequirement(
  requirement: Requirement,
  facts: FactProvider,
): boolean {
  return evaluate(requirement, facts).passed;
}

function evaluateTrait(
  requirement: TraitRequirement,
  facts: FactProvider,
): CheckResult {
  const label = capitalize(requirement.name);
  const value = query(`reading trait "${requirement.name}"`, () =>
    facts.getTrait(requirement.name),
  );

  if (value === undefined) {
    return leafResult(
      "trait",
      false,
      `${label} requirement not met (trait not found)`,
    );
  }
  if (!Number.isFinite(value)) {
    throw new FactProviderError(
      `Trait "${requirement.name}" is not a finite number: ${value}`,
    );
  }

  const failed = violations(value, requirement);
  if (failed.length > 0) {
    return leafResult(
      "trait",
      false,
      `${label} requirement not met (${failed.join(", ")})`,
    );
  }
  return leafResult(
    "trait",
    true,
    `${label} requirement met (${value}; required ${describeBounds(requirement)})`,
  );
}

function evaluatePossession(
  requirement: PossessionRequirement,
  facts: FactProvider,
): CheckResult {
  const filter: PossessionFilter = {
    ...(requirement.id !== undefined ? { id: requirement.id } : {}),
    ...(requirement.name !== undefined ? { name: requirement.name } : {}),
    ...(requirement.attributes ? { attributes: requirement.attributes } : {}),
  };
  const found = query(`matching in "${requirement.collectionField}"`, () =>
    facts.hasMatch(requirement.collectionField, filter),
  );
  const criteria = describeCriteria(filter);

  return leafResult(
    "possession",
    found,
    found
      ? `Has matching ${requirement.collectionField} (${criteria})`
      : `No matching ${requirement.collectionField} (${criteria})`,
  );
}

function evaluateTagCount(
  requirement: TagCountRequirement,
  facts: FactProvider,
): CheckResult {
  const subject = `Count of ${requirement.collectionField} tagged "${requirement.tag}"`;
  const count = query(
    `counting "${requirement.tag}" in "${requirement.collectionField}"`,
    () => facts.countTagged(requirement.collectionField, requirement.tag),
  );

  if (!Number.isInteger(count) || count < 0) {
    throw new FactProviderError(
      `Tag count for "${requirement.tag}" in "${requirement.collectionField}" is not a non-negative integer: ${count}`,
    );
  }

  const failed = violations(count, requirement);
  if (failed.length > 0) {
    return leafResult(
      "tag_count",
      false,
      `${subject} not met (${failed.join(", ")})`,
    );
  }
  return leafResult(
    "tag_count",
    true,
    `${subject} met (${count}; required ${describeBounds(requirement)})`,
  );
}

// Empty group passes.
function evaluateAllOf(
  requirement: AllOfRequirement,
  facts: FactProvider,
): CheckResult {
  const children = requirement.children.map((child) =>
    evaluateNode(child, facts),
  );
  const met = children.filter((child) => child.passed).length;
  const passed = met === children.length;

  return {
    passed,
    message: passed
      ? `All requirements met (${met}/${children.length})`
      : `Not all requirements met (${met}/${children.length})`,
    requirementType: "all_of",
    children,
  };
}

// Empty group fails.
function evaluateAnyOf(
  requirement: AnyOfRequirement,
  facts: FactProvider,
): CheckResult {
  const children = requirement.children.map((child) =>
    evaluateNode(child, facts),
  );
  const met = children.filter((child) => child.passed).length;
  const passed = met > 0;

  return {
    passed,
    message: passed
      ? `At least one requirement met (${met}/${children.length})`
      : `No requirements met (0/${children.length})`,
    requirementType: "any_of",
    children,
  };
}

function query<T>(action: string, run: () => T): T {
  try {
    return run();
  } catch (err: unknown) {
    if (err instanceof FactProviderError) throw err;
    throw new FactProviderError(
      `Fact provider failed while ${action}: ${describeError(err)}`,
      err,
    );
  }
}

function violations(value: number, bounds: Bounds): string[] {
  const failed: string[] = [];
  if (bounds.minimum !== undefined && value < bounds.minimum) {
    failed.push(`${value} < ${bounds.minimum}`);
  }
  if (bounds.maximum !== undefined && value > bounds.maximum) {
    failed.push(`${value} > ${bounds.maximum}`);
  }
  if (bounds.exact !== undefined && value !== bounds.exact) {
    failed.push(`${value} != ${bounds.exact}`);
  }
  return failed;
}

function describeBounds(bounds: Bounds): string {
  const parts: string[] = [];
  if (bounds.minimum !== undefined) parts.push(`>= ${bounds.minimum}`);
  if (bounds.maximum !== undefined) parts.push(`<= ${bounds.maximum}`);
  if (bounds.exact !== undefined) parts.push(`== ${bounds.exact}`);
  return parts.join(" and ");
}

function describeCriteria(filter: PossessionFilter): string {
  const parts: string[] = [];
  if (filter.id !== undefined) parts.push(`id=${filter.id}`);
  if (filter.name !== undefined) parts.push(`name=${filter.name}`);
  for (const [key, value] of Object.entries(filter.attributes ?? {})) {
    parts.push(`${key}=${String(value)}`);
  }
  return parts.join(", ");
}

function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1);
}
