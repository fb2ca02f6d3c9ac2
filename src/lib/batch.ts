import type { RequirementDocument } from "../db/schema.js";
import { evaluate } from "./checker.js";
import { deserializeRequirement, type DeserializeOptions } from "./codec.js";
import { RequirementError } from "./errors.js";
import type { FactProvider } from "./facts.js";
import { isRequirement, type Requirement } from "./requirement.js";
import type { CheckResult } from "./result.js";

/** A built requirement tree, or a stored document still to be deserialized. */
export type RequirementInput = Requirement | RequirementDocument;

export type ManyOutcome = {
  results: Record<string, CheckResult>;
  errors: Record<string, RequirementError>;
};

export type AcrossOutcome = {
  /** One slot per provider, `null` where that provider's evaluation failed. */
  results: Array<CheckResult | null>;
  errors: Map<number, RequirementError>;
};

export function resolveRequirement(
  input: unknown,
  options: DeserializeOptions = {},
): Requirement {
  return isRequirement(input) ? input : deserializeRequirement(input, options);
}

/**
 * One character, many requirements. Every key is evaluated on its own; a
 * malformed document or failing provider lands in `errors` under its key.
 */
export function evaluateMany(
  requirements: Readonly<Record<string, RequirementInput>>,
  facts: FactProvider,
  options: DeserializeOptions = {},
): ManyOutcome {
  // Collected in maps so keys such as "__proto__" stay own properties.
  const results = new Map<string, CheckResult>();
  const errors = new Map<string, RequirementError>();

  for (const [key, input] of Object.entries(requirements)) {
    try {
      results.set(key, evaluate(resolveRequirement(input, options), facts));
    } catch (err: unknown) {
      if (!(err instanceof RequirementError)) throw err;
      errors.set(key, err);
    }
  }

  return {
    results: Object.fromEntries(results),
    errors: Object.fromEntries(errors),
  };
}

/**
 * One requirement, many characters. The requirement is resolved once; if it
 * is malformed every slot reports the same error.
 */
export function evaluateAcross(
  requirement: RequirementInput,
  providers: readonly FactProvider[],
  options: DeserializeOptions = {},
): AcrossOutcome {
  const outcome: AcrossOutcome = { results: [], errors: new Map() };

  let resolved: Requirement;
  try {
    resolved = resolveRequirement(requirement, options);
  } catch (err: unknown) {
    if (!(err instanceof RequirementError)) throw err;
    providers.forEach((_, index) => {
      outcome.results.push(null);
      outcome.errors.set(index, err);
    });
    return outcome;
  }

  providers.forEach((facts, index) => {
    try {
      outcome.results.push(evaluate(resolved, facts));
    } catch (err: unknown) {
      if (!(err instanceof RequirementError)) throw err;
      outcome.results.push(null);
      outcome.errors.set(index, err);
    }
  });

  return outcome;
}
