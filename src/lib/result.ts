import type { RequirementKind } from "./requirement.js";

/** Outcome of one requirement node; `children` mirrors the requirement tree. */
export type CheckResult = {
  passed: boolean;
  message: string;
  requirementType: RequirementKind;
  children: readonly CheckResult[];
};

export type ResultSummary = {
  passed: boolean;
  total: number;
  passedCount: number;
  failedCount: number;
};

export function leafResult(
  requirementType: RequirementKind,
  passed: boolean,
  message: string,
): CheckResult {
  return { passed, message, requirementType, children: [] };
}

export function isLeafResult(result: CheckResult): boolean {
  return result.requirementType !== "all_of" && result.requirementType !== "any_of";
}

/**
 * Messages of every failing leaf, depth-first and left to right.
 * Failing leaves under a passing `any_of` are included: they still did not hold.
 * An empty group that failed reports its own message.
 */
export function getFailureReasons(result: CheckResult): string[] {
  if (isLeafResult(result) || result.children.length === 0) {
    return result.passed ? [] : [result.message];
  }
  return result.children.flatMap((child) => getFailureReasons(child));
}

/** Leaf-level counts for a result tree. */
export function summarizeResult(result: CheckResult): ResultSummary {
  let total = 0;
  let passedCount = 0;
  visitLeaves(result, (leaf) => {
    total += 1;
    if (leaf.passed) passedCount += 1;
  });
  return {
    passed: result.passed,
    total,
    passedCount,
    failedCount: total - passedCount,
  };
}

/** One line per node, two spaces of indent per level. */
export function formatResult(result: CheckResult, depth = 0): string {
  const line = `${"  ".repeat(depth)}${result.passed ? "✓" : "✗"} ${result.message}`;
  const rest = result.children.map((child) => formatResult(child, depth + 1));
  return [line, ...rest].join("\n");
}

function visitLeaves(
  result: CheckResult,
  visit: (leaf: CheckResult) => void,
): void {
  if (isLeafResult(result)) {
    visit(result);
    return;
  }
  for (const child of result.children) {
    visitLeaves(child, visit);
  }
}
