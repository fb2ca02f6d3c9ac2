import { describe, expect, it } from "vitest";

import type { RequirementDocument } from "../db/schema.js";
import {
  DEFAULT_MAX_DEPTH,
  deserializeRequirement,
  parseRequirementJson,
  serializeRequirement,
  validateRequirementDocument,
} from "./codec.js";
import { InvalidRequirement } from "./errors.js";
import {
  allOf,
  anyOf,
  countWithTag,
  hasItem,
  isRequirement,
  requirementDepth,
  trait,
} from "./requirement.js";

function issuesOf(document: unknown, maxDepth?: number): string[] {
  const outcome = validateRequirementDocument(document, { maxDepth });
  return outcome.valid ? [] : outcome.errors;
}

function nested(depth: number): RequirementDocument {
  let document: RequirementDocument = { trait: { name: "strength", min: 1 } };
  for (let level = 1; level < depth; level += 1) {
    document = { all: [document] };
  }
  return document;
}

describe("deserializeRequirement", () => {
  it("reads every variant into built nodes", () => {
    const requirement = deserializeRequirement({
      all: [
        { trait: { name: "strength", min: 3 } },
        { has: { field: "foci", name: "Primary Focus", material: "jade" } },
        { any: [{ count_tag: { model: "spheres", tag: "elemental", minimum: 2 } }] },
      ],
    });

    expect(isRequirement(requirement)).toBe(true);
    expect(requirement).toEqual(
      allOf(
        trait("strength", { minimum: 3 }),
        hasItem("foci", { name: "Primary Focus", attributes: { material: "jade" } }),
        anyOf(countWithTag("spheres", "elemental", { minimum: 2 })),
      ),
    );
  });

  it("rejects a trait without constraints", () => {
    expect(() => deserializeRequirement({ trait: { name: "strength" } })).toThrow(
      InvalidRequirement,
    );
    expect(issuesOf({ trait: { name: "strength" } })).toEqual([
      "trait: at least one constraint (min, max or exact) is required",
    ]);
  });

  it("accepts empty groups", () => {
    expect(deserializeRequirement({ all: [] })).toEqual(allOf());
    expect(deserializeRequirement({ any: [] })).toEqual(anyOf());
  });

  it("rejects documents that are not single-key objects", () => {
    expect(issuesOf("strength")).toEqual(["requirement: must be an object"]);
    expect(issuesOf([])).toEqual(["requirement: must be an object"]);
    expect(issuesOf({})).toEqual([
      "requirement: must contain exactly one requirement type, got 0",
    ]);
    expect(
      issuesOf({
        trait: { name: "strength", min: 1 },
        has: { field: "weapons", id: 1 },
      }),
    ).toEqual([
      "requirement: must contain exactly one requirement type, got 2 (trait, has)",
    ]);
    expect(issuesOf({ level: { min: 3 } })).toEqual([
      'requirement: unknown requirement type "level"',
    ]);
  });

  it("collects issues from every child with their paths", () => {
    expect(
      issuesOf({
        all: [
          { trait: { name: "strength", min: 3 } },
          { trait: { name: "", min: 1 } },
          { has: { field: "weapons" } },
        ],
      }),
    ).toEqual([
      "all[1].trait.name: cannot be empty",
      "all[2].has: must specify id, name or at least one attribute",
    ]);
  });

  it("checks bounds", () => {
    expect(issuesOf({ trait: { name: "strength", min: 5, max: 3 } })).toEqual([
      "trait.max: max cannot be less than min",
    ]);
    expect(issuesOf({ trait: { name: "strength", min: -1 } })).toContain(
      "trait.min: must be non-negative",
    );
    expect(
      issuesOf({
        count_tag: { model: "spheres", tag: "elemental", minimum: 3, maximum: 1 },
      }),
    ).toEqual(["count_tag.maximum: maximum cannot be less than minimum"]);
    expect(issuesOf({ has: { field: "weapons", id: 0 } })).toContain(
      "has.id: must be positive",
    );
  });

  it("reports a missing name", () => {
    expect(issuesOf({ trait: { min: 1 } })).toContain("trait.name: is required");
  });

  it("rejects unknown trait keys and non-scalar attributes", () => {
    expect(() =>
      deserializeRequirement({ trait: { name: "strength", min: 1, bonus: 2 } }),
    ).toThrow(InvalidRequirement);
    expect(issuesOf({ has: { field: "weapons", runes: [1, 2] } })).toContain(
      "has.runes: must be a string, number, boolean or null",
    );
  });

  it("requires group bodies to be lists", () => {
    expect(issuesOf({ any: { trait: { name: "strength", min: 1 } } })).toEqual([
      "any: must be a list of requirements",
    ]);
  });

  it("limits nesting depth", () => {
    expect(
      issuesOf(
        { all: [{ any: [{ trait: { name: "strength", min: 1 } }] }] },
        2,
      ),
    ).toEqual(["all[0].any[0]: exceeds maximum depth of 2"]);

    expect(requirementDepth(deserializeRequirement(nested(DEFAULT_MAX_DEPTH)))).toBe(
      DEFAULT_MAX_DEPTH,
    );
    const issues = issuesOf(nested(DEFAULT_MAX_DEPTH + 1));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/: exceeds maximum depth of 16$/);
  });
});

describe("serializeRequirement", () => {
  it("writes the stored document format", () => {
    expect(
      serializeRequirement(
        anyOf(
          trait("arete", { minimum: 1, maximum: 5, exact: 3 }),
          countWithTag("spheres", "elemental", { maximum: 4 }),
        ),
      ),
    ).toEqual({
      any: [
        { trait: { name: "arete", min: 1, max: 5, exact: 3 } },
        { count_tag: { model: "spheres", tag: "elemental", maximum: 4 } },
      ],
    });
  });

  it("puts field, id and name before attributes", () => {
    const document = serializeRequirement(
      hasItem("weapons", { id: 7, name: "Magic Sword", attributes: { enchanted: true } }),
    );
    expect(document).toEqual({
      has: { field: "weapons", id: 7, name: "Magic Sword", enchanted: true },
    });
    expect("has" in document && Object.keys(document.has)).toEqual([
      "field",
      "id",
      "name",
      "enchanted",
    ]);
  });

  it("reproduces a well-formed document", () => {
    const document: RequirementDocument = {
      all: [
        { trait: { name: "arete", min: 4 } },
        { has: { field: "foci", id: 3, school: "hermetic" } },
        {
          any: [
            { count_tag: { model: "spheres", tag: "elemental", minimum: 2 } },
            { trait: { name: "willpower", exact: 5 } },
          ],
        },
      ],
    };
    expect(serializeRequirement(deserializeRequirement(document))).toEqual(document);
  });

  it("rejects padded labels rather than rewriting them", () => {
    expect(issuesOf({ trait: { name: " strength", min: 3 } })).toEqual([
      "trait.name: cannot have leading or trailing whitespace",
    ]);
    expect(issuesOf({ has: { field: "weapons ", id: 1 } })).toEqual([
      "has.field: cannot have leading or trailing whitespace",
    ]);
    expect(
      issuesOf({ count_tag: { model: "spheres", tag: "elemental\t", minimum: 1 } }),
    ).toEqual(["count_tag.tag: cannot have leading or trailing whitespace"]);
  });

  it("keeps inner spacing and possession names exactly as stored", () => {
    const document: RequirementDocument = {
      any: [
        { trait: { name: "fire resistance", min: 1 } },
        { has: { field: "weapons", name: " Magic Sword " } },
      ],
    };
    expect(serializeRequirement(deserializeRequirement(document))).toEqual(document);
  });
});

describe("parseRequirementJson", () => {
  it("parses JSON text", () => {
    expect(parseRequirementJson('{"trait":{"name":"strength","min":3}}')).toEqual(
      trait("strength", { minimum: 3 }),
    );
  });

  it("reports malformed JSON as an invalid requirement", () => {
    let caught: unknown;
    try {
      parseRequirementJson("{");
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidRequirement);
    expect(caught instanceof InvalidRequirement && caught.issues[0]).toMatch(
      /^invalid JSON: /,
    );
  });
});

describe("validateRequirementDocument", () => {
  it("returns valid for a good document", () => {
    expect(
      validateRequirementDocument({ has: { field: "weapons", name: "Dagger" } }),
    ).toEqual({ valid: true, requirement: hasItem("weapons", { name: "Dagger" }) });
  });
});
