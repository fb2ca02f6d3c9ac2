import { describe, expect, it } from "vitest";

import {
  createSnapshotFactProvider,
  matchesFilter,
  possessed,
} from "./facts.js";

const sword = possessed(1, "Magic Sword", {
  tags: ["blade", "enchanted"],
  attributes: { material: "steel", charges: 3 },
});

describe("matchesFilter", () => {
  it("matches on every supplied criterion", () => {
    expect(matchesFilter(sword, { id: 1 })).toBe(true);
    expect(matchesFilter(sword, { id: 1, name: "Magic Sword" })).toBe(true);
    expect(matchesFilter(sword, { id: 2, name: "Magic Sword" })).toBe(false);
    expect(matchesFilter(sword, { attributes: { material: "steel" } })).toBe(true);
  });

  it("compares attribute values strictly", () => {
    expect(matchesFilter(sword, { attributes: { charges: "3" } })).toBe(false);
    expect(matchesFilter(sword, { attributes: { charges: 3 } })).toBe(true);
  });

  it("treats a missing attribute as a mismatch, even against null", () => {
    expect(matchesFilter(sword, { attributes: { owner: null } })).toBe(false);
  });

  it("matches anything with an empty filter", () => {
    expect(matchesFilter(sword, {})).toBe(true);
  });
});

describe("createSnapshotFactProvider", () => {
  const facts = createSnapshotFactProvider({
    identity: "character:7",
    traits: { strength: 3, willpower: 0 },
    collections: {
      weapons: [sword, possessed(2, "Dagger", { tags: ["blade"] })],
      spheres: [possessed(1, "Forces", { tags: ["elemental"] })],
    },
  });

  it("exposes the identity", () => {
    expect(facts.identity).toBe("character:7");
  });

  it("reads traits, including zero", () => {
    expect(facts.getTrait("strength")).toBe(3);
    expect(facts.getTrait("willpower")).toBe(0);
    expect(facts.getTrait("arete")).toBeUndefined();
  });

  it("does not see inherited object keys", () => {
    expect(facts.getTrait("toString")).toBeUndefined();
    expect(facts.hasMatch("constructor", { id: 1 })).toBe(false);
  });

  it("answers possession queries", () => {
    expect(facts.hasMatch("weapons", { name: "Dagger" })).toBe(true);
    expect(facts.hasMatch("weapons", { name: "Staff" })).toBe(false);
    expect(facts.hasMatch("armor", { id: 1 })).toBe(false);
  });

  it("counts tagged objects", () => {
    expect(facts.countTagged("weapons", "blade")).toBe(2);
    expect(facts.countTagged("weapons", "enchanted")).toBe(1);
    expect(facts.countTagged("spheres", "blade")).toBe(0);
    expect(facts.countTagged("armor", "blade")).toBe(0);
  });
});
