import type { AttributeValue } from "./requirement.js";

export type PossessionFilter = {
  id?: number;
  name?: string;
  attributes?: Readonly<Record<string, AttributeValue>>;
};

/**
 * Read-only view of one character's facts. Implementations decide where the
 * data lives; the engine only ever calls these three queries.
 */
export interface FactProvider {
  /** Used by audit sinks to tell characters apart. */
  readonly identity?: string;
  getTrait(name: string): number | undefined;
  hasMatch(collection: string, filter: PossessionFilter): boolean;
  countTagged(collection: string, tag: string): number;
}

export type PossessedObject = {
  id: number;
  name: string;
  tags: readonly string[];
  attributes: Readonly<Record<string, AttributeValue>>;
};

export type CharacterFacts = {
  identity?: string;
  traits: Readonly<Record<string, number>>;
  collections: Readonly<Record<string, readonly PossessedObject[]>>;
};

export function matchesFilter(
  object: PossessedObject,
  filter: PossessionFilter,
): boolean {
  if (filter.id !== undefined && object.id !== filter.id) return false;
  if (filter.name !== undefined && object.name !== filter.name) return false;
  for (const [key, expected] of Object.entries(filter.attributes ?? {})) {
    if (!Object.hasOwn(object.attributes, key)) return false;
    if (object.attributes[key] !== expected) return false;
  }
  return true;
}

/** Fact provider over an in-memory snapshot of a character. */
export function createSnapshotFactProvider(facts: CharacterFacts): FactProvider {
  const collectionOf = (name: string): readonly PossessedObject[] =>
    Object.hasOwn(facts.collections, name) ? (facts.collections[name] ?? []) : [];

  return {
    identity: facts.identity,
    getTrait(name) {
      if (!Object.hasOwn(facts.traits, name)) return undefined;
      return facts.traits[name];
    },
    hasMatch(collection, filter) {
      return collectionOf(collection).some((object) =>
        matchesFilter(object, filter),
      );
    },
    countTagged(collection, tag) {
      let count = 0;
      for (const object of collectionOf(collection)) {
        if (object.tags.includes(tag)) count += 1;
      }
      return count;
    },
  };
}

/** Shorthand for building a snapshot in tests and fixtures. */
export function possessed(
  id: number,
  name: string,
  options: { tags?: string[]; attributes?: Record<string, AttributeValue> } = {},
): PossessedObject {
  return {
    id,
    name,
    tags: options.tags ?? [],
    attributes: options.attributes ?? {},
  };
}
