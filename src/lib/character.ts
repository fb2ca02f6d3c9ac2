import { eq } from "drizzle-orm";
import type { PgliteDatabase } from "drizzle-orm/pglite";
import { z } from "zod";

import * as schema from "../db/schema.js";
import { character } from "../db/schema.js";
import {
  CharacterNotFound,
  describeError,
  FactProviderError,
} from "./errors.js";
import {
  createSnapshotFactProvider,
  type CharacterFacts,
  type FactProvider,
  type PossessedObject,
} from "./facts.js";

type DatabaseClient = PgliteDatabase<typeof schema>;

const storedTraitsSchema = z.record(z.string(), z.number());

export function characterIdentity(characterId: number): string {
  return `character:${characterId}`;
}

/**
 * Snapshots a character's traits and possessions so requirements can be
 * evaluated without further queries. Later writes are not reflected.
 */
export async function loadCharacterFacts(
  db: DatabaseClient,
  characterId: number,
): Promise<CharacterFacts> {
  const row = await db.query.character
    .findFirst({
      where: eq(character.id, characterId),
      columns: { id: true, traits: true },
      with: {
        possessions: {
          columns: {
            collection: true,
            objectId: true,
            name: true,
            tags: true,
            attributes: true,
          },
          orderBy: (rows, { asc }) => [asc(rows.collection), asc(rows.objectId)],
        },
      },
    })
    .catch((err: unknown) => {
      throw new FactProviderError(
        `Failed to load character ${characterId}: ${describeError(err)}`,
        err,
      );
    });

  if (!row) {
    throw new CharacterNotFound(characterId);
  }

  const traits = storedTraitsSchema.safeParse(row.traits ?? {});
  if (!traits.success) {
    throw new FactProviderError(
      `Character ${characterId} has non-numeric traits`,
      traits.error,
    );
  }

  const collections: Record<string, PossessedObject[]> = {};
  for (const item of row.possessions) {
    const list = collections[item.collection] ?? [];
    list.push({
      id: item.objectId,
      name: item.name,
      tags: Array.isArray(item.tags) ? item.tags : [],
      attributes: item.attributes ?? {},
    });
    collections[item.collection] = list;
  }

  return {
    identity: characterIdentity(row.id),
    traits: traits.data,
    collections,
  };
}

export async function loadCharacterFactProvider(
  db: DatabaseClient,
  characterId: number,
): Promise<FactProvider> {
  return createSnapshotFactProvider(await loadCharacterFacts(db, characterId));
}
