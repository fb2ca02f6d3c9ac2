import { and, eq, sql } from "drizzle-orm";
import type { InferInsertModel, InferSelectModel } from "drizzle-orm";
import type { PgliteDatabase } from "drizzle-orm/pglite";

import type { AttributeValue } from "../lib/requirement.js";
import { character, possession } from "./schema.js";
import type * as schema from "./schema.js";

type CharacterDatabase = PgliteDatabase<typeof schema>;

export type CharacterRow = InferSelectModel<typeof character>;
export type PossessionRow = InferSelectModel<typeof possession>;

export type CreateCharacterInput = {
  name: string;
  traits?: Record<string, number>;
};

export type PossessionInput = {
  collection: string;
  objectId: number;
  name: string;
  tags?: string[];
  attributes?: Record<string, AttributeValue>;
};

export async function insertCharacter(
  db: CharacterDatabase,
  input: CreateCharacterInput,
): Promise<CharacterRow> {
  const values = {
    name: input.name,
    traits: { ...input.traits },
  } satisfies Omit<InferInsertModel<typeof character>, "id">;

  const [row] = await db.insert(character).values(values).returning();
  if (!row) {
    throw new Error("Failed to insert character");
  }
  return row;
}

export async function getCharacterById(
  db: CharacterDatabase,
  id: number,
): Promise<CharacterRow | undefined> {
  const [row] = await db.select().from(character).where(eq(character.id, id));
  return row;
}

/** Merges `traits` into the stored map; returns undefined for an unknown id. */
export async function updateTraits(
  db: CharacterDatabase,
  id: number,
  traits: Record<string, number>,
): Promise<CharacterRow | undefined> {
  const [row] = await db
    .update(character)
    .set({
      traits: sql`${character.traits} || ${JSON.stringify(traits)}::jsonb`,
      updatedAt: new Date(),
    })
    .where(eq(character.id, id))
    .returning();
  return row;
}

export async function deleteCharacter(
  db: CharacterDatabase,
  id: number,
): Promise<boolean> {
  const deleted = await db
    .delete(character)
    .where(eq(character.id, id))
    .returning({ id: character.id });
  return deleted.length > 0;
}

export async function listPossessions(
  db: CharacterDatabase,
  characterId: number,
): Promise<PossessionRow[]> {
  return db
    .select()
    .from(possession)
    .where(eq(possession.characterId, characterId))
    .orderBy(possession.collection, possession.objectId);
}

/** Inserts or replaces the object `objectId` in `collection`. */
export async function upsertPossession(
  db: CharacterDatabase,
  characterId: number,
  input: PossessionInput,
): Promise<PossessionRow> {
  const values = {
    characterId,
    collection: input.collection,
    objectId: input.objectId,
    name: input.name,
    tags: input.tags ?? [],
    attributes: input.attributes ?? {},
  } satisfies InferInsertModel<typeof possession>;

  const [row] = await db
    .insert(possession)
    .values(values)
    .onConflictDoUpdate({
      target: [possession.characterId, possession.collection, possession.objectId],
      set: {
        name: values.name,
        tags: values.tags,
        attributes: values.attributes,
      },
    })
    .returning();
  if (!row) {
    throw new Error("Failed to store possession");
  }
  return row;
}

export async function deletePossession(
  db: CharacterDatabase,
  characterId: number,
  collection: string,
  objectId: number,
): Promise<boolean> {
  const deleted = await db
    .delete(possession)
    .where(
      and(
        eq(possession.characterId, characterId),
        eq(possession.collection, collection),
        eq(possession.objectId, objectId),
      ),
    )
    .returning({ objectId: possession.objectId });
  return deleted.length > 0;
}
