import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";
import { sql } from "drizzle-orm";

import { ensureSchema } from "../db/migrate.js";
import * as schema from "../db/schema.js";
import {
  ANONYMOUS_PROVIDER,
  createDatabaseAuditSink,
  createMemoryAuditSink,
  evaluateWithAudit,
  listAuditEntries,
} from "./audit.js";
import { createSnapshotFactProvider } from "./facts.js";
import { anyOf, trait } from "./requirement.js";

const facts = createSnapshotFactProvider({
  identity: "character:1",
  traits: { strength: 3 },
  collections: {},
});

const at = (iso: string) => () => new Date(iso);

describe("memory audit sink", () => {
  it("records one entry per evaluation", () => {
    const sink = createMemoryAuditSink();
    const requirement = trait("strength", { minimum: 3 });

    const result = evaluateWithAudit(requirement, facts, {
      sink,
      now: at("2026-01-02T03:04:05.000Z"),
    });

    expect(result.passed).toBe(true);
    expect(sink.entries()).toEqual([
      {
        requirement: { trait: { name: "strength", min: 3 } },
        factProviderIdentity: "character:1",
        result,
        timestamp: new Date("2026-01-02T03:04:05.000Z"),
      },
    ]);
  });

  it("labels providers without identity as anonymous", () => {
    const sink = createMemoryAuditSink();
    evaluateWithAudit(
      trait("strength", { minimum: 1 }),
      createSnapshotFactProvider({ traits: {}, collections: {} }),
      { sink },
    );
    expect(sink.entries()[0]?.factProviderIdentity).toBe(ANONYMOUS_PROVIDER);
  });

  it("clears recorded entries", () => {
    const sink = createMemoryAuditSink();
    evaluateWithAudit(trait("strength", { minimum: 1 }), facts, { sink });
    sink.clear();
    expect(sink.entries()).toEqual([]);
  });
});

describe("database audit sink", () => {
  let client: PGlite;
  let db: PgliteDatabase<typeof schema>;

  beforeAll(async () => {
    client = new PGlite();
    db = drizzle({ client, schema });
    await ensureSchema(db);
  });

  afterAll(async () => {
    await client.close();
  });

  beforeEach(async () => {
    await db.execute(sql`TRUNCATE requirement_audit RESTART IDENTITY`);
  });

  it("buffers until flushed", async () => {
    const sink = createDatabaseAuditSink(db);
    evaluateWithAudit(trait("strength", { minimum: 3 }), facts, {
      sink,
      now: at("2026-01-02T03:04:05.000Z"),
    });
    evaluateWithAudit(trait("strength", { minimum: 4 }), facts, {
      sink,
      now: at("2026-01-02T03:04:06.000Z"),
    });

    expect(sink.pending()).toBe(2);
    expect(await listAuditEntries(db)).toEqual([]);

    expect(await sink.flush()).toBe(2);
    expect(sink.pending()).toBe(0);
    expect(await sink.flush()).toBe(0);

    const rows = await listAuditEntries(db, "character:1");
    expect(
      rows.map((row) => ({
        requirement: row.requirement,
        passed: row.passed,
        checkedAt: row.checkedAt.toISOString(),
      })),
    ).toEqual([
      {
        requirement: { trait: { name: "strength", min: 4 } },
        passed: false,
        checkedAt: "2026-01-02T03:04:06.000Z",
      },
      {
        requirement: { trait: { name: "strength", min: 3 } },
        passed: true,
        checkedAt: "2026-01-02T03:04:05.000Z",
      },
    ]);
  });

  it("stores the full result tree", async () => {
    const sink = createDatabaseAuditSink(db);
    const result = evaluateWithAudit(
      anyOf(trait("strength", { minimum: 5 }), trait("wits", { minimum: 1 })),
      facts,
      { sink },
    );
    await sink.flush();

    const [row] = await listAuditEntries(db);
    expect(row?.result).toEqual(result);
    expect(row?.providerIdentity).toBe("character:1");
  });

  it("filters by provider identity", async () => {
    const sink = createDatabaseAuditSink(db);
    evaluateWithAudit(trait("strength", { minimum: 1 }), facts, { sink });
    evaluateWithAudit(
      trait("strength", { minimum: 1 }),
      createSnapshotFactProvider({
        identity: "character:2",
        traits: {},
        collections: {},
      }),
      { sink },
    );
    await sink.flush();

    expect(await listAuditEntries(db)).toHaveLength(2);
    const rows = await listAuditEntries(db, "character:2");
    expect(rows.map((row) => row.passed)).toEqual([false]);
  });

  it("keeps entries when the insert fails", async () => {
    const bare = new PGlite();
    const sink = createDatabaseAuditSink(drizzle({ client: bare, schema }));
    evaluateWithAudit(trait("strength", { minimum: 1 }), facts, { sink });

    await expect(sink.flush()).rejects.toThrow();
    expect(sink.pending()).toBe(1);
    await bare.close();
  });
});
