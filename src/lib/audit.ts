import { desc, eq } from "drizzle-orm";
import type { PgliteDatabase } from "drizzle-orm/pglite";

import * as schema from "../db/schema.js";
import { requirementAudit, type RequirementDocument } from "../db/schema.js";
import { evaluate } from "./checker.js";
import { serializeRequirement } from "./codec.js";
import type { FactProvider } from "./facts.js";
import type { Requirement } from "./requirement.js";
import type { CheckResult } from "./result.js";

export type DatabaseClient = PgliteDatabase<typeof schema>;

export type AuditRow = typeof requirementAudit.$inferSelect;

export type AuditEntry = {
  requirement: RequirementDocument;
  factProviderIdentity: string;
  result: CheckResult;
  timestamp: Date;
};

export interface AuditSink {
  record(entry: AuditEntry): void;
}

export type MemoryAuditSink = AuditSink & {
  entries(): readonly AuditEntry[];
  clear(): void;
};

export type DatabaseAuditSink = AuditSink & {
  pending(): number;
  /** Writes buffered entries in one insert; returns how many were written. */
  flush(): Promise<number>;
};

export type AuditOptions = {
  sink: AuditSink;
  now?: () => Date;
};

export const ANONYMOUS_PROVIDER = "anonymous";

export function createMemoryAuditSink(): MemoryAuditSink {
  const recorded: AuditEntry[] = [];
  return {
    record(entry) {
      recorded.push(entry);
    },
    entries: () => recorded,
    clear() {
      recorded.length = 0;
    },
  };
}

/**
 * Buffers entries in memory so evaluation stays synchronous; callers flush
 * once the request is done. Entries survive a failed flush.
 */
export function createDatabaseAuditSink(db: DatabaseClient): DatabaseAuditSink {
  let buffered: AuditEntry[] = [];

  return {
    record(entry) {
      buffered.push(entry);
    },
    pending: () => buffered.length,
    async flush() {
      if (buffered.length === 0) return 0;
      const batch = buffered;
      buffered = [];
      try {
        await db.insert(requirementAudit).values(
          batch.map((entry) => ({
            providerIdentity: entry.factProviderIdentity,
            requirement: entry.requirement,
            result: entry.result,
            passed: entry.result.passed,
            checkedAt: entry.timestamp,
          })),
        );
      } catch (err: unknown) {
        buffered = [...batch, ...buffered];
        throw err;
      }
      return batch.length;
    },
  };
}

/** Evaluates, then records one audit entry for the call. */
export function evaluateWithAudit(
  requirement: Requirement,
  facts: FactProvider,
  options: AuditOptions,
): CheckResult {
  const result = evaluate(requirement, facts);
  options.sink.record({
    requirement: serializeRequirement(requirement),
    factProviderIdentity: facts.identity ?? ANONYMOUS_PROVIDER,
    result,
    timestamp: options.now ? options.now() : new Date(),
  });
  return result;
}

/** Newest first. */
export async function listAuditEntries(
  db: DatabaseClient,
  providerIdentity?: string,
): Promise<AuditRow[]> {
  return db
    .select()
    .from(requirementAudit)
    .where(
      providerIdentity
        ? eq(requirementAudit.providerIdentity, providerIdentity)
        : undefined,
    )
    .orderBy(desc(requirementAudit.checkedAt), desc(requirementAudit.id));
}
