import { describe, expect, test } from "vitest";
import { groupChains } from "../../src/core/chain";
import { evaluateRetention, findCurrentChain, type RetentionPolicy } from "../../src/core/prune";
import type { BackupRecord } from "../../src/types";
import { daysAgo, makeRecord, NOW } from "../helpers";

const DEFAULT_POLICY: RetentionPolicy = { keepFullDays: 30, keepIncrementalDays: 7 };

function ids(records: BackupRecord[]): string[] {
  return records.map((r) => r.id);
}

describe("evaluateRetention", () => {
  test("deletes a whole chain whose full backup is past keepFullDays", () => {
    const full = makeRecord("full", daysAgo(45));
    const inc = makeRecord("incremental", daysAgo(44), { parent: full });
    const current = makeRecord("full", daysAgo(1));

    const plan = evaluateRetention(groupChains([full, inc, current]), DEFAULT_POLICY, NOW);

    expect(plan.evaluations[0]?.decision).toBe("delete-whole");
    expect(plan.evaluations[0]?.reason).toBe("full backup is older than 30 days");
    expect(ids(plan.evaluations[0]?.delete ?? [])).toEqual([inc.id, full.id]);
    expect(ids(plan.toDelete)).toEqual([inc.id, full.id]);
  });

  test("keeps the full backup and drops stale incrementals", () => {
    const full = makeRecord("full", daysAgo(20));
    const inc1 = makeRecord("incremental", daysAgo(10), { parent: full });
    const inc2 = makeRecord("incremental", daysAgo(9), { parent: inc1 });
    const current = makeRecord("full", daysAgo(1));

    const plan = evaluateRetention(groupChains([full, inc1, inc2, current]), DEFAULT_POLICY, NOW);
    const evaluation = plan.evaluations[0];

    expect(evaluation?.decision).toBe("keep-full-only");
    expect(evaluation?.reason).toBe("oldest incremental is older than 7 days");
    expect(ids(evaluation?.keep ?? [])).toEqual([full.id]);
    expect(ids(evaluation?.delete ?? [])).toEqual([inc2.id, inc1.id]);
    expect(evaluation?.fullAgeDays).toBe(20);
    expect(evaluation?.oldestIncrementalAgeDays).toBe(10);
  });

  test("always keeps the most recent chain", () => {
    const full = makeRecord("full", daysAgo(5));
    const inc = makeRecord("incremental", daysAgo(2), { parent: full });

    const plan = evaluateRetention(groupChains([full, inc]), { keepFullDays: 0, keepIncrementalDays: 0 }, NOW);

    expect(plan.evaluations[0]?.decision).toBe("keep-whole");
    expect(plan.evaluations[0]?.reason).toBe("most recent chain");
    expect(plan.evaluations[0]?.current).toBe(true);
    expect(plan.toDelete).toEqual([]);
  });

  test("keeps a long-term full backup but drops its incremental when a newer chain exists", () => {
    const longTerm = makeRecord("full", daysAgo(200));
    const inc = makeRecord("incremental", daysAgo(20), { parent: longTerm });
    const newer = makeRecord("full", daysAgo(3));

    const plan = evaluateRetention(
      groupChains([longTerm, inc, newer]),
      { keepFullDays: 365, keepIncrementalDays: 14 },
      NOW,
    );

    expect(plan.evaluations[0]?.decision).toBe("keep-full-only");
    expect(ids(plan.evaluations[0]?.keep ?? [])).toEqual([longTerm.id]);
    expect(ids(plan.toDelete)).toEqual([inc.id]);
    expect(plan.evaluations[1]?.current).toBe(true);
  });

  test("keeps backups exactly at the window", () => {
    const full = makeRecord("full", daysAgo(30));
    const inc = makeRecord("incremental", daysAgo(7), { parent: full });
    const current = makeRecord("full", daysAgo(1));

    const plan = evaluateRetention(groupChains([full, inc, current]), DEFAULT_POLICY, NOW);

    expect(plan.evaluations[0]?.decision).toBe("keep-whole");
    expect(plan.evaluations[0]?.reason).toBe("full backup and incrementals within retention");
    expect(plan.toDelete).toEqual([]);
  });

  test("keeps a lone full backup within retention", () => {
    const full = makeRecord("full", daysAgo(10));
    const current = makeRecord("full", daysAgo(1));

    const plan = evaluateRetention(groupChains([full, current]), DEFAULT_POLICY, NOW);

    expect(plan.evaluations[0]?.reason).toBe("full backup within retention");
  });

  test("never deletes orphaned chains and does not count them as current", () => {
    const missing = makeRecord("full", daysAgo(90));
    const orphan = makeRecord("incremental", daysAgo(89), { parent: missing });
    const full = makeRecord("full", daysAgo(60));

    const plan = evaluateRetention(groupChains([orphan, full]), DEFAULT_POLICY, NOW);

    expect(plan.orphaned.map((c) => c.chainStart)).toEqual([missing.id]);
    const orphaned = plan.evaluations.find((e) => e.chain.chainStart === missing.id);
    expect(orphaned?.decision).toBe("keep-orphaned");
    expect(orphaned?.reason).toBe(`chain start ${missing.id} cannot be resolved`);
    expect(orphaned?.delete).toEqual([]);
    // The 60-day chain is the newest resolvable one, so it is kept
    expect(plan.toDelete).toEqual([]);
  });

  test("keeps a chain that holds a second full backup", () => {
    const full = makeRecord("full", daysAgo(60));
    const stray = makeRecord("full", daysAgo(50), { chainStart: full.id });
    const inc = makeRecord("incremental", daysAgo(49), { parent: stray, chainStart: full.id });
    const current = makeRecord("full", daysAgo(1));

    const plan = evaluateRetention(groupChains([full, stray, inc, current]), DEFAULT_POLICY, NOW);

    const malformed = plan.evaluations.find((e) => e.chain.chainStart === full.id);
    expect(malformed?.decision).toBe("keep-malformed");
    expect(malformed?.reason).toBe(`${stray.id} is a full backup inside chain ${full.id}`);
    expect(ids(malformed?.keep ?? [])).toEqual([full.id, stray.id, inc.id]);
    expect(plan.toDelete).toEqual([]);
  });

  test("applies decisions to each chain independently", () => {
    const ancient = makeRecord("full", daysAgo(100));
    const older = makeRecord("full", daysAgo(20));
    const olderInc = makeRecord("incremental", daysAgo(15), { parent: older });
    const recent = makeRecord("full", daysAgo(6));
    const recentInc = makeRecord("incremental", daysAgo(5), { parent: recent });
    const current = makeRecord("full", daysAgo(1));

    const plan = evaluateRetention(
      groupChains([ancient, older, olderInc, recent, recentInc, current]),
      DEFAULT_POLICY,
      NOW,
    );

    expect(plan.evaluations.map((e) => e.decision)).toEqual([
      "delete-whole",
      "keep-full-only",
      "keep-whole",
      "keep-whole",
    ]);
    expect(ids(plan.toDelete)).toEqual([ancient.id, olderInc.id]);
  });

  test("is idempotent once the plan is applied", () => {
    const full = makeRecord("full", daysAgo(20));
    const inc = makeRecord("incremental", daysAgo(10), { parent: full });
    const stale = makeRecord("full", daysAgo(40));
    const current = makeRecord("full", daysAgo(1));
    const records = [stale, full, inc, current];

    const first = evaluateRetention(groupChains(records), DEFAULT_POLICY, NOW);
    const deleted = new Set(ids(first.toDelete));
    const remaining = records.filter((r) => !deleted.has(r.id));
    const second = evaluateRetention(groupChains(remaining), DEFAULT_POLICY, NOW);

    expect(ids(first.toDelete)).toEqual([stale.id, inc.id]);
    expect(second.toDelete).toEqual([]);
  });
});

describe("findCurrentChain", () => {
  test("picks the chain with the newest full backup", () => {
    const older = makeRecord("full", daysAgo(10));
    const newer = makeRecord("full", daysAgo(2));

    expect(findCurrentChain(groupChains([newer, older]))?.chainStart).toBe(newer.id);
  });

  test("returns null when every chain is orphaned", () => {
    const missing = makeRecord("full", daysAgo(10));
    const orphan = makeRecord("incremental", daysAgo(9), { parent: missing });

    expect(findCurrentChain(groupChains([orphan]))).toBeNull();
  });
});
