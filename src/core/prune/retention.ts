/**
 * Two-tier retention policy
 *
 * Decides, per chain, whether to keep it whole, keep only its full backup,
 * or delete it. Incrementals are only ever removed as the complete set of
 * their chain, so no kept backup ever loses an ancestor.
 */

import type { BackupRecord, Chain } from "../../types";
import { ageInDays } from "../../utils/format";
import { oldestIncremental } from "../chain";

export interface RetentionPolicy {
  keepFullDays: number;
  keepIncrementalDays: number;
}

export type RetentionDecision =
  | "keep-whole"
  | "keep-full-only"
  | "delete-whole"
  | "keep-orphaned"
  | "keep-malformed";

export interface ChainEvaluation {
  chain: Chain;
  decision: RetentionDecision;
  reason: string;
  /** Age of the full backup in days (null for orphaned chains) */
  fullAgeDays: number | null;
  /** Age of the oldest incremental in days (null when there is none) */
  oldestIncrementalAgeDays: number | null;
  /** Whether this is the most recent chain, which is never pruned */
  current: boolean;
  keep: BackupRecord[];
  /** Backups to remove, newest first */
  delete: BackupRecord[];
}

export interface RetentionPlan {
  evaluations: ChainEvaluation[];
  toDelete: BackupRecord[];
  orphaned: Chain[];
}

export function evaluateRetention(
  chains: Chain[],
  policy: RetentionPolicy,
  now: Date = new Date(),
): RetentionPlan {
  const current = findCurrentChain(chains);
  const evaluations = chains.map((chain) => evaluateChain(chain, chain === current, policy, now));

  return {
    evaluations,
    toDelete: evaluations.flatMap((e) => e.delete),
    orphaned: evaluations.filter((e) => e.decision === "keep-orphaned").map((e) => e.chain),
  };
}

/**
 * The most recent chain by full-backup timestamp; orphaned chains never count.
 */
export function findCurrentChain(chains: Chain[]): Chain | null {
  let current: Chain | null = null;
  for (const chain of chains) {
    if (!chain.full) continue;
    if (!current?.full) {
      current = chain;
      continue;
    }
    const diff = chain.full.timestamp.getTime() - current.full.timestamp.getTime();
    if (diff > 0 || (diff === 0 && chain.chainStart > current.chainStart)) {
      current = chain;
    }
  }
  return current;
}

function evaluateChain(
  chain: Chain,
  isCurrent: boolean,
  policy: RetentionPolicy,
  now: Date,
): ChainEvaluation {
  const oldest = oldestIncremental(chain);
  const oldestIncrementalAgeDays = oldest ? ageInDays(oldest.timestamp, now) : null;

  if (!chain.full) {
    return {
      chain,
      decision: "keep-orphaned",
      reason: `chain start ${chain.chainStart} cannot be resolved`,
      fullAgeDays: null,
      oldestIncrementalAgeDays,
      current: false,
      keep: [...chain.members],
      delete: [],
    };
  }

  const full = chain.full;
  const fullAgeDays = ageInDays(full.timestamp, now);
  const base = { chain, fullAgeDays, oldestIncrementalAgeDays, current: isCurrent };

  // A second full backup means the links are wrong; never delete on top of that
  const strayFull = chain.incrementals.find((record) => record.kind === "full");
  if (strayFull) {
    return {
      ...base,
      decision: "keep-malformed",
      reason: `${strayFull.id} is a full backup inside chain ${chain.chainStart}`,
      keep: [...chain.members],
      delete: [],
    };
  }

  if (isCurrent) {
    return {
      ...base,
      decision: "keep-whole",
      reason: "most recent chain",
      keep: [...chain.members],
      delete: [],
    };
  }

  if (fullAgeDays > policy.keepFullDays) {
    return {
      ...base,
      decision: "delete-whole",
      reason: `full backup is older than ${policy.keepFullDays} days`,
      keep: [],
      delete: newestFirst(chain.members),
    };
  }

  if (oldestIncrementalAgeDays !== null && oldestIncrementalAgeDays > policy.keepIncrementalDays) {
    return {
      ...base,
      decision: "keep-full-only",
      reason: `oldest incremental is older than ${policy.keepIncrementalDays} days`,
      keep: [full],
      delete: newestFirst(chain.incrementals),
    };
  }

  return {
    ...base,
    decision: "keep-whole",
    reason:
      chain.incrementals.length > 0
        ? "full backup and incrementals within retention"
        : "full backup within retention",
    keep: [...chain.members],
    delete: [],
  };
}

function newestFirst(records: BackupRecord[]): BackupRecord[] {
  return [...records].sort((a, b) => (a.id < b.id ? 1 : a.id > b.id ? -1 : 0));
}
