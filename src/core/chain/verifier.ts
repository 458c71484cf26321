/**
 * Backup root verification
 */

import type { CorruptEntry, QuarantinedEntry } from "../../types";
import { logger } from "../../utils/logger";
import { hasManifest } from "../../postgres";
import { buildChains, chainTip } from "./builder";
import { reconstructChain } from "./reconstructor";

export interface ChainVerification {
  chainStart: string;
  tip: string | null;
  members: number;
  orphaned: boolean;
  /** Link problems found while grouping plus any reconstruction failure */
  issues: string[];
}

export interface VerifyReport {
  chains: ChainVerification[];
  corrupt: CorruptEntry[];
  quarantined: QuarantinedEntry[];
  issueCount: number;
}

/**
 * Reconstruct every chain tip and check each member still carries a manifest.
 */
export async function verifyBackupRoot(root: string): Promise<VerifyReport> {
  const { scan, chains } = await buildChains(root);
  const results: ChainVerification[] = [];

  for (const chain of chains) {
    const tip = chainTip(chain);
    const issues = [...chain.problems];

    if (tip) {
      try {
        const restored = await reconstructChain(tip.path);
        logger.debug(`Chain ${chain.chainStart} reconstructs from ${restored.length} backup(s)`);
      } catch (error) {
        issues.push((error as Error).message);
      }
    }

    for (const member of chain.members) {
      if (!(await hasManifest(member.path))) {
        issues.push(`${member.id} has no backup_manifest`);
      }
    }

    results.push({
      chainStart: chain.chainStart,
      tip: tip?.id ?? null,
      members: chain.members.length,
      orphaned: chain.orphaned,
      issues,
    });
  }

  const issueCount =
    results.reduce((sum, chain) => sum + chain.issues.length, 0) + scan.corrupt.length;

  return {
    chains: results,
    corrupt: scan.corrupt,
    quarantined: scan.quarantined,
    issueCount,
  };
}
