import { parseArgs } from "node:util";
import { verifyBackupRoot } from "../../core";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "../options";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    ui.intro("pgchain verify");

    const s = ui.spinner();
    s.start("Verifying backup chains...");
    const report = await verifyBackupRoot(config.backupDir);
    s.stop("Verification complete");

    for (const chain of report.chains) {
      const status = chain.issues.length === 0 ? color.green("OK") : color.red("ISSUES");
      const label = chain.orphaned ? color.yellow(" (orphaned)") : "";
      ui.message(
        `[${status}] ${chain.chainStart}${label} ${color.dim(`${chain.members} backup(s), tip ${chain.tip ?? "-"}`)}`,
      );
      for (const issue of chain.issues) {
        ui.message(`         ${color.dim("•")} ${issue}`);
      }
    }

    for (const entry of report.corrupt) {
      ui.warn(`Corrupt backup ${entry.name}: ${entry.reason}`);
    }
    for (const entry of report.quarantined) {
      ui.info(`Quarantined: ${entry.name}`);
    }

    ui.note(
      formatSummary([
        { label: "Chains", value: report.chains.length.toString() },
        { label: "Orphaned", value: report.chains.filter((c) => c.orphaned).length.toString() },
        { label: "Corrupt", value: report.corrupt.length.toString() },
        { label: "Quarantined", value: report.quarantined.length.toString() },
        { label: "Issues", value: report.issueCount.toString() },
      ]),
      "Verification Summary",
    );

    if (report.issueCount > 0) {
      ui.outro("Verification found issues");
      return 1;
    }

    ui.outro("All backup chains are restorable");
    return 0;
  } catch (error) {
    ui.error(`Verify failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("pgchain verify")} - Check that every backup chain can be restored

${color.dim("USAGE:")}
  pgchain verify [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./pgchain.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("CHECKS:")}
  - Every chain tip reconstructs back to its full backup
  - Every backup still has its backup_manifest
  - Chains whose full backup is missing are reported as orphaned
  - Directories with missing or corrupt metadata are reported

  Exits with code 1 when any issue is found.
`);
}
