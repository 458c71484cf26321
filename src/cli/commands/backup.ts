import { parseArgs } from "node:util";
import { runBackup } from "../../core";
import { formatDuration } from "../../utils/format";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "../options";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      "skip-prune": { type: "boolean", default: false },
      full: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    ui.intro("pgchain backup");

    const s = ui.spinner();
    s.start("Taking snapshot...");

    const result = await runBackup(config, {
      dryRun: values["dry-run"] || undefined,
      skipPrune: values["skip-prune"],
      forceFull: values.full,
    });

    s.stop(result.dryRun ? "Snapshot planned" : "Snapshot created");

    const prune = result.prune;
    const summaryItems = [
      { label: "Backup ID", value: result.backupId },
      { label: "Type", value: result.kind },
      { label: "Parent", value: result.parent },
      { label: "Chain", value: result.chainStart },
      { label: "Path", value: result.path },
      { label: "Duration", value: formatDuration(result.durationMs) },
      { label: "Pruned", value: prune ? prune.totalDeleted.toString() : null },
      { label: "Quarantined", value: prune ? prune.quarantined.length.toString() : null },
      {
        label: "Prune failures",
        value: prune && prune.totalFailed > 0 ? prune.totalFailed.toString() : null,
      },
    ];

    ui.note(result.reason, "Plan");
    ui.note(formatSummary(summaryItems), "Backup Summary");

    if (result.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    if (prune && prune.totalFailed > 0) {
      ui.warn("Some backups could not be pruned; they will be retried on the next run");
      ui.outro("Backup finished with warnings");
      return 1;
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("pgchain backup")} - Take a full or incremental backup, then prune

${color.dim("USAGE:")}
  pgchain backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./pgchain.config.yaml)
      --dry-run           Show the planned backup without running pg_basebackup
      --skip-prune        Do not prune after the backup
      --full              Start a new chain with a full backup
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  A full backup is taken when there are no backups yet or the latest full
  backup is older than the full backup interval. Otherwise an incremental
  backup is taken on top of the latest backup, using its backup_manifest.

${color.dim("EXAMPLES:")}
  pgchain backup                           # Backup and prune
  pgchain backup --dry-run                 # Show what would happen
  pgchain backup --full                    # Force a new chain
  pgchain backup --backup-dir ./backups    # Override the backup root
`);
}
