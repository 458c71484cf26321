import { parseArgs } from "node:util";
import { runPrune } from "../../core";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "../options";
import { color, formatSummary, ui } from "../ui";

export async function pruneCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    const now = new Date();

    ui.intro("pgchain prune");

    // Preview what will be deleted first
    const preview = await runPrune(config, { dryRun: true, now });
    const pending = preview.deletions.filter((d) => d.success && !d.skipped);

    if (pending.length === 0 && preview.quarantined.length === 0) {
      ui.success("No backups need to be pruned");
      ui.outro("Nothing to do");
      return 0;
    }

    if (preview.quarantined.length > 0) {
      ui.step(`Found ${preview.quarantined.length} corrupt backup(s) to quarantine:`);
      for (const outcome of preview.quarantined) {
        ui.message(`  ${color.dim("•")} ${outcome.path} ${color.dim(`(${outcome.reason})`)}`);
      }
    }

    if (pending.length > 0) {
      ui.step(`Found ${pending.length} backup(s) to delete:`);
      for (const deletion of pending) {
        ui.message(`  ${color.dim("•")} ${deletion.backupId} ${color.dim(`(${deletion.reason})`)}`);
      }
    }

    if (values["dry-run"] || config.safety.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return 0;
    }

    // Confirm unless --force
    if (!values.force) {
      const confirmed = await ui.confirm({
        message: `Delete ${pending.length} and quarantine ${preview.quarantined.length} backup(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Prune cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Pruning old backups...");
    const result = await runPrune(config, { dryRun: false, now });
    s.stop("Prune complete");

    if (result.deletions.length > 0) {
      ui.step("Deletions:");
      for (const deletion of result.deletions) {
        const status = deletion.skipped
          ? color.yellow("SKIPPED")
          : deletion.success
            ? color.green("OK")
            : color.red("FAILED");
        ui.message(`  [${status}] ${deletion.backupId} ${color.dim(`(${deletion.reason})`)}`);
        if (deletion.error) {
          ui.error(`         ${deletion.error}`);
        }
      }
    }

    ui.note(
      formatSummary([
        { label: "Checked", value: result.totalChecked.toString() },
        { label: "Deleted", value: result.totalDeleted.toString() },
        { label: "Failed", value: result.totalFailed.toString() },
        { label: "Quarantined", value: result.quarantined.filter((q) => q.success).length.toString() },
        { label: "Orphaned chains", value: result.plan.orphaned.length.toString() },
      ]),
      "Prune Summary",
    );

    const quarantineFailures = result.quarantined.filter((q) => !q.success).length;
    if (result.totalFailed > 0 || quarantineFailures > 0) {
      ui.warn("Some backups could not be pruned or quarantined");
      ui.outro("Prune finished with warnings");
      return 1;
    }

    ui.outro("Prune complete!");
    return 0;
  } catch (error) {
    ui.error(`Prune failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("pgchain prune")} - Apply the retention policy to the backup root

${color.dim("USAGE:")}
  pgchain prune [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./pgchain.config.yaml)
      --dry-run           Show what would be deleted without doing it
      --force             Skip confirmation prompts
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("POLICY:")}
  1. Backups with missing or corrupt metadata are renamed with an Invalid_ prefix
  2. The most recent chain is always kept
  3. A chain whose full backup is older than keepFullDays is deleted entirely
  4. Otherwise, once its oldest incremental is older than keepIncrementalDays,
     all of its incrementals are deleted and the full backup is kept
  5. Chains whose full backup cannot be found are never deleted

${color.dim("EXAMPLES:")}
  pgchain prune                            # Prune (with confirmation)
  pgchain prune --dry-run                  # Preview what would be deleted
  pgchain prune --force                    # Skip confirmation
`);
}
