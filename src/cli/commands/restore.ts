import { parseArgs } from "node:util";
import { runRestore } from "../../core";
import { formatDuration } from "../../utils/format";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "../options";
import { color, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      at: { type: "string" },
      force: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    if (positionals.length > 1) {
      ui.error("Only one target backup can be restored at a time");
      return 1;
    }

    let at: Date | undefined;
    if (values.at) {
      at = new Date(values.at);
      if (Number.isNaN(at.getTime())) {
        ui.error(`Invalid --at timestamp: ${values.at}`);
        return 1;
      }
    }

    const config = await loadCommandConfig(values);

    ui.intro("pgchain restore");

    const s = ui.spinner();
    s.start("Combining backup chain...");

    const result = await runRestore(config, {
      target: positionals[0],
      at,
      force: values.force,
      dryRun: values["dry-run"] || undefined,
    });

    s.stop(result.dryRun ? "Restore planned" : "Backup chain combined");

    ui.step("Backup chain (oldest to newest):");
    for (const record of result.chain) {
      ui.message(`  ${color.dim("•")} ${record.id} ${color.dim(`(${record.kind})`)}`);
    }

    ui.note(
      formatSummary([
        { label: "Target", value: result.target.id },
        { label: "Backups combined", value: result.chain.length.toString() },
        { label: "Restore dir", value: result.restoreDir },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Restore Summary",
    );

    if (result.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    } else {
      ui.note(
        result.nextSteps.map((step, i) => `${i + 1}. ${step}`).join("\n"),
        "Next steps",
      );
    }

    ui.outro("Restore complete!");
    return 0;
  } catch (error) {
    ui.error(`Restore failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("pgchain restore")} - Rebuild a data directory from a backup chain

${color.dim("USAGE:")}
  pgchain restore <path|id> [OPTIONS]
  pgchain restore --at <timestamp> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./pgchain.config.yaml)
      --at <timestamp>    Restore the newest backup taken at or before this time
      --force             Clear a non-empty restore directory first
      --dry-run           Show the chain that would be combined
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("EXAMPLES:")}
  pgchain restore 2025-01-02_03-00-00_incremental
  pgchain restore /backups/2025-01-02_03-00-00_incremental --force
  pgchain restore --at 2025-01-02T12:00:00Z
`);
}
