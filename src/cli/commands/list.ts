import { parseArgs } from "node:util";
import { buildChains, type ChainEvaluation, evaluateRetention } from "../../core";
import { ageInDays, formatAgeDays } from "../../utils/format";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "../options";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.format !== "table" && values.format !== "json") {
    ui.error(`Unknown format: ${values.format}. Use table or json`);
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    const now = new Date();
    const { scan, chains } = await buildChains(config.backupDir);
    const plan = evaluateRetention(chains, config.retention, now);

    // No intro for scripting formats
    if (values.format === "json") {
      console.log(JSON.stringify(toJson(plan.evaluations, now), null, 2));
      return 0;
    }

    ui.intro("pgchain list");

    if (plan.evaluations.length === 0) {
      ui.info("No backups found");
    } else {
      printTable(plan.evaluations, now);
    }

    if (scan.corrupt.length > 0) {
      ui.warn(`${scan.corrupt.length} corrupt backup(s) will be quarantined by the next prune:`);
      for (const entry of scan.corrupt) {
        ui.message(`  ${color.dim("•")} ${entry.name} ${color.dim(`(${entry.reason})`)}`);
      }
    }
    if (scan.quarantined.length > 0) {
      ui.info(`${scan.quarantined.length} quarantined backup(s) left for manual inspection`);
    }

    ui.outro(`${scan.valid.length} backup(s) in ${plan.evaluations.length} chain(s)`);
    return 0;
  } catch (error) {
    ui.error(`List failed: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(evaluations: ChainEvaluation[], now: Date): void {
  const widths = [
    TABLE_WIDTHS.backupId,
    TABLE_WIDTHS.kind,
    TABLE_WIDTHS.age,
    TABLE_WIDTHS.parent,
    TABLE_WIDTHS.decision,
  ];

  console.log(formatTableRow(["ID", "Type", "Age", "Parent", "Planned"], widths));
  console.log(formatTableSeparator(widths));

  for (const evaluation of evaluations) {
    const deleting = new Set(evaluation.delete.map((record) => record.id));

    for (const record of evaluation.chain.members) {
      const planned = deleting.has(record.id)
        ? color.red("delete")
        : evaluation.decision === "keep-orphaned"
          ? color.yellow("orphaned")
          : evaluation.decision === "keep-malformed"
            ? color.yellow("malformed")
            : color.green("keep");

      console.log(
        formatTableRow(
          [
            record.id,
            record.kind,
            formatAgeDays(ageInDays(record.timestamp, now)),
            record.parent ?? "-",
            planned,
          ],
          widths,
        ),
      );
    }
    console.log(formatTableSeparator(widths));
  }
}

function toJson(evaluations: ChainEvaluation[], now: Date) {
  return evaluations.map((evaluation) => ({
    chainStart: evaluation.chain.chainStart,
    orphaned: evaluation.chain.orphaned,
    current: evaluation.current,
    decision: evaluation.decision,
    reason: evaluation.reason,
    problems: evaluation.chain.problems,
    members: evaluation.chain.members.map((record) => ({
      id: record.id,
      type: record.kind,
      timestamp: record.timestamp.toISOString(),
      parent: record.parent,
      ageDays: Number(ageInDays(record.timestamp, now).toFixed(2)),
      planned: evaluation.delete.includes(record) ? "delete" : "keep",
    })),
  }));
}

function printHelp(): void {
  console.log(`
${color.bold("pgchain list")} - List backup chains and their retention status

${color.dim("USAGE:")}
  pgchain list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./pgchain.config.yaml)
      --format <fmt>      Output format: table, json (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("EXAMPLES:")}
  pgchain list                             # Table of chains
  pgchain list --format json               # JSON output for scripting
`);
}
