import { parseArgs } from "node:util";
import { Scheduler } from "../../core";
import { COMMON_OPTIONS, INLINE_OPTIONS_HELP, loadCommandConfig } from "../options";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
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

    ui.intro("pgchain scheduler");

    const scheduler = new Scheduler(config);
    const status = scheduler.getStatus();

    ui.step("Schedule:");
    ui.message(
      `  ${color.cyan(status.cron.padEnd(15))} ${color.dim(status.timezone ?? "local time")} ${color.dim("next:")} ${status.nextRun.toLocaleString()}`,
    );
    ui.message(`  ${color.dim("Backup root:")} ${config.backupDir}`);

    const shutdown = () => {
      ui.cancel("Shutting down...");
      scheduler.stop();
      process.exit(0);
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    scheduler.start();

    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    // Keep the process running
    await new Promise(() => {}); // Never resolves

    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${(error as Error).message}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("pgchain start")} - Start the scheduler daemon

${color.dim("USAGE:")}
  pgchain start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./pgchain.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  Runs a backup cycle (backup, then prune) each time schedule.cron fires.
  A trigger is skipped while the previous cycle is still running.

${color.dim("SCHEDULE FORMAT:")}
  Standard cron format: minute hour day-of-month month day-of-week
  Set it in the config file or with the BACKUP_CRON environment variable.

    "0 2 * * *"     - Every day at 2:00 AM
    "0 3 * * 0"     - Every Sunday at 3:00 AM
    "30 1,13 * * *" - Twice a day

${color.dim("EXAMPLES:")}
  pgchain start                            # Start with default config
  pgchain start -c /etc/pgchain.yaml       # Start with specific config
  BACKUP_CRON="0 4 * * *" pgchain start    # Override the schedule
`);
}
