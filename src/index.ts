#!/usr/bin/env tsx

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { listCommand } from "./cli/commands/list";
import { pruneCommand } from "./cli/commands/prune";
import { restoreCommand } from "./cli/commands/restore";
import { startCommand } from "./cli/commands/start";
import { verifyCommand } from "./cli/commands/verify";
import { VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan("pgchain")} ${color.dim(`v${VERSION}`)} - PostgreSQL incremental backup chains`);

  p.note(
    `${color.cyan("start")}       Start the scheduler daemon
${color.cyan("backup")}      Take a full or incremental backup, then prune
${color.cyan("prune")}       Apply the retention policy
${color.cyan("restore")}     Rebuild a data directory from a backup chain
${color.cyan("list")}        List backup chains
${color.cyan("verify")}      Check that every chain can be restored`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `pgchain start                              ${color.dim("# Start scheduler daemon")}
pgchain backup                             ${color.dim("# Backup and prune now")}
pgchain prune --dry-run                    ${color.dim("# Preview pruning")}
pgchain restore --at 2025-01-02T12:00:00Z  ${color.dim("# Point-in-time restore")}
pgchain list                               ${color.dim("# List all chains")}
pgchain verify                             ${color.dim("# Check all chains")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("pgchain <command> --help")} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "prune":
      return pruneCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("pgchain --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
