import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import type { SwitchRecord } from "@sdn-port-manager/shared";

function formatConnection(sw: SwitchRecord): string {
  if (!sw.connected) {
    return chalk.yellow("○ disconnected");
  }
  const version = sw.ofp_version === null ? "" : ` (OpenFlow 0x0${sw.ofp_version})`;
  return chalk.green(`● connected${version}`);
}

export function registerSwitchesCommand(program: Command): void {
  const switches = program
    .command("switches")
    .alias("sw")
    .description("Inspect switches");

  switches
    .command("list")
    .alias("ls")
    .description("List all switches")
    .action(async () => {
      try {
        const api = getApiClient();
        const list = await api.listSwitches();

        if (list.length === 0) {
          console.log(chalk.yellow("No switches found"));
          return;
        }

        console.log(chalk.bold(`\nSwitches (${list.length}):`));
        for (const sw of list) {
          console.log();
          console.log(chalk.bold(sw.dpid));
          console.log(`  Status:     ${formatConnection(sw)}`);
          console.log(`  Interfaces: ${sw.interfaces.length}`);
        }
        console.log();
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
