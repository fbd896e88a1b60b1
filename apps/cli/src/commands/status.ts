import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";

export function registerStatusCommands(program: Command): void {
  program
    .command("health")
    .description("Ping the port manager API")
    .action(async () => {
      try {
        const { status } = await getApiClient().health();
        console.log(`${chalk.green("●")} port manager reachable (${status})`);
      } catch (error) {
        const message = error instanceof Error ? error.message : error;
        console.error(chalk.red("Cannot reach the port manager:"), message);
        process.exit(1);
      }
    });

  program
    .command("stats")
    .description("Summarise switches, interfaces and free tags")
    .action(async () => {
      try {
        const stats = await getApiClient().stats();
        console.log(chalk.bold("\nTopology"));
        console.log(`  ${chalk.cyan("switches")}    ${stats.switches} (${stats.connectedSwitches} connected)`);
        console.log(`  ${chalk.cyan("interfaces")}  ${stats.interfaces}`);
        console.log(`  ${chalk.cyan("free tags")}   ${stats.availableTags}`);
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
