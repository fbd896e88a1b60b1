import { Command } from "commander";
import chalk from "chalk";
import { getApiClient } from "../api/client.js";
import { formatRole, formatSpeed } from "./format.js";
import type { InterfaceDetail, InterfaceRecord } from "@sdn-port-manager/shared";

function formatInterface(iface: InterfaceRecord): void {
  console.log();
  console.log(chalk.bold(iface.name), chalk.gray(`(${iface.id})`));
  console.log(`  Role:    ${formatRole(iface)}`);
  console.log(`  Speed:   ${formatSpeed(iface.speed)}`);
  if (iface.mac) {
    console.log(`  MAC:     ${iface.mac}`);
  }
}

function formatDetail(iface: InterfaceDetail): void {
  formatInterface(iface);
  console.log(`  Switch:  ${iface.switch}`);
  console.log(`  Port:    ${iface.port_number}`);
  console.log(`  Enabled: ${iface.enabled ? chalk.green("yes") : chalk.yellow("no")}`);
  if (Object.keys(iface.metadata).length > 0) {
    console.log(`  Metadata:`);
    for (const [key, value] of Object.entries(iface.metadata)) {
      console.log(`    ${key}: ${JSON.stringify(value)}`);
    }
  }
  if (iface.stats) {
    console.log(`  Stats:`);
    for (const [key, value] of Object.entries(iface.stats)) {
      console.log(`    ${key}: ${value}`);
    }
  }
}

export function registerInterfacesCommand(program: Command): void {
  const interfaces = program
    .command("interfaces")
    .alias("if")
    .description("Inspect switch interfaces");

  // List interfaces
  interfaces
    .command("list")
    .alias("ls")
    .description("List all interfaces")
    .action(async () => {
      try {
        const api = getApiClient();
        const list = await api.listInterfaces();

        if (list.length === 0) {
          console.log(chalk.yellow("No interfaces found"));
          return;
        }

        console.log(chalk.bold(`\nInterfaces (${list.length}):`));
        for (const iface of list) {
          formatInterface(iface);
        }
        console.log();
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Get interface info
  interfaces
    .command("info <interfaceId>")
    .description("Get detailed interface information")
    .action(async (interfaceId: string) => {
      try {
        const api = getApiClient();
        const iface = await api.getInterface(interfaceId);
        formatDetail(iface);

        const endpoints = await api.listEndpoints(interfaceId);
        if (endpoints.length > 0) {
          console.log(`  Endpoints:`);
          for (const entry of endpoints) {
            console.log(`    ${entry.endpoint} ${chalk.gray(entry.updated_at)}`);
          }
        }
        console.log();
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  // Override speed
  interfaces
    .command("speed <interfaceId> [bytesPerSecond]")
    .description("Override the interface speed (omit the value to clear the override)")
    .action(async (interfaceId: string, bytesPerSecond?: string) => {
      try {
        const api = getApiClient();
        const speed = bytesPerSecond === undefined ? null : Number(bytesPerSecond);
        if (speed !== null && (!Number.isFinite(speed) || speed < 0)) {
          console.error(chalk.red(`Invalid speed: ${bytesPerSecond}`));
          process.exit(1);
        }

        const iface = await api.setCustomSpeed(interfaceId, speed);
        console.log(chalk.green(`✓ ${iface.id} speed is now ${formatSpeed(iface.speed)}`));
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
