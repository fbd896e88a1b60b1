#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { registerInterfacesCommand } from "./commands/interfaces.js";
import { registerStatusCommands } from "./commands/status.js";
import { registerSwitchesCommand } from "./commands/switches.js";
import { registerTagsCommand } from "./commands/tags.js";

interface GlobalOptions {
  apiUrl?: string;
}

const program = new Command("spm")
  .description("Inspect switch interfaces and provision their VLAN tags")
  .version("0.1.0")
  .option("--api-url <url>", "port manager API base URL", process.env.API_URL || "http://localhost:3000")
  // getApiClient reads API_URL on first use
  .hook("preAction", () => {
    const { apiUrl } = program.opts<GlobalOptions>();
    if (apiUrl) {
      process.env.API_URL = apiUrl;
    }
  })
  .exitOverride((err) => process.exit(err.exitCode));

registerStatusCommands(program);
registerSwitchesCommand(program);
registerInterfacesCommand(program);
registerTagsCommand(program);

program.parse();
