import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";
import { silentDiagnostics, type DiagnosticsSink } from "../logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_CONFIG_FILE = join(__dirname, "../../../../config/network.yaml");

const PortConfigSchema = z.object({
  number: z.number().int().min(0),
  name: z.string().min(1),
  address: z.string().optional(),
  nni: z.boolean().default(false),
  /** Speed override in bytes per second */
  speed: z.number().nonnegative().optional(),
});

const SwitchConfigSchema = z.object({
  dpid: z.string().min(1),
  ports: z.array(PortConfigSchema).default([]),
}).refine((data) => new Set(data.ports.map((p) => p.number)).size === data.ports.length, {
  message: "Port numbers must be unique within a switch",
});

const NetworkConfigSchema = z.object({
  switches: z.array(SwitchConfigSchema).default([]),
});

export type PortConfig = z.infer<typeof PortConfigSchema>;
export type SwitchConfig = z.infer<typeof SwitchConfigSchema>;
export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;

let cachedConfig: NetworkConfig | null = null;

/**
 * Path of the topology file, overridable with NETWORK_CONFIG
 */
export function getNetworkConfigPath(): string {
  return process.env.NETWORK_CONFIG ?? DEFAULT_CONFIG_FILE;
}

/**
 * Parse and validate a topology YAML document. Throws on invalid input.
 */
export function parseNetworkConfig(content: string): NetworkConfig {
  // An empty document loads as undefined
  return NetworkConfigSchema.parse(yaml.load(content) ?? {});
}

/**
 * Load the topology file. A missing or invalid file yields an empty topology.
 */
export function loadNetworkConfig(
  filePath: string = getNetworkConfigPath(),
  diagnostics: DiagnosticsSink = silentDiagnostics
): NetworkConfig {
  if (!existsSync(filePath)) {
    return { switches: [] };
  }

  try {
    return parseNetworkConfig(readFileSync(filePath, "utf-8"));
  } catch (error) {
    diagnostics.warn(
      { filePath, error: error instanceof Error ? error.message : String(error) },
      "Failed to load network config, starting with an empty topology"
    );
    return { switches: [] };
  }
}

/**
 * Get the network configuration
 */
export function getNetworkConfig(diagnostics?: DiagnosticsSink): NetworkConfig {
  if (!cachedConfig) {
    cachedConfig = loadNetworkConfig(getNetworkConfigPath(), diagnostics);
  }
  return cachedConfig;
}

/**
 * Reload network configuration from disk
 */
export function reloadNetworkConfig(diagnostics?: DiagnosticsSink): NetworkConfig {
  cachedConfig = loadNetworkConfig(getNetworkConfigPath(), diagnostics);
  return cachedConfig;
}
