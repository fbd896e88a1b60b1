import "dotenv/config";
import { getNetworkConfig, getNetworkConfigPath, reloadNetworkConfig } from "./config/network.js";
import { diagnosticsFrom, loggerOptions } from "./logger.js";
import { buildServer } from "./server.js";

const { fastify, topology } = buildServer({ logger: loggerOptions() });
const configDiagnostics = diagnosticsFrom(fastify.log.child({ component: "config" }));

const port = parseInt(process.env.PORT ?? "3000", 10);
const host = process.env.HOST ?? "0.0.0.0";

async function start() {
  try {
    // Load the configured topology
    const config = getNetworkConfig(configDiagnostics);
    topology.applyConfig(config);
    fastify.log.info(
      { configPath: getNetworkConfigPath(), switches: config.switches.length },
      "Loaded network configuration"
    );

    // Handle SIGHUP for config reload
    process.on("SIGHUP", () => {
      fastify.log.info("Received SIGHUP, reloading network configuration...");
      topology.applyConfig(reloadNetworkConfig(configDiagnostics));
      fastify.log.info({ interfaces: topology.listInterfaces().length }, "Reloaded network configuration");
    });

    // Graceful shutdown
    const shutdown = async () => {
      fastify.log.info("Shutting down...");
      await fastify.close();
      process.exit(0);
    };

    process.on("SIGTERM", () => void shutdown());
    process.on("SIGINT", () => void shutdown());

    await fastify.listen({ port, host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

void start();
