import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { diagnosticsFrom } from "./logger.js";
import { interfaceRoutes, switchRoutes, tagRoutes } from "./routes/index.js";
import { Topology } from "./services/topology.js";

export interface BuildServerOptions {
  /** Defaults to an empty topology reporting through the server's logger */
  topology?: Topology;
  logger?: FastifyServerOptions["logger"];
}

export interface Server {
  fastify: FastifyInstance;
  topology: Topology;
}

export function buildServer(options: BuildServerOptions = {}): Server {
  const fastify = Fastify({
    logger: options.logger ?? false,
  });
  const topology =
    options.topology ??
    new Topology({ diagnostics: diagnosticsFrom(fastify.log.child({ component: "interface" })) });

  // Health check endpoint
  fastify.get("/health", async () => {
    return { status: "ok" };
  });

  // Topology stats endpoint
  fastify.get("/stats", async () => {
    return topology.getStats();
  });

  // Register route modules
  fastify.register(switchRoutes, { topology });
  fastify.register(interfaceRoutes, { topology });
  fastify.register(tagRoutes, { topology });

  return { fastify, topology };
}
