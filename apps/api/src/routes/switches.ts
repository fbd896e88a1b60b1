import type { FastifyInstance } from "fastify";
import type { Topology } from "../services/topology.js";
import { ConnectionSchema, PortParamsSchema, PortStatusSchema } from "./schemas.js";

export interface SwitchRoutesOptions {
  topology: Topology;
}

export async function switchRoutes(fastify: FastifyInstance, opts: SwitchRoutesOptions) {
  const { topology } = opts;

  // List switches
  fastify.get("/switches", async () => {
    return { switches: topology.listSwitches().map((sw) => sw.toRecord()) };
  });

  // Register a switch
  fastify.put<{ Params: { dpid: string } }>("/switches/:dpid", async (request) => {
    const sw = topology.addSwitch(request.params.dpid);
    return { switch: sw.toRecord() };
  });

  // Record the OpenFlow version a switch connected with, or its disconnection
  fastify.put<{ Params: { dpid: string } }>("/switches/:dpid/connection", async (request, reply) => {
    const sw = topology.getSwitch(request.params.dpid);
    if (!sw) {
      reply.status(404);
      return { error: "Switch not found" };
    }

    const parseResult = ConnectionSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    const { version } = parseResult.data;
    if (version === null) {
      sw.disconnect();
    } else {
      sw.connect(version);
    }

    return { switch: sw.toRecord() };
  });

  // Port status from the switch: update the interface or create it
  fastify.put("/switches/:dpid/ports/:port", async (request, reply) => {
    const paramsResult = PortParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      reply.status(400);
      return { error: "Invalid port", details: paramsResult.error.issues };
    }

    const sw = topology.getSwitch(paramsResult.data.dpid);
    if (!sw) {
      reply.status(404);
      return { error: "Switch not found" };
    }

    const parseResult = PortStatusSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    const created = !sw.getInterface(paramsResult.data.port);
    const iface = sw.updateOrCreateInterface(paramsResult.data.port, parseResult.data);
    if (created) {
      reply.status(201);
    }
    return { interface: iface.toRecord() };
  });

  // Port removed from the switch
  fastify.delete("/switches/:dpid/ports/:port", async (request, reply) => {
    const paramsResult = PortParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      reply.status(400);
      return { error: "Invalid port", details: paramsResult.error.issues };
    }

    const sw = topology.getSwitch(paramsResult.data.dpid);
    if (!sw || !sw.removeInterface(paramsResult.data.port)) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    reply.status(204);
    return null;
  });
}
