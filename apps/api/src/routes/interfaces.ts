import type { FastifyInstance } from "fastify";
import type { EndpointRecord, InterfaceDetail } from "@sdn-port-manager/shared";
import type { Interface } from "../models/interface.js";
import { PortStats } from "../models/port-stats.js";
import { humanReadableSpeed } from "../services/speed-resolver.js";
import type { Topology } from "../services/topology.js";
import {
  CustomSpeedSchema,
  MetadataSchema,
  PortStatsSchema,
  UpdateInterfaceSchema,
} from "./schemas.js";

export interface InterfaceRoutesOptions {
  topology: Topology;
}

function toDetail(iface: Interface): InterfaceDetail {
  const record = iface.toRecord();
  return {
    ...record,
    hr_speed: humanReadableSpeed(record.speed),
    enabled: iface.entity.enabled,
    active: iface.entity.active,
  };
}

function toEndpointRecords(iface: Interface): EndpointRecord[] {
  return iface.endpoints.map(({ endpoint, updatedAt }) => ({
    endpoint: typeof endpoint === "string" ? endpoint : endpoint.id,
    updated_at: updatedAt.toISOString(),
  }));
}

export async function interfaceRoutes(fastify: FastifyInstance, opts: InterfaceRoutesOptions) {
  const { topology } = opts;

  // List interfaces
  fastify.get("/interfaces", async () => {
    return { interfaces: topology.listInterfaces().map((iface) => iface.toRecord()) };
  });

  // Get a specific interface
  fastify.get<{ Params: { id: string } }>("/interfaces/:id", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }
    return { interface: toDetail(iface) };
  });

  // Change role or administrative state
  fastify.patch<{ Params: { id: string } }>("/interfaces/:id", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const parseResult = UpdateInterfaceSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    const { nni, enabled } = parseResult.data;
    if (nni !== undefined) {
      iface.isNetworkToNetwork = nni;
    }
    if (enabled === true) {
      iface.entity.enable();
    } else if (enabled === false) {
      iface.entity.disable();
    }

    return { interface: toDetail(iface) };
  });

  // Override the speed reported by the switch (null clears the override)
  fastify.put<{ Params: { id: string } }>("/interfaces/:id/speed", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const parseResult = CustomSpeedSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    iface.setCustomSpeed(parseResult.data.bytesPerSecond);
    return { interface: toDetail(iface) };
  });

  // Latest port counters
  fastify.put<{ Params: { id: string } }>("/interfaces/:id/stats", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const parseResult = PortStatsSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    iface.stats = new PortStats(parseResult.data);
    return { interface: iface.toRecord() };
  });

  // Endpoints seen behind an interface
  fastify.get<{ Params: { id: string } }>("/interfaces/:id/endpoints", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }
    return { endpoints: toEndpointRecords(iface) };
  });

  fastify.put<{ Params: { id: string; endpoint: string } }>(
    "/interfaces/:id/endpoints/:endpoint",
    async (request, reply) => {
      const iface = topology.getInterface(request.params.id);
      if (!iface) {
        reply.status(404);
        return { error: "Interface not found" };
      }

      iface.updateEndpoint(request.params.endpoint);
      return { endpoints: toEndpointRecords(iface) };
    }
  );

  fastify.delete<{ Params: { id: string; endpoint: string } }>(
    "/interfaces/:id/endpoints/:endpoint",
    async (request, reply) => {
      const iface = topology.getInterface(request.params.id);
      if (!iface) {
        reply.status(404);
        return { error: "Interface not found" };
      }

      if (!iface.deleteEndpoint(request.params.endpoint)) {
        reply.status(404);
        return { error: "Endpoint not found" };
      }

      reply.status(204);
      return null;
    }
  );

  // Metadata
  fastify.get<{ Params: { id: string } }>("/interfaces/:id/metadata", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }
    return { metadata: iface.entity.metadata };
  });

  fastify.post<{ Params: { id: string } }>("/interfaces/:id/metadata", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const parseResult = MetadataSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    iface.entity.extendMetadata(parseResult.data);
    reply.status(201);
    return { metadata: iface.entity.metadata };
  });

  fastify.delete<{ Params: { id: string; key: string } }>(
    "/interfaces/:id/metadata/:key",
    async (request, reply) => {
      const iface = topology.getInterface(request.params.id);
      if (!iface) {
        reply.status(404);
        return { error: "Interface not found" };
      }

      if (!iface.entity.removeMetadata(request.params.key)) {
        reply.status(404);
        return { error: "Metadata key not found" };
      }

      reply.status(204);
      return null;
    }
  );
}
