import type { FastifyInstance } from "fastify";
import type { TagPoolSummary } from "@sdn-port-manager/shared";
import { Tag } from "../models/tag.js";
import {
  allocateTag,
  provisionUni,
  releaseTag,
  TagAllocationError,
} from "../services/tag-provisioner.js";
import type { Topology } from "../services/topology.js";
import { ProvisionUniSchema, TagParamsSchema, TagSchema } from "./schemas.js";

export interface TagRoutesOptions {
  topology: Topology;
}

export async function tagRoutes(fastify: FastifyInstance, opts: TagRoutesOptions) {
  const { topology } = opts;

  // Pool summary
  fastify.get<{ Params: { id: string } }>("/interfaces/:id/tags", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const summary: TagPoolSummary = { interfaceId: iface.id, available: iface.tags.size };
    return summary;
  });

  // Check whether a tag is available
  fastify.get("/interfaces/:id/tags/:type/:value", async (request, reply) => {
    const paramsResult = TagParamsSchema.safeParse(request.params);
    if (!paramsResult.success) {
      reply.status(400);
      return { error: "Invalid tag", details: paramsResult.error.issues };
    }

    const iface = topology.getInterface(paramsResult.data.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const tag = new Tag(paramsResult.data.type, paramsResult.data.value);
    return { tag: tag.toRecord(), available: iface.isTagAvailable(tag) };
  });

  // Allocate the next free tag
  fastify.post<{ Params: { id: string } }>("/interfaces/:id/tags/allocate", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    try {
      const tag = allocateTag(iface);
      reply.status(201);
      return { tag: tag.toRecord() };
    } catch (error) {
      if (error instanceof TagAllocationError) {
        reply.status(409);
        return { error: error.message };
      }
      throw error;
    }
  });

  // Reserve a specific tag
  fastify.post<{ Params: { id: string } }>("/interfaces/:id/tags/reserve", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const parseResult = TagSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    try {
      const tag = allocateTag(iface, Tag.fromRecord(parseResult.data));
      return { tag: tag.toRecord() };
    } catch (error) {
      if (error instanceof TagAllocationError) {
        reply.status(409);
        return { error: error.message };
      }
      throw error;
    }
  });

  // Give a tag back
  fastify.post<{ Params: { id: string } }>("/interfaces/:id/tags/release", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    const parseResult = TagSchema.safeParse(request.body);
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    try {
      const tag = Tag.fromRecord(parseResult.data);
      releaseTag(iface, tag);
      return { tag: tag.toRecord() };
    } catch (error) {
      if (error instanceof TagAllocationError) {
        reply.status(409);
        return { error: error.message };
      }
      throw error;
    }
  });

  // Build a UNI on the interface, reserving its user tag
  fastify.post<{ Params: { id: string } }>("/interfaces/:id/uni", async (request, reply) => {
    const iface = topology.getInterface(request.params.id);
    if (!iface) {
      reply.status(404);
      return { error: "Interface not found" };
    }

    if (iface.isNetworkToNetwork) {
      reply.status(400);
      return { error: "Interface is a network-to-network interface" };
    }

    const parseResult = ProvisionUniSchema.safeParse(request.body ?? {});
    if (!parseResult.success) {
      reply.status(400);
      return { error: "Invalid request body", details: parseResult.error.issues };
    }

    const requested = parseResult.data.tag ? Tag.fromRecord(parseResult.data.tag) : undefined;
    try {
      const uni = provisionUni(iface, requested);
      reply.status(201);
      return { uni: uni.toRecord() };
    } catch (error) {
      if (error instanceof TagAllocationError) {
        reply.status(409);
        return { error: error.message };
      }
      throw error;
    }
  });
}
