import { z } from "zod";
import {
  isTagValueInRange,
  OpenFlowVersion,
  TAG_VALUE_RANGES,
  TagType,
  type MetadataValue,
} from "@sdn-port-manager/shared";

const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(z.string(), MetadataValueSchema),
  ])
);

function checkTagValue(type: TagType, value: number, ctx: z.RefinementCtx, path: string): void {
  if (!isTagValueInRange(type, value)) {
    const { min, max } = TAG_VALUE_RANGES[type];
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [path],
      message: `Tag value must be between ${min} and ${max}`,
    });
  }
}

// Tag schemas
export const TagSchema = z
  .object({
    tag_type: z.nativeEnum(TagType).default(TagType.VLAN),
    value: z.number().int().nonnegative(),
  })
  .superRefine((tag, ctx) => checkTagValue(tag.tag_type, tag.value, ctx, "value"));

export const TagParamsSchema = z
  .object({
    id: z.string().min(1),
    type: z.coerce.number().pipe(z.nativeEnum(TagType)),
    value: z.coerce.number().int().nonnegative(),
  })
  .superRefine((params, ctx) => checkTagValue(params.type, params.value, ctx, "value"));

export const ProvisionUniSchema = z.object({
  tag: TagSchema.optional(),
});

// Switch schemas
export const ConnectionSchema = z.object({
  version: z.nativeEnum(OpenFlowVersion).nullable(),
});

export const PortParamsSchema = z.object({
  dpid: z.string().min(1),
  port: z.coerce.number().int().nonnegative(),
});

export const PortStatusSchema = z.object({
  name: z.string().min(1),
  address: z.string().nullable().optional(),
  state: z.number().int().nonnegative().nullable().optional(),
  features: z.number().int().nonnegative().nullable().optional(),
});

// Interface schemas
export const UpdateInterfaceSchema = z.object({
  nni: z.boolean().optional(),
  enabled: z.boolean().optional(),
});

export const CustomSpeedSchema = z.object({
  bytesPerSecond: z.number().nonnegative().nullable(),
});

const counter = z.number().int().nonnegative().optional();

export const PortStatsSchema = z.object({
  rx_packets: counter,
  tx_packets: counter,
  rx_bytes: counter,
  tx_bytes: counter,
  rx_dropped: counter,
  tx_dropped: counter,
  rx_errors: counter,
  tx_errors: counter,
});

export const MetadataSchema = z.record(z.string(), MetadataValueSchema);

// Type exports
export type TagInput = z.infer<typeof TagSchema>;
export type PortStatusInput = z.infer<typeof PortStatusSchema>;
export type PortStatsInput = z.infer<typeof PortStatsSchema>;
