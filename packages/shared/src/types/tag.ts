/**
 * Kind of tag that can be pushed onto traffic crossing an interface
 */
export enum TagType {
  VLAN = 1,
  VLAN_QINQ = 2,
  MPLS = 3,
}

export interface TagValueRange {
  min: number;
  max: number;
}

/**
 * Values a tag of each type can carry: 12-bit VLAN ids and 20-bit MPLS labels
 */
export const TAG_VALUE_RANGES: Record<TagType, TagValueRange> = {
  [TagType.VLAN]: { min: 1, max: 4095 },
  [TagType.VLAN_QINQ]: { min: 1, max: 4095 },
  [TagType.MPLS]: { min: 0, max: 2 ** 20 - 1 },
};

export function isTagValueInRange(type: TagType, value: number): boolean {
  const { min, max } = TAG_VALUE_RANGES[type];
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * A tag as rendered on the wire
 */
export interface TagRecord {
  tag_type: TagType;
  value: number;
}

/**
 * Availability summary for an interface's tag pool
 */
export interface TagPoolSummary {
  interfaceId: string;
  available: number;
}
