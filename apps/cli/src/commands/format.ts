import chalk from "chalk";
import {
  humanReadableSpeed,
  isTagValueInRange,
  TAG_VALUE_RANGES,
  TagType,
  type InterfaceRecord,
  type TagRecord,
} from "@sdn-port-manager/shared";

const TAG_TYPE_NAMES: Record<TagType, string> = {
  [TagType.VLAN]: "vlan",
  [TagType.VLAN_QINQ]: "vlan_qinq",
  [TagType.MPLS]: "mpls",
};

const TAG_TYPES: readonly TagType[] = [TagType.VLAN, TagType.VLAN_QINQ, TagType.MPLS];

/**
 * Parse a tag type given on the command line by name or number
 */
export function parseTagType(input: string): TagType {
  const normalized = input.trim().toLowerCase();
  const match = TAG_TYPES.find(
    (type) => TAG_TYPE_NAMES[type] === normalized || String(type) === normalized
  );
  if (match !== undefined) {
    return match;
  }
  throw new Error(`Unknown tag type: ${input} (expected vlan, vlan_qinq or mpls)`);
}

/**
 * Parse a tag value given on the command line, bounded by the tag type
 */
export function parseTagValue(input: string, type: TagType = TagType.VLAN): number {
  if (!/^\d+$/.test(input.trim())) {
    throw new Error(`Invalid tag value: ${input}`);
  }
  const value = Number(input);
  if (!isTagValueInRange(type, value)) {
    const { min, max } = TAG_VALUE_RANGES[type];
    throw new Error(`Tag value ${value} is out of range for ${TAG_TYPE_NAMES[type]} (${min}-${max})`);
  }
  return value;
}

export function formatTag(tag: TagRecord): string {
  return `${TAG_TYPE_NAMES[tag.tag_type]} ${tag.value}`;
}

export function formatSpeed(speed: number | null): string {
  return speed === null ? chalk.gray("unknown") : humanReadableSpeed(speed);
}

export function formatRole(iface: InterfaceRecord): string {
  return iface.nni ? chalk.magenta("NNI") : chalk.cyan("UNI");
}
