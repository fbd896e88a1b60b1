import type { Interface } from "../models/interface.js";
import { UNI } from "../models/access.js";
import type { Tag } from "../models/tag.js";

export class TagAllocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TagAllocationError";
  }
}

/**
 * Take a tag out of an interface's pool: the requested one, or the next free
 * one when none is requested
 */
export function allocateTag(iface: Interface, requested?: Tag): Tag {
  if (requested) {
    if (!iface.useTag(requested)) {
      throw new TagAllocationError(
        `Tag ${requested.value} (type ${requested.type}) is not available on ${iface.id}`
      );
    }
    return requested;
  }

  const tag = iface.getNextAvailableTag();
  if (!tag) {
    throw new TagAllocationError(`No tags available on ${iface.id}`);
  }
  return tag;
}

/**
 * Return a tag to an interface's pool
 */
export function releaseTag(iface: Interface, tag: Tag): void {
  if (!iface.makeTagAvailable(tag)) {
    throw new TagAllocationError(`Tag ${tag.value} (type ${tag.type}) is already available on ${iface.id}`);
  }
}

/**
 * Build a UNI on an interface, reserving its user tag
 */
export function provisionUni(iface: Interface, requested?: Tag): UNI {
  return new UNI(allocateTag(iface, requested), iface);
}

/**
 * Give a UNI's user tag back to its interface
 */
export function releaseUni(uni: UNI): void {
  releaseTag(uni.iface, uni.userTag);
}
