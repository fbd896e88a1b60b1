import type { NniRecord, UniRecord, VnniRecord } from "@sdn-port-manager/shared";
import type { Interface } from "./interface.js";
import type { Tag } from "./tag.js";

/**
 * User-to-network interface: a customer-facing port carrying one tag
 */
export class UNI {
  readonly userTag: Tag;
  readonly iface: Interface;

  constructor(userTag: Tag, iface: Interface) {
    this.userTag = userTag;
    this.iface = iface;
  }

  toRecord(): UniRecord {
    return { interface_id: this.iface.id, user_tag: this.userTag.toRecord() };
  }
}

/**
 * Network-to-network interface: a trunk between network elements
 */
export class NNI {
  readonly iface: Interface;

  constructor(iface: Interface) {
    this.iface = iface;
  }

  toRecord(): NniRecord {
    return { interface_id: this.iface.id };
  }
}

/**
 * Virtual NNI carrying an additional service tag for Q-in-Q trunking
 */
export class VNNI extends NNI {
  readonly serviceTag: Tag;

  constructor(serviceTag: Tag, iface: Interface) {
    super(iface);
    this.serviceTag = serviceTag;
  }

  override toRecord(): VnniRecord {
    return { ...super.toRecord(), service_tag: this.serviceTag.toRecord() };
  }
}
