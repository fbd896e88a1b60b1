import { describe, it, expect } from "vitest";
import { TagType } from "@sdn-port-manager/shared";
import { NNI, UNI, VNNI } from "../models/access.js";
import { Interface } from "../models/interface.js";
import { Switch } from "../models/switch.js";
import { Tag } from "../models/tag.js";
import {
  allocateTag,
  provisionUni,
  releaseTag,
  releaseUni,
  TagAllocationError,
} from "../services/tag-provisioner.js";

function createInterface(): Interface {
  return new Interface({ name: "eth1", portNumber: 1, switch: new Switch("00:00:00:00:00:00:00:01") });
}

describe("tag provisioner", () => {
  it("provisions a UNI with the next free VLAN", () => {
    const iface = createInterface();

    const uni = provisionUni(iface);
    expect(uni).toBeInstanceOf(UNI);
    expect(uni.toRecord()).toEqual({
      interface_id: "00:00:00:00:00:00:00:01:1",
      user_tag: { tag_type: TagType.VLAN, value: 4095 },
    });
    expect(iface.isTagAvailable(Tag.vlan(4095))).toBe(false);
  });

  it("provisions a UNI with a requested VLAN", () => {
    const iface = createInterface();

    const uni = provisionUni(iface, Tag.vlan(100));
    expect(uni.userTag.value).toBe(100);
    expect(iface.isTagAvailable(Tag.vlan(100))).toBe(false);
    expect(iface.tags.size).toBe(4094);
  });

  it("refuses a tag that is already in use", () => {
    const iface = createInterface();
    allocateTag(iface, Tag.vlan(100));

    expect(() => provisionUni(iface, Tag.vlan(100))).toThrow(TagAllocationError);
    expect(() => allocateTag(iface, Tag.vlan(100))).toThrow(
      "Tag 100 (type 1) is not available on 00:00:00:00:00:00:00:01:1"
    );
  });

  it("reports an exhausted pool", () => {
    const iface = createInterface();
    while (iface.getNextAvailableTag()) {
      // drain
    }

    expect(() => allocateTag(iface)).toThrow("No tags available on 00:00:00:00:00:00:00:01:1");
  });

  it("returns a UNI's tag to the pool once", () => {
    const iface = createInterface();
    const uni = provisionUni(iface, Tag.vlan(200));

    releaseUni(uni);
    expect(iface.isTagAvailable(Tag.vlan(200))).toBe(true);
    expect(() => releaseUni(uni)).toThrow(
      "Tag 200 (type 1) is already available on 00:00:00:00:00:00:00:01:1"
    );
  });

  it("refuses to release a tag that was never taken", () => {
    expect(() => releaseTag(createInterface(), Tag.vlan(1))).toThrow(TagAllocationError);
  });
});

describe("NNI and VNNI", () => {
  it("render the interface and service tag", () => {
    const iface = createInterface();
    const nni = new NNI(iface);
    const vnni = new VNNI(new Tag(TagType.VLAN_QINQ, 300), iface);

    expect(nni.toRecord()).toEqual({ interface_id: "00:00:00:00:00:00:00:01:1" });
    expect(vnni).toBeInstanceOf(NNI);
    expect(vnni.iface).toBe(iface);
    expect(vnni.toRecord()).toEqual({
      interface_id: "00:00:00:00:00:00:00:01:1",
      service_tag: { tag_type: TagType.VLAN_QINQ, value: 300 },
    });
  });
});
