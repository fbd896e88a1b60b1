import { describe, it, expect, afterEach, vi } from "vitest";
import { OpenFlowVersion, PortFeaturesV0x01, PortFeaturesV0x04 } from "@sdn-port-manager/shared";
import { Interface } from "../models/interface.js";
import { PortStats } from "../models/port-stats.js";
import { Switch } from "../models/switch.js";
import { Tag } from "../models/tag.js";

const DPID = "00:00:00:00:00:00:00:01";
const MAC = "00:11:22:33:44:55";

function createInterface(overrides: Partial<ConstructorParameters<typeof Interface>[0]> = {}): Interface {
  return new Interface({
    name: "eth0",
    portNumber: 2,
    switch: new Switch(DPID),
    address: MAC,
    ...overrides,
  });
}

describe("Interface", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("identity", () => {
    it("is identified by switch dpid and port number", () => {
      expect(createInterface().id).toBe("00:00:00:00:00:00:00:01:2");
    });

    it("coerces the port number to an integer", () => {
      expect(createInterface({ portNumber: "7" }).portNumber).toBe(7);
      expect(createInterface({ portNumber: 2.9 }).portNumber).toBe(2);
    });

    it("rejects port numbers that are negative or not numeric", () => {
      expect(() => createInterface({ portNumber: -1 })).toThrow(RangeError);
      expect(() => createInterface({ portNumber: "eth0" })).toThrow(RangeError);
      expect(() => createInterface({ portNumber: "" })).toThrow(RangeError);
    });

    it("is a UNI unless marked as NNI", () => {
      const iface = createInterface();
      expect(iface.isUserToNetwork).toBe(true);

      iface.isNetworkToNetwork = true;
      expect(iface.isUserToNetwork).toBe(false);
      expect(createInterface({ nni: true }).isUserToNetwork).toBe(false);
    });
  });

  describe("equals", () => {
    it("equals an interface with the same port, name, address and switch", () => {
      const a = createInterface();
      const b = new Interface({ name: "eth0", portNumber: 2, switch: new Switch(DPID), address: MAC });

      expect(a.equals(b)).toBe(true);
    });

    it("differs from an interface on another switch", () => {
      const other = createInterface({ switch: new Switch("00:00:00:00:00:00:00:02") });

      expect(createInterface().equals(other)).toBe(false);
    });

    it("differs when name or address differ", () => {
      expect(createInterface().equals(createInterface({ name: "eth1" }))).toBe(false);
      expect(createInterface().equals(createInterface({ address: "00:11:22:33:44:66" }))).toBe(false);
    });

    it("equals a string matching its address", () => {
      const iface = createInterface();

      expect(iface.equals(MAC)).toBe(true);
      expect(iface.equals("ff:ff:ff:ff:ff:ff")).toBe(false);
      expect(iface.equals(2)).toBe(false);
      expect(iface.equals(null)).toBe(false);
    });
  });

  describe("tags", () => {
    it("starts with a full VLAN pool and allocates from the top", () => {
      const iface = createInterface();

      const tag = iface.getNextAvailableTag();
      expect(tag?.equals(Tag.vlan(4095))).toBe(true);
      expect(iface.tags.size).toBe(4094);
    });

    it("uses and returns specific tags", () => {
      const iface = createInterface();

      expect(iface.useTag(Tag.vlan(100))).toBe(true);
      expect(iface.isTagAvailable(Tag.vlan(100))).toBe(false);
      expect(iface.useTag(Tag.vlan(100))).toBe(false);
      expect(iface.makeTagAvailable(Tag.vlan(100))).toBe(true);
      expect(iface.makeTagAvailable(Tag.vlan(100))).toBe(false);
      expect(iface.tags.size).toBe(4095);
    });
  });

  describe("speed", () => {
    it("derives 10 Gbps from features with the switch disconnected", () => {
      const iface = createInterface({ features: PortFeaturesV0x01.OFPPF_10GB_FD });

      expect(iface.speed).toBe(1_250_000_000);
      expect(iface.getHumanReadableSpeed()).toBe("10 Gbps");
    });

    it("reports a custom speed of zero", () => {
      const iface = createInterface({ speed: 0, features: PortFeaturesV0x01.OFPPF_1GB_FD });

      expect(iface.speed).toBe(0);
      expect(iface.getHumanReadableSpeed()).toBe("0 Mbps");
    });

    it("needs an OpenFlow 1.3 connection for 1.3-only speeds", () => {
      const sw = new Switch(DPID);
      const iface = createInterface({ switch: sw, features: PortFeaturesV0x04.OFPPF_1TB_FD });

      expect(iface.speed).toBeNull();

      sw.connect(OpenFlowVersion.V0x01);
      expect(iface.speed).toBeNull();

      sw.connect(OpenFlowVersion.V0x04);
      expect(iface.speed).toBe(125_000_000_000);
      expect(iface.getHumanReadableSpeed()).toBe("1 Tbps");

      sw.disconnect();
      expect(iface.speed).toBeNull();
      expect(iface.getHumanReadableSpeed()).toBe("");
    });

    it("warns with the port, shortened switch id and features when speed is unknown", () => {
      const warn = vi.fn();
      const iface = createInterface({
        features: PortFeaturesV0x04.OFPPF_1TB_FD,
        diagnostics: { warn },
      });

      expect(iface.speed).toBeNull();
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        { portNumber: 2, switchId: "00:...:01", features: 512 },
        "Couldn't get port speed"
      );
    });

    it("keeps short switch ids intact in the warning", () => {
      const warn = vi.fn();
      const iface = createInterface({ switch: new Switch("s1"), diagnostics: { warn } });

      iface.getFeaturesSpeed();
      expect(warn).toHaveBeenCalledWith(
        { portNumber: 2, switchId: "s1", features: null },
        "Couldn't get port speed"
      );
    });

    it("does not warn when a custom speed is set", () => {
      const warn = vi.fn();
      const iface = createInterface({ speed: 1000, diagnostics: { warn } });

      expect(iface.speed).toBe(1000);
      expect(warn).not.toHaveBeenCalled();
    });

    it("can clear the custom speed", () => {
      const iface = createInterface({ features: PortFeaturesV0x01.OFPPF_1GB_FD });

      iface.setCustomSpeed(100);
      expect(iface.getCustomSpeed()).toBe(100);
      expect(iface.speed).toBe(100);
      expect(iface.getFeaturesSpeed()).toBe(125_000_000);

      iface.setCustomSpeed(null);
      expect(iface.speed).toBe(125_000_000);
    });

    it("follows features resent by the switch", () => {
      const iface = createInterface({ features: PortFeaturesV0x01.OFPPF_100MB_FD });

      iface.updatePortStatus({ features: PortFeaturesV0x01.OFPPF_10GB_FD, state: 1 });
      expect(iface.speed).toBe(1_250_000_000);
      expect(iface.state).toBe(1);
      expect(iface.name).toBe("eth0");
    });
  });

  describe("endpoints", () => {
    it("keeps the original timestamp when an endpoint is added again", () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
      const iface = createInterface();
      iface.addEndpoint("aa:aa:aa:aa:aa:aa");

      vi.setSystemTime(new Date("2024-01-01T00:05:00.000Z"));
      iface.addEndpoint("aa:aa:aa:aa:aa:aa");

      expect(iface.endpoints).toHaveLength(1);
      expect(iface.endpoints[0].updatedAt.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    });

    it("refreshes the timestamp and moves the endpoint last on update", () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
      const iface = createInterface();
      iface.addEndpoint("aa:aa:aa:aa:aa:aa");
      iface.addEndpoint("bb:bb:bb:bb:bb:bb");

      vi.setSystemTime(new Date("2024-01-01T00:05:00.000Z"));
      iface.updateEndpoint("aa:aa:aa:aa:aa:aa");

      expect(iface.endpoints.map((e) => e.endpoint)).toEqual(["bb:bb:bb:bb:bb:bb", "aa:aa:aa:aa:aa:aa"]);
      expect(iface.getEndpoint("aa:aa:aa:aa:aa:aa")?.updatedAt.toISOString()).toBe("2024-01-01T00:05:00.000Z");
    });

    it("adds an endpoint on update when it is unknown", () => {
      const iface = createInterface();

      iface.updateEndpoint("aa:aa:aa:aa:aa:aa");
      expect(iface.endpoints).toHaveLength(1);
    });

    it("deletes endpoints", () => {
      const iface = createInterface();
      iface.addEndpoint("aa:aa:aa:aa:aa:aa");

      expect(iface.deleteEndpoint("aa:aa:aa:aa:aa:aa")).toBe(true);
      expect(iface.deleteEndpoint("aa:aa:aa:aa:aa:aa")).toBe(false);
      expect(iface.getEndpoint("aa:aa:aa:aa:aa:aa")).toBeNull();
    });

    it("matches a peer interface by its address", () => {
      const iface = createInterface();
      const peer = new Interface({
        name: "eth1",
        portNumber: 1,
        switch: new Switch("00:00:00:00:00:00:00:02"),
        address: "cc:cc:cc:cc:cc:cc",
      });
      iface.addEndpoint(peer);

      expect(iface.getEndpoint("cc:cc:cc:cc:cc:cc")?.endpoint).toBe(peer);
      iface.addEndpoint("cc:cc:cc:cc:cc:cc");
      expect(iface.endpoints).toHaveLength(1);
    });
  });

  describe("toRecord", () => {
    it("renders the stable external representation", () => {
      const iface = createInterface({ features: PortFeaturesV0x01.OFPPF_10GB_FD });
      iface.entity.addMetadata("description", "uplink");

      const record = iface.toRecord();
      expect(record).toEqual({
        id: "00:00:00:00:00:00:00:01:2",
        name: "eth0",
        port_number: 2,
        mac: MAC,
        switch: DPID,
        type: "interface",
        nni: false,
        uni: true,
        speed: 1_250_000_000,
        metadata: { description: "uplink" },
      });
      expect("stats" in record).toBe(false);
    });

    it("includes stats when present", () => {
      const iface = createInterface();
      iface.stats = new PortStats({ rx_packets: 10, tx_bytes: 2048 }, new Date("2024-01-01T00:00:00.000Z"));

      expect(iface.toRecord().stats).toEqual({
        rx_packets: 10,
        tx_packets: 0,
        rx_bytes: 0,
        tx_bytes: 2048,
        rx_dropped: 0,
        tx_dropped: 0,
        rx_errors: 0,
        tx_errors: 0,
        collected_at: "2024-01-01T00:00:00.000Z",
      });
    });

    it("serializes unknown speed as null", () => {
      const parsed = JSON.parse(JSON.stringify(createInterface()));

      expect(parsed.speed).toBeNull();
      expect(parsed.type).toBe("interface");
    });
  });
});
