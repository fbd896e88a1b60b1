import { OpenFlowVersion, type InterfaceRecord } from "@sdn-port-manager/shared";
import { silentDiagnostics, type DiagnosticsSink } from "../logger.js";
import {
  humanReadableSpeed,
  resolveFeaturesSpeed,
  resolveSpeed,
  truncateSwitchId,
} from "../services/speed-resolver.js";
import type { StatsSource, SwitchHandle } from "./collaborators.js";
import { EntityState, type EntityCapable } from "./entity-state.js";
import type { Tag } from "./tag.js";
import { TagPool } from "./tag-pool.js";

/**
 * Something seen behind an interface: a hardware address or a peer interface
 */
export type Endpoint = string | Interface;

export interface EndpointEntry {
  endpoint: Endpoint;
  updatedAt: Date;
}

/**
 * Port attributes a switch reports
 */
export interface PortStatus {
  name?: string;
  address?: string | null;
  state?: number | null;
  features?: number | null;
}

export interface InterfaceOptions extends PortStatus {
  name: string;
  portNumber: number | string;
  switch: SwitchHandle;
  /** Speed override in bytes per second */
  speed?: number | null;
  nni?: boolean;
  diagnostics?: DiagnosticsSink;
}

function toPortNumber(value: number | string): number {
  const numeric = typeof value === "number" ? value : value.trim() === "" ? Number.NaN : Number(value);
  const port = Math.trunc(numeric);
  if (!Number.isFinite(port) || port < 0) {
    throw new RangeError(`Invalid port number: ${value}`);
  }
  return port;
}

function endpointsEqual(a: Endpoint, b: Endpoint): boolean {
  if (a instanceof Interface) {
    return a.equals(b);
  }
  if (b instanceof Interface) {
    return b.equals(a);
  }
  return a === b;
}

/**
 * A switch port and the VLAN tags still free on it
 */
export class Interface implements EntityCapable {
  name: string;
  readonly portNumber: number;
  readonly switch: SwitchHandle;
  address: string | null;
  state: number | null;
  features: number | null;
  isNetworkToNetwork: boolean;
  stats: StatsSource | null = null;
  readonly entity = new EntityState();
  readonly tags: TagPool = TagPool.forVlans();

  private customSpeed: number | null;
  private endpointEntries: EndpointEntry[] = [];
  private diagnostics: DiagnosticsSink;

  constructor(options: InterfaceOptions) {
    this.name = options.name;
    this.portNumber = toPortNumber(options.portNumber);
    this.switch = options.switch;
    this.address = options.address ?? null;
    this.state = options.state ?? null;
    this.features = options.features ?? null;
    this.customSpeed = options.speed ?? null;
    this.isNetworkToNetwork = options.nni ?? false;
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
  }

  /**
   * "<switch dpid>:<port number>"
   */
  get id(): string {
    return `${this.switch.dpid}:${this.portNumber}`;
  }

  get isUserToNetwork(): boolean {
    return !this.isNetworkToNetwork;
  }

  /**
   * Interfaces equal a bare string when their address matches it, and another
   * interface when port, name, address and switch all match.
   */
  equals(other: unknown): boolean {
    if (typeof other === "string") {
      return this.address === other;
    }
    if (other instanceof Interface) {
      return (
        this.portNumber === other.portNumber &&
        this.name === other.name &&
        this.address === other.address &&
        this.switch.dpid === other.switch.dpid
      );
    }
    return false;
  }

  /**
   * Apply port information resent by the switch
   */
  updatePortStatus(status: PortStatus): void {
    if (status.name !== undefined) {
      this.name = status.name;
    }
    if (status.address !== undefined) {
      this.address = status.address;
    }
    if (status.state !== undefined) {
      this.state = status.state;
    }
    if (status.features !== undefined) {
      this.features = status.features;
    }
  }

  // Tags

  /**
   * Remove a specific tag from the available ones. False if it was not available.
   */
  useTag(tag: Tag): boolean {
    return this.tags.reserve(tag);
  }

  isTagAvailable(tag: Tag): boolean {
    return this.tags.isAvailable(tag);
  }

  getNextAvailableTag(): Tag | null {
    return this.tags.allocateNext();
  }

  /**
   * Give a tag back. False if it was already available.
   */
  makeTagAvailable(tag: Tag): boolean {
    return this.tags.release(tag);
  }

  // Endpoints

  get endpoints(): readonly EndpointEntry[] {
    return this.endpointEntries;
  }

  getEndpoint(endpoint: Endpoint): EndpointEntry | null {
    return this.endpointEntries.find((entry) => endpointsEqual(endpoint, entry.endpoint)) ?? null;
  }

  /**
   * Record an endpoint. Known endpoints keep their original timestamp.
   */
  addEndpoint(endpoint: Endpoint): void {
    if (!this.getEndpoint(endpoint)) {
      this.endpointEntries.push({ endpoint, updatedAt: new Date() });
    }
  }

  deleteEndpoint(endpoint: Endpoint): boolean {
    const existing = this.getEndpoint(endpoint);
    if (!existing) {
      return false;
    }
    this.endpointEntries = this.endpointEntries.filter((entry) => entry !== existing);
    return true;
  }

  /**
   * Record an endpoint, refreshing its timestamp if already known
   */
  updateEndpoint(endpoint: Endpoint): void {
    this.deleteEndpoint(endpoint);
    this.addEndpoint(endpoint);
  }

  // Speed

  /**
   * Link speed in bytes per second, or null if unknown.
   *
   * With the switch disconnected, speeds shared by OpenFlow 1.0 and 1.3 are
   * still reported. 40 Gbps, 100 Gbps and 1 Tbps need an active 1.3 connection.
   */
  get speed(): number | null {
    const speed = resolveSpeed(this.customSpeed, this.features, this.isV0x04());
    if (speed === null) {
      this.warnUnknownSpeed();
    }
    return speed;
  }

  /**
   * Override the speed reported by the switch. Null restores it.
   */
  setCustomSpeed(bytesPerSecond: number | null): void {
    this.customSpeed = bytesPerSecond;
  }

  getCustomSpeed(): number | null {
    return this.customSpeed;
  }

  /**
   * Speed derived from the advertised features only, ignoring any override
   */
  getFeaturesSpeed(): number | null {
    const speed = resolveFeaturesSpeed(this.features, this.isV0x04());
    if (speed === null) {
      this.warnUnknownSpeed();
    }
    return speed;
  }

  getHumanReadableSpeed(): string {
    return humanReadableSpeed(this.speed);
  }

  private isV0x04(): boolean {
    return this.switch.isConnected() && this.switch.negotiatedVersion === OpenFlowVersion.V0x04;
  }

  private warnUnknownSpeed(): void {
    this.diagnostics.warn(
      {
        portNumber: this.portNumber,
        switchId: truncateSwitchId(this.switch.dpid),
        features: this.features,
      },
      "Couldn't get port speed"
    );
  }

  toRecord(): InterfaceRecord {
    const record: InterfaceRecord = {
      id: this.id,
      name: this.name,
      port_number: this.portNumber,
      mac: this.address,
      switch: this.switch.dpid,
      type: "interface",
      nni: this.isNetworkToNetwork,
      uni: this.isUserToNetwork,
      speed: this.speed,
      metadata: this.entity.metadata,
    };
    if (this.stats) {
      record.stats = this.stats.toRecord();
    }
    return record;
  }

  toJSON(): InterfaceRecord {
    return this.toRecord();
  }
}
