import type { OpenFlowVersion, SwitchRecord } from "@sdn-port-manager/shared";
import { silentDiagnostics, type DiagnosticsSink } from "../logger.js";
import type { SwitchHandle } from "./collaborators.js";
import { EntityState, type EntityCapable } from "./entity-state.js";
import { Interface, type PortStatus } from "./interface.js";

export interface SwitchOptions {
  /** Sink handed to every interface this switch creates */
  diagnostics?: DiagnosticsSink;
}

/**
 * A datapath and the ports it has reported
 */
export class Switch implements SwitchHandle, EntityCapable {
  readonly dpid: string;
  readonly entity = new EntityState();
  private connectedVersion: OpenFlowVersion | null = null;
  private ports = new Map<number, Interface>();
  private diagnostics: DiagnosticsSink;

  constructor(dpid: string, options: SwitchOptions = {}) {
    this.dpid = dpid;
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
  }

  get negotiatedVersion(): OpenFlowVersion | null {
    return this.connectedVersion;
  }

  isConnected(): boolean {
    return this.connectedVersion !== null;
  }

  connect(version: OpenFlowVersion): void {
    this.connectedVersion = version;
  }

  disconnect(): void {
    this.connectedVersion = null;
  }

  get interfaces(): Interface[] {
    return Array.from(this.ports.values()).sort((a, b) => a.portNumber - b.portNumber);
  }

  getInterface(portNumber: number): Interface | undefined {
    return this.ports.get(portNumber);
  }

  /**
   * Apply a port status message: update the known interface or create it
   */
  updateOrCreateInterface(portNumber: number, status: PortStatus & { name: string }): Interface {
    const existing = this.ports.get(portNumber);
    if (existing) {
      existing.updatePortStatus(status);
      return existing;
    }

    const iface = new Interface({
      ...status,
      portNumber,
      switch: this,
      diagnostics: this.diagnostics,
    });
    this.ports.set(iface.portNumber, iface);
    return iface;
  }

  removeInterface(portNumber: number): boolean {
    return this.ports.delete(portNumber);
  }

  toRecord(): SwitchRecord {
    return {
      id: this.dpid,
      dpid: this.dpid,
      connected: this.isConnected(),
      ofp_version: this.negotiatedVersion,
      interfaces: this.interfaces.map((iface) => iface.id),
    };
  }
}
