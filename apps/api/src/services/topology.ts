import type { TopologyStats } from "@sdn-port-manager/shared";
import type { NetworkConfig } from "../config/network.js";
import { silentDiagnostics, type DiagnosticsSink } from "../logger.js";
import type { Interface } from "../models/interface.js";
import { Switch } from "../models/switch.js";

export interface TopologyOptions {
  diagnostics?: DiagnosticsSink;
}

/**
 * In-memory registry of the switches known to the controller
 */
export class Topology {
  private switches = new Map<string, Switch>();
  private diagnostics: DiagnosticsSink;

  constructor(options: TopologyOptions = {}) {
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
  }

  /**
   * Get a switch, registering it if unknown
   */
  addSwitch(dpid: string): Switch {
    let sw = this.switches.get(dpid);
    if (!sw) {
      sw = new Switch(dpid, { diagnostics: this.diagnostics });
      this.switches.set(dpid, sw);
    }
    return sw;
  }

  getSwitch(dpid: string): Switch | undefined {
    return this.switches.get(dpid);
  }

  listSwitches(): Switch[] {
    return Array.from(this.switches.values());
  }

  listInterfaces(): Interface[] {
    return this.listSwitches().flatMap((sw) => sw.interfaces);
  }

  /**
   * Look up an interface by its "<dpid>:<port>" identifier
   */
  getInterface(id: string): Interface | undefined {
    const separator = id.lastIndexOf(":");
    if (separator <= 0) {
      return undefined;
    }
    const portText = id.slice(separator + 1);
    if (!/^\d+$/.test(portText)) {
      return undefined;
    }
    return this.switches.get(id.slice(0, separator))?.getInterface(Number(portText));
  }

  /**
   * Register the configured switches and ports. Configured names, addresses,
   * roles and speed overrides replace the current ones.
   */
  applyConfig(config: NetworkConfig): void {
    for (const switchConfig of config.switches) {
      const sw = this.addSwitch(switchConfig.dpid);
      for (const port of switchConfig.ports) {
        const iface = sw.updateOrCreateInterface(port.number, {
          name: port.name,
          address: port.address ?? null,
        });
        iface.isNetworkToNetwork = port.nni;
        iface.setCustomSpeed(port.speed ?? null);
      }
    }
  }

  getStats(): TopologyStats {
    const switches = this.listSwitches();
    const interfaces = this.listInterfaces();
    return {
      switches: switches.length,
      connectedSwitches: switches.filter((sw) => sw.isConnected()).length,
      interfaces: interfaces.length,
      availableTags: interfaces.reduce((total, iface) => total + iface.tags.size, 0),
    };
  }
}
