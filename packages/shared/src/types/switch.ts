import type { OpenFlowVersion } from "./port-features.js";

/**
 * A switch as rendered on the wire
 */
export interface SwitchRecord {
  id: string;
  dpid: string;
  connected: boolean;
  ofp_version: OpenFlowVersion | null;
  interfaces: string[];
}

/**
 * Summary returned by GET /stats
 */
export interface TopologyStats {
  switches: number;
  connectedSwitches: number;
  interfaces: number;
  availableTags: number;
}
