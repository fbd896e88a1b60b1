import type { OpenFlowVersion } from "@sdn-port-manager/shared";

/**
 * What an interface needs to know about the switch it belongs to
 */
export interface SwitchHandle {
  readonly dpid: string;
  /** OpenFlow version negotiated on the current connection, if any */
  readonly negotiatedVersion: OpenFlowVersion | null;
  isConnected(): boolean;
}

/**
 * Statistics rendered verbatim into an interface record
 */
export interface StatsSource {
  toRecord(): Record<string, unknown>;
}
