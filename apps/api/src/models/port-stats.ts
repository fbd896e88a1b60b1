import type { PortStatsRecord } from "@sdn-port-manager/shared";
import type { StatsSource } from "./collaborators.js";

const EMPTY_COUNTERS: PortStatsRecord = {
  rx_packets: 0,
  tx_packets: 0,
  rx_bytes: 0,
  tx_bytes: 0,
  rx_dropped: 0,
  tx_dropped: 0,
  rx_errors: 0,
  tx_errors: 0,
};

/**
 * Latest port counters received from a switch
 */
export class PortStats implements StatsSource {
  readonly counters: PortStatsRecord;
  readonly collectedAt: Date;

  constructor(counters: Partial<PortStatsRecord> = {}, collectedAt: Date = new Date()) {
    this.counters = { ...EMPTY_COUNTERS, ...counters };
    this.collectedAt = collectedAt;
  }

  toRecord(): Record<string, unknown> {
    return { ...this.counters, collected_at: this.collectedAt.toISOString() };
  }
}
