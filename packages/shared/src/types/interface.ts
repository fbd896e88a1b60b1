import type { TagRecord } from "./tag.js";

/**
 * JSON-compatible value stored in entity metadata
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type Metadata = Record<string, MetadataValue>;

/**
 * Port counters reported by a switch
 */
export interface PortStatsRecord {
  rx_packets: number;
  tx_packets: number;
  rx_bytes: number;
  tx_bytes: number;
  rx_dropped: number;
  tx_dropped: number;
  rx_errors: number;
  tx_errors: number;
}

/**
 * External representation of an interface.
 *
 * Field names are consumed by dashboards and REST clients; keep them stable.
 * Speed is in bytes per second, null when it cannot be determined.
 */
export interface InterfaceRecord {
  id: string;
  name: string;
  port_number: number;
  mac: string | null;
  switch: string;
  type: "interface";
  nni: boolean;
  uni: boolean;
  speed: number | null;
  metadata: Metadata;
  stats?: Record<string, unknown>;
}

/**
 * Interface record as returned by GET /interfaces/:id
 */
export interface InterfaceDetail extends InterfaceRecord {
  hr_speed: string;
  enabled: boolean;
  active: boolean;
}

/**
 * An endpoint seen behind an interface
 */
export interface EndpointRecord {
  endpoint: string;
  updated_at: string;
}

export interface UniRecord {
  interface_id: string;
  user_tag: TagRecord;
}

export interface NniRecord {
  interface_id: string;
}

export interface VnniRecord extends NniRecord {
  service_tag: TagRecord;
}
