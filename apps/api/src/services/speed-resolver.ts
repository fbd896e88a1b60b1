import { PortFeaturesV0x01, PortFeaturesV0x04 } from "@sdn-port-manager/shared";

export { humanReadableSpeed, roundHalfEven } from "@sdn-port-manager/shared";

interface SpeedTier {
  mask: number;
  bytesPerSecond: number;
}

/**
 * Speeds whose bits sit at the same positions in OpenFlow 1.0 and 1.3.
 * Order matters: the first matching tier wins.
 */
const COMMON_TIERS: readonly SpeedTier[] = [
  { mask: PortFeaturesV0x01.OFPPF_10GB_FD, bytesPerSecond: (10 * 10 ** 9) / 8 },
  {
    mask: PortFeaturesV0x01.OFPPF_1GB_HD | PortFeaturesV0x01.OFPPF_1GB_FD,
    bytesPerSecond: 10 ** 9 / 8,
  },
  {
    mask: PortFeaturesV0x01.OFPPF_100MB_HD | PortFeaturesV0x01.OFPPF_100MB_FD,
    bytesPerSecond: (100 * 10 ** 6) / 8,
  },
  {
    mask: PortFeaturesV0x01.OFPPF_10MB_HD | PortFeaturesV0x01.OFPPF_10MB_FD,
    bytesPerSecond: (10 * 10 ** 6) / 8,
  },
];

/**
 * Speeds only OpenFlow 1.3 defines. In 1.0 these bit positions carry
 * medium and autonegotiation flags.
 */
const V0X04_TIERS: readonly SpeedTier[] = [
  { mask: PortFeaturesV0x04.OFPPF_1TB_FD, bytesPerSecond: 10 ** 12 / 8 },
  { mask: PortFeaturesV0x04.OFPPF_100GB_FD, bytesPerSecond: (100 * 10 ** 9) / 8 },
  { mask: PortFeaturesV0x04.OFPPF_40GB_FD, bytesPerSecond: (40 * 10 ** 9) / 8 },
];

function matchTier(features: number, tiers: readonly SpeedTier[]): number | null {
  for (const tier of tiers) {
    if (features & tier.mask) {
      return tier.bytesPerSecond;
    }
  }
  return null;
}

/**
 * Link speed in bytes per second derived from a port feature bitmask, or
 * null if no known speed bit is set.
 *
 * The 1.3-only tiers are consulted only when the switch is known to be
 * connected with OpenFlow 1.3.
 */
export function resolveFeaturesSpeed(
  features: number | null,
  isV0x04Connected: boolean
): number | null {
  if (!features) {
    return null;
  }
  const speed = matchTier(features, COMMON_TIERS);
  if (speed === null && isV0x04Connected) {
    return matchTier(features, V0X04_TIERS);
  }
  return speed;
}

/**
 * Effective link speed in bytes per second. A custom speed, zero included,
 * always takes precedence over the one advertised by the switch.
 */
export function resolveSpeed(
  customSpeed: number | null,
  features: number | null,
  isV0x04Connected: boolean
): number | null {
  if (customSpeed !== null) {
    return customSpeed;
  }
  return resolveFeaturesSpeed(features, isV0x04Connected);
}

const MAX_SWITCH_ID_LENGTH = 20;

/**
 * Shorten long switch ids for log lines: "00:00:00:00:00:00:00:01" -> "00:...:01"
 */
export function truncateSwitchId(id: string): string {
  if (id.length > MAX_SWITCH_ID_LENGTH) {
    return `${id.slice(0, 3)}...${id.slice(-3)}`;
  }
  return id;
}
