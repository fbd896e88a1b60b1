/**
 * OpenFlow protocol versions a switch can negotiate
 */
export enum OpenFlowVersion {
  V0x01 = 0x01,
  V0x04 = 0x04,
}

/**
 * Port feature bits advertised by OpenFlow 1.0 switches (ofp_port_features)
 */
export enum PortFeaturesV0x01 {
  OFPPF_10MB_HD = 1 << 0,
  OFPPF_10MB_FD = 1 << 1,
  OFPPF_100MB_HD = 1 << 2,
  OFPPF_100MB_FD = 1 << 3,
  OFPPF_1GB_HD = 1 << 4,
  OFPPF_1GB_FD = 1 << 5,
  OFPPF_10GB_FD = 1 << 6,
  OFPPF_COPPER = 1 << 7,
  OFPPF_FIBER = 1 << 8,
  OFPPF_AUTONEG = 1 << 9,
  OFPPF_PAUSE = 1 << 10,
  OFPPF_PAUSE_ASYM = 1 << 11,
}

/**
 * Port feature bits advertised by OpenFlow 1.3 switches.
 *
 * Bits 0-6 match OpenFlow 1.0. From bit 7 on the two layouts diverge, so a
 * 1.3 speed bit means nothing unless the switch negotiated 1.3.
 */
export enum PortFeaturesV0x04 {
  OFPPF_10MB_HD = 1 << 0,
  OFPPF_10MB_FD = 1 << 1,
  OFPPF_100MB_HD = 1 << 2,
  OFPPF_100MB_FD = 1 << 3,
  OFPPF_1GB_HD = 1 << 4,
  OFPPF_1GB_FD = 1 << 5,
  OFPPF_10GB_FD = 1 << 6,
  OFPPF_40GB_FD = 1 << 7,
  OFPPF_100GB_FD = 1 << 8,
  OFPPF_1TB_FD = 1 << 9,
  OFPPF_OTHER = 1 << 10,
  OFPPF_COPPER = 1 << 11,
  OFPPF_FIBER = 1 << 12,
  OFPPF_AUTONEG = 1 << 13,
  OFPPF_PAUSE = 1 << 14,
  OFPPF_PAUSE_ASYM = 1 << 15,
}
