/**
 * Round to the nearest integer, ties to even
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) {
    return floor;
  }
  if (diff > 0.5) {
    return floor + 1;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Format a speed in bytes per second, e.g. "10 Gbps" or "350 Mbps".
 * Unknown speed renders as an empty string.
 */
export function humanReadableSpeed(bytesPerSecond: number | null): string {
  if (bytesPerSecond === null) {
    return "";
  }
  const bits = bytesPerSecond * 8;
  if (bits === 10 ** 12) {
    return "1 Tbps";
  }
  if (bits >= 10 ** 9) {
    return `${roundHalfEven(bits / 10 ** 9)} Gbps`;
  }
  return `${roundHalfEven(bits / 10 ** 6)} Mbps`;
}
