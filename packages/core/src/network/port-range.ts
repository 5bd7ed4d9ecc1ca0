import { MAX_PORT, MIN_PORT, UNBOUNDED_PORT } from "../constants";

export interface PortRange {
  readonly from: number;
  readonly to: number;
}

/**
 * Build a port range from provider data. EC2 reports `-1` on both bounds for
 * ICMP and all-protocol rules; either bound set to `-1` is unbounded on
 * that side.
 */
export function createPortRange(from: number, to: number): PortRange {
  return {
    from: from === UNBOUNDED_PORT ? MIN_PORT : from,
    to: to === UNBOUNDED_PORT ? MAX_PORT : to,
  };
}

export function portInRange(port: number, range: PortRange): boolean {
  return port >= range.from && port <= range.to;
}

export function formatPortRange(range: PortRange): string {
  if (range.from === MIN_PORT && range.to === MAX_PORT) {
    return "all";
  }
  return range.from === range.to ? `${range.from}` : `${range.from}-${range.to}`;
}
