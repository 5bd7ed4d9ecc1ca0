/**
 * VPC placement types and the pre-check that gates the evaluator.
 */

import type { ResourceDescriptor } from "./descriptor";

export interface RouteTableInfo {
  routeTableId: string;
  /** Target of the 0.0.0.0/0 route (internet or NAT gateway), if any */
  defaultGateway?: string;
}

export interface SubnetInfo {
  subnetId: string;
  vpcId: string;
  cidr: string;
  availabilityZone: string;
  routeTable?: RouteTableInfo;
}

export interface VpcInfo {
  vpcId: string;
  cidr: string;
  /** Subnets keyed by subnet id, in network-address order */
  subnets: Map<string, SubnetInfo>;
}

/**
 * Two resources are only evaluated further when they sit in the same VPC.
 * Peering, transit gateways and NAT paths are not considered.
 */
export function sameVpc(a: ResourceDescriptor, b: ResourceDescriptor): boolean {
  return a.vpcId !== "" && a.vpcId === b.vpcId;
}
