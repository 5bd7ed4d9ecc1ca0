/**
 * Security group rule model.
 *
 * Egress and ingress rules share identity and port fields and differ only in
 * their match targets, so they are one union discriminated by `kind`.
 */

import type { AddressBlock } from "../network/address-block";
import type { PortRange } from "../network/port-range";

interface RuleBase {
  /** Security group that owns the rule */
  groupId: string;
  groupName?: string;
  /** Provider rule id, e.g. "sgr-0123456789abcdef0" */
  ruleId: string;
  /** IP protocol tag ("tcp", "udp", "-1", ...). Carried, never matched. */
  protocol: string;
  portRange: PortRange;
}

export interface EgressRule extends RuleBase {
  kind: "egress";
  /** IPv4 destination; absent for rules that only target IPv6 or prefix lists */
  destination?: AddressBlock;
  destinationIpv6?: string;
}

export interface IngressRule extends RuleBase {
  kind: "ingress";
  /** Referenced security group allowed to connect */
  sourceGroupId?: string;
  sourceCidr?: AddressBlock;
  sourceIpv6?: string;
}

export type SecurityGroupRule = EgressRule | IngressRule;
