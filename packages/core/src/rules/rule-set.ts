import { AddressBlock } from "../network/address-block";
import { createPortRange } from "../network/port-range";
import type { ConnectivityEvaluation } from "../evaluation/evaluation";
import { canConnect } from "../evaluation/evaluator";
import type { EgressRule, IngressRule } from "./rule";

interface RuleInputBase {
  groupId: string;
  groupName?: string;
  ruleId: string;
  protocol: string;
  /** Raw lower bound; -1 means unbounded */
  fromPort: number;
  /** Raw upper bound; -1 means unbounded */
  toPort: number;
  cidrIpv4?: string | AddressBlock;
  cidrIpv6?: string;
}

export type EgressRuleInput = RuleInputBase;

export interface IngressRuleInput extends RuleInputBase {
  sourceGroupId?: string;
}

/**
 * The combined rules of every security group attached to one resource.
 *
 * Built once per check, then read by {@link canConnect}. A RuleSet is meant to
 * be used either for its egress rules (source side) or for its ingress rules
 * (destination side) in a given evaluation.
 */
export class RuleSet {
  private readonly _groupIds = new Set<string>();
  private readonly _egressRules: EgressRule[] = [];
  private readonly _ingressRules: IngressRule[] = [];

  get groupIds(): ReadonlySet<string> {
    return this._groupIds;
  }

  get egressRules(): readonly EgressRule[] {
    return this._egressRules;
  }

  get ingressRules(): readonly IngressRule[] {
    return this._ingressRules;
  }

  get isEmpty(): boolean {
    return this._egressRules.length === 0 && this._ingressRules.length === 0;
  }

  /**
   * Register an outbound rule. A malformed `cidrIpv4` string throws
   * CidrParseError.
   */
  addEgressRule(input: EgressRuleInput): this {
    this._groupIds.add(input.groupId);
    this._egressRules.push({
      kind: "egress",
      groupId: input.groupId,
      groupName: input.groupName,
      ruleId: input.ruleId,
      protocol: input.protocol,
      portRange: createPortRange(input.fromPort, input.toPort),
      destination: input.cidrIpv4 ? AddressBlock.from(input.cidrIpv4) : undefined,
      destinationIpv6: input.cidrIpv6,
    });
    return this;
  }

  /**
   * Register an inbound rule. A malformed `cidrIpv4` string throws
   * CidrParseError.
   */
  addIngressRule(input: IngressRuleInput): this {
    this._groupIds.add(input.groupId);
    this._ingressRules.push({
      kind: "ingress",
      groupId: input.groupId,
      groupName: input.groupName,
      ruleId: input.ruleId,
      protocol: input.protocol,
      portRange: createPortRange(input.fromPort, input.toPort),
      sourceGroupId: input.sourceGroupId,
      sourceCidr: input.cidrIpv4 ? AddressBlock.from(input.cidrIpv4) : undefined,
      sourceIpv6: input.cidrIpv6,
    });
    return this;
  }

  /**
   * Evaluate whether a resource governed by this RuleSet, sitting in
   * `sourceCidr`, can reach `destinationCidr:destinationPort` guarded by
   * `destinationRules`.
   */
  canConnectTo(
    sourceCidr: string,
    destinationCidr: string,
    destinationPort: number,
    destinationRules: RuleSet
  ): ConnectivityEvaluation {
    return canConnect(sourceCidr, destinationCidr, destinationPort, this, destinationRules);
  }
}
