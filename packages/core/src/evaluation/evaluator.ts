/**
 * Reachability evaluator.
 *
 * Decides whether traffic from a source address block can reach a
 * destination address block and port, given the source's egress rules and
 * the destination's ingress rules. Pure and synchronous: every call builds
 * and returns a fresh {@link ConnectivityEvaluation}.
 *
 * Protocols are not compared; only address blocks and port ranges are.
 */

import { AddressBlock } from "../network/address-block";
import { portInRange } from "../network/port-range";
import type { EgressRule, IngressRule } from "../rules/rule";
import type { RuleSet } from "../rules/rule-set";
import { ConnectivityEvaluation } from "./evaluation";

/**
 * Run the egress check, then (only if egress passed) the ingress check.
 *
 * When several ingress paths are valid, the first one found wins; with more
 * than one source group the group visiting order is not significant.
 *
 * @throws CidrParseError if either CIDR literal is malformed
 */
export function canConnect(
  sourceCidr: string,
  destinationCidr: string,
  destinationPort: number,
  sourceRules: RuleSet,
  destinationRules: RuleSet
): ConnectivityEvaluation {
  const source = AddressBlock.parse(sourceCidr);
  const destination = AddressBlock.parse(destinationCidr);
  const evaluation = new ConnectivityEvaluation();

  if (!checkEgress(sourceRules.egressRules, destination, destinationPort, evaluation)) {
    evaluation.markFailure(
      `no egress rule allows connections to ${destinationCidr} port ${destinationPort}`
    );
    return evaluation;
  }

  checkIngress(sourceRules.groupIds, source, destinationPort, destinationRules.ingressRules, evaluation);
  return evaluation;
}

function checkEgress(
  rules: readonly EgressRule[],
  destination: AddressBlock,
  port: number,
  evaluation: ConnectivityEvaluation
): boolean {
  for (const rule of rules) {
    if (!rule.destination || !rule.destination.contains(destination)) {
      continue;
    }
    if (portInRange(port, rule.portRange)) {
      return true;
    }
    evaluation.addContext(
      `egress rule ${rule.ruleId} allows ${destination.literal} but not port ${port}`
    );
  }
  return false;
}

function checkIngress(
  sourceGroupIds: ReadonlySet<string>,
  source: AddressBlock,
  port: number,
  rules: readonly IngressRule[],
  evaluation: ConnectivityEvaluation
): void {
  for (const sourceGroupId of sourceGroupIds) {
    for (const rule of rules) {
      if (matchIngressRule(rule, sourceGroupId, source, port, evaluation)) {
        return;
      }
    }
  }
}

/**
 * Check one ingress rule against one source group, group reference first and
 * CIDR second. Records a success and returns true on a match; records a hint
 * when the rule matches the source but not the port.
 */
function matchIngressRule(
  rule: IngressRule,
  sourceGroupId: string,
  source: AddressBlock,
  port: number,
  evaluation: ConnectivityEvaluation
): boolean {
  const portAllowed = portInRange(port, rule.portRange);

  if (rule.sourceGroupId !== undefined && rule.sourceGroupId === sourceGroupId) {
    if (portAllowed) {
      evaluation.markSuccess(
        `${rule.groupId} has group-based rule ${rule.ruleId} that allows ${sourceGroupId} on port ${port}`
      );
      return true;
    }
    evaluation.addContext(
      `${rule.groupId} has group-based rule ${rule.ruleId} that allows ${sourceGroupId} but not on port ${port}`
    );
  }

  if (rule.sourceCidr && rule.sourceCidr.contains(source)) {
    if (portAllowed) {
      evaluation.markSuccess(
        `${rule.groupId} has cidr-based rule ${rule.ruleId} that allows ${source.literal} on port ${port}`
      );
      return true;
    }
    evaluation.addContext(
      `${rule.groupId} has cidr-based rule ${rule.ruleId} that allows ${source.literal} but not on port ${port}`
    );
  }

  return false;
}
