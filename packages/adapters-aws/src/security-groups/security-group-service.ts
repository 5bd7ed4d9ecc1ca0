import {
  LookupError,
  RuleSet,
  createPortRange,
  formatPortRange,
  type ISecurityGroupRulesService,
} from "@reachcheck/core";
import type {
  EC2Service,
  SecurityGroupDescription,
  SecurityGroupRuleDescription,
} from "../ec2/ec2-service";
import { hasErrorName } from "../errors";
import { noopLog, type AwsLogCallback } from "../types";

/**
 * Collects the rules of a resource's security groups into one RuleSet.
 */
export class SecurityGroupService implements ISecurityGroupRulesService {
  constructor(
    private readonly ec2: EC2Service,
    private readonly log: AwsLogCallback = noopLog
  ) {}

  async lookupRules(groupIds: readonly string[]): Promise<RuleSet> {
    const result = new RuleSet();
    if (groupIds.length === 0) {
      return result;
    }

    const groups = await this.describeGroups([...groupIds]);

    for (const group of groups) {
      const rules = await this.ec2.describeSecurityGroupRules(group.groupId);
      this.log(`${group.groupId} (${group.groupName}): ${rules.length} rule(s)`);

      for (const rule of rules) {
        this.log(`  ${describeRule(rule)}`);
        const common = {
          groupId: group.groupId,
          groupName: group.groupName,
          ruleId: rule.ruleId,
          protocol: rule.protocol,
          fromPort: rule.fromPort,
          toPort: rule.toPort,
          cidrIpv4: rule.cidrIpv4,
          cidrIpv6: rule.cidrIpv6,
        };

        if (rule.isEgress) {
          result.addEgressRule(common);
        } else {
          result.addIngressRule({ ...common, sourceGroupId: rule.referencedGroupId });
        }
      }
    }

    return result;
  }

  private async describeGroups(groupIds: string[]): Promise<SecurityGroupDescription[]> {
    const groups = await this.ec2.describeSecurityGroups(groupIds).catch((error: unknown) => {
      if (hasErrorName(error, "InvalidGroup.NotFound", "InvalidGroupId.Malformed")) {
        throw new LookupError(
          `unable to find security groups ${groupIds.join(", ")}`,
          "security-group",
          groupIds.join(","),
          error
        );
      }
      throw error;
    });

    const missing = groupIds.filter((id) => !groups.some((group) => group.groupId === id));
    if (missing.length > 0) {
      throw new LookupError(
        `unable to find security groups ${missing.join(", ")}`,
        "security-group",
        missing.join(",")
      );
    }
    return groups;
  }
}

/** One-line summary for verbose output, e.g. "ingress sgr-1 tcp ports 5432 from sg-app" */
function describeRule(rule: SecurityGroupRuleDescription): string {
  const protocol = rule.protocol === "-1" ? "any" : rule.protocol;
  const ports = formatPortRange(createPortRange(rule.fromPort, rule.toPort));
  const cidr = rule.cidrIpv4 ?? rule.cidrIpv6 ?? "-";
  const peer = rule.isEgress ? `to ${cidr}` : `from ${rule.referencedGroupId ?? cidr}`;
  return `${rule.isEgress ? "egress" : "ingress"} ${rule.ruleId} ${protocol} ports ${ports} ${peer}`;
}
