import { describe, it, expect, vi } from "vitest";
import { checkReachability } from "../reachability";
import { RuleSet } from "../rules/rule-set";
import type { ISecurityGroupRulesService } from "../interfaces/lookup-service";
import type { DestinationDescriptor, SourceDescriptor } from "../resources/descriptor";

const SOURCE: SourceDescriptor = {
  resourceType: "lambda",
  resourceName: "orders-handler",
  vpcId: "vpc-1111",
  subnetIds: ["subnet-aaaa"],
  securityGroupIds: ["sg-12345"],
  cidr: "172.31.0.0/20",
};

const DESTINATION: DestinationDescriptor = {
  resourceType: "rds",
  resourceName: "orders-db",
  vpcId: "vpc-1111",
  subnetIds: ["subnet-bbbb"],
  securityGroupIds: ["sg-67890"],
  cidr: "172.31.128.0/20",
  port: 5432,
};

function fakeSecurityGroups(rules: Record<string, RuleSet>): ISecurityGroupRulesService {
  return {
    lookupRules: vi.fn(async (groupIds: readonly string[]) => rules[groupIds.join(",")] ?? new RuleSet()),
  };
}

const OPEN_EGRESS = new RuleSet().addEgressRule({
  groupId: "sg-12345",
  ruleId: "sgr-12345-01",
  protocol: "-1",
  fromPort: -1,
  toPort: -1,
  cidrIpv4: "0.0.0.0/0",
});

describe("checkReachability", () => {
  it("stops before the evaluator when the VPCs differ", async () => {
    const securityGroups = fakeSecurityGroups({});

    const report = await checkReachability({
      source: { ...SOURCE, vpcId: "vpc-2222" },
      destination: DESTINATION,
      securityGroups,
    });

    expect(report.status).toBe("different-vpc");
    expect(report.evaluation).toBeUndefined();
    expect(report.messages).toEqual(["not in same VPC (vpc-2222 / vpc-1111)"]);
    expect(securityGroups.lookupRules).not.toHaveBeenCalled();
  });

  it("reports a reachable path", async () => {
    const securityGroups = fakeSecurityGroups({
      "sg-12345": OPEN_EGRESS,
      "sg-67890": new RuleSet().addIngressRule({
        groupId: "sg-67890",
        ruleId: "sgr-67890-01",
        protocol: "tcp",
        fromPort: 5432,
        toPort: 5432,
        sourceGroupId: "sg-12345",
      }),
    });

    const report = await checkReachability({ source: SOURCE, destination: DESTINATION, securityGroups });

    expect(report.status).toBe("reachable");
    expect(report.port).toBe(5432);
    expect(report.messages).toEqual([
      "sg-67890 has group-based rule sgr-67890-01 that allows sg-12345 on port 5432",
    ]);
    expect(securityGroups.lookupRules).toHaveBeenCalledWith(["sg-12345"]);
    expect(securityGroups.lookupRules).toHaveBeenCalledWith(["sg-67890"]);
  });

  it("reports a blocked path with its hints", async () => {
    const securityGroups = fakeSecurityGroups({
      "sg-12345": new RuleSet().addEgressRule({
        groupId: "sg-12345",
        ruleId: "sgr-12345-01",
        protocol: "tcp",
        fromPort: 443,
        toPort: 443,
        cidrIpv4: "0.0.0.0/0",
      }),
    });

    const report = await checkReachability({ source: SOURCE, destination: DESTINATION, securityGroups });

    expect(report.status).toBe("blocked");
    expect(report.messages).toEqual([
      "no egress rule allows connections to 172.31.128.0/20 port 5432",
      "egress rule sgr-12345-01 allows 172.31.128.0/20 but not port 5432",
    ]);
  });

  it("checks the requested port instead of the destination's", async () => {
    const securityGroups = fakeSecurityGroups({
      "sg-12345": OPEN_EGRESS,
      "sg-67890": new RuleSet().addIngressRule({
        groupId: "sg-67890",
        ruleId: "sgr-67890-01",
        protocol: "tcp",
        fromPort: 5432,
        toPort: 5432,
        cidrIpv4: "172.31.0.0/16",
      }),
    });

    const report = await checkReachability({
      source: SOURCE,
      destination: DESTINATION,
      port: 3306,
      securityGroups,
    });

    expect(report.status).toBe("inconclusive");
    expect(report.port).toBe(3306);
    expect(report.messages).toEqual([
      "sg-67890 has cidr-based rule sgr-67890-01 that allows 172.31.0.0/20 but not on port 3306",
    ]);
  });

  it("is inconclusive with no hints when nothing matches", async () => {
    const securityGroups = fakeSecurityGroups({ "sg-12345": OPEN_EGRESS });
    const log = vi.fn();

    const report = await checkReachability({ source: SOURCE, destination: DESTINATION, securityGroups, log });

    expect(report.status).toBe("inconclusive");
    expect(report.messages).toEqual([]);
    expect(log).toHaveBeenCalledWith("both resources are in vpc-1111");
  });
});
