/**
 * Reachability check
 *
 * Ties the VPC pre-check, the security group lookups and the evaluator
 * together for one source/destination pair.
 */

import type { ConnectivityEvaluation } from "./evaluation/evaluation";
import { canConnect } from "./evaluation/evaluator";
import type { ISecurityGroupRulesService } from "./interfaces/lookup-service";
import type { DestinationDescriptor, SourceDescriptor } from "./resources/descriptor";
import { sameVpc } from "./resources/vpc";

export type ReachabilityStatus = "reachable" | "different-vpc" | "blocked" | "inconclusive";

export interface ReachabilityReport {
  status: ReachabilityStatus;
  source: SourceDescriptor;
  destination: DestinationDescriptor;
  port: number;
  /** Absent when the VPC pre-check stopped the check */
  evaluation?: ConnectivityEvaluation;
  /** Lines explaining the status, most relevant first */
  messages: string[];
}

export interface ReachabilityCheckOptions {
  source: SourceDescriptor;
  destination: DestinationDescriptor;
  /** Defaults to the destination's own port */
  port?: number;
  securityGroups: ISecurityGroupRulesService;
  log?: (message: string) => void;
}

export async function checkReachability(
  options: ReachabilityCheckOptions
): Promise<ReachabilityReport> {
  const { source, destination, securityGroups } = options;
  const log = options.log ?? (() => {});
  const port = options.port ?? destination.port;

  if (!sameVpc(source, destination)) {
    log(`source VPC ${source.vpcId || "(none)"} differs from destination VPC ${destination.vpcId}`);
    return {
      status: "different-vpc",
      source,
      destination,
      port,
      messages: [
        `not in same VPC (${source.vpcId || "none"} / ${destination.vpcId || "none"})`,
      ],
    };
  }
  log(`both resources are in ${source.vpcId}`);

  const [sourceRules, destinationRules] = await Promise.all([
    securityGroups.lookupRules(source.securityGroupIds),
    securityGroups.lookupRules(destination.securityGroupIds),
  ]);
  log(
    `loaded ${sourceRules.egressRules.length} egress rule(s) for the source and ` +
      `${destinationRules.ingressRules.length} ingress rule(s) for the destination`
  );

  const evaluation = canConnect(source.cidr, destination.cidr, port, sourceRules, destinationRules);

  return {
    status: statusOf(evaluation),
    source,
    destination,
    port,
    evaluation,
    messages: messagesOf(evaluation),
  };
}

function statusOf(evaluation: ConnectivityEvaluation): ReachabilityStatus {
  switch (evaluation.outcome) {
    case "success":
      return "reachable";
    case "failure":
      return "blocked";
    case "inconclusive":
      return "inconclusive";
  }
}

function messagesOf(evaluation: ConnectivityEvaluation): string[] {
  if (evaluation.success !== undefined) {
    return [evaluation.success];
  }
  const hints = [...evaluation.context].sort();
  if (evaluation.failure !== undefined) {
    return [evaluation.failure, ...hints];
  }
  return hints;
}
