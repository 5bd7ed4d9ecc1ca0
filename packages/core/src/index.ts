export * from "./constants";
export * from "./errors";

// Address and port predicates
export { AddressBlock, contains, compareAddressBlocks } from "./network/address-block";
export { createPortRange, portInRange, formatPortRange } from "./network/port-range";
export type { PortRange } from "./network/port-range";

// Rules
export { RuleSet } from "./rules/rule-set";
export type { EgressRuleInput, IngressRuleInput } from "./rules/rule-set";
export type { EgressRule, IngressRule, SecurityGroupRule } from "./rules/rule";

// Evaluation
export { ConnectivityEvaluation } from "./evaluation/evaluation";
export type { EvaluationOutcome, EvaluationJSON } from "./evaluation/evaluation";
export { canConnect } from "./evaluation/evaluator";

// Resources
export { found, notFound, describeResource } from "./resources/descriptor";
export type {
  SourceResourceType,
  DestinationResourceType,
  ResourceType,
  SourceDescriptor,
  DestinationDescriptor,
  ResourceDescriptor,
  LookupResult,
  SubnetPlacement,
} from "./resources/descriptor";
export { sameVpc } from "./resources/vpc";
export type { VpcInfo, SubnetInfo, RouteTableInfo } from "./resources/vpc";

// Collaborator contracts
export type {
  ISecurityGroupRulesService,
  ISourceLookupService,
  IDestinationLookupService,
} from "./interfaces/lookup-service";

export { checkReachability } from "./reachability";
export type {
  ReachabilityStatus,
  ReachabilityReport,
  ReachabilityCheckOptions,
} from "./reachability";

export const REACHCHECK_VERSION = "0.1.0";
