/**
 * Lookup Service Interfaces
 *
 * Contracts for the collaborators that fetch resource descriptions and
 * security group rules from a cloud provider. Implemented by the AWS
 * adapters; replaced by in-memory fakes in tests.
 */

import type {
  DestinationDescriptor,
  SourceDescriptor,
  SourceResourceType,
} from "../resources/descriptor";
import type { RuleSet } from "../rules/rule-set";

export interface ISecurityGroupRulesService {
  /**
   * Combine the rules of every listed security group into one RuleSet.
   * An empty list yields an empty RuleSet.
   *
   * @throws LookupError if a group does not exist
   */
  lookupRules(groupIds: readonly string[]): Promise<RuleSet>;
}

export interface ISourceLookupService {
  /**
   * Describe the resource that originates the connection.
   *
   * @param type - Kind of source resource
   * @param name - Name, ARN, or `cluster:service` for ECS
   * @throws LookupError if the resource cannot be found or is unsupported
   */
  lookupSource(type: SourceResourceType, name: string): Promise<SourceDescriptor>;
}

export interface IDestinationLookupService {
  /**
   * Describe the database that receives the connection.
   *
   * @throws LookupError if neither an instance nor a cluster matches
   */
  lookupDestination(name: string): Promise<DestinationDescriptor>;
}
