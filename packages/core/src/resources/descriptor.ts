/**
 * Normalized descriptions of the resources on either end of a check.
 *
 * Lookup collaborators turn provider responses into these; the evaluator
 * never sees provider types.
 */

export type SourceResourceType = "lambda" | "ecs";
export type DestinationResourceType = "rds";
export type ResourceType = SourceResourceType | DestinationResourceType;

/**
 * The subnet a resource is evaluated from. Route table details are reported
 * alongside the result but take no part in the evaluation.
 */
export interface SubnetPlacement {
  /** CIDR of the subnet the resource is placed in */
  cidr: string;
  availabilityZone?: string;
  /** Associated route table, else the VPC's main one */
  routeTableId?: string;
  /** Target of that table's 0.0.0.0/0 route */
  defaultGateway?: string;
}

interface ResourceDescriptorBase extends SubnetPlacement {
  resourceName: string;
  vpcId: string;
  subnetIds: string[];
  securityGroupIds: string[];
}

export interface SourceDescriptor extends ResourceDescriptorBase {
  resourceType: SourceResourceType;
}

export interface DestinationDescriptor extends ResourceDescriptorBase {
  resourceType: DestinationResourceType;
  /** Port the destination listens on */
  port: number;
}

export type ResourceDescriptor = SourceDescriptor | DestinationDescriptor;

/**
 * Result of a lookup that may legitimately find nothing. Used where the
 * caller decides on a fallback instead of treating absence as an error.
 */
export type LookupResult<T> = { found: true; value: T } | { found: false };

export function found<T>(value: T): LookupResult<T> {
  return { found: true, value };
}

export function notFound<T>(): LookupResult<T> {
  return { found: false };
}

export function describeResource(resource: ResourceDescriptor): string {
  return `${resource.resourceType} ${resource.resourceName}`;
}
