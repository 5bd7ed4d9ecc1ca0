import { type ECSClient, DescribeServicesCommand } from "@aws-sdk/client-ecs";
import { LookupError, type SourceDescriptor } from "@reachcheck/core";
import { hasErrorName } from "../errors";
import { noopLog, type AwsLogCallback } from "../types";
import type { VpcService } from "../vpc/vpc-service";

export interface EcsServiceName {
  /** Absent for services in the default cluster */
  cluster?: string;
  service: string;
}

/**
 * Split a `[cluster:]service` specification. Service ARNs in the
 * `service/<cluster>/<name>` form are passed through with their cluster.
 */
export function parseEcsServiceName(identifier: string): EcsServiceName {
  if (identifier.startsWith("arn:")) {
    const resource = identifier.split(":").slice(5).join(":").split("/");
    return resource.length === 3 ? { cluster: resource[1], service: identifier } : { service: identifier };
  }

  const separator = identifier.indexOf(":");
  if (separator < 0) {
    return { service: identifier };
  }
  const cluster = identifier.slice(0, separator);
  const service = identifier.slice(separator + 1);
  if (!cluster || !service) {
    throw new LookupError(`unable to parse ECS service specification: ${identifier}`, "ecs", identifier);
  }
  return { cluster, service };
}

export class ECSService {
  constructor(
    private readonly client: ECSClient,
    private readonly vpcs: VpcService,
    private readonly log: AwsLogCallback = noopLog
  ) {}

  /**
   * Describe an ECS service (awsvpc networking) as the source of a connection.
   *
   * @param identifier - `service` in the default cluster, or `cluster:service`
   * @throws LookupError if the service does not exist or has no awsvpc configuration
   */
  async lookupSource(identifier: string): Promise<SourceDescriptor> {
    const { cluster, service: serviceName } = parseEcsServiceName(identifier);

    const result = await this.client
      .send(
        new DescribeServicesCommand({
          cluster,
          services: [serviceName],
        })
      )
      .catch((error: unknown) => {
        if (hasErrorName(error, "ClusterNotFoundException")) {
          throw new LookupError(`unable to find cluster for service ${identifier}`, "ecs", identifier, error);
        }
        throw error;
      });

    const service = result.services?.[0];
    if (!service) {
      throw new LookupError(`unable to find service ${identifier}`, "ecs", identifier);
    }

    const network = service.networkConfiguration?.awsvpcConfiguration;
    const subnetIds = network?.subnets ?? [];
    if (subnetIds.length === 0) {
      throw new LookupError(
        `service ${identifier} does not use awsvpc networking, which is not supported`,
        "ecs",
        identifier
      );
    }

    const vpc = await this.vpcs.lookupBySubnet(subnetIds[0]);
    this.log(`ECS service ${service.serviceName ?? serviceName} runs in ${vpc.vpcId}`);

    return {
      resourceType: "ecs",
      resourceName: service.serviceName ?? serviceName,
      vpcId: vpc.vpcId,
      subnetIds,
      securityGroupIds: network?.securityGroups ?? [],
      ...this.vpcs.placement(vpc, subnetIds[0]),
    };
  }
}
