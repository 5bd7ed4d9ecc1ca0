/**
 * RDS lookups for the destination side of a check.
 *
 * A name may refer to a DB instance or to an Aurora cluster; for a cluster,
 * the writer instance is used. Instance and cluster lookups report "not
 * found" as a value so the caller chooses the fallback, while any other
 * failure (credentials, throttling) propagates unchanged.
 */

import {
  type RDSClient,
  DescribeDBInstancesCommand,
  DescribeDBClustersCommand,
  type DBInstance,
  type DBClusterMember,
} from "@aws-sdk/client-rds";
import {
  LookupError,
  found,
  notFound,
  type DestinationDescriptor,
  type LookupResult,
} from "@reachcheck/core";
import { hasErrorName } from "../errors";
import { noopLog, type AwsLogCallback } from "../types";
import type { VpcService } from "../vpc/vpc-service";

export class RDSService {
  constructor(
    private readonly client: RDSClient,
    private readonly vpcs: VpcService,
    private readonly log: AwsLogCallback = noopLog
  ) {}

  /**
   * @throws LookupError if neither an instance nor a cluster has this name,
   *   or the cluster has no writer
   */
  async lookupDestination(name: string): Promise<DestinationDescriptor> {
    const instance = await this.findInstance(name);
    if (instance.found) {
      return this.describeInstance(name, instance.value);
    }

    this.log(`no DB instance named ${name}, trying clusters`);
    const writer = await this.findClusterWriter(name);
    if (writer.found) {
      return this.describeInstance(name, writer.value);
    }

    throw new LookupError(`failed to find RDS instance/cluster with name ${name}`, "rds", name);
  }

  async findInstance(identifier: string): Promise<LookupResult<DBInstance>> {
    try {
      const result = await this.client.send(
        new DescribeDBInstancesCommand({ DBInstanceIdentifier: identifier })
      );
      const instance = result.DBInstances?.[0];
      return instance ? found(instance) : notFound();
    } catch (error) {
      if (hasErrorName(error, "DBInstanceNotFoundFault")) {
        return notFound();
      }
      throw error;
    }
  }

  /**
   * Find the writer instance of a cluster.
   *
   * @throws LookupError if the cluster exists but has no writer
   */
  async findClusterWriter(identifier: string): Promise<LookupResult<DBInstance>> {
    const members = await this.findClusterMembers(identifier);
    if (!members.found) {
      return notFound();
    }

    const writer = members.value.find((member) => member.IsClusterWriter);
    if (!writer?.DBInstanceIdentifier) {
      throw new LookupError(`cluster ${identifier} has no writer instance`, "rds", identifier);
    }

    this.log(`cluster ${identifier} writer is ${writer.DBInstanceIdentifier}`);
    const instance = await this.findInstance(writer.DBInstanceIdentifier);
    if (!instance.found) {
      throw new LookupError(
        `writer instance ${writer.DBInstanceIdentifier} of cluster ${identifier} does not exist`,
        "rds",
        identifier
      );
    }
    return instance;
  }

  private async findClusterMembers(identifier: string): Promise<LookupResult<DBClusterMember[]>> {
    try {
      const result = await this.client.send(
        new DescribeDBClustersCommand({ DBClusterIdentifier: identifier })
      );
      const cluster = result.DBClusters?.[0];
      return cluster ? found(cluster.DBClusterMembers ?? []) : notFound();
    } catch (error) {
      if (hasErrorName(error, "DBClusterNotFoundFault")) {
        return notFound();
      }
      throw error;
    }
  }

  private async describeInstance(
    requestedName: string,
    instance: DBInstance
  ): Promise<DestinationDescriptor> {
    const subnetGroup = instance.DBSubnetGroup;
    if (!subnetGroup?.VpcId) {
      throw new LookupError(`${requestedName} is not deployed in a VPC`, "rds", requestedName);
    }

    const subnetIds = (subnetGroup.Subnets ?? [])
      .filter((subnet) => subnet.SubnetStatus === "Active" && subnet.SubnetIdentifier)
      .map((subnet) => subnet.SubnetIdentifier ?? "");
    if (subnetIds.length === 0) {
      throw new LookupError(`${requestedName} has no active subnets`, "rds", requestedName);
    }

    const securityGroupIds = (instance.VpcSecurityGroups ?? [])
      .filter((group) => group.Status === "active" && group.VpcSecurityGroupId)
      .map((group) => group.VpcSecurityGroupId ?? "");

    const port = instance.Endpoint?.Port ?? instance.DbInstancePort;
    if (!port) {
      throw new LookupError(`${requestedName} has no endpoint yet`, "rds", requestedName);
    }

    const vpc = await this.vpcs.lookup(subnetGroup.VpcId);

    return {
      resourceType: "rds",
      resourceName: requestedName,
      vpcId: vpc.vpcId,
      subnetIds,
      securityGroupIds,
      ...this.vpcs.placement(vpc, subnetIds[0]),
      port,
    };
  }
}
