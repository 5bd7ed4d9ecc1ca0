/**
 * VPC Service
 *
 * Resolves a VPC, its subnets and their route tables into the
 * placement model the reachability check works with.
 */

import {
  AddressBlock,
  LookupError,
  compareAddressBlocks,
  type RouteTableInfo,
  type SubnetInfo,
  type SubnetPlacement,
  type VpcInfo,
} from "@reachcheck/core";
import type { EC2Service, RouteTableDescription, VpcDescription } from "../ec2/ec2-service";
import { hasErrorName } from "../errors";
import { noopLog, type AwsLogCallback } from "../types";

export class VpcService {
  constructor(
    private readonly ec2: EC2Service,
    private readonly log: AwsLogCallback = noopLog
  ) {}

  /**
   * Load a VPC with its subnets (ordered by network address) and the route
   * table that applies to each subnet.
   *
   * @throws LookupError if the VPC does not exist
   */
  async lookup(vpcId: string): Promise<VpcInfo> {
    const vpc = await this.describeVpc(vpcId);

    const [routeTables, subnets] = await Promise.all([
      this.ec2.describeRouteTables(vpcId),
      this.ec2.describeSubnets({ vpcId }),
    ]);
    const routeTableFor = routeTableResolver(routeTables);

    const ordered = subnets
      .map((subnet) => ({ subnet, block: AddressBlock.parse(subnet.cidrBlock) }))
      .sort((a, b) => compareAddressBlocks(a.block, b.block));

    const result = new Map<string, SubnetInfo>();
    for (const { subnet } of ordered) {
      result.set(subnet.subnetId, {
        subnetId: subnet.subnetId,
        vpcId,
        cidr: subnet.cidrBlock,
        availabilityZone: subnet.availabilityZone,
        routeTable: routeTableFor(subnet.subnetId),
      });
    }

    this.log(`VPC ${vpcId}: ${result.size} subnet(s), ${routeTables.length} route table(s)`);
    return { vpcId, cidr: vpc.cidrBlock, subnets: result };
  }

  /**
   * Load the VPC that contains a subnet. ECS services only report subnets.
   *
   * @throws LookupError if the subnet does not exist
   */
  async lookupBySubnet(subnetId: string): Promise<VpcInfo> {
    const subnets = await this.ec2
      .describeSubnets({ subnetIds: [subnetId] })
      .catch((error: unknown) => {
        if (hasErrorName(error, "InvalidSubnetID.NotFound")) {
          throw new LookupError(`unable to find subnet ${subnetId}`, "subnet", subnetId, error);
        }
        throw error;
      });
    if (subnets.length === 0) {
      throw new LookupError(`unable to find subnet ${subnetId}`, "subnet", subnetId);
    }
    return this.lookup(subnets[0].vpcId);
  }

  /**
   * Placement of a subnet within an already loaded VPC: its CIDR, zone and
   * the route table that applies to it.
   *
   * @throws LookupError if the subnet is not part of the VPC
   */
  placement(vpc: VpcInfo, subnetId: string): SubnetPlacement {
    const subnet = vpc.subnets.get(subnetId);
    if (!subnet) {
      throw new LookupError(
        `subnet ${subnetId} is not part of VPC ${vpc.vpcId}`,
        "subnet",
        subnetId
      );
    }
    return {
      cidr: subnet.cidr,
      availabilityZone: subnet.availabilityZone,
      routeTableId: subnet.routeTable?.routeTableId,
      defaultGateway: subnet.routeTable?.defaultGateway,
    };
  }

  private async describeVpc(vpcId: string): Promise<VpcDescription> {
    const vpcs = await this.ec2.describeVpcs([vpcId]).catch((error: unknown) => {
      if (hasErrorName(error, "InvalidVpcID.NotFound")) {
        throw new LookupError(`unable to find VPC ${vpcId}`, "vpc", vpcId, error);
      }
      throw error;
    });
    if (vpcs.length === 0) {
      throw new LookupError(`unable to find VPC ${vpcId}`, "vpc", vpcId);
    }
    return vpcs[0];
  }
}

function routeTableResolver(
  routeTables: RouteTableDescription[]
): (subnetId: string) => RouteTableInfo | undefined {
  const bySubnet = new Map<string, RouteTableInfo>();
  let main: RouteTableInfo | undefined;

  for (const table of routeTables) {
    const info: RouteTableInfo = {
      routeTableId: table.routeTableId,
      defaultGateway: table.defaultGateway,
    };
    if (table.isMain) {
      main = info;
    }
    for (const subnetId of table.associatedSubnetIds) {
      bySubnet.set(subnetId, info);
    }
  }

  return (subnetId) => bySubnet.get(subnetId) ?? main;
}
