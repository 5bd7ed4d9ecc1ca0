import {
  type EC2Client,
  DescribeVpcsCommand,
  DescribeSubnetsCommand,
  DescribeRouteTablesCommand,
  DescribeSecurityGroupsCommand,
  DescribeSecurityGroupRulesCommand,
  type Vpc,
  type Subnet,
  type RouteTable,
  type SecurityGroup,
  type SecurityGroupRule as Ec2SecurityGroupRule,
  type Filter,
} from "@aws-sdk/client-ec2";

export interface VpcDescription {
  vpcId: string;
  cidrBlock: string;
}

export interface SubnetDescription {
  subnetId: string;
  vpcId: string;
  cidrBlock: string;
  availabilityZone: string;
}

export interface RouteTableDescription {
  routeTableId: string;
  /** Gateway or NAT gateway targeted by the 0.0.0.0/0 route */
  defaultGateway?: string;
  /** Subnets with an active ("associated") association */
  associatedSubnetIds: string[];
  /** The VPC's main route table, used by subnets without an association */
  isMain: boolean;
}

export interface SecurityGroupDescription {
  groupId: string;
  groupName: string;
}

export interface SecurityGroupRuleDescription {
  ruleId: string;
  groupId: string;
  isEgress: boolean;
  protocol: string;
  fromPort: number;
  toPort: number;
  cidrIpv4?: string;
  cidrIpv6?: string;
  referencedGroupId?: string;
}

const DEFAULT_ROUTE_CIDR = "0.0.0.0/0";

/**
 * Read-only EC2 queries used to place resources in their VPC and collect
 * their security group rules. All Describe* calls follow pagination.
 */
export class EC2Service {
  constructor(private readonly client: EC2Client) {}

  /**
   * Describe VPCs by ID.
   */
  async describeVpcs(vpcIds: string[]): Promise<VpcDescription[]> {
    const vpcs: VpcDescription[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.client.send(
        new DescribeVpcsCommand({
          VpcIds: vpcIds,
          NextToken: nextToken,
        })
      );

      for (const vpc of result.Vpcs ?? []) {
        vpcs.push(this.mapVpc(vpc));
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return vpcs;
  }

  /**
   * Describe subnets, either by ID or by VPC.
   */
  async describeSubnets(options: {
    subnetIds?: string[];
    vpcId?: string;
  }): Promise<SubnetDescription[]> {
    const subnets: SubnetDescription[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.client.send(
        new DescribeSubnetsCommand({
          SubnetIds: options.subnetIds,
          Filters: options.vpcId ? vpcFilter(options.vpcId) : undefined,
          NextToken: nextToken,
        })
      );

      for (const subnet of result.Subnets ?? []) {
        subnets.push(this.mapSubnet(subnet));
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return subnets;
  }

  /**
   * Describe the route tables of a VPC.
   */
  async describeRouteTables(vpcId: string): Promise<RouteTableDescription[]> {
    const routeTables: RouteTableDescription[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.client.send(
        new DescribeRouteTablesCommand({
          Filters: vpcFilter(vpcId),
          NextToken: nextToken,
        })
      );

      for (const routeTable of result.RouteTables ?? []) {
        routeTables.push(this.mapRouteTable(routeTable));
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return routeTables;
  }

  /**
   * Describe security groups by ID.
   */
  async describeSecurityGroups(groupIds: string[]): Promise<SecurityGroupDescription[]> {
    const groups: SecurityGroupDescription[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.client.send(
        new DescribeSecurityGroupsCommand({
          GroupIds: groupIds,
          NextToken: nextToken,
        })
      );

      for (const group of result.SecurityGroups ?? []) {
        groups.push(this.mapSecurityGroup(group));
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return groups;
  }

  /**
   * Describe every ingress and egress rule belonging to one security group.
   */
  async describeSecurityGroupRules(groupId: string): Promise<SecurityGroupRuleDescription[]> {
    const rules: SecurityGroupRuleDescription[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.client.send(
        new DescribeSecurityGroupRulesCommand({
          Filters: [{ Name: "group-id", Values: [groupId] }],
          NextToken: nextToken,
        })
      );

      for (const rule of result.SecurityGroupRules ?? []) {
        rules.push(this.mapSecurityGroupRule(rule));
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return rules;
  }

  private mapVpc(vpc: Vpc): VpcDescription {
    return {
      vpcId: vpc.VpcId || "",
      cidrBlock: vpc.CidrBlock || "",
    };
  }

  private mapSubnet(subnet: Subnet): SubnetDescription {
    return {
      subnetId: subnet.SubnetId || "",
      vpcId: subnet.VpcId || "",
      cidrBlock: subnet.CidrBlock || "",
      availabilityZone: subnet.AvailabilityZone || "",
    };
  }

  private mapRouteTable(routeTable: RouteTable): RouteTableDescription {
    const defaultRoute = (routeTable.Routes ?? []).find(
      (route) => route.DestinationCidrBlock === DEFAULT_ROUTE_CIDR
    );

    return {
      routeTableId: routeTable.RouteTableId || "",
      defaultGateway: defaultRoute?.GatewayId ?? defaultRoute?.NatGatewayId,
      associatedSubnetIds: (routeTable.Associations ?? [])
        .filter((assoc) => assoc.SubnetId && assoc.AssociationState?.State === "associated")
        .map((assoc) => assoc.SubnetId || ""),
      isMain: (routeTable.Associations ?? []).some((assoc) => assoc.Main === true),
    };
  }

  private mapSecurityGroup(group: SecurityGroup): SecurityGroupDescription {
    return {
      groupId: group.GroupId || "",
      groupName: group.GroupName || "",
    };
  }

  private mapSecurityGroupRule(rule: Ec2SecurityGroupRule): SecurityGroupRuleDescription {
    return {
      ruleId: rule.SecurityGroupRuleId || "",
      groupId: rule.GroupId || "",
      isEgress: rule.IsEgress || false,
      protocol: rule.IpProtocol || "-1",
      fromPort: rule.FromPort ?? -1,
      toPort: rule.ToPort ?? -1,
      cidrIpv4: rule.CidrIpv4,
      cidrIpv6: rule.CidrIpv6,
      referencedGroupId: rule.ReferencedGroupInfo?.GroupId,
    };
  }
}

function vpcFilter(vpcId: string): Filter[] {
  return [{ Name: "vpc-id", Values: [vpcId] }];
}
