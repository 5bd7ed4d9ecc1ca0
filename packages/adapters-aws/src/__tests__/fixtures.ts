import {
  DescribeRouteTablesCommand,
  DescribeSecurityGroupRulesCommand,
  DescribeSecurityGroupsCommand,
  DescribeSubnetsCommand,
  DescribeVpcsCommand,
  type RouteTable,
  type SecurityGroup,
  type SecurityGroupRule,
  type Subnet,
} from "@aws-sdk/client-ec2";

export const VPC_ID = "vpc-0a1b2c3d";

/** Service exceptions only need a matching `name` for our error mapping */
export function awsError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

export interface Ec2Fixture {
  subnets: Subnet[];
  routeTables: RouteTable[];
  securityGroups: SecurityGroup[];
  rules: SecurityGroupRule[];
}

export const DEFAULT_FIXTURE: Ec2Fixture = {
  subnets: [
    { SubnetId: "subnet-app", VpcId: VPC_ID, CidrBlock: "10.0.2.0/24", AvailabilityZone: "us-east-1b" },
    { SubnetId: "subnet-db", VpcId: VPC_ID, CidrBlock: "10.0.10.0/24", AvailabilityZone: "us-east-1a" },
    { SubnetId: "subnet-edge", VpcId: VPC_ID, CidrBlock: "10.0.1.0/24", AvailabilityZone: "us-east-1a" },
  ],
  routeTables: [
    {
      RouteTableId: "rtb-main",
      VpcId: VPC_ID,
      Routes: [{ DestinationCidrBlock: "0.0.0.0/0", NatGatewayId: "nat-1" }],
      Associations: [{ Main: true, AssociationState: { State: "associated" } }],
    },
    {
      RouteTableId: "rtb-public",
      VpcId: VPC_ID,
      Routes: [
        { DestinationCidrBlock: "10.0.0.0/16", GatewayId: "local" },
        { DestinationCidrBlock: "0.0.0.0/0", GatewayId: "igw-1" },
      ],
      Associations: [{ SubnetId: "subnet-edge", AssociationState: { State: "associated" } }],
    },
  ],
  securityGroups: [
    { GroupId: "sg-app", GroupName: "app", VpcId: VPC_ID },
    { GroupId: "sg-db", GroupName: "db", VpcId: VPC_ID },
  ],
  rules: [
    {
      SecurityGroupRuleId: "sgr-app-out",
      GroupId: "sg-app",
      IsEgress: true,
      IpProtocol: "-1",
      FromPort: -1,
      ToPort: -1,
      CidrIpv4: "0.0.0.0/0",
    },
    {
      SecurityGroupRuleId: "sgr-db-in",
      GroupId: "sg-db",
      IsEgress: false,
      IpProtocol: "tcp",
      FromPort: 5432,
      ToPort: 5432,
      ReferencedGroupInfo: { GroupId: "sg-app" },
    },
  ],
};

/**
 * Builds a mockImplementation for ec2.send that answers Describe* commands
 * from the fixture, honouring the id and group-id filters the services use.
 */
export function makeEc2Mock(fixture: Ec2Fixture = DEFAULT_FIXTURE): (cmd: unknown) => Promise<unknown> {
  return (cmd: unknown): Promise<unknown> => {
    if (cmd instanceof DescribeVpcsCommand) {
      const ids = cmd.input.VpcIds ?? [];
      return Promise.resolve({
        Vpcs: ids.includes(VPC_ID) ? [{ VpcId: VPC_ID, CidrBlock: "10.0.0.0/16" }] : [],
      });
    }
    if (cmd instanceof DescribeSubnetsCommand) {
      const ids = cmd.input.SubnetIds;
      return Promise.resolve({
        Subnets: fixture.subnets.filter((subnet) => !ids || ids.includes(subnet.SubnetId ?? "")),
      });
    }
    if (cmd instanceof DescribeRouteTablesCommand) {
      return Promise.resolve({ RouteTables: fixture.routeTables });
    }
    if (cmd instanceof DescribeSecurityGroupsCommand) {
      const ids = cmd.input.GroupIds ?? [];
      return Promise.resolve({
        SecurityGroups: fixture.securityGroups.filter((group) => ids.includes(group.GroupId ?? "")),
      });
    }
    if (cmd instanceof DescribeSecurityGroupRulesCommand) {
      const groupIds = cmd.input.Filters?.find((filter) => filter.Name === "group-id")?.Values ?? [];
      return Promise.resolve({
        SecurityGroupRules: fixture.rules.filter((rule) => groupIds.includes(rule.GroupId ?? "")),
      });
    }
    return Promise.resolve({});
  };
}
