import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import type { EC2Client } from "@aws-sdk/client-ec2";
import { DescribeServicesCommand, type ECSClient } from "@aws-sdk/client-ecs";
import type { LambdaClient } from "@aws-sdk/client-lambda";
import { LookupError } from "@reachcheck/core";
import { EC2Service } from "../ec2/ec2-service";
import { ECSService, parseEcsServiceName } from "../ecs/ecs-service";
import { LambdaService } from "../lambda/lambda-service";
import { VpcService } from "../vpc/vpc-service";
import { awsError, makeEc2Mock, VPC_ID } from "./fixtures";

function createVpcService(): VpcService {
  const ec2 = { send: vi.fn().mockImplementation(makeEc2Mock()) } as unknown as EC2Client;
  return new VpcService(new EC2Service(ec2));
}

describe("LambdaService", () => {
  let mockSend: Mock;
  let log: Mock;
  let service: LambdaService;

  beforeEach(() => {
    mockSend = vi.fn();
    log = vi.fn();
    service = new LambdaService({ send: mockSend } as unknown as LambdaClient, createVpcService(), log);
  });

  it("describes a VPC-attached function", async () => {
    mockSend.mockResolvedValue({
      Configuration: {
        FunctionName: "orders-handler",
        VpcConfig: {
          VpcId: VPC_ID,
          SubnetIds: ["subnet-app", "subnet-edge"],
          SecurityGroupIds: ["sg-app"],
        },
      },
    });

    const source = await service.lookupSource("orders-handler");

    expect(source).toEqual({
      resourceType: "lambda",
      resourceName: "orders-handler",
      vpcId: VPC_ID,
      subnetIds: ["subnet-app", "subnet-edge"],
      securityGroupIds: ["sg-app"],
      cidr: "10.0.2.0/24",
      availabilityZone: "us-east-1b",
      routeTableId: "rtb-main",
      defaultGateway: "nat-1",
    });
    expect(log).toHaveBeenCalledWith(`Lambda orders-handler runs in ${VPC_ID}`);
  });

  it("maps ResourceNotFoundException to LookupError", async () => {
    mockSend.mockRejectedValue(awsError("ResourceNotFoundException"));

    const error: unknown = await service.lookupSource("missing-fn").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LookupError);
    if (error instanceof LookupError) {
      expect(error.message).toBe("unable to find Lambda missing-fn");
      expect(error.target).toBe("lambda");
    }
  });

  it("rejects functions outside a VPC", async () => {
    mockSend.mockResolvedValue({
      Configuration: { FunctionName: "public-fn", VpcConfig: { SubnetIds: [], SecurityGroupIds: [] } },
    });

    await expect(service.lookupSource("public-fn")).rejects.toThrow(
      "Lambda public-fn does not run in a VPC, which is not supported"
    );
  });

  it("propagates other errors unchanged", async () => {
    mockSend.mockRejectedValue(awsError("AccessDeniedException", "denied"));

    const error: unknown = await service.lookupSource("orders-handler").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(LookupError);
    expect(error).toHaveProperty("message", "denied");
  });
});

describe("parseEcsServiceName", () => {
  it("treats a bare name as a default-cluster service", () => {
    expect(parseEcsServiceName("web")).toEqual({ service: "web" });
  });

  it("splits cluster:service", () => {
    expect(parseEcsServiceName("prod:web")).toEqual({ cluster: "prod", service: "web" });
  });

  it("keeps the cluster of a long-form service ARN", () => {
    const arn = "arn:aws:ecs:us-east-1:123456789012:service/prod/web";

    expect(parseEcsServiceName(arn)).toEqual({ cluster: "prod", service: arn });
  });

  it("passes short-form ARNs through without a cluster", () => {
    const arn = "arn:aws:ecs:us-east-1:123456789012:service/web";

    expect(parseEcsServiceName(arn)).toEqual({ service: arn });
  });

  it("rejects an empty cluster or service", () => {
    expect(() => parseEcsServiceName(":web")).toThrow(
      "unable to parse ECS service specification: :web"
    );
    expect(() => parseEcsServiceName("prod:")).toThrow(LookupError);
  });
});

describe("ECSService", () => {
  let mockSend: Mock;
  let service: ECSService;

  beforeEach(() => {
    mockSend = vi.fn();
    service = new ECSService({ send: mockSend } as unknown as ECSClient, createVpcService());
  });

  it("describes an awsvpc service via its first subnet", async () => {
    mockSend.mockResolvedValue({
      services: [
        {
          serviceName: "web",
          networkConfiguration: {
            awsvpcConfiguration: { subnets: ["subnet-edge"], securityGroups: ["sg-app"] },
          },
        },
      ],
    });

    const source = await service.lookupSource("prod:web");

    expect(source).toEqual({
      resourceType: "ecs",
      resourceName: "web",
      vpcId: VPC_ID,
      subnetIds: ["subnet-edge"],
      securityGroupIds: ["sg-app"],
      cidr: "10.0.1.0/24",
      availabilityZone: "us-east-1a",
      routeTableId: "rtb-public",
      defaultGateway: "igw-1",
    });

    const command: unknown = mockSend.mock.calls[0][0];
    expect(command).toBeInstanceOf(DescribeServicesCommand);
    if (command instanceof DescribeServicesCommand) {
      expect(command.input).toEqual({ cluster: "prod", services: ["web"] });
    }
  });

  it("throws LookupError when the service is not returned", async () => {
    mockSend.mockResolvedValue({ services: [], failures: [{ reason: "MISSING" }] });

    await expect(service.lookupSource("web")).rejects.toThrow("unable to find service web");
  });

  it("maps ClusterNotFoundException to LookupError", async () => {
    mockSend.mockRejectedValue(awsError("ClusterNotFoundException"));

    await expect(service.lookupSource("nope:web")).rejects.toThrow(
      "unable to find cluster for service nope:web"
    );
  });

  it("rejects services without awsvpc networking", async () => {
    mockSend.mockResolvedValue({ services: [{ serviceName: "legacy" }] });

    await expect(service.lookupSource("legacy")).rejects.toThrow(
      "service legacy does not use awsvpc networking, which is not supported"
    );
  });
});
