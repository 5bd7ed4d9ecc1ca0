// Clients
export { createAwsClients, destroyAwsClients } from "./clients/aws-clients";
export type { AwsClientConfig, AwsClients } from "./clients/aws-clients";

// EC2
export { EC2Service } from "./ec2/ec2-service";
export type {
  VpcDescription,
  SubnetDescription,
  RouteTableDescription,
  SecurityGroupDescription,
  SecurityGroupRuleDescription,
} from "./ec2/ec2-service";

// VPC placement
export { VpcService } from "./vpc/vpc-service";

// Security groups
export { SecurityGroupService } from "./security-groups/security-group-service";

// Sources
export { LambdaService } from "./lambda/lambda-service";
export { ECSService, parseEcsServiceName } from "./ecs/ecs-service";
export type { EcsServiceName } from "./ecs/ecs-service";

// Destinations
export { RDSService } from "./rds/rds-service";

export { AwsResourceLookupService, createAwsLookupServices } from "./resources/aws-resource-lookup";
export type { AwsLookupServices } from "./resources/aws-resource-lookup";

export { hasErrorName } from "./errors";
export { noopLog } from "./types";
export type { AwsLogCallback } from "./types";
