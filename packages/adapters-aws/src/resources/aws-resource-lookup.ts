import type {
  DestinationDescriptor,
  IDestinationLookupService,
  ISourceLookupService,
  SourceDescriptor,
  SourceResourceType,
} from "@reachcheck/core";
import type { AwsClients } from "../clients/aws-clients";
import { EC2Service } from "../ec2/ec2-service";
import { ECSService } from "../ecs/ecs-service";
import { LambdaService } from "../lambda/lambda-service";
import { RDSService } from "../rds/rds-service";
import { SecurityGroupService } from "../security-groups/security-group-service";
import { noopLog, type AwsLogCallback } from "../types";
import { VpcService } from "../vpc/vpc-service";

/**
 * Dispatches source and destination lookups to the per-service adapters.
 */
export class AwsResourceLookupService implements ISourceLookupService, IDestinationLookupService {
  constructor(
    private readonly lambda: LambdaService,
    private readonly ecs: ECSService,
    private readonly rds: RDSService
  ) {}

  lookupSource(type: SourceResourceType, name: string): Promise<SourceDescriptor> {
    switch (type) {
      case "lambda":
        return this.lambda.lookupSource(name);
      case "ecs":
        return this.ecs.lookupSource(name);
    }
  }

  lookupDestination(name: string): Promise<DestinationDescriptor> {
    return this.rds.lookupDestination(name);
  }
}

export interface AwsLookupServices {
  resources: AwsResourceLookupService;
  securityGroups: SecurityGroupService;
}

/**
 * Wire the adapters on top of a set of clients.
 */
export function createAwsLookupServices(
  clients: AwsClients,
  log: AwsLogCallback = noopLog
): AwsLookupServices {
  const ec2 = new EC2Service(clients.ec2);
  const vpcs = new VpcService(ec2, log);

  return {
    resources: new AwsResourceLookupService(
      new LambdaService(clients.lambda, vpcs, log),
      new ECSService(clients.ecs, vpcs, log),
      new RDSService(clients.rds, vpcs, log)
    ),
    securityGroups: new SecurityGroupService(ec2, log),
  };
}
