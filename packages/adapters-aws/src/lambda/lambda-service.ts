import { type LambdaClient, GetFunctionCommand } from "@aws-sdk/client-lambda";
import { LookupError, type SourceDescriptor } from "@reachcheck/core";
import { hasErrorName } from "../errors";
import { noopLog, type AwsLogCallback } from "../types";
import type { VpcService } from "../vpc/vpc-service";

export class LambdaService {
  constructor(
    private readonly client: LambdaClient,
    private readonly vpcs: VpcService,
    private readonly log: AwsLogCallback = noopLog
  ) {}

  /**
   * Describe a Lambda function as the source of a connection.
   *
   * @param functionName - Function name or ARN
   * @throws LookupError if the function does not exist or is not attached to a VPC
   */
  async lookupSource(functionName: string): Promise<SourceDescriptor> {
    const result = await this.client
      .send(new GetFunctionCommand({ FunctionName: functionName }))
      .catch((error: unknown) => {
        if (hasErrorName(error, "ResourceNotFoundException")) {
          throw new LookupError(`unable to find Lambda ${functionName}`, "lambda", functionName, error);
        }
        throw error;
      });

    const config = result.Configuration;
    if (!config) {
      throw new LookupError(`unable to find Lambda ${functionName}`, "lambda", functionName);
    }

    const vpcConfig = config.VpcConfig;
    const subnetIds = vpcConfig?.SubnetIds ?? [];
    if (!vpcConfig?.VpcId || subnetIds.length === 0) {
      throw new LookupError(
        `Lambda ${functionName} does not run in a VPC, which is not supported`,
        "lambda",
        functionName
      );
    }

    const vpc = await this.vpcs.lookup(vpcConfig.VpcId);
    this.log(`Lambda ${config.FunctionName ?? functionName} runs in ${vpc.vpcId}`);

    return {
      resourceType: "lambda",
      resourceName: config.FunctionName ?? functionName,
      vpcId: vpc.vpcId,
      subnetIds,
      securityGroupIds: vpcConfig.SecurityGroupIds ?? [],
      ...this.vpcs.placement(vpc, subnetIds[0]),
    };
  }
}
