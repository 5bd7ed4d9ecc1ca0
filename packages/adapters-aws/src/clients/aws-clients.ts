import { EC2Client } from "@aws-sdk/client-ec2";
import { ECSClient } from "@aws-sdk/client-ecs";
import { LambdaClient } from "@aws-sdk/client-lambda";
import { RDSClient } from "@aws-sdk/client-rds";

export interface AwsClientConfig {
  /** Falls back to the SDK's region resolution (AWS_REGION, profile) */
  region?: string;
  /** SDK retry attempts for throttled or failed calls */
  maxAttempts?: number;
}

export interface AwsClients {
  ec2: EC2Client;
  ecs: ECSClient;
  lambda: LambdaClient;
  rds: RDSClient;
}

/**
 * Build one client per service. Callers own the clients and pass them to
 * the services that need them.
 */
export function createAwsClients(config: AwsClientConfig = {}): AwsClients {
  const options = { region: config.region, maxAttempts: config.maxAttempts };
  return {
    ec2: new EC2Client(options),
    ecs: new ECSClient(options),
    lambda: new LambdaClient(options),
    rds: new RDSClient(options),
  };
}

export function destroyAwsClients(clients: AwsClients): void {
  clients.ec2.destroy();
  clients.ecs.destroy();
  clients.lambda.destroy();
  clients.rds.destroy();
}
