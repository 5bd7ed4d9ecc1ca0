import {
  createAwsClients,
  createAwsLookupServices,
  destroyAwsClients,
} from "@reachcheck/adapters-aws";
import { EXIT_CODES, type ExitCode } from "@reachcheck/core";
import {
  OptionsError,
  loadEnvironment,
  parseCheckOptions,
  type CheckRequest,
  type Environment,
} from "../config";
import type { IOutputService } from "../interfaces/output.interface";
import { ConsoleOutputService } from "../services/console-output.service";
import { createCheckHandler } from "./check/check.handler";

export interface CheckCommandOptions {
  fromLambda?: string;
  fromEcs?: string;
  toRds?: string;
  port?: string;
  region?: string;
  verbose?: boolean;
  json?: boolean;
}

/**
 * `reachcheck check`: validates options, builds the AWS clients and runs the
 * handler. Sets `process.exitCode` rather than exiting so pending output is
 * flushed.
 */
export async function check(options: CheckCommandOptions): Promise<void> {
  process.exitCode = await runCheck(options, process.env);
}

export async function runCheck(
  options: CheckCommandOptions,
  env: NodeJS.ProcessEnv,
  output: IOutputService = new ConsoleOutputService({ quiet: options.json === true })
): Promise<ExitCode> {
  let request: CheckRequest;
  let environment: Environment;
  try {
    request = parseCheckOptions(options);
    environment = loadEnvironment(env);
  } catch (error) {
    if (error instanceof OptionsError) {
      for (const issue of error.issues) {
        output.error(issue);
      }
      return EXIT_CODES.LOOKUP_FAILED;
    }
    throw error;
  }

  const log = request.verbose ? (message: string) => output.dim(message) : undefined;
  const clients = createAwsClients({
    region: request.region ?? environment.AWS_REGION,
    maxAttempts: environment.REACHCHECK_MAX_ATTEMPTS,
  });

  try {
    const { resources, securityGroups } = createAwsLookupServices(clients, log);
    return await createCheckHandler(output, resources, securityGroups, log).execute(request);
  } finally {
    destroyAwsClients(clients);
  }
}
