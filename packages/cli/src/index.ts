#!/usr/bin/env tsx

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { DEFAULT_DATABASE_PORT, EXIT_CODES, REACHCHECK_VERSION } from "@reachcheck/core";
import { check } from "./commands/check";

const program = new Command();

program
  .name("reachcheck")
  .description("Check whether an AWS resource can open a connection to a database")
  .version(REACHCHECK_VERSION);

program
  .command("check", { isDefault: true })
  .description("Evaluate VPC placement and security group rules between two resources")
  .option("--from-lambda <name>", "Source Lambda function name or ARN")
  .option("--from-ecs <service>", "Source ECS service, as service or cluster:service")
  .option("--to-rds <name>", "Destination RDS instance or Aurora cluster")
  .option("-p, --port <port>", `Destination port (default: ${DEFAULT_DATABASE_PORT})`)
  .option("-r, --region <region>", "AWS region (defaults to AWS_REGION)")
  .option("-v, --verbose", "Print lookup progress")
  .option("--json", "Print the result as JSON")
  .action(check);

// Add error handling
program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  // Commander has already printed its own message; usage errors share the invalid-options code.
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode === 0 ? 0 : EXIT_CODES.LOOKUP_FAILED;
    return;
  }
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_CODES.UNEXPECTED_ERROR;
});
