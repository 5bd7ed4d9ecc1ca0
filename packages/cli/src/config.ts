import { z } from "zod";
import { DEFAULT_DATABASE_PORT, MAX_PORT, type SourceResourceType } from "@reachcheck/core";

/**
 * Invalid command line options or environment. Reported with the
 * lookup-failure exit code.
 */
export class OptionsError extends Error {
  constructor(public readonly issues: string[]) {
    super(issues.join("; "));
    this.name = "OptionsError";
  }
}

export const CheckOptionsSchema = z
  .object({
    fromLambda: z.string().min(1, "--from-lambda needs a function name").optional(),
    fromEcs: z.string().min(1, "--from-ecs needs a service name").optional(),
    toRds: z.string({ required_error: "--to-rds is required" }).min(1, "--to-rds is required"),
    port: z.coerce
      .number({ invalid_type_error: "--port must be a number" })
      .int("--port must be an integer")
      .min(1, `--port must be between 1 and ${MAX_PORT}`)
      .max(MAX_PORT, `--port must be between 1 and ${MAX_PORT}`)
      .default(DEFAULT_DATABASE_PORT),
    region: z.string().min(1).optional(),
    verbose: z.boolean().default(false),
    json: z.boolean().default(false),
  })
  .refine((options) => (options.fromLambda === undefined) !== (options.fromEcs === undefined), {
    message: "exactly one of --from-lambda or --from-ecs is required",
  })
  .transform((options) => ({
    source: sourceOf(options),
    destination: options.toRds,
    port: options.port,
    region: options.region,
    verbose: options.verbose,
    json: options.json,
  }));

export const EnvironmentSchema = z.object({
  AWS_REGION: z.string().min(1).optional(),
  REACHCHECK_MAX_ATTEMPTS: z.coerce
    .number({ invalid_type_error: "REACHCHECK_MAX_ATTEMPTS must be a number" })
    .int()
    .min(1, "REACHCHECK_MAX_ATTEMPTS must be at least 1")
    .optional(),
});

export type CheckRequest = z.output<typeof CheckOptionsSchema>;
export type Environment = z.output<typeof EnvironmentSchema>;

export interface SourceSelection {
  type: SourceResourceType;
  name: string;
}

function sourceOf(options: { fromLambda?: string; fromEcs?: string }): SourceSelection {
  if (options.fromLambda !== undefined) {
    return { type: "lambda", name: options.fromLambda };
  }
  return { type: "ecs", name: options.fromEcs ?? "" };
}

/**
 * Validate raw commander options.
 *
 * @throws OptionsError listing every problem found
 */
export function parseCheckOptions(raw: unknown): CheckRequest {
  const result = CheckOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new OptionsError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}

/**
 * Read the settings the CLI takes from the environment. Empty values count
 * as unset.
 *
 * @throws OptionsError if a value is present but invalid
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const result = EnvironmentSchema.safeParse({
    AWS_REGION: env.AWS_REGION || undefined,
    REACHCHECK_MAX_ATTEMPTS: env.REACHCHECK_MAX_ATTEMPTS || undefined,
  });
  if (!result.success) {
    throw new OptionsError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}
