/**
 * Constants module for @reachcheck/core.
 */

// Port bounds
export const MIN_PORT = 0;
export const MAX_PORT = 65535;

/** Sentinel EC2 uses on FromPort/ToPort for "all ports" */
export const UNBOUNDED_PORT = -1;

/** Port checked when the caller does not name one (PostgreSQL) */
export const DEFAULT_DATABASE_PORT = 5432;

// Process exit codes used by the CLI
export const EXIT_CODES = {
  REACHABLE: 0,
  UNEXPECTED_ERROR: 1,
  LOOKUP_FAILED: 2,
  NOT_REACHABLE: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
