/**
 * Error types shared by the evaluator and its lookup collaborators.
 */

import type { ResourceType } from "./resources/descriptor";

/**
 * What kind of thing a failed lookup was looking for. Covers the resources a
 * check starts from plus the supporting EC2 objects.
 */
export type LookupTarget = ResourceType | "vpc" | "subnet" | "security-group";

/**
 * A requested resource, VPC, subnet or security group does not exist, or a
 * database cluster has no writer instance. Aborts the whole check.
 */
export class LookupError extends Error {
  constructor(
    message: string,
    public readonly target: LookupTarget,
    public readonly identifier: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "LookupError";
  }
}

/**
 * A CIDR literal that is not valid IPv4. Raised while building rules or
 * evaluating a path; it means the upstream data is malformed.
 */
export class CidrParseError extends Error {
  constructor(
    public readonly literal: string,
    public readonly originalError?: Error
  ) {
    super(`invalid IPv4 CIDR: '${literal}'`);
    this.name = "CidrParseError";
  }
}

export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError;
}
