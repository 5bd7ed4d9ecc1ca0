/**
 * AWS SDK v3 service exceptions carry the error code in `name`
 * (e.g. "InvalidGroup.NotFound", "DBInstanceNotFoundFault").
 */
export function hasErrorName(error: unknown, ...names: string[]): error is Error {
  return error instanceof Error && names.includes(error.name);
}
