import { QueryFailedError } from 'typeorm';

/** PostgreSQL SQLSTATE for unique_violation. */
export const UNIQUE_VIOLATION = '23505';

function driverErrorOf(error: unknown): object | null {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }
  const driverError: unknown = error.driverError;
  return typeof driverError === 'object' && driverError !== null ? driverError : null;
}

export function isUniqueViolation(error: unknown): boolean {
  const driverError = driverErrorOf(error);
  return driverError !== null && 'code' in driverError && driverError.code === UNIQUE_VIOLATION;
}

/**
 * Name of the constraint a driver error refers to, when the driver reports one.
 */
export function violatedConstraint(error: unknown): string | null {
  const driverError = driverErrorOf(error);
  if (driverError !== null && 'constraint' in driverError) {
    return typeof driverError.constraint === 'string' ? driverError.constraint : null;
  }
  return null;
}
