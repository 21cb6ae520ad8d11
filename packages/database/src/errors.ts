export const RepositoryErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  DUPLICATE: 'DUPLICATE',
  CONFLICT: 'CONFLICT',
  QUERY_FAILED: 'QUERY_FAILED',
} as const;
export type RepositoryErrorCode = (typeof RepositoryErrorCode)[keyof typeof RepositoryErrorCode];

export interface RepositoryError {
  code: RepositoryErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

const UNIQUE_VIOLATION = '23505';

// Both postgres-js and PGlite surface the SQLSTATE as `code`, possibly on a wrapped cause
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && error.code === UNIQUE_VIOLATION) {
    return true;
  }
  return 'cause' in error && isUniqueViolation(error.cause);
}

export function toRepositoryError(error: unknown): RepositoryError {
  const message = error instanceof Error ? error.message : String(error);
  if (isUniqueViolation(error)) {
    return { code: RepositoryErrorCode.DUPLICATE, message };
  }
  return { code: RepositoryErrorCode.QUERY_FAILED, message };
}

export const notFound = (entity: string, id: string): RepositoryError => ({
  code: RepositoryErrorCode.NOT_FOUND,
  message: `${entity} not found: ${id}`,
  details: { id },
});
