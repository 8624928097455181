export const PG_UNIQUE_VIOLATION = '23505';
export const PG_SERIALIZATION_FAILURE = '40001';
export const PG_DEADLOCK_DETECTED = '40P01';
export const PG_LOCK_NOT_AVAILABLE = '55P03';

const readCode = (value: unknown): string | null => {
  if (typeof value !== 'object' || value === null || !('code' in value)) {
    return null;
  }
  return typeof value.code === 'string' ? value.code : null;
};

/** Resolves the SQLSTATE of a pg error, also when wrapped in `cause`. */
export function pgErrorCode(error: unknown): string | null {
  const direct = readCode(error);
  if (direct) {
    return direct;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return readCode(error.cause);
  }
  return null;
}

export function isLockConflict(error: unknown) {
  const code = pgErrorCode(error);
  return (
    code === PG_SERIALIZATION_FAILURE ||
    code === PG_DEADLOCK_DETECTED ||
    code === PG_LOCK_NOT_AVAILABLE
  );
}
