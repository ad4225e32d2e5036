import { QueryFailedError } from 'typeorm';

/** MySQL rejected a write on a unique index. */
export const isDuplicateEntryError = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) return false;

  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === 'ER_DUP_ENTRY'
  );
};
