/**
 * CLI exit codes for failures outside the bootstrap sequence. A run that
 * reaches its steps exits with the failing command's code instead.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  INVALID_CONFIG: 3,
} as const;
