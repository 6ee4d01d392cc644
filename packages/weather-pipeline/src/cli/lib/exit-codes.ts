/**
 * Process exit codes shared by every command
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** Completed, but some files are pending retry or an aggregation failed */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
