import { createLogger, errorMessage, rootCause, ValidationError } from '@labfleet/shared';

export const ExitCode = {
  Ok: 0,
  Fatal: 1,
  Invalid: 2,
  Partial: 3,
  Pending: 4,
  Cancelled: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const logger = createLogger('cli');

/** Prints a failure and maps it to an exit code: 2 for validation errors, 1 otherwise. */
export function reportError(err: unknown): ExitCode {
  if (err instanceof ValidationError) {
    console.error(err.message);
    console.error(err.format());
    return ExitCode.Invalid;
  }
  const cause = rootCause(err);
  logger.error(errorMessage(err), cause !== err ? { cause: errorMessage(cause) } : undefined);
  return ExitCode.Fatal;
}
