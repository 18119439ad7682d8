/**
 * Raised for unrecoverable configuration problems. Library code never
 * catches or rewraps it; the CLI maps it to exit code 99.
 */
export class FatalError extends Error {
  constructor(
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = "FatalError";
  }
}

export const FATAL_EXIT_CODE = 99;

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}
