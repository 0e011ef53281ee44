import type { CheckErrorKind } from "./types";

/**
 * Failure raised anywhere in a check. The pipeline catches every CheckError
 * and turns it into an ERROR report.
 */
export class CheckError extends Error {
  readonly kind: CheckErrorKind;

  constructor(kind: CheckErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CheckError";
    this.kind = kind;
  }
}

export function isCheckError(err: unknown): err is CheckError {
  return err instanceof CheckError;
}
