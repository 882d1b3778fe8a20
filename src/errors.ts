// pattern: Functional Core

/**
 * Error taxonomy shared by the registry client, the offline catalog and the lookup facade.
 * Callers branch on `code`; `status` carries the HTTP status when one was received.
 */

export type LookupErrorCode =
  | "network"
  | "auth"
  | "parse"
  | "config"
  | "seed";

export class LookupError extends Error {
  readonly status: number | undefined;

  constructor(
    public code: LookupErrorCode,
    message: string,
    options: { readonly cause?: unknown; readonly status?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "LookupError";
    this.status = options.status;
  }
}

export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
