export type HedgeErrorKind =
  | "NotFound"
  | "MalformedData"
  | "CollaboratorFailure"
  | "ConfigurationError";

export abstract class HedgeError extends Error {
  abstract readonly kind: HedgeErrorKind;
}

/** No matching (or more than one matching) AMM or CEX position. */
export class NotFoundError extends HedgeError {
  readonly kind = "NotFound";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class MalformedDataError extends HedgeError {
  readonly kind = "MalformedData";

  constructor(
    readonly field: string,
    readonly value: string
  ) {
    super(`Failed to parse ${field}: ${JSON.stringify(value)}`);
    this.name = "MalformedDataError";
  }
}

/** A venue or RPC call rejected. The original error is kept as `cause`. */
export class CollaboratorFailure extends HedgeError {
  readonly kind = "CollaboratorFailure";

  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = "CollaboratorFailure";
  }
}

export class ConfigurationError extends HedgeError {
  readonly kind = "ConfigurationError";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function isHedgeError(err: unknown): err is HedgeError {
  return err instanceof HedgeError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
