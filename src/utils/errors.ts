export type OutreachErrorKind =
  | "validation"
  | "connection"
  | "send"
  | "not_found"
  | "store";

/**
 * Base class for every failure the outreach services raise on purpose.
 * `kind` lets callers branch without instanceof chains.
 */
export abstract class OutreachError extends Error {
  abstract readonly kind: OutreachErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input: unknown placeholder, missing field, duplicate name. */
export class ValidationError extends OutreachError {
  readonly kind = "validation";

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

/** SMTP handshake or authentication failed; the whole campaign is aborted. */
export class ConnectionError extends OutreachError {
  readonly kind = "connection";
}

/** A single message could not be transmitted. Retried by the orchestrator. */
export class SendError extends OutreachError {
  readonly kind = "send";

  constructor(
    message: string,
    readonly responseCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NotFoundError extends OutreachError {
  readonly kind = "not_found";

  constructor(
    readonly entity: string,
    readonly key: string | number
  ) {
    super(`${entity} ${key} not found`);
  }
}

/** Persistence layer failed; the in-flight mutation has been rolled back. */
export class StoreError extends OutreachError {
  readonly kind = "store";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
