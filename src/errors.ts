export type ErrorCode =
  | "DECODE"
  | "VALIDATION"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INSUFFICIENT_FUNDS"
  | "UNSUPPORTED"
  | "CONTRACT_QUERY"
  | "SYSTEM_QUERY";

/**
 * Base class for every failure raised by a simulated module or the host app.
 * The message is what tests assert on, so subclasses never decorate it.
 */
export class SimError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options: { context?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "SimError";
    this.code = code;
    this.context = options.context;
  }
}

/** Malformed binary payload for a known type. */
export class DecodeError extends SimError {
  constructor(typeName: string, reason: string, cause?: unknown) {
    super(`failed to decode ${typeName}: ${reason}`, "DECODE", {
      context: { typeName },
      cause,
    });
    this.name = "DecodeError";
  }
}

export class ValidationError extends SimError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION", { context });
    this.name = "ValidationError";
  }
}

export class UnauthorizedError extends SimError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "UNAUTHORIZED", { context });
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends SimError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "NOT_FOUND", { context });
    this.name = "NotFoundError";
  }
}

export class InsufficientFundsError extends SimError {
  constructor(balance: bigint, requested: bigint, denom: string) {
    super(`Cannot Sub with ${balance} and ${requested}`, "INSUFFICIENT_FUNDS", {
      context: { denom },
    });
    this.name = "InsufficientFundsError";
  }
}

/** Unknown type URL, query path or query variant. */
export class UnsupportedError extends SimError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "UNSUPPORTED", { context });
    this.name = "UnsupportedError";
  }
}

/** A contract answered a query with its own error; the message is the contract's. */
export class ContractQueryError extends SimError {
  constructor(message: string) {
    super(message, "CONTRACT_QUERY");
    this.name = "ContractQueryError";
  }
}

export class SystemQueryError extends SimError {
  constructor(message: string) {
    super(`Querier system error: ${message}`, "SYSTEM_QUERY");
    this.name = "SystemQueryError";
  }
}

export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);
