export type InvalidHandCode = "WRONG_LENGTH" | "INVALID_CARD" | "TOO_MANY_OF_RANK" | "TOO_MANY_WILDCARDS";

export class InvalidHandError extends Error {
  readonly code: InvalidHandCode;
  readonly details?: Record<string, unknown>;

  constructor(code: InvalidHandCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "InvalidHandError";
    this.code = code;
    this.details = details;
  }
}

/** Raised when a validated hand cannot be classified. Indicates a bug, not bad input. */
export class HandInvariantError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "HandInvariantError";
    this.details = details;
  }
}
