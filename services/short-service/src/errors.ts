export type ShortErrorCode = "value_too_large" | "key_not_found" | "internal_error";

export class ShortServiceError extends Error {
  readonly code: ShortErrorCode;

  constructor(code: ShortErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValueTooLargeError extends ShortServiceError {
  constructor(maxLen?: number) {
    super(
      "value_too_large",
      maxLen === undefined
        ? "input exceeds maximum length"
        : `input exceeds maximum length of ${maxLen} bytes`
    );
  }
}

export class KeyNotFoundError extends ShortServiceError {
  constructor() {
    super("key_not_found", "key not found");
  }
}

/**
 * Unexpected failure inside the store. Its message is for logs only and is
 * never sent to clients.
 */
export class InternalError extends ShortServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super("internal_error", message, options);
  }
}

const STATUS_BY_CODE: Record<ShortErrorCode, number> = {
  value_too_large: 400,
  key_not_found: 404,
  internal_error: 500
};

export function statusCodeFor(err: ShortServiceError): number {
  return STATUS_BY_CODE[err.code];
}

export function isShortErrorCode(s: string): s is ShortErrorCode {
  return Object.hasOwn(STATUS_BY_CODE, s);
}

/** Rebuilds a typed error from the `error` field of a response body. */
export function errorFromCode(code: ShortErrorCode): ShortServiceError {
  switch (code) {
    case "value_too_large":
      return new ValueTooLargeError();
    case "key_not_found":
      return new KeyNotFoundError();
    case "internal_error":
      return new InternalError("remote internal error");
  }
}
