/**
 * Commerce error taxonomy. Every failure a caller is expected to show to a
 * user is a CommerceError; routes map `status` and `code` straight onto the
 * JSON error body.
 */

export class CommerceError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends CommerceError {
  constructor(message: string, code = "VALIDATION_ERROR", status = 400) {
    super(message, code, status);
  }
}

export class CapacityExceededError extends CommerceError {
  constructor(message: string) {
    super(message, "CAPACITY_EXCEEDED", 409);
  }
}

export class PerUserLimitExceededError extends CommerceError {
  constructor(message: string) {
    super(message, "PER_USER_LIMIT_EXCEEDED", 409);
  }
}

export class CartNotOpenError extends CommerceError {
  constructor(message = "Cart is not open for modification") {
    super(message, "CART_NOT_OPEN", 409);
  }
}

export class IllegalTransitionError extends ValidationError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Cannot transition order from '${from}' to '${to}'`, "ILLEGAL_TRANSITION", 409);
    this.from = from;
    this.to = to;
  }
}

export class NotFoundError extends CommerceError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
  }
}

export const isCommerceError = (error: unknown): error is CommerceError => error instanceof CommerceError;
