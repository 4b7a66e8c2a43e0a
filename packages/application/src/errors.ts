export type AppErrorCode =
  | "BAD_REQUEST"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "IDEMPOTENCY_CONFLICT"
  | "IDEMPOTENCY_IN_PROGRESS"
  | "MISSING_IDEMPOTENCY_KEY"
  | "DOMAIN_CONFLICT"
  | "INVALID_SIGNATURE"
  | "MALFORMED_PAYLOAD"
  | "UNKNOWN_CUSTOMER"
  | "PROVIDER_UNAVAILABLE"
  | "USAGE_DATA_UNAVAILABLE"
  | "CONFIGURATION_ERROR"
  | "INTERNAL_ERROR";

export interface AppErrorInput {
  message: string;
  code: AppErrorCode;
  httpStatus: number;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly httpStatus: number;
  readonly details?: unknown;

  constructor(input: AppErrorInput) {
    super(input.message);
    this.name = new.target.name;
    this.code = input.code;
    this.httpStatus = input.httpStatus;
    if (input.details !== undefined) this.details = input.details;
    if (input.cause !== undefined) {
      this.cause = input.cause;
    }
  }
}

export class BadRequestError extends AppError {
  constructor(message = "Invalid request input", details?: unknown) {
    super({
      message,
      code: "BAD_REQUEST",
      httpStatus: 400,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: unknown) {
    super({
      message,
      code: "VALIDATION_ERROR",
      httpStatus: 400,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", details?: unknown) {
    super({
      message,
      code: "NOT_FOUND",
      httpStatus: 404,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", details?: unknown) {
    super({
      message,
      code: "CONFLICT",
      httpStatus: 409,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class InternalError extends AppError {
  constructor(message = "Unexpected error", details?: unknown) {
    super({
      message,
      code: "INTERNAL_ERROR",
      httpStatus: 500,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

// Idempotent execution

export class MissingIdempotencyKeyError extends AppError {
  constructor(message = "An idempotency key is required") {
    super({ message, code: "MISSING_IDEMPOTENCY_KEY", httpStatus: 400 });
  }
}

export class IdempotencyConflictError extends AppError {
  constructor(scope: string, key: string) {
    super({
      message: `Idempotency key ${key} was already used with another payload`,
      code: "IDEMPOTENCY_CONFLICT",
      httpStatus: 409,
      details: { scope, key },
    });
  }
}

export class IdempotencyInProgressError extends AppError {
  constructor(scope: string, key: string) {
    super({
      message: `Execution for idempotency key ${key} is still in progress`,
      code: "IDEMPOTENCY_IN_PROGRESS",
      httpStatus: 409,
      details: { scope, key },
    });
  }
}

// Billing taxonomy

export class InvalidSignatureError extends AppError {
  constructor(message = "Invalid webhook signature", cause?: unknown) {
    super({
      message,
      code: "INVALID_SIGNATURE",
      httpStatus: 400,
      ...(cause !== undefined ? { cause } : {}),
    });
  }
}

export class MalformedPayloadError extends AppError {
  constructor(message = "Malformed webhook payload", details?: unknown) {
    super({
      message,
      code: "MALFORMED_PAYLOAD",
      httpStatus: 400,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class UnknownCustomerError extends AppError {
  readonly customerId: string;

  constructor(customerId: string, message?: string) {
    super({
      message: message ?? `No organization found for customer ${customerId}`,
      code: "UNKNOWN_CUSTOMER",
      httpStatus: 400,
      details: { customerId },
    });
    this.customerId = customerId;
  }
}

export class ProviderUnavailableError extends AppError {
  constructor(message = "Payment provider is unavailable", cause?: unknown) {
    super({
      message,
      code: "PROVIDER_UNAVAILABLE",
      httpStatus: 503,
      ...(cause !== undefined ? { cause } : {}),
    });
  }
}

export class UsageDataUnavailableError extends AppError {
  constructor(message = "Usage data is unavailable", details?: unknown) {
    super({
      message,
      code: "USAGE_DATA_UNAVAILABLE",
      httpStatus: 503,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super({
      message,
      code: "CONFIGURATION_ERROR",
      httpStatus: 500,
    });
  }
}

export class PlanNotEligibleError extends ValidationError {
  constructor(planKey: string, message = "Plan is not available for self-serve signup") {
    super(message, { planKey });
  }
}

export class BillingAlreadyActiveError extends ValidationError {
  constructor(
    message = "Your organization already has billing set up, please contact us to change.",
  ) {
    super(message);
  }
}
