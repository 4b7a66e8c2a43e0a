export type BillingDomainErrorCode =
  | "subscription_mismatch"
  | "malformed_line_item"
  | "missing_provisioned_subscription";

export class BillingDomainError extends Error {
  readonly code: BillingDomainErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: BillingDomainErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (details !== undefined) this.details = details;
  }
}

export class SubscriptionMismatchError extends BillingDomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("subscription_mismatch", message, details);
  }
}

export class MalformedLineItemError extends BillingDomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("malformed_line_item", message, details);
  }
}
