import { AppError } from "@billsync/application";
import { BillingDomainError } from "@billsync/domain";
import { buildStandardErrorBody, t } from "@billsync/shared";

import type { ApiResponse } from "./types.js";

export function toApiErrorResponse(
  error: unknown,
  traceId?: string,
  locale?: string,
): ApiResponse {
  if (error instanceof AppError) {
    return {
      status: error.httpStatus,
      body: buildStandardErrorBody({
        message: error.message,
        code: error.code,
        details: error.details,
        traceId,
      }),
    };
  }

  if (error instanceof BillingDomainError) {
    return {
      status: 409,
      body: buildStandardErrorBody({
        message: error.message,
        code: "DOMAIN_CONFLICT",
        details: error.details,
        traceId,
      }),
    };
  }

  return {
    status: 500,
    body: buildStandardErrorBody({
      message: t("error.unexpected", { locale }),
      code: "INTERNAL_ERROR",
      traceId,
    }),
  };
}
