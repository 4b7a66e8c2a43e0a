import { randomUUID } from "node:crypto";
import {
  AppError,
  ConfigurationError,
  processBillingWebhook,
  type BillingWebhookDeps,
} from "@billsync/application";
import { BillingDomainError } from "@billsync/domain";
import { describeError, t, utcNowIso, type Logger } from "@billsync/shared";

import { traceIdFromHeaders } from "../http/headers.js";
import type { ApiResponse, Headers } from "../http/types.js";

export interface StripeWebhookHandlerDeps {
  webhook: BillingWebhookDeps;
  logger: Logger;
  now?: () => string;
  generateTraceId?: () => string;
}

export type StripeWebhookHandler = (
  headers: Headers,
  rawBody: string,
) => Promise<ApiResponse>;

function isRejectedEvent(error: unknown): boolean {
  if (error instanceof ConfigurationError) return false;
  return error instanceof AppError || error instanceof BillingDomainError;
}

/**
 * Acknowledges provider webhooks. Rejected events answer 400 so the provider
 * retries them; configuration and unexpected failures propagate to the host.
 */
export function createStripeWebhookHandler(
  deps: StripeWebhookHandlerDeps,
): StripeWebhookHandler {
  const now = deps.now ?? utcNowIso;
  const generateTraceId = deps.generateTraceId ?? randomUUID;

  return async function handleStripeWebhook(
    headers: Headers,
    rawBody: string,
  ): Promise<ApiResponse> {
    const traceId = traceIdFromHeaders(headers) ?? generateTraceId();

    try {
      const result = await processBillingWebhook(deps.webhook, {
        provider: "stripe",
        rawBody,
        headers,
        receivedAt: now(),
        traceId,
      });

      deps.logger.info(t("webhook.accepted"), {
        traceId,
        status: result.status,
        eventKind: result.eventKind,
        idempotencyKey: result.idempotencyKey,
        ...(result.organizationId !== undefined
          ? { organizationId: result.organizationId }
          : {}),
      });

      return { status: 200, body: { success: true } };
    } catch (error) {
      if (!isRejectedEvent(error)) {
        deps.logger.error("Stripe webhook failed", {
          traceId,
          reason: describeError(error),
        });
        throw error;
      }

      deps.logger.warn("Stripe webhook rejected", {
        traceId,
        code: error instanceof AppError ? error.code : "DOMAIN_CONFLICT",
        reason: describeError(error),
      });
      return { status: 400, body: { success: false } };
    }
  };
}
