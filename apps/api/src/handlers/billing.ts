import {
  createBillingPortalSession,
  getBillingStatus,
  subscribeToPlan,
  type BillingStatusDeps,
} from "@billsync/application";
import { subscribePayloadSchema } from "@billsync/contracts";

import { toApiErrorResponse } from "../http/errors.js";
import {
  localeFromHeaders,
  requireOrganizationId,
  traceIdFromHeaders,
} from "../http/headers.js";
import type { ApiResponse, Headers } from "../http/types.js";
import { parseOrThrowBadRequest } from "../http/validation.js";

export interface BillingHandlerDeps {
  billing: BillingStatusDeps;
  siteUrl: string;
}

export type BillingStatusHandler = (headers: Headers) => Promise<ApiResponse>;
export type SubscribeHandler = (
  headers: Headers,
  payload: unknown,
) => Promise<ApiResponse>;
export type BillingPortalHandler = (headers: Headers) => Promise<ApiResponse>;

function errorResponse(error: unknown, headers: Headers): ApiResponse {
  return toApiErrorResponse(
    error,
    traceIdFromHeaders(headers),
    localeFromHeaders(headers),
  );
}

export function billingReturnUrl(siteUrl: string): string {
  return `${siteUrl.endsWith("/") ? siteUrl : `${siteUrl}/`}billing`;
}

export function createBillingStatusHandler(
  deps: BillingHandlerDeps,
): BillingStatusHandler {
  return async function handleBillingStatus(headers) {
    try {
      const organizationId = requireOrganizationId(headers);
      const status = await getBillingStatus(deps.billing, {
        organizationId,
        baseUrl: deps.siteUrl,
      });
      return { status: 200, body: status };
    } catch (error) {
      return errorResponse(error, headers);
    }
  };
}

export function createSubscribeHandler(
  deps: BillingHandlerDeps,
): SubscribeHandler {
  return async function handleSubscribe(headers, payload) {
    try {
      const organizationId = requireOrganizationId(headers);
      const { plan } = parseOrThrowBadRequest(
        subscribePayloadSchema,
        payload,
        "Invalid subscribe payload",
      );

      const checkout = await subscribeToPlan(deps.billing, {
        organizationId,
        planKey: plan,
        baseUrl: deps.siteUrl,
      });
      return { status: 200, body: checkout };
    } catch (error) {
      return errorResponse(error, headers);
    }
  };
}

/** Redirects to the provider's self-service portal, or home without a customer. */
export function createBillingPortalHandler(
  deps: BillingHandlerDeps,
): BillingPortalHandler {
  return async function handleBillingPortal(headers) {
    try {
      const organizationId = requireOrganizationId(headers);
      const { url } = await createBillingPortalSession(deps.billing, {
        organizationId,
        returnUrl: billingReturnUrl(deps.siteUrl),
      });
      return { status: 302, body: null, headers: { location: url } };
    } catch (error) {
      return errorResponse(error, headers);
    }
  };
}
