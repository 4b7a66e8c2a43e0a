import { BadRequestError, findHeader } from "@billsync/application";
import { t } from "@billsync/shared";
import type { Headers } from "./types.js";

export const ORGANIZATION_HEADER = "x-organization-id";

export function getHeader(headers: Headers, key: string): string | null {
  return findHeader(headers, key) ?? null;
}

export function localeFromHeaders(headers: Headers): string | undefined {
  return getHeader(headers, "accept-language") ?? undefined;
}

export function traceIdFromHeaders(headers: Headers): string | undefined {
  return getHeader(headers, "x-trace-id") ?? undefined;
}

export function requireOrganizationId(headers: Headers): string {
  const organizationId = getHeader(headers, ORGANIZATION_HEADER)?.trim();
  if (!organizationId) {
    throw new BadRequestError(
      t("billing.organization_required", { locale: localeFromHeaders(headers) }),
    );
  }
  return organizationId;
}
