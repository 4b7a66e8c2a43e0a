import { enUSMessages, type EnUSMessageKey } from "./messages.en-US.js";

export type SupportedLocale = "en-US";

export type MessageKey = EnUSMessageKey;

const catalogs: Record<SupportedLocale, Readonly<Record<MessageKey, string>>> = {
  "en-US": enUSMessages,
};

export function resolveLocale(input?: string): SupportedLocale {
  if (!input) return "en-US";
  // only en-US ships today; any Accept-Language value falls back to it
  return "en-US";
}

export function t(
  key: MessageKey,
  options?: { locale?: string | undefined; fallback?: string },
): string {
  const catalog = catalogs[resolveLocale(options?.locale)];
  return catalog[key] ?? options?.fallback ?? key;
}
