import { createHash } from "node:crypto";

function stableStringifyInternal(value: unknown): string {
  if (typeof value === "undefined") {
    return '"__undefined__"';
  }

  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringifyInternal(item)).join(",")}]`;
  }

  const entries = Object.entries(value).sort(([leftKey], [rightKey]) =>
    leftKey.localeCompare(rightKey),
  );

  return `{${entries
    .map(
      ([entryKey, entryValue]) =>
        `${JSON.stringify(entryKey)}:${stableStringifyInternal(entryValue)}`,
    )
    .join(",")}}`;
}

export type FingerprintFn<TPayload> = (payload: TPayload | undefined) => string;

export function stableStringify(value: unknown): string {
  return stableStringifyInternal(value);
}

export function sha256Hex(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

export function hashPayload(payload: unknown): string {
  return sha256Hex(stableStringify(payload));
}
