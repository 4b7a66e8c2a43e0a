import { z } from "zod";

export const nonEmptyStringSchema = z.string().trim().min(1);

/** Provider references arrive either as a bare id or as an expanded object. */
export const providerReferenceSchema = z.union([
  nonEmptyStringSchema,
  z.object({ id: nonEmptyStringSchema }).passthrough(),
]);

export type ProviderReference = z.infer<typeof providerReferenceSchema>;

export function referenceId(
  reference: ProviderReference | null | undefined,
): string | null {
  if (reference === null || reference === undefined) return null;
  return typeof reference === "string" ? reference : reference.id;
}
