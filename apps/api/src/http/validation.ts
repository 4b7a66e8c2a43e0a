import { BadRequestError } from "@billsync/application";
import type { ZodTypeAny, z } from "zod";

export function formatIssues(issues: { path: PropertyKey[]; message: string }[]): string {
  return issues
    .map((issue) => {
      const field =
        issue.path.length > 0 ? issue.path.map(String).join(".") : "payload";
      return `${field}: ${issue.message}`;
    })
    .join("; ");
}

export function parseOrThrowBadRequest<TSchema extends ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  message = "Invalid request payload",
): z.infer<TSchema> {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    throw new BadRequestError(`${message} - ${formatIssues(parsed.error.issues)}`);
  }

  return parsed.data;
}
