export interface StandardErrorBody {
  message: string;
  code: string;
  details?: unknown;
  traceId?: string;
}

export function buildStandardErrorBody(input: {
  message: string;
  code: string;
  details?: unknown;
  traceId?: string | undefined;
}): StandardErrorBody {
  return {
    message: input.message,
    code: input.code,
    ...(input.details !== undefined ? { details: input.details } : {}),
    ...(input.traceId !== undefined ? { traceId: input.traceId } : {}),
  };
}

export function describeError(
  error: unknown,
  fallback = "Unexpected error",
): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === "string" && error.trim().length > 0) {
    return error;
  }
  return fallback;
}
