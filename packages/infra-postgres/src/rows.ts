export type TimestampValue = Date | string;

export function toIso(value: TimestampValue): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function toNullableIso(value: TimestampValue | null): string | null {
  return value === null ? null : toIso(value);
}

export function firstRow<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}
