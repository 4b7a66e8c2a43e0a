export function buildUsageIdempotencyKey(
  subscriptionItemId: string,
  usageDate: string,
): string {
  return `${subscriptionItemId}-${usageDate}`;
}

export function buildUsageJobKey(organizationId: string, usageDate: string): string {
  return `${organizationId}:${usageDate}`;
}
