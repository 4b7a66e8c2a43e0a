export const enUSMessages = {
  "webhook.accepted": "Webhook accepted",
  "billing.status_loaded": "Billing status loaded",
  "billing.checkout_started": "Checkout session ready",
  "billing.already_active":
    "Your organization already has billing set up, please contact us to change.",
  "billing.subscription_start_failed":
    "Error starting your billing subscription. Please try again.",
  "billing.plan_not_eligible": "Plan is not available for self-serve signup",
  "billing.organization_required": "Organization id is required",
  "error.unexpected": "Unexpected error",
} as const;

export type EnUSMessageKey = keyof typeof enUSMessages;
