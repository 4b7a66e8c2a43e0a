import { describe, expect, it } from "vitest";
import { planCatalogFileSchema, subscribePayloadSchema } from "./billing-api.js";
import { referenceId } from "./common.js";

describe("billing api schemas", () => {
  it("fills optional plan display fields with null", () => {
    const parsed = planCatalogFileSchema.parse({
      plans: [
        {
          key: "growth",
          name: "Growth",
          priceId: "price_growth",
          eventAllowance: 1000,
          isMetered: false,
          selfServe: true,
          isActive: true,
          defaultAwaitingSetup: true,
        },
      ],
    });

    expect(parsed.plans[0]).toMatchObject({
      customSetupBillingMessage: null,
      imageUrl: null,
      priceString: null,
    });
  });

  it("rejects unknown plan fields", () => {
    const result = planCatalogFileSchema.safeParse({
      plans: [{ key: "growth", tier: 2 }],
    });

    expect(result.success).toBe(false);
  });

  it("trims the subscribe plan key and rejects extra fields", () => {
    expect(subscribePayloadSchema.parse({ plan: " growth " })).toEqual({
      plan: "growth",
    });
    expect(
      subscribePayloadSchema.safeParse({ plan: "growth", coupon: "x" }).success,
    ).toBe(false);
    expect(subscribePayloadSchema.safeParse({ plan: "  " }).success).toBe(false);
  });

  it("reads provider references as ids", () => {
    expect(referenceId("cus_1")).toBe("cus_1");
    expect(referenceId({ id: "cus_2", object: "customer" })).toBe("cus_2");
    expect(referenceId(null)).toBeNull();
  });
});
