import { planCatalogFileSchema, type Plan } from "@billsync/contracts";

export interface PlanCatalog {
  findByKey(key: string): Promise<Plan | null>;
  findByPriceId(priceId: string): Promise<Plan | null>;
  list(): Promise<Plan[]>;
}

/** Validates the contents of a plan catalog file such as `config/plans.json`. */
export function parsePlanCatalogFile(content: unknown): Plan[] {
  return planCatalogFileSchema.parse(content).plans;
}

export function createInMemoryPlanCatalog(plans: readonly Plan[]): PlanCatalog {
  const byKey = new Map(plans.map((plan) => [plan.key, plan]));

  return {
    async findByKey(key: string): Promise<Plan | null> {
      return byKey.get(key) ?? null;
    },
    async findByPriceId(priceId: string): Promise<Plan | null> {
      return plans.find((plan) => plan.priceId === priceId) ?? null;
    },
    async list(): Promise<Plan[]> {
      return [...plans];
    },
  };
}
