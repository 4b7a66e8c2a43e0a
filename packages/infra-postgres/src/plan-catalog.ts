import type { PlanCatalog } from "@billsync/application";
import type { Plan } from "@billsync/contracts";
import type { Pool } from "pg";
import { firstRow } from "./rows.js";

type PlanRow = {
  key: string;
  name: string;
  price_id: string;
  event_allowance: number | null;
  is_metered: boolean;
  self_serve: boolean;
  is_active: boolean;
  default_awaiting_setup: boolean;
  custom_setup_billing_message: string | null;
  image_url: string | null;
  price_string: string | null;
};

const COLUMNS = `key, name, price_id, event_allowance, is_metered, self_serve, is_active,
  default_awaiting_setup, custom_setup_billing_message, image_url, price_string`;

function mapRow(row: PlanRow): Plan {
  return {
    key: row.key,
    name: row.name,
    priceId: row.price_id,
    eventAllowance: row.event_allowance,
    isMetered: row.is_metered,
    selfServe: row.self_serve,
    isActive: row.is_active,
    defaultAwaitingSetup: row.default_awaiting_setup,
    customSetupBillingMessage: row.custom_setup_billing_message,
    imageUrl: row.image_url,
    priceString: row.price_string,
  };
}

export function createPostgresPlanCatalog(pool: Pool): PlanCatalog {
  async function findOne(column: "key" | "price_id", value: string): Promise<Plan | null> {
    const result = await pool.query<PlanRow>(
      `SELECT ${COLUMNS} FROM billing_plans WHERE ${column} = $1 LIMIT 1`,
      [value],
    );
    const row = firstRow(result.rows);
    return row ? mapRow(row) : null;
  }

  return {
    findByKey: (key) => findOne("key", key),
    findByPriceId: (priceId) => findOne("price_id", priceId),
    async list(): Promise<Plan[]> {
      const result = await pool.query<PlanRow>(
        `SELECT ${COLUMNS} FROM billing_plans ORDER BY key`,
      );
      return result.rows.map(mapRow);
    },
  };
}
