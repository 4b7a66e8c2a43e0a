import type { EventUsageSource } from "@billsync/application";
import type { Pool } from "pg";
import { firstRow } from "./rows.js";

/** Counts rows of the product event table within an inclusive time range. */
export function createPostgresEventUsageSource(pool: Pool): EventUsageSource {
  return {
    async countEvents(
      organizationId: string,
      startIso: string,
      endIso: string,
    ): Promise<number | null> {
      const result = await pool.query<{ count: string }>(
        `SELECT count(*)::text AS count
           FROM organization_events
          WHERE organization_id = $1
            AND occurred_at BETWEEN $2::timestamptz AND $3::timestamptz`,
        [organizationId, startIso, endIso],
      );

      const row = firstRow(result.rows);
      return row ? Number(row.count) : null;
    },
  };
}
