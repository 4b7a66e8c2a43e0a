import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ZodError } from "zod";
import { ConfigurationError, parsePlanCatalogFile } from "@billsync/application";
import type { Plan } from "@billsync/contracts";
import { describeError } from "@billsync/shared";

import { formatIssues } from "../http/validation.js";

export const DEFAULT_PLAN_CATALOG_PATH = fileURLToPath(
  new URL("../../../../config/plans.json", import.meta.url),
);

export function loadPlanCatalogFile(path = DEFAULT_PLAN_CATALOG_PATH): Plan[] {
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read plan catalog ${path}: ${describeError(error)}`,
    );
  }

  try {
    return parsePlanCatalogFile(content);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(
        `Invalid plan catalog ${path} - ${formatIssues(error.issues)}`,
      );
    }
    throw error;
  }
}
