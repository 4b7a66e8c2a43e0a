import { randomUUID } from "node:crypto";
import { hostname } from "node:os";
import {
  ConfigurationError,
  DEFAULT_ATTEMPT_TIMEOUT_SECONDS,
  DEFAULT_LEASE_SECONDS,
  createInMemoryUsageOpsMonitor,
  processNextUsageReportJob,
  scheduleDailyUsageForAllMeteredOrganizations,
  type ScheduleDailyUsageResult,
  type UsageOpsMonitor,
  type UsageOpsSnapshot,
  type UsageUseCaseDeps,
} from "@billsync/application";
import { createApiCompositionRoot } from "@billsync/api";
import { createConsoleLogger } from "@billsync/shared";

export interface UsageWorkerDeps {
  usageUseCases: UsageUseCaseDeps;
  runtimeConfig?: UsageWorkerRuntimeConfig;
  opsMonitor?: UsageOpsMonitor;
}

export interface RunUsageWorkerOnceResult {
  status: "processed" | "idle" | "failed";
  jobId?: string;
}

export interface UsageWorkerRuntimeConfig {
  workerId: string;
  leaseSeconds: number;
  heartbeatSeconds: number;
  reportTimeoutSeconds: number;
}

const DEFAULT_HEARTBEAT_SECONDS = 10;
const defaultWorkerId = `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;

function parsePositiveInt(
  raw: string | undefined,
  envName: string,
  fallback: number,
): number {
  if (!raw?.trim()) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${envName} must be a positive integer`);
  }

  return value;
}

export function resolveUsageWorkerRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): UsageWorkerRuntimeConfig {
  const workerId = env.WORKER_ID?.trim() || defaultWorkerId;
  const leaseSeconds = parsePositiveInt(
    env.JOB_LEASE_SECONDS,
    "JOB_LEASE_SECONDS",
    DEFAULT_LEASE_SECONDS,
  );
  const heartbeatSeconds = parsePositiveInt(
    env.JOB_HEARTBEAT_SECONDS,
    "JOB_HEARTBEAT_SECONDS",
    DEFAULT_HEARTBEAT_SECONDS,
  );
  const reportTimeoutSeconds = parsePositiveInt(
    env.USAGE_REPORT_TIMEOUT_SECONDS,
    "USAGE_REPORT_TIMEOUT_SECONDS",
    DEFAULT_ATTEMPT_TIMEOUT_SECONDS,
  );

  if (heartbeatSeconds >= leaseSeconds) {
    throw new ConfigurationError(
      "JOB_HEARTBEAT_SECONDS must be lower than JOB_LEASE_SECONDS",
    );
  }

  return { workerId, leaseSeconds, heartbeatSeconds, reportTimeoutSeconds };
}

/** Routes job lifecycle events of `usageUseCases` into a fresh ops monitor. */
export function withUsageOpsMonitor(
  usageUseCases: UsageUseCaseDeps,
  runtimeConfig?: UsageWorkerRuntimeConfig,
): UsageWorkerDeps {
  const opsMonitor = createInMemoryUsageOpsMonitor();

  return {
    usageUseCases: { ...usageUseCases, jobObserver: opsMonitor.observer },
    opsMonitor,
    ...(runtimeConfig !== undefined ? { runtimeConfig } : {}),
  };
}

function createDefaultWorkerDeps(): UsageWorkerDeps {
  const logger = createConsoleLogger("usage-worker");
  const { stores, provider } = createApiCompositionRoot({ logger });

  return withUsageOpsMonitor({
    billingRecords: stores.billingRecords,
    planCatalog: stores.planCatalog,
    usageSource: stores.usageSource,
    usageJobStore: stores.usageJobStore,
    reportIdempotencyStore: stores.reportIdempotencyStore,
    provider,
    logger,
  });
}

let defaultWorkerDeps: UsageWorkerDeps | null = null;

function resolveDefaultWorkerDeps(): UsageWorkerDeps {
  if (!defaultWorkerDeps) {
    defaultWorkerDeps = createDefaultWorkerDeps();
  }
  return defaultWorkerDeps;
}

export async function runUsageWorkerOnce(
  deps: UsageWorkerDeps = resolveDefaultWorkerDeps(),
): Promise<RunUsageWorkerOnceResult> {
  const runtimeConfig = deps.runtimeConfig ?? resolveUsageWorkerRuntimeConfig();
  const result = await processNextUsageReportJob(deps.usageUseCases, {
    lease: {
      workerId: runtimeConfig.workerId,
      leaseToken: randomUUID(),
      leaseSeconds: runtimeConfig.leaseSeconds,
    },
    heartbeatSeconds: runtimeConfig.heartbeatSeconds,
    attemptTimeoutSeconds: runtimeConfig.reportTimeoutSeconds,
  });

  if (result.status === "no_job") {
    return { status: "idle" };
  }

  if (deps.opsMonitor) {
    deps.usageUseCases.logger.info("Usage job finished", {
      status: result.status,
      jobId: result.jobId,
      ...deps.opsMonitor.snapshot(),
    });
  }

  if (result.status === "processed") {
    return { status: "processed", jobId: result.jobId };
  }

  return { status: "failed", jobId: result.jobId };
}

/** Daily entry point; `date` defaults to yesterday in UTC. */
export async function runDailyUsageScheduling(
  deps: UsageWorkerDeps = resolveDefaultWorkerDeps(),
  date?: string,
): Promise<ScheduleDailyUsageResult> {
  return scheduleDailyUsageForAllMeteredOrganizations(deps.usageUseCases, {
    date,
  });
}

/** Operator view of the jobs this process has seen; null without a monitor. */
export function readUsageOpsSnapshot(
  deps: UsageWorkerDeps = resolveDefaultWorkerDeps(),
): UsageOpsSnapshot | null {
  return deps.opsMonitor ? deps.opsMonitor.snapshot() : null;
}
