import { randomUUID } from "node:crypto";
import type {
  UsageReportJobStatus,
  UsageReportedEvent,
} from "@billsync/contracts";
import { buildUsageIdempotencyKey, buildUsageJobKey } from "@billsync/domain";
import {
  addSecondsToIso,
  describeError,
  isUtcDateString,
  parseIsoToEpochMillis,
  previousUtcDate,
  utcDayRange,
  utcNowIso,
  type Logger,
} from "@billsync/shared";
import type { BillingRecordStore } from "./billing-record-store.js";
import {
  ConflictError,
  NotFoundError,
  ProviderUnavailableError,
  UsageDataUnavailableError,
  ValidationError,
} from "./errors.js";
import {
  executeIdempotent,
  type AsyncIdempotencyStore,
} from "./idempotency.js";
import type { PlanCatalog } from "./plan-catalog.js";
import type { BillingProvider, EventUsageSource } from "./provider.js";

export interface UsageReportJob {
  id: string;
  status: UsageReportJobStatus;
  jobKey: string;
  organizationId: string;
  usageDate: string;
  createdAt: string;
  updatedAt: string;
  quantity?: number;
  reason?: string;
  attemptCount: number;
  maxAttempts: number;
  nextAttemptAt: string;
  lastError?: string;
  deadLetteredAt?: string;
  leaseOwner?: string;
  leaseToken?: string;
  leaseExpiresAt?: string;
}

export interface UsageJobLease {
  workerId: string;
  leaseToken: string;
}

export interface UsageJobClaimInput extends UsageJobLease {
  leaseSeconds: number;
}

export interface UsageJobStore {
  /** Returns false when a job with the same key already exists. */
  enqueue(job: UsageReportJob): Promise<boolean>;
  claimNext(input: UsageJobClaimInput): Promise<UsageReportJob | null>;
  renewLease(
    jobId: string,
    lease: UsageJobLease,
    leaseSeconds: number,
  ): Promise<void>;
  get(jobId: string): Promise<UsageReportJob | null>;
  markCompleted(
    jobId: string,
    quantity: number,
    lease: UsageJobLease,
  ): Promise<void>;
  markRetry(
    jobId: string,
    reason: string,
    nextAttemptAt: string,
    attemptCount: number,
    lease: UsageJobLease,
  ): Promise<void>;
  markDeadLetter(
    jobId: string,
    reason: string,
    lease: UsageJobLease,
  ): Promise<void>;
}

export interface UsageJobObserver {
  onJobEnqueued?(job: UsageReportJob): Promise<void> | void;
  onJobClaimed?(job: UsageReportJob): Promise<void> | void;
  onJobCompleted?(job: UsageReportJob, quantity: number): Promise<void> | void;
  onJobRetryScheduled?(
    job: UsageReportJob,
    reason: string,
    nextAttemptAt: string,
    attemptCount: number,
  ): Promise<void> | void;
  onJobDeadLettered?(job: UsageReportJob, reason: string): Promise<void> | void;
}

export interface UsageUseCaseDeps {
  billingRecords: BillingRecordStore;
  planCatalog: PlanCatalog;
  usageSource: EventUsageSource;
  provider: BillingProvider;
  usageJobStore: UsageJobStore;
  reportIdempotencyStore: AsyncIdempotencyStore<UsageReportedEvent>;
  logger: Logger;
  jobObserver?: UsageJobObserver;
  now?: () => string;
  generateId?: () => string;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_LEASE_SECONDS = 30;
export const DEFAULT_ATTEMPT_TIMEOUT_SECONDS = 20;
const MAX_RETRY_DELAY_SECONDS = 60;

const noopUsageJobObserver: UsageJobObserver = {};

export class UsageJobNotFoundError extends NotFoundError {
  constructor(message = "Usage report job not found") {
    super(message);
  }
}

export class UsageJobLeaseError extends ConflictError {
  constructor(message = "Usage job lease is no longer owned by this worker") {
    super(message);
  }
}

function resolveNow(deps: Pick<UsageUseCaseDeps, "now">): string {
  return (deps.now ?? utcNowIso)();
}

function resolveId(deps: Pick<UsageUseCaseDeps, "generateId">): string {
  return (deps.generateId ?? randomUUID)();
}

export function computeRetryDelaySeconds(attemptCount: number): number {
  return Math.min(2 ** attemptCount, MAX_RETRY_DELAY_SECONDS);
}

async function notifyObserver(
  logger: Logger,
  event: string,
  callback: () => Promise<void> | void,
): Promise<void> {
  try {
    await callback();
  } catch (error) {
    logger.warn("Usage job observer failed", {
      event,
      reason: describeError(error, "Unexpected observer failure"),
    });
  }
}

function stripLeaseMetadata(job: UsageReportJob): UsageReportJob {
  const {
    leaseOwner: _leaseOwner,
    leaseToken: _leaseToken,
    leaseExpiresAt: _leaseExpiresAt,
    ...withoutLease
  } = job;

  void _leaseOwner;
  void _leaseToken;
  void _leaseExpiresAt;
  return withoutLease;
}

function isDue(iso: string | undefined, nowMillis: number): boolean {
  if (iso === undefined) return false;
  try {
    return parseIsoToEpochMillis(iso) <= nowMillis;
  } catch {
    return false;
  }
}

export function createInMemoryUsageJobStore(
  now: () => string = utcNowIso,
): UsageJobStore {
  const jobs = new Map<string, UsageReportJob>();

  function requireJob(jobId: string): UsageReportJob {
    const job = jobs.get(jobId);
    if (!job) {
      throw new UsageJobNotFoundError();
    }
    return job;
  }

  function requireLeasedJob(jobId: string, lease: UsageJobLease): UsageReportJob {
    const current = requireJob(jobId);
    if (
      current.leaseOwner !== lease.workerId ||
      current.leaseToken !== lease.leaseToken
    ) {
      throw new UsageJobLeaseError();
    }
    return current;
  }

  return {
    async enqueue(job: UsageReportJob): Promise<boolean> {
      for (const existing of jobs.values()) {
        if (existing.jobKey === job.jobKey) return false;
      }
      jobs.set(job.id, { ...job });
      return true;
    },

    async claimNext(input: UsageJobClaimInput): Promise<UsageReportJob | null> {
      const nowIso = now();
      const nowMillis = parseIsoToEpochMillis(nowIso);

      for (const [jobId, candidate] of jobs.entries()) {
        const claimable =
          (candidate.status === "queued" &&
            isDue(candidate.nextAttemptAt, nowMillis)) ||
          (candidate.status === "processing" &&
            isDue(candidate.leaseExpiresAt, nowMillis));

        if (!claimable) continue;

        const claimed: UsageReportJob = {
          ...candidate,
          status: "processing",
          updatedAt: nowIso,
          leaseOwner: input.workerId,
          leaseToken: input.leaseToken,
          leaseExpiresAt: addSecondsToIso(nowIso, input.leaseSeconds),
        };

        jobs.set(jobId, claimed);
        return { ...claimed };
      }

      return null;
    },

    async renewLease(
      jobId: string,
      lease: UsageJobLease,
      leaseSeconds: number,
    ): Promise<void> {
      const current = requireLeasedJob(jobId, lease);
      const nowIso = now();
      jobs.set(jobId, {
        ...current,
        leaseExpiresAt: addSecondsToIso(nowIso, leaseSeconds),
        updatedAt: nowIso,
      });
    },

    async get(jobId: string): Promise<UsageReportJob | null> {
      const job = jobs.get(jobId);
      return job ? { ...job } : null;
    },

    async markCompleted(
      jobId: string,
      quantity: number,
      lease: UsageJobLease,
    ): Promise<void> {
      const current = requireLeasedJob(jobId, lease);
      jobs.set(jobId, {
        ...stripLeaseMetadata(current),
        status: "completed",
        quantity,
        updatedAt: now(),
      });
    },

    async markRetry(
      jobId: string,
      reason: string,
      nextAttemptAt: string,
      attemptCount: number,
      lease: UsageJobLease,
    ): Promise<void> {
      const current = requireLeasedJob(jobId, lease);
      jobs.set(jobId, {
        ...stripLeaseMetadata(current),
        status: "queued",
        reason,
        lastError: reason,
        attemptCount,
        nextAttemptAt,
        updatedAt: now(),
      });
    },

    async markDeadLetter(
      jobId: string,
      reason: string,
      lease: UsageJobLease,
    ): Promise<void> {
      const current = requireLeasedJob(jobId, lease);
      const deadLetteredAt = now();
      jobs.set(jobId, {
        ...stripLeaseMetadata(current),
        status: "failed",
        reason,
        lastError: reason,
        deadLetteredAt,
        updatedAt: deadLetteredAt,
      });
    },
  };
}

export interface ScheduleDailyUsageInput {
  date?: string | undefined;
}

export interface ScheduleDailyUsageResult {
  usageDate: string;
  scheduled: string[];
  skipped: number;
}

/**
 * Enqueues one report job per metered organization for a UTC day, by
 * default yesterday. Jobs are keyed by organization and date, so running
 * the schedule twice for the same day enqueues nothing new.
 */
export async function scheduleDailyUsageForAllMeteredOrganizations(
  deps: Pick<
    UsageUseCaseDeps,
    | "billingRecords"
    | "planCatalog"
    | "usageJobStore"
    | "logger"
    | "jobObserver"
    | "now"
    | "generateId"
  >,
  input: ScheduleDailyUsageInput = {},
): Promise<ScheduleDailyUsageResult> {
  const nowIso = resolveNow(deps);
  const usageDate = input.date ?? previousUtcDate(nowIso);

  if (!isUtcDateString(usageDate)) {
    throw new ValidationError("Usage date must be formatted as YYYY-MM-DD", {
      date: usageDate,
    });
  }

  const observer = deps.jobObserver ?? noopUsageJobObserver;
  const meteredPlanKeys = new Set(
    (await deps.planCatalog.list())
      .filter((plan) => plan.isMetered)
      .map((plan) => plan.key),
  );

  const scheduled: string[] = [];
  let skipped = 0;

  for (const record of await deps.billingRecords.listMeteredCandidates()) {
    if (
      record.planKey === null ||
      !meteredPlanKeys.has(record.planKey) ||
      record.providerSubscriptionItemId === null
    ) {
      skipped += 1;
      continue;
    }

    const job: UsageReportJob = {
      id: resolveId(deps),
      status: "queued",
      jobKey: buildUsageJobKey(record.organizationId, usageDate),
      organizationId: record.organizationId,
      usageDate,
      createdAt: nowIso,
      updatedAt: nowIso,
      attemptCount: 0,
      maxAttempts: DEFAULT_MAX_ATTEMPTS,
      nextAttemptAt: nowIso,
    };

    if (!(await deps.usageJobStore.enqueue(job))) {
      skipped += 1;
      continue;
    }

    scheduled.push(job.id);
    await notifyObserver(deps.logger, "job_enqueued", () =>
      observer.onJobEnqueued?.(job),
    );
  }

  deps.logger.info("Daily usage scheduled", {
    usageDate,
    scheduled: scheduled.length,
    skipped,
  });

  return { usageDate, scheduled, skipped };
}

export interface ProcessNextUsageReportJobInput {
  lease?: UsageJobClaimInput;
  heartbeatSeconds?: number;
  attemptTimeoutSeconds?: number;
}

export type ProcessNextUsageReportJobResult =
  | { status: "no_job" }
  | { status: "processed"; jobId: string; quantity: number; skipped: boolean }
  | {
      status: "retry_scheduled";
      jobId: string;
      reason: string;
      nextAttemptAt: string;
    }
  | { status: "failed"; jobId: string; reason: string };

async function withAttemptTimeout<T>(
  work: Promise<T>,
  timeoutSeconds: number,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | null = null;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(
        new ProviderUnavailableError(
          `Usage report timed out after ${timeoutSeconds}s`,
        ),
      );
    }, timeoutSeconds * 1000);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer !== null) clearTimeout(timer);
  }
}

type ReportOutcome =
  | { kind: "reported"; event: UsageReportedEvent }
  | { kind: "skipped"; reason: string };

async function reportUsageForJob(
  deps: UsageUseCaseDeps,
  job: UsageReportJob,
  attemptTimeoutSeconds: number,
): Promise<ReportOutcome> {
  const record = await deps.billingRecords.get(job.organizationId);
  const subscriptionItemId = record?.providerSubscriptionItemId ?? null;

  // cancelled since scheduling; nothing left to meter
  if (subscriptionItemId === null) {
    return { kind: "skipped", reason: "No subscription item on file" };
  }

  const idempotencyKey = buildUsageIdempotencyKey(
    subscriptionItemId,
    job.usageDate,
  );

  const { response } = await executeIdempotent({
    scope: "usage.report",
    key: idempotencyKey,
    payload: { organizationId: job.organizationId, usageDate: job.usageDate },
    store: deps.reportIdempotencyStore,
    // a crashed attempt leaves "processing" behind; its timeout bounds it
    staleAfterSeconds: attemptTimeoutSeconds,
    ...(deps.now !== undefined ? { now: deps.now } : {}),
    execute: async () => {
      const { startIso, endIso } = utcDayRange(job.usageDate);
      const quantity = await deps.usageSource.countEvents(
        job.organizationId,
        startIso,
        endIso,
      );

      if (quantity === null) {
        throw new UsageDataUnavailableError(
          `Event usage for ${job.usageDate} is unavailable`,
          { organizationId: job.organizationId },
        );
      }

      await withAttemptTimeout(
        deps.provider.reportUsage({
          subscriptionItemId,
          quantity,
          timestamp: startIso,
          idempotencyKey,
        }),
        attemptTimeoutSeconds,
      );

      return {
        organizationId: job.organizationId,
        subscriptionItemId,
        usageDate: job.usageDate,
        quantity,
        idempotencyKey,
        reportedAt: resolveNow(deps),
      };
    },
  });

  return { kind: "reported", event: response };
}

export async function processNextUsageReportJob(
  deps: UsageUseCaseDeps,
  input?: ProcessNextUsageReportJobInput,
): Promise<ProcessNextUsageReportJobResult> {
  const lease = input?.lease ?? {
    workerId: "worker-default",
    leaseToken: resolveId(deps),
    leaseSeconds: DEFAULT_LEASE_SECONDS,
  };
  const heartbeatSeconds = input?.heartbeatSeconds;
  const attemptTimeoutSeconds =
    input?.attemptTimeoutSeconds ?? DEFAULT_ATTEMPT_TIMEOUT_SECONDS;
  const leaseRef: UsageJobLease = {
    workerId: lease.workerId,
    leaseToken: lease.leaseToken,
  };

  const job = await deps.usageJobStore.claimNext(lease);
  const observer = deps.jobObserver ?? noopUsageJobObserver;

  if (!job) {
    return { status: "no_job" };
  }

  await notifyObserver(deps.logger, "job_claimed", () =>
    observer.onJobClaimed?.(job),
  );
  let leaseRenewalError: Error | null = null;
  let heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  if (
    heartbeatSeconds !== undefined &&
    Number.isFinite(heartbeatSeconds) &&
    heartbeatSeconds > 0
  ) {
    heartbeatTimer = setInterval(() => {
      void deps.usageJobStore
        .renewLease(job.id, leaseRef, lease.leaseSeconds)
        .catch((error: unknown) => {
          if (leaseRenewalError !== null) {
            return;
          }

          leaseRenewalError =
            error instanceof Error
              ? error
              : new Error("Unexpected lease renewal failure");
        });
    }, heartbeatSeconds * 1000);
    heartbeatTimer.unref?.();
  }

  try {
    const outcome = await reportUsageForJob(deps, job, attemptTimeoutSeconds);

    if (leaseRenewalError) {
      throw leaseRenewalError;
    }

    const quantity = outcome.kind === "reported" ? outcome.event.quantity : 0;
    await deps.usageJobStore.markCompleted(job.id, quantity, leaseRef);
    await notifyObserver(deps.logger, "job_completed", () =>
      observer.onJobCompleted?.(job, quantity),
    );

    if (outcome.kind === "skipped") {
      deps.logger.info("Usage report skipped", {
        jobId: job.id,
        organizationId: job.organizationId,
        reason: outcome.reason,
      });
    }

    return {
      status: "processed",
      jobId: job.id,
      quantity,
      skipped: outcome.kind === "skipped",
    };
  } catch (error) {
    if (error instanceof UsageJobLeaseError) {
      return {
        status: "failed",
        jobId: job.id,
        reason: error.message,
      };
    }

    const reason = describeError(error, "Unexpected usage report failure");
    const nextAttempt = job.attemptCount + 1;

    if (nextAttempt < job.maxAttempts) {
      const nextAttemptAt = addSecondsToIso(
        resolveNow(deps),
        computeRetryDelaySeconds(nextAttempt),
      );

      try {
        await deps.usageJobStore.markRetry(
          job.id,
          reason,
          nextAttemptAt,
          nextAttempt,
          leaseRef,
        );
      } catch (markRetryError) {
        if (markRetryError instanceof UsageJobLeaseError) {
          return {
            status: "failed",
            jobId: job.id,
            reason: markRetryError.message,
          };
        }
        throw markRetryError;
      }

      deps.logger.warn("Usage report failed, retry scheduled", {
        jobId: job.id,
        organizationId: job.organizationId,
        attempt: nextAttempt,
        nextAttemptAt,
        reason,
      });
      await notifyObserver(deps.logger, "job_retry_scheduled", () =>
        observer.onJobRetryScheduled?.(job, reason, nextAttemptAt, nextAttempt),
      );

      return {
        status: "retry_scheduled",
        jobId: job.id,
        reason,
        nextAttemptAt,
      };
    }

    try {
      await deps.usageJobStore.markDeadLetter(job.id, reason, leaseRef);
    } catch (markDeadLetterError) {
      if (markDeadLetterError instanceof UsageJobLeaseError) {
        return {
          status: "failed",
          jobId: job.id,
          reason: markDeadLetterError.message,
        };
      }
      throw markDeadLetterError;
    }

    deps.logger.error("Usage report dead-lettered", {
      jobId: job.id,
      organizationId: job.organizationId,
      usageDate: job.usageDate,
      attempts: nextAttempt,
      reason,
    });
    await notifyObserver(deps.logger, "job_dead_lettered", () =>
      observer.onJobDeadLettered?.(job, reason),
    );

    return {
      status: "failed",
      jobId: job.id,
      reason,
    };
  } finally {
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer);
    }
  }
}
