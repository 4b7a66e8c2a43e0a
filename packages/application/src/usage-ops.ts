import type { UsageJobObserver, UsageReportJob } from "./usage.js";

type RuntimeJobState = "queued" | "processing" | "completed" | "dead_lettered";

export interface UsageOpsSnapshot {
  queueDepth: number;
  processingCount: number;
  completedCount: number;
  retryScheduledCount: number;
  deadLetterCount: number;
  reportedQuantity: number;
  terminalFailureRate: number;
}

export interface UsageOpsMonitor {
  observer: UsageJobObserver;
  snapshot(): UsageOpsSnapshot;
}

export function createInMemoryUsageOpsMonitor(): UsageOpsMonitor {
  const states = new Map<string, RuntimeJobState>();
  let retryScheduledCount = 0;
  let reportedQuantity = 0;

  const track =
    (state: RuntimeJobState) =>
    (job: UsageReportJob): void => {
      states.set(job.id, state);
    };

  const observer: UsageJobObserver = {
    onJobEnqueued: track("queued"),
    onJobClaimed: track("processing"),
    onJobCompleted(job, quantity) {
      reportedQuantity += quantity;
      states.set(job.id, "completed");
    },
    onJobRetryScheduled(job) {
      retryScheduledCount += 1;
      states.set(job.id, "queued");
    },
    onJobDeadLettered: track("dead_lettered"),
  };

  return {
    observer,
    snapshot(): UsageOpsSnapshot {
      const counts: Record<RuntimeJobState, number> = {
        queued: 0,
        processing: 0,
        completed: 0,
        dead_lettered: 0,
      };
      for (const state of states.values()) counts[state] += 1;

      const terminalTotal = counts.completed + counts.dead_lettered;

      return {
        queueDepth: counts.queued,
        processingCount: counts.processing,
        completedCount: counts.completed,
        retryScheduledCount,
        deadLetterCount: counts.dead_lettered,
        reportedQuantity,
        terminalFailureRate:
          terminalTotal === 0 ? 0 : counts.dead_lettered / terminalTotal,
      };
    },
  };
}
