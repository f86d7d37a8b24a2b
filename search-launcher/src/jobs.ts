import { randomUUID } from "node:crypto";
import { openAll, isOpenable, type OpenAllOptions } from "./dispatcher";
import { errorMessage } from "./errors";
import type { BrowserOpener, SearchRecord } from "./types";

export type DispatchJob = {
  id: string;
  status: "pending" | "running" | "completed" | "failed";
  total: number; // records with an openable url
  opened: number;
  failed: number;
  error?: string;
  createdAt: string;
  finishedAt?: string;
};

export type DispatchJobsOptions = Omit<OpenAllOptions, "onEvent"> & {
  /** Finished jobs kept for polling; older ones are dropped first. */
  maxFinished?: number;
};

export const MAX_FINISHED_JOBS = 50;

/**
 * In-memory store of batch-open jobs. `start` returns immediately; the batch
 * runs on its own and the caller polls `get` for progress. A started job
 * cannot be cancelled; only the latest `maxFinished` finished jobs are kept.
 */
export class DispatchJobs {
  private readonly jobs = new Map<string, DispatchJob>();
  private readonly running = new Map<string, Promise<DispatchJob>>();

  private readonly maxFinished: number;
  private readonly options: Omit<OpenAllOptions, "onEvent">;

  constructor(private readonly opener: BrowserOpener, options: DispatchJobsOptions = {}) {
    const { maxFinished = MAX_FINISHED_JOBS, ...openOptions } = options;
    this.maxFinished = maxFinished;
    this.options = openOptions;
  }

  start(records: readonly SearchRecord[], delayMs: number): DispatchJob {
    const job: DispatchJob = {
      id: randomUUID(),
      status: "pending",
      total: records.filter(isOpenable).length,
      opened: 0,
      failed: 0,
      createdAt: new Date().toISOString(),
    };
    this.jobs.set(job.id, job);

    const snapshot = [...records];
    const run = Promise.resolve()
      .then(() => {
        job.status = "running";
        return openAll(snapshot, delayMs, this.opener, {
          ...this.options,
          onEvent: (event) => {
            if (event.status === "opened") job.opened++;
            if (event.status === "failed") job.failed++;
          },
        });
      })
      .then((opened) => {
        job.opened = opened;
        job.status = "completed";
        return job;
      })
      .catch((err: unknown) => {
        job.status = "failed";
        job.error = errorMessage(err);
        return job;
      })
      .finally(() => {
        job.finishedAt = new Date().toISOString();
        this.running.delete(job.id);
        this.prune();
      });

    this.running.set(job.id, run);
    return { ...job };
  }

  private prune(): void {
    const finished = [...this.jobs.values()].filter((job) => job.finishedAt !== undefined);
    for (const job of finished.slice(0, Math.max(0, finished.length - this.maxFinished))) {
      this.jobs.delete(job.id);
    }
  }

  get(id: string): DispatchJob | undefined {
    const job = this.jobs.get(id);
    return job ? { ...job } : undefined;
  }

  /** Resolves once the job has finished; resolves right away for unknown or finished jobs. */
  async wait(id: string): Promise<DispatchJob | undefined> {
    await this.running.get(id);
    return this.get(id);
  }

  list(): DispatchJob[] {
    return [...this.jobs.values()].map((job) => ({ ...job }));
  }
}
