import { availableParallelism } from "node:os";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import pLimit from "p-limit";

import type { DispatchMode } from "../config/diagramConfig.js";
import type { DiagramFamily, DiagramJob, DiagramJobContext, JobRunResult, ScopeKey } from "../jobs/types.js";

/** Terminal states of a job. */
export const JOB_STATUSES = [
  "succeeded",
  "skipped",
  "renderer_failed",
  "write_failed",
  "failed",
  "timed_out",
  "cancelled",
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];
export type JobState = "pending" | "running" | JobStatus;
export type BatchState = "started" | "running" | "complete";

/** Statuses that make a batch `degraded`. */
const FAILURE_STATUSES: ReadonlySet<JobStatus> = new Set([
  "renderer_failed",
  "write_failed",
  "failed",
  "timed_out",
  "cancelled",
]);

export interface OutcomeError {
  readonly name: string;
  readonly code: string | null;
  readonly message: string;
  /** Renderer stderr, when the failure came from the renderer. */
  readonly stderr?: string;
}

export interface JobOutcome {
  readonly jobId: string;
  readonly family: DiagramFamily;
  readonly scope: ScopeKey;
  readonly status: JobStatus;
  readonly artifactPath: string | null;
  readonly imagePath: string | null;
  readonly error: OutcomeError | null;
  /** Why a job was skipped. */
  readonly reason: string | null;
  readonly durationMs: number;
}

export interface BatchReport {
  readonly status: "clean" | "degraded";
  /** One outcome per submitted job, in submission order. */
  readonly outcomes: readonly JobOutcome[];
  readonly counts: Readonly<Record<JobStatus, number>>;
  readonly durationMs: number;
}

export type DispatchTransition =
  | { readonly kind: "job"; readonly jobId: string; readonly from: JobState; readonly to: JobState; readonly outcome?: JobOutcome }
  | { readonly kind: "batch"; readonly from: BatchState | null; readonly to: BatchState };

export interface DispatchOptions {
  /** Maximum number of jobs executing at once. Defaults to the available parallelism. */
  readonly concurrency?: number;
  /** `sequential` runs one job at a time. */
  readonly mode?: DispatchMode;
  /** Per-job deadline; `0` or absent disables it. */
  readonly jobTimeoutMs?: number;
  /** Aborting cancels every job not yet admitted. Running jobs finish. */
  readonly signal?: AbortSignal;
  /** Receives every job and batch state change. Must not throw. */
  readonly onTransition?: (transition: DispatchTransition) => void;
  /** Millisecond clock used for durations. */
  readonly now?: () => number;
}

/** Abort reason of a job whose deadline elapsed. */
export class JobTimeoutError extends Error {
  public readonly code = "E-JOB-TIMEOUT";
  public readonly details: { jobId: string; timeoutMs: number };

  constructor(jobId: string, timeoutMs: number) {
    super(`job '${jobId}' exceeded its timeout of ${timeoutMs}ms`);
    this.name = "JobTimeoutError";
    this.details = { jobId, timeoutMs };
  }
}

/** Abort reason of a job cancelled before it started. */
export class BatchCancelledError extends Error {
  public readonly code = "E-BATCH-CANCELLED";

  constructor() {
    super("batch cancelled before the job started");
    this.name = "BatchCancelledError";
  }
}

/** Convenience alias describing the limiter returned by `p-limit`. */
type Limit = ReturnType<typeof pLimit>;

type Settled = { readonly kind: "result"; readonly result: JobRunResult } | { readonly kind: "error"; readonly error: unknown };

function describeError(error: unknown): OutcomeError {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : null;
    return { name: error.name, code, message: error.message };
  }
  return { name: "Error", code: null, message: String(error) };
}

function emptyCounts(): Record<JobStatus, number> {
  return { succeeded: 0, skipped: 0, renderer_failed: 0, write_failed: 0, failed: 0, timed_out: 0, cancelled: 0 };
}

/**
 * Runs independent diagram jobs behind a bounded admission gate and waits for
 * all of them. Every job ends in exactly one terminal state; a failing job
 * never stops its siblings and the returned promise never rejects because of
 * a job.
 */
export class Dispatcher {
  private readonly concurrency: number;
  private readonly jobTimeoutMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly onTransition: ((transition: DispatchTransition) => void) | undefined;
  private readonly now: () => number;

  constructor(options: DispatchOptions = {}) {
    const requested = options.concurrency ?? availableParallelism();
    this.concurrency = options.mode === "sequential" ? 1 : Math.max(1, Math.floor(requested));
    this.jobTimeoutMs = options.jobTimeoutMs && options.jobTimeoutMs > 0 ? options.jobTimeoutMs : 0;
    this.signal = options.signal;
    this.onTransition = options.onTransition;
    this.now = options.now ?? Date.now;
  }

  /** Effective bound on simultaneously running jobs. */
  get limit(): number {
    return this.concurrency;
  }

  async dispatch(jobs: readonly DiagramJob[], context: Omit<DiagramJobContext, "signal">): Promise<BatchReport> {
    const startedAt = this.now();
    this.emit({ kind: "batch", from: null, to: "started" });

    const limit: Limit = pLimit(this.concurrency);
    this.emit({ kind: "batch", from: "started", to: "running" });
    const outcomes = await Promise.all(jobs.map((job) => limit(() => this.runJob(job, context))));

    const counts = emptyCounts();
    for (const outcome of outcomes) {
      counts[outcome.status] += 1;
    }
    const degraded = outcomes.some((outcome) => FAILURE_STATUSES.has(outcome.status));
    this.emit({ kind: "batch", from: "running", to: "complete" });

    return {
      status: degraded ? "degraded" : "clean",
      outcomes,
      counts,
      durationMs: this.now() - startedAt,
    };
  }

  private async runJob(job: DiagramJob, context: Omit<DiagramJobContext, "signal">): Promise<JobOutcome> {
    const startedAt = this.now();
    const base = { jobId: job.id, family: job.family, scope: job.scope };

    if (this.signal?.aborted) {
      const outcome: JobOutcome = {
        ...base,
        status: "cancelled",
        artifactPath: null,
        imagePath: null,
        error: describeError(new BatchCancelledError()),
        reason: null,
        durationMs: 0,
      };
      this.emit({ kind: "job", jobId: job.id, from: "pending", to: "cancelled", outcome });
      return outcome;
    }

    this.emit({ kind: "job", jobId: job.id, from: "pending", to: "running" });

    const controller = new AbortController();
    let timer: NodeJS.Timeout | null = null;
    const deadline = new Promise<"timeout">((resolve) => {
      controller.signal.addEventListener("abort", () => resolve("timeout"), { once: true });
    });
    if (this.jobTimeoutMs > 0) {
      const timeoutMs = this.jobTimeoutMs;
      timer = setTimeout(() => controller.abort(new JobTimeoutError(job.id, timeoutMs)), timeoutMs);
    }

    let settled: Settled | "timeout";
    try {
      const running: Promise<Settled> = Promise.resolve()
        .then(() => job.run({ ...context, signal: controller.signal }))
        .then(
          (result): Settled => ({ kind: "result", result }),
          (error: unknown): Settled => ({ kind: "error", error }),
        );
      settled = await Promise.race([running, deadline]);
    } finally {
      if (timer !== null) {
        clearTimeout(timer);
      }
    }

    const durationMs = this.now() - startedAt;
    const outcome = this.toOutcome(base, settled, controller.signal, durationMs);
    this.emit({ kind: "job", jobId: job.id, from: "running", to: outcome.status, outcome });
    return outcome;
  }

  private toOutcome(
    base: Pick<JobOutcome, "jobId" | "family" | "scope">,
    settled: Settled | "timeout",
    signal: AbortSignal,
    durationMs: number,
  ): JobOutcome {
    const empty = { artifactPath: null, imagePath: null, error: null, reason: null, durationMs };

    if (settled === "timeout" || signal.reason instanceof JobTimeoutError) {
      return { ...base, ...empty, status: "timed_out", error: describeError(signal.reason) };
    }
    if (settled.kind === "error") {
      return { ...base, ...empty, status: "failed", error: describeError(settled.error) };
    }

    const { result } = settled;
    switch (result.status) {
      case "succeeded":
        return { ...base, ...empty, status: "succeeded", artifactPath: result.artifactPath, imagePath: result.imagePath };
      case "skipped":
        return { ...base, ...empty, status: "skipped", reason: result.reason };
      case "write_failed":
        return { ...base, ...empty, status: "write_failed", artifactPath: result.artifactPath, error: describeError(result.error) };
      case "renderer_failed":
        return {
          ...base,
          ...empty,
          status: "renderer_failed",
          artifactPath: result.artifactPath,
          imagePath: result.imagePath,
          error: {
            name: "RendererFailure",
            code: result.failure.reason,
            message: result.failure.message,
            stderr: result.failure.stderr,
          },
        };
    }
  }

  private emit(transition: DispatchTransition): void {
    this.onTransition?.(transition);
  }
}

/** One-shot helper around {@link Dispatcher}. */
export function dispatch(
  jobs: readonly DiagramJob[],
  context: Omit<DiagramJobContext, "signal">,
  options: DispatchOptions = {},
): Promise<BatchReport> {
  return new Dispatcher(options).dispatch(jobs, context);
}
