import type { DiagramConfig } from "./config/diagramConfig.js";
import { type BatchReport, type DispatchTransition, Dispatcher, type JobOutcome } from "./dispatch/dispatcher.js";
import { loadEnergySystemSnapshot } from "./domain/snapshot.js";
import type { EnergySystemModel } from "./domain/types.js";
import { planDiagramJobs } from "./jobs/planner.js";
import type { DiagramFamily } from "./jobs/types.js";
import type { StructuredLogger } from "./logger.js";
import { prepareRunDirectory, type RunLayout } from "./output/runLayout.js";
import { type DiagramRenderer, RendererInvoker } from "./render/renderer.js";

export interface RunDiagramBatchOptions {
  /** Dataset the run is named after; loaded unless {@link model} is given. */
  readonly datasetPath: string;
  readonly config: DiagramConfig;
  readonly logger: StructuredLogger;
  /** Pre-loaded model; skips reading {@link datasetPath}. */
  readonly model?: EnergySystemModel;
  /** Defaults to a {@link RendererInvoker} built from the configuration. */
  readonly renderer?: DiagramRenderer;
  readonly families?: readonly DiagramFamily[];
  /** Aborting cancels the jobs not yet started. */
  readonly signal?: AbortSignal;
}

export interface DiagramBatchResult {
  readonly layout: RunLayout;
  readonly report: BatchReport;
}

function logOutcome(logger: StructuredLogger, outcome: JobOutcome): void {
  const payload = {
    job_id: outcome.jobId,
    family: outcome.family,
    scope: outcome.scope,
    status: outcome.status,
    duration_ms: outcome.durationMs,
  };
  switch (outcome.status) {
    case "succeeded":
      logger.info("job_succeeded", { ...payload, image_path: outcome.imagePath });
      return;
    case "skipped":
      logger.info("job_skipped", { ...payload, reason: outcome.reason });
      return;
    default:
      logger.error("job_failed", {
        ...payload,
        artifact_path: outcome.artifactPath,
        error: outcome.error,
      });
  }
}

function logTransition(logger: StructuredLogger, transition: DispatchTransition): void {
  if (transition.kind === "batch") {
    logger.debug("batch_state", { from: transition.from, to: transition.to });
    return;
  }
  if (transition.outcome) {
    logOutcome(logger, transition.outcome);
    return;
  }
  logger.debug("job_state", { job_id: transition.jobId, from: transition.from, to: transition.to });
}

/**
 * Full diagram run for one dataset: reset the run directory, plan one job per
 * scope, dispatch them and log a summary. Setup failures (dataset, run
 * directory) reject; job failures only degrade the report.
 */
export async function runDiagramBatch(options: RunDiagramBatchOptions): Promise<DiagramBatchResult> {
  const { config, logger } = options;
  const model = options.model ?? (await loadEnergySystemSnapshot(options.datasetPath));

  const layout = await prepareRunDirectory({ outputRoot: config.outputRoot, datasetPath: options.datasetPath });
  logger.info("run_directory_ready", { run_directory: layout.root });

  const jobs = planDiagramJobs(model, {
    processLayout: config.processLayout,
    ...(options.families ? { families: options.families } : {}),
  });
  logger.info("batch_planned", { jobs: jobs.length, concurrency: config.mode === "sequential" ? 1 : config.concurrency });

  const renderer =
    options.renderer ?? new RendererInvoker({ command: config.rendererCommand, timeoutMs: config.jobTimeoutMs });
  const dispatcher = new Dispatcher({
    concurrency: config.concurrency,
    mode: config.mode,
    jobTimeoutMs: config.jobTimeoutMs,
    onTransition: (transition) => logTransition(logger, transition),
    ...(options.signal ? { signal: options.signal } : {}),
  });

  const report = await dispatcher.dispatch(jobs, { model, config, layout, renderer });
  const summary = {
    status: report.status,
    run_directory: layout.root,
    duration_ms: report.durationMs,
    ...report.counts,
  };
  if (report.status === "clean") {
    logger.info("batch_complete", summary);
  } else {
    logger.warn("batch_complete", summary);
  }

  return { layout, report };
}
