import type { DiagramConfig } from "../config/diagramConfig.js";
import type { EnergySystemModel } from "../domain/types.js";
import type { RunLayout } from "../output/runLayout.js";
import type { DiagramRenderer, RenderResult } from "../render/renderer.js";

/** Diagram families produced for one dataset. */
export const DIAGRAM_FAMILIES = [
  "complete_system",
  "main_model",
  "commodity",
  "process",
  "period_results",
  "tech_results",
  "flow_segments",
  "commodity_results",
] as const;
export type DiagramFamily = (typeof DIAGRAM_FAMILIES)[number];

/** Domain identifiers a job addresses, e.g. `{ carrier: "ELC", period: "2020" }`. */
export type ScopeKey = Readonly<Record<string, string>>;

/** Read-only inputs shared by every job of a batch, plus the job's own signal. */
export interface DiagramJobContext {
  readonly model: EnergySystemModel;
  readonly config: DiagramConfig;
  readonly layout: RunLayout;
  readonly renderer: DiagramRenderer;
  /** Fires when the job's deadline elapses. */
  readonly signal: AbortSignal;
}

export type RenderFailure = Extract<RenderResult, { ok: false }>;

/** What a job reports back when it returns normally. */
export type JobRunResult =
  | { readonly status: "succeeded"; readonly artifactPath: string; readonly imagePath: string }
  | { readonly status: "skipped"; readonly reason: string }
  | {
      readonly status: "renderer_failed";
      readonly artifactPath: string;
      readonly imagePath: string;
      readonly failure: RenderFailure;
    }
  | { readonly status: "write_failed"; readonly artifactPath: string; readonly error: Error };

/** One independent unit of work: one scope, one artifact, one renderer call. */
export interface DiagramJob {
  /** Unique within a batch, e.g. `commodity:ELC`. */
  readonly id: string;
  readonly family: DiagramFamily;
  readonly scope: ScopeKey;
  run(context: DiagramJobContext): Promise<JobRunResult>;
}
