export {
  ConfigurationError,
  DEFAULT_PALETTE,
  DEFAULT_SIGNIFICANCE_THRESHOLD,
  defaultDiagramConfig,
  DiagramConfigSchema,
  IMAGE_FORMATS,
  PROCESS_LAYOUTS,
  resolveDiagramConfig,
  type DiagramConfig,
  type DiagramConfigOverrides,
  type ImageFormat,
  type Palette,
  type ProcessLayout,
} from "./config/diagramConfig.js";
export {
  BatchCancelledError,
  dispatch,
  Dispatcher,
  JobTimeoutError,
  type BatchReport,
  type DispatchOptions,
  type DispatchTransition,
  type JobOutcome,
  type JobStatus,
} from "./dispatch/dispatcher.js";
export {
  DatasetValidationError,
  EnergySystemDatasetSchema,
  EnergySystemSnapshot,
  loadEnergySystemSnapshot,
  type EnergySystemDataset,
} from "./domain/snapshot.js";
export type { EmissionKey, EnergySystemModel, ProcessKey, TechVintage } from "./domain/types.js";
export { DotDocument, DotStatementError, DotSubgraph } from "./graph/dotDocument.js";
export { EdgeSet, GraphShapeError, NodeSet, type DotEdge, type DotNode } from "./graph/graphSet.js";
export {
  EMPTY_EDGES_PLACEHOLDER,
  EMPTY_NODES_PLACEHOLDER,
  formatAttributes,
  quoteId,
  renderEdges,
  renderNodes,
} from "./graph/serializer.js";
export { ArtifactWriteError, DotDiagramJob } from "./jobs/diagramJob.js";
export { CommodityJob, CommodityResultsJob, computeModelUsage } from "./jobs/commodityDiagrams.js";
export { planDiagramJobs, type PlanOptions } from "./jobs/planner.js";
export { ProcessJob } from "./jobs/processDiagram.js";
export { FlowSegmentsJob, PeriodResultsJob, TechResultsJob } from "./jobs/resultsDiagrams.js";
export { CompleteSystemJob, MainModelJob } from "./jobs/systemDiagrams.js";
export {
  DIAGRAM_FAMILIES,
  type DiagramFamily,
  type DiagramJob,
  type DiagramJobContext,
  type JobRunResult,
} from "./jobs/types.js";
export { StructuredLogger, type LogEntry, type LogLevel } from "./logger.js";
export { prepareRunDirectory, RunDirectoryError, RunLayout, runNameFor } from "./output/runLayout.js";
export { PathResolutionError } from "./paths.js";
export {
  RendererInvoker,
  type DiagramRenderer,
  type RenderRequest,
  type RenderResult,
} from "./render/renderer.js";
export { runDiagramBatch, type DiagramBatchResult, type RunDiagramBatchOptions } from "./runner.js";
