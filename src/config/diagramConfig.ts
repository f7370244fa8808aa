import { availableParallelism } from "node:os";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { z } from "zod";

import {
  type EnvSource,
  readOptionalBool,
  readOptionalEnum,
  readOptionalInt,
  readOptionalNumber,
  readOptionalString,
} from "./env.js";
import { omitUndefinedEntries } from "../utils/object.js";

/** Image formats handed to the renderer through `-T<format>`. */
export const IMAGE_FORMATS = ["svg", "png", "pdf", "gif", "jpg", "ps"] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

/** Layout strategies available for the per-technology diagrams. */
export const PROCESS_LAYOUTS = ["separate_vintages", "explicit_vintages"] as const;
export type ProcessLayout = (typeof PROCESS_LAYOUTS)[number];

/** Execution strategies understood by the dispatcher. */
export const DISPATCH_MODES = ["parallel", "sequential"] as const;
export type DispatchMode = (typeof DISPATCH_MODES)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

/** Magnitudes below this value are drawn as unused edges. */
export const DEFAULT_SIGNIFICANCE_THRESHOLD = 0.005;
/** Deadline granted to a single diagram job, renderer included. */
export const DEFAULT_JOB_TIMEOUT_MS = 120_000;
const MAX_JOB_TIMEOUT_MS = 3_600_000;

/** Colours used by the DOT templates. Names follow the Graphviz X11 scheme. */
export const PaletteSchema = z
  .object({
    tech: z.string().min(1),
    commodity: z.string().min(1),
    unused: z.string().min(1),
    arrowOut: z.string().min(1),
    arrowIn: z.string().min(1),
    usedFont: z.string().min(1),
    unusedFont: z.string().min(1),
    home: z.string().min(1),
    processInputCarrier: z.string().min(1),
    processOutputCarrier: z.string().min(1),
    clusterBackground: z.string().min(1),
    clusterNode: z.string().min(1),
    flowArrow: z.string().min(1),
    rainbow: z.array(z.string().min(1)).min(1, "rainbow palette must hold at least one colour"),
  })
  .strict();

export type Palette = z.infer<typeof PaletteSchema>;

export const DEFAULT_PALETTE: Palette = {
  tech: "darkseagreen",
  commodity: "lightsteelblue",
  unused: "powderblue",
  arrowOut: "forestgreen",
  arrowIn: "firebrick",
  usedFont: "black",
  unusedFont: "chocolate",
  home: "gray75",
  processInputCarrier: "lightsteelblue",
  processOutputCarrier: "lawngreen",
  clusterBackground: "lightgrey",
  clusterNode: "white",
  flowArrow: "forestgreen",
  rainbow: [
    "red",
    "orange",
    "gold",
    "green",
    "blue",
    "purple",
    "hotpink",
    "cyan",
    "burlywood",
    "coral",
    "limegreen",
    "black",
    "brown",
  ],
};

export const DiagramConfigSchema = z
  .object({
    imageFormat: z.enum(IMAGE_FORMATS),
    outputRoot: z.string().min(1).refine((value) => path.isAbsolute(value), {
      message: "outputRoot must be an absolute path",
    }),
    concurrency: z.number().int().positive(),
    mode: z.enum(DISPATCH_MODES),
    jobTimeoutMs: z.number().int().nonnegative().max(MAX_JOB_TIMEOUT_MS),
    significanceThreshold: z.number().finite().nonnegative(),
    rendererCommand: z.string().trim().min(1),
    processLayout: z.enum(PROCESS_LAYOUTS),
    splines: z.boolean(),
    showCapacity: z.boolean(),
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.string().min(1).nullable(),
    palette: PaletteSchema,
  })
  .strict();

/** Validated configuration shared read-only by every job of a batch. */
export type DiagramConfig = z.infer<typeof DiagramConfigSchema>;

/** Overrides accepted by {@link resolveDiagramConfig}; the palette merges per colour. */
export type DiagramConfigOverrides = Partial<Omit<DiagramConfig, "palette">> & {
  readonly palette?: Partial<Palette>;
};

/** Raised when the merged configuration fails validation. */
export class ConfigurationError extends Error {
  public readonly code = "E-CONFIG-INVALID";
  public readonly details: { issues: Array<{ path: string; message: string }> };

  constructor(issues: Array<{ path: string; message: string }>) {
    super(`invalid diagram configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`);
    this.name = "ConfigurationError";
    this.details = { issues };
  }
}

/**
 * Reads the `DIAGRAMS_*` variables. Unset or unparsable variables are left
 * out so the defaults apply.
 */
export function readDiagramConfigFromEnv(env: EnvSource = process.env): DiagramConfigOverrides {
  const outputRoot = readOptionalString("DIAGRAMS_OUTPUT_ROOT", env);
  const logFile = readOptionalString("DIAGRAMS_LOG_FILE", env);

  return omitUndefinedEntries({
    imageFormat: readOptionalEnum("DIAGRAMS_IMAGE_FORMAT", IMAGE_FORMATS, env),
    outputRoot: outputRoot ? path.resolve(outputRoot) : undefined,
    concurrency: readOptionalInt("DIAGRAMS_CONCURRENCY", { min: 1 }, env),
    mode: readOptionalEnum("DIAGRAMS_MODE", DISPATCH_MODES, env),
    jobTimeoutMs: readOptionalInt("DIAGRAMS_JOB_TIMEOUT_MS", { min: 0, max: MAX_JOB_TIMEOUT_MS }, env),
    significanceThreshold: readOptionalNumber("DIAGRAMS_SIGNIFICANCE_THRESHOLD", { min: 0 }, env),
    rendererCommand: readOptionalString("DIAGRAMS_RENDERER", env),
    processLayout: readOptionalEnum("DIAGRAMS_PROCESS_LAYOUT", PROCESS_LAYOUTS, env),
    splines: readOptionalBool("DIAGRAMS_SPLINES", env),
    showCapacity: readOptionalBool("DIAGRAMS_SHOW_CAPACITY", env),
    logLevel: readOptionalEnum("DIAGRAMS_LOG_LEVEL", LOG_LEVELS, env),
    logFile: logFile ? path.resolve(logFile) : undefined,
  });
}

/** Built-in defaults, resolved against the current process. */
export function defaultDiagramConfig(): DiagramConfig {
  return {
    imageFormat: "svg",
    outputRoot: path.resolve(process.cwd()),
    concurrency: Math.max(1, availableParallelism()),
    mode: "parallel",
    jobTimeoutMs: DEFAULT_JOB_TIMEOUT_MS,
    significanceThreshold: DEFAULT_SIGNIFICANCE_THRESHOLD,
    rendererCommand: "dot",
    processLayout: "separate_vintages",
    splines: true,
    showCapacity: false,
    logLevel: "info",
    logFile: null,
    palette: { ...DEFAULT_PALETTE, rainbow: [...DEFAULT_PALETTE.rainbow] },
  };
}

/**
 * Merges explicit overrides over the environment over the defaults and
 * validates the result.
 *
 * @throws {ConfigurationError} when a merged field is invalid.
 */
export function resolveDiagramConfig(
  overrides: DiagramConfigOverrides = {},
  env: EnvSource = process.env,
): DiagramConfig {
  const defaults = defaultDiagramConfig();
  const fromEnv = readDiagramConfigFromEnv(env);
  const candidate = {
    ...defaults,
    ...fromEnv,
    ...omitUndefinedEntries({ ...overrides, palette: undefined }),
    palette: { ...defaults.palette, ...omitUndefinedEntries({ ...overrides.palette }) },
  };

  const parsed = DiagramConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join(".") || "(root)", message: issue.message })),
    );
  }
  return parsed.data;
}
