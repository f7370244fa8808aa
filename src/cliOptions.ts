import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import {
  DISPATCH_MODES,
  type DiagramConfigOverrides,
  IMAGE_FORMATS,
  LOG_LEVELS,
  PROCESS_LAYOUTS,
} from "./config/diagramConfig.js";
import { DIAGRAM_FAMILIES, type DiagramFamily } from "./jobs/types.js";

export interface CliOptions {
  /** `null` when `--help` was requested. */
  readonly datasetPath: string | null;
  readonly overrides: DiagramConfigOverrides;
  readonly families: readonly DiagramFamily[] | null;
  readonly help: boolean;
}

/** Raised for unknown flags, missing values and malformed values. */
export class CliUsageError extends Error {
  public readonly code = "E-CLI-USAGE";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `Usage: energy-diagrams <dataset.json> [options]

Options:
  --format <fmt>          image format (${IMAGE_FORMATS.join(", ")})
  --output <dir>          directory receiving images_<dataset>/
  --concurrency <n>       maximum number of jobs running at once
  --sequential            run jobs one after another
  --mode <mode>           ${DISPATCH_MODES.join(", ")}
  --timeout-ms <ms>       per-job deadline, 0 disables it
  --threshold <value>     smallest flow drawn as in use
  --renderer <command>    Graphviz executable (default: dot)
  --layout <layout>       process diagram layout (${PROCESS_LAYOUTS.join(", ")})
  --show-capacity         print capacities on process diagrams
  --no-splines            draw straight edges
  --families <list>       comma separated subset of ${DIAGRAM_FAMILIES.join(", ")}
  --log-level <level>     ${LOG_LEVELS.join(", ")}
  --log-file <path>       mirror log entries to a file
  --help                  print this message
`;

const FLAG_WITH_VALUE = new Set([
  "--format",
  "--output",
  "--concurrency",
  "--timeout-ms",
  "--threshold",
  "--renderer",
  "--layout",
  "--families",
  "--log-level",
  "--log-file",
  "--mode",
]);

function parseChoice<T extends string>(value: string, allowed: readonly T[], flag: string): T {
  const normalised = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalised);
  if (match === undefined) {
    throw new CliUsageError(`${flag} must be one of ${allowed.join(", ")}; received '${value}'.`);
  }
  return match;
}

function parseInteger(value: string, flag: string, min: number): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < min) {
    throw new CliUsageError(`${flag} must be an integer >= ${min}; received '${value}'.`);
  }
  return num;
}

function parseNonNegative(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isFinite(num) || num < 0) {
    throw new CliUsageError(`${flag} must be a non-negative number; received '${value}'.`);
  }
  return num;
}

function parseFamilies(value: string): DiagramFamily[] {
  const families = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => parseChoice(entry, DIAGRAM_FAMILIES, "--families"));
  if (families.length === 0) {
    throw new CliUsageError("--families requires at least one family.");
  }
  return families;
}

/**
 * Parses `process.argv.slice(2)`. Flags accept `--flag value` and
 * `--flag=value`; the first bare argument is the dataset path.
 */
export function parseCliOptions(argv: readonly string[], cwd: string = process.cwd()): CliOptions {
  const overrides: DiagramConfigOverrides = {};
  let datasetPath: string | null = null;
  let families: DiagramFamily[] | null = null;
  let help = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      if (datasetPath !== null) {
        throw new CliUsageError(`unexpected argument '${arg}': only one dataset can be given.`);
      }
      datasetPath = path.resolve(cwd, arg);
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const inlineValue = separator === -1 ? undefined : arg.slice(separator + 1);
    let value = inlineValue ?? "";
    if (FLAG_WITH_VALUE.has(flag) && inlineValue === undefined) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliUsageError(`${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--help":
        help = true;
        break;
      case "--format":
        overrides.imageFormat = parseChoice(value, IMAGE_FORMATS, flag);
        break;
      case "--output":
        overrides.outputRoot = path.resolve(cwd, value);
        break;
      case "--concurrency":
        overrides.concurrency = parseInteger(value, flag, 1);
        break;
      case "--sequential":
        overrides.mode = "sequential";
        break;
      case "--timeout-ms":
        overrides.jobTimeoutMs = parseInteger(value, flag, 0);
        break;
      case "--threshold":
        overrides.significanceThreshold = parseNonNegative(value, flag);
        break;
      case "--renderer":
        overrides.rendererCommand = value;
        break;
      case "--layout":
        overrides.processLayout = parseChoice(value, PROCESS_LAYOUTS, flag);
        break;
      case "--show-capacity":
        overrides.showCapacity = true;
        break;
      case "--no-splines":
        overrides.splines = false;
        break;
      case "--families":
        families = parseFamilies(value);
        break;
      case "--log-level":
        overrides.logLevel = parseChoice(value, LOG_LEVELS, flag);
        break;
      case "--log-file":
        overrides.logFile = path.resolve(cwd, value);
        break;
      case "--mode":
        overrides.mode = parseChoice(value, DISPATCH_MODES, flag);
        break;
      default:
        throw new CliUsageError(`unknown option '${flag}'.`);
    }
  }

  if (datasetPath === null && !help) {
    throw new CliUsageError("a dataset path is required.");
  }

  return { datasetPath, overrides, families, help };
}
