#!/usr/bin/env node
import { realpathSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { CliUsageError, parseCliOptions, USAGE } from "./cliOptions.js";
import { type EnvSource } from "./config/env.js";
import { resolveDiagramConfig } from "./config/diagramConfig.js";
import { StructuredLogger } from "./logger.js";
import { runDiagramBatch } from "./runner.js";

/** Process exit codes of the command line entry point. */
export const EXIT_CODES = { clean: 0, fatal: 1, degraded: 2 } as const;

export interface CliIo {
  readonly env?: EnvSource;
  readonly cwd?: string;
  /** Receives usage text and fatal messages. */
  readonly writeError?: (text: string) => void;
  readonly writeOutput?: (text: string) => void;
  /** Aborting cancels the jobs not yet started. */
  readonly signal?: AbortSignal;
}

function describe(error: unknown): { name: string; code: string | null; message: string } {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : null;
    return { name: error.name, code, message: error.message };
  }
  return { name: "Error", code: null, message: String(error) };
}

/**
 * Runs one diagram batch from command line arguments and resolves with the
 * exit code: 0 when every job succeeded or was skipped, 2 when some job
 * failed, 1 when the run could not start.
 */
export async function main(argv: readonly string[], io: CliIo = {}): Promise<number> {
  const writeError = io.writeError ?? ((text: string) => process.stderr.write(text));
  const writeOutput = io.writeOutput ?? ((text: string) => process.stdout.write(text));

  let options;
  try {
    options = parseCliOptions(argv, io.cwd ?? process.cwd());
  } catch (error) {
    if (error instanceof CliUsageError) {
      writeError(`${error.message}\n\n${USAGE}`);
      return EXIT_CODES.fatal;
    }
    throw error;
  }
  if (options.help || options.datasetPath === null) {
    writeOutput(USAGE);
    return EXIT_CODES.clean;
  }

  let config;
  try {
    config = resolveDiagramConfig(options.overrides, io.env ?? process.env);
  } catch (error) {
    writeError(`${describe(error).message}\n`);
    return EXIT_CODES.fatal;
  }

  const logger = new StructuredLogger({ level: config.logLevel, logFile: config.logFile });
  try {
    const { report } = await runDiagramBatch({
      datasetPath: options.datasetPath,
      config,
      logger,
      ...(options.families ? { families: options.families } : {}),
      ...(io.signal ? { signal: io.signal } : {}),
    });
    return report.status === "clean" ? EXIT_CODES.clean : EXIT_CODES.degraded;
  } catch (error) {
    logger.error("run_failed", describe(error));
    return EXIT_CODES.fatal;
  } finally {
    await logger.flush();
  }
}

function canonicalPath(filePath: string): string {
  try {
    return realpathSync(filePath);
  } catch {
    return path.resolve(filePath);
  }
}

/**
 * Whether the script Node was started with is the module at `moduleUrl`.
 * Installed `bin` commands are symlinks, so both sides are compared after
 * resolving links.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  return canonicalPath(scriptPath) === canonicalPath(fileURLToPath(moduleUrl));
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  main(process.argv.slice(2), { signal: controller.signal }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${describe(error).message}\n`);
      process.exitCode = EXIT_CODES.fatal;
    },
  );
}
