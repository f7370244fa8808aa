import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { ErrnoException } from "../nodePrimitives.js";
import { baseNameWithoutExtension, resolveWithin, sanitizeFilename } from "../paths.js";

/** Sub-directories created inside every run directory. */
export const ARTIFACT_CATEGORIES = ["commodities", "processes", "results"] as const;
export type ArtifactCategory = (typeof ARTIFACT_CATEGORIES)[number];

/** Where an artifact lands: the run root itself or one of the category folders. */
export type ArtifactLocation = ArtifactCategory | "root";

export interface ArtifactPaths {
  /** Absolute path of the `.dot` source. */
  readonly dotPath: string;
  /** Absolute path of the rendered image. */
  readonly imagePath: string;
  /** Image path relative to the run root, used for cross-diagram links. */
  readonly relativeImagePath: string;
}

export interface PrepareRunDirectoryOptions {
  /** Absolute directory under which the run directory is created. */
  readonly outputRoot: string;
  /** Dataset the run is named after. */
  readonly datasetPath: string;
}

/** Raised when the run tree cannot be reset; no job starts after it. */
export class RunDirectoryError extends Error {
  public readonly code = "E-RUN-DIRECTORY";
  public readonly details: { runDirectory: string; operation: "remove" | "create"; cause: string | null };

  constructor(runDirectory: string, operation: "remove" | "create", cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : cause === undefined ? null : String(cause);
    super(`unable to ${operation} run directory '${runDirectory}'${causeMessage ? `: ${causeMessage}` : ""}`);
    this.name = "RunDirectoryError";
    const errno: ErrnoException | null = cause instanceof Error ? cause : null;
    this.details = { runDirectory, operation, cause: errno?.code ?? causeMessage };
  }
}

/** Absolute locations of one prepared run. */
export class RunLayout {
  readonly runName: string;
  readonly root: string;
  private readonly directories: Record<ArtifactLocation, string>;

  constructor(outputRoot: string, runName: string) {
    this.runName = runName;
    this.root = resolveWithin(outputRoot, runName);
    this.directories = {
      root: this.root,
      commodities: resolveWithin(this.root, "commodities"),
      processes: resolveWithin(this.root, "processes"),
      results: resolveWithin(this.root, "results"),
    };
  }

  directory(location: ArtifactLocation): string {
    return this.directories[location];
  }

  /**
   * Paths of the `.dot` source and rendered image for `stem`.
   *
   * @throws {PathResolutionError} when the stem resolves outside its directory.
   */
  artifactPaths(location: ArtifactLocation, stem: string, imageFormat: string): ArtifactPaths {
    const directory = this.directories[location];
    const dotPath = resolveWithin(directory, `${stem}.dot`);
    const imagePath = resolveWithin(directory, `${stem}.${imageFormat}`);
    return { dotPath, imagePath, relativeImagePath: this.relativeToRoot(imagePath) };
  }

  /** Relative link (forward slashes) from the run root to an absolute path inside it. */
  relativeToRoot(absolutePath: string): string {
    return path.relative(this.root, absolutePath).split(path.sep).join("/");
  }
}

/** `images_<dataset base name>`, sanitised for use as a directory name. */
export function runNameFor(datasetPath: string): string {
  return `images_${sanitizeFilename(baseNameWithoutExtension(datasetPath))}`;
}

/**
 * Removes any previous run directory for the dataset and recreates the empty
 * tree. Two consecutive calls leave the same empty tree behind.
 *
 * @throws {RunDirectoryError} when the tree cannot be removed or created.
 */
export async function prepareRunDirectory(options: PrepareRunDirectoryOptions): Promise<RunLayout> {
  const layout = new RunLayout(path.resolve(options.outputRoot), runNameFor(options.datasetPath));

  try {
    await rm(layout.root, { recursive: true, force: true });
  } catch (error) {
    throw new RunDirectoryError(layout.root, "remove", error);
  }

  try {
    await mkdir(layout.root, { recursive: true });
    for (const category of ARTIFACT_CATEGORIES) {
      await mkdir(layout.directory(category));
    }
  } catch (error) {
    throw new RunDirectoryError(layout.root, "create", error);
  }

  return layout;
}
