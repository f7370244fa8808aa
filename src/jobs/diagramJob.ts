import { writeFile } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { DotDocument } from "../graph/dotDocument.js";
import type { ArtifactRef } from "./naming.js";
import { linkTo } from "./naming.js";
import type { DiagramFamily, DiagramJob, DiagramJobContext, JobRunResult, ScopeKey } from "./types.js";

/** Raised when a `.dot` artifact cannot be written; reported as `write_failed`. */
export class ArtifactWriteError extends Error {
  public readonly code = "E-ARTIFACT-WRITE";
  public readonly details: { artifactPath: string; cause: string };

  constructor(artifactPath: string, cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(`unable to write artifact '${artifactPath}': ${causeMessage}`);
    this.name = "ArtifactWriteError";
    this.details = { artifactPath, cause: causeMessage };
  }
}

/**
 * Writes one artifact in a single call.
 *
 * @throws {ArtifactWriteError} on any filesystem failure.
 */
export async function writeArtifact(artifactPath: string, contents: string, signal?: AbortSignal): Promise<void> {
  try {
    await writeFile(artifactPath, contents, { encoding: "utf8", ...(signal ? { signal } : {}) });
  } catch (error) {
    throw new ArtifactWriteError(artifactPath, error);
  }
}

/** Comment block written above every generated graph. */
export function artifactHeader(description: string, stem: string): string[] {
  return [
    "Generated by energy-diagrams. This is a Graphviz DOT description of",
    `${description}.`,
    "Graphviz turns it into an image, for example:",
    "",
    `  dot -Tsvg -o ${stem}.svg ${stem}.dot`,
  ];
}

/**
 * Shared pipeline of every diagram family: build the document, write
 * `<stem>.dot`, render `<stem>.<format>`. Subclasses only describe the
 * document; returning `null` from {@link build} marks the scope as empty and
 * nothing is written.
 */
export abstract class DotDiagramJob implements DiagramJob {
  readonly id: string;

  protected constructor(
    readonly family: DiagramFamily,
    readonly scope: ScopeKey,
    readonly artifact: ArtifactRef,
  ) {
    const scopeValues = Object.values(scope);
    this.id = scopeValues.length > 0 ? `${family}:${scopeValues.join("/")}` : family;
  }

  protected abstract build(context: DiagramJobContext): DotDocument | null;

  /** Reason recorded when {@link build} returns `null`. */
  protected get emptyReason(): string {
    return "no data for scope";
  }

  /** Link from this job's diagram to the image of another artifact. */
  protected link(context: DiagramJobContext, target: ArtifactRef): string {
    return linkTo(this.artifact.location, target, context.config.imageFormat);
  }

  async run(context: DiagramJobContext): Promise<JobRunResult> {
    const document = this.build(context);
    if (document === null) {
      return { status: "skipped", reason: this.emptyReason };
    }

    const { imageFormat } = context.config;
    const paths = context.layout.artifactPaths(this.artifact.location, this.artifact.stem, imageFormat);

    try {
      await writeArtifact(paths.dotPath, document.toString(), context.signal);
    } catch (error) {
      if (error instanceof ArtifactWriteError) {
        return { status: "write_failed", artifactPath: paths.dotPath, error };
      }
      throw error;
    }

    const rendered = await context.renderer.render({
      format: imageFormat,
      inputPath: paths.dotPath,
      outputPath: paths.imagePath,
      signal: context.signal,
    });
    if (!rendered.ok) {
      return { status: "renderer_failed", artifactPath: paths.dotPath, imagePath: paths.imagePath, failure: rendered };
    }
    return { status: "succeeded", artifactPath: paths.dotPath, imagePath: paths.imagePath };
  }
}
