import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { ArtifactLocation } from "../output/runLayout.js";
import { encodeFilenameComponent } from "../paths.js";

/** Where one family writes the artifact of one scope. */
export interface ArtifactRef {
  readonly location: ArtifactLocation;
  readonly stem: string;
}

const id = encodeFilenameComponent;

/** Period part of a segments stem; a literal `v` would blur the `p<period>v<vintage>` boundary. */
function segmentPeriod(period: string): string {
  return id(period).replace(/v/g, "%76");
}

/**
 * Artifact names for every family. Jobs use these both for their own output
 * and for `href` links to sibling diagrams, so the two always agree.
 * Identifiers are encoded with {@link encodeFilenameComponent}, which never
 * emits `_`, so distinct scopes always get distinct stems.
 */
export const artifactRefs = {
  completeSystem: (): ArtifactRef => ({ location: "root", stem: "all_vintages_model" }),
  mainModel: (): ArtifactRef => ({ location: "root", stem: "simple_model" }),
  commodity: (carrier: string): ArtifactRef => ({ location: "commodities", stem: `commodity_${id(carrier)}` }),
  process: (tech: string): ArtifactRef => ({ location: "processes", stem: `process_${id(tech)}` }),
  periodResults: (period: string): ArtifactRef => ({ location: "results", stem: `results${id(period)}` }),
  techResults: (tech: string, period: string): ArtifactRef => ({
    location: "results",
    stem: `results_${id(tech)}_${id(period)}`,
  }),
  flowSegments: (tech: string, period: string, vintage: string): ArtifactRef => ({
    location: "results",
    stem: `results_${id(tech)}_p${segmentPeriod(period)}v${id(vintage)}_segments`,
  }),
  commodityResults: (carrier: string, period: string): ArtifactRef => ({
    location: "commodities",
    stem: `rc_${id(carrier)}_${id(period)}`,
  }),
} as const;

function directoryOf(location: ArtifactLocation): string {
  return location === "root" ? "/run" : `/run/${location}`;
}

/**
 * Relative link from a diagram in `from` to the rendered image of `target`,
 * e.g. `../processes/process_E01.svg` from `commodities`. The result is a
 * URL reference, so the `%` of encoded stems is itself escaped.
 */
export function linkTo(from: ArtifactLocation, target: ArtifactRef, imageFormat: string): string {
  const relativeDirectory = path.posix.relative(directoryOf(from), directoryOf(target.location));
  return path.posix.join(relativeDirectory, `${target.stem}.${imageFormat}`).replace(/%/g, "%25");
}

/** Two-decimal rendering used for every magnitude shown on a diagram. */
export function fixed2(value: number): string {
  return value.toFixed(2);
}
