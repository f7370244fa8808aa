import type { EdgeSet, NodeSet } from "./graphSet.js";

/** Placeholder emitted for a node section without members. */
export const EMPTY_NODES_PLACEHOLDER = "// no nodes in this section";
/** Placeholder emitted for an edge section without members. */
export const EMPTY_EDGES_PLACEHOLDER = "// no edges in this section";

export interface SerializeOptions {
  /** Number of tabs prefixed to every line but the first. Defaults to 1. */
  readonly indent?: number;
}

/**
 * Quotes a DOT identifier. Backslashes and quotes are escaped and line breaks
 * become the `\n` escape so an identifier can never end a statement early.
 */
export function quoteId(id: string): string {
  return `"${escapeDotString(id)}"`;
}

export function escapeDotString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/\r\n|\r|\n/g, "\\n")
    .replace(/"/g, '\\"');
}

/**
 * Builds an attribute list body (`color="red", href="x.svg"`) from a record.
 * Values are quoted and escaped; `undefined`/`null` entries are skipped and
 * key order is preserved.
 */
export function formatAttributes(attributes: Readonly<Record<string, string | number | null | undefined>>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined || value === null) {
      continue;
    }
    parts.push(`${key}="${escapeDotString(String(value))}"`);
  }
  return parts.join(", ");
}

/** Label text with a literal DOT line break between the given lines. */
export function multilineLabel(...lines: string[]): string {
  return lines.join("\n");
}

function joinLines(lines: Iterable<string>, indent: number): string {
  const unique = Array.from(new Set(lines));
  // Default sort compares UTF-16 code units, independent of locale.
  unique.sort();
  return unique.join(`\n${"\t".repeat(Math.max(0, Math.trunc(indent)))}`);
}

/**
 * Renders node statements, one per line, sorted by their full text.
 *
 * Attributed nodes are aligned: every quoted id is padded to the widest quoted
 * id among the attributed nodes so the brackets share a column.
 */
export function renderNodes(nodes: NodeSet, options: SerializeOptions = {}): string {
  if (nodes.isEmpty) {
    return EMPTY_NODES_PLACEHOLDER;
  }

  const entries = nodes.entries().map((node) => ({ quoted: quoteId(node.id), attributes: node.attributes }));
  let width = 0;
  for (const entry of entries) {
    if (entry.attributes !== null) {
      width = Math.max(width, entry.quoted.length);
    }
  }

  const lines = entries.map((entry) =>
    entry.attributes === null ? `${entry.quoted} ;` : `${entry.quoted.padEnd(width)} [ ${entry.attributes} ] ;`,
  );
  return joinLines(lines, options.indent ?? 1);
}

/**
 * Renders edge statements, one per line, sorted by their full text.
 *
 * Sources are padded to the widest quoted source; destinations of attributed
 * edges are padded to the widest quoted destination.
 */
export function renderEdges(edges: EdgeSet, options: SerializeOptions = {}): string {
  if (edges.isEmpty) {
    return EMPTY_EDGES_PLACEHOLDER;
  }

  const entries = edges.entries().map((edge) => ({
    source: quoteId(edge.source),
    destination: quoteId(edge.destination),
    attributes: edge.attributes,
  }));
  const sourceWidth = Math.max(...entries.map((entry) => entry.source.length));
  const destinationWidth = Math.max(...entries.map((entry) => entry.destination.length));

  const lines = entries.map((entry) =>
    entry.attributes === null
      ? `${entry.source.padEnd(sourceWidth)} -> ${entry.destination} ;`
      : `${entry.source.padEnd(sourceWidth)} -> ${entry.destination.padEnd(destinationWidth)} [ ${entry.attributes} ] ;`,
  );
  return joinLines(lines, options.indent ?? 1);
}
