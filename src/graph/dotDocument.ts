import type { EdgeSet, NodeSet } from "./graphSet.js";
import { escapeDotString, renderEdges, renderNodes } from "./serializer.js";

/** Attribute values accepted on graphs, subgraphs and default statements. */
export type DotAttributeValue = string | number | boolean;
export type DotAttributeMap = Readonly<Record<string, DotAttributeValue | null | undefined>>;

const BARE_ID = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Raised when a graph, subgraph or attribute name is not a valid DOT identifier. */
export class DotStatementError extends Error {
  public readonly code = "E-DOT-STATEMENT";
  public readonly details: { name: string; role: string };

  constructor(role: string, name: string) {
    super(`invalid ${role} name '${name}': expected [A-Za-z_][A-Za-z0-9_]*`);
    this.name = "DotStatementError";
    this.details = { name, role };
  }
}

function assertIdentifier(role: string, name: string): string {
  if (!BARE_ID.test(name)) {
    throw new DotStatementError(role, name);
  }
  return name;
}

function formatValue(value: DotAttributeValue): string {
  if (typeof value === "boolean") {
    return value ? '"True"' : '"False"';
  }
  return `"${escapeDotString(String(value))}"`;
}

/** Comment text is kept on one line so it cannot end the comment early. */
function commentText(text: string): string {
  return text.replace(/\r\n|\r|\n/g, " ");
}

function definedEntries(attributes: DotAttributeMap): Array<[string, DotAttributeValue]> {
  const entries: Array<[string, DotAttributeValue]> = [];
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined || value === null) {
      continue;
    }
    entries.push([assertIdentifier("attribute", key), value]);
  }
  return entries;
}

type ScopeItem =
  | { readonly kind: "nodes"; readonly set: NodeSet; readonly comment: string | null }
  | { readonly kind: "edges"; readonly set: EdgeSet; readonly comment: string | null }
  | { readonly kind: "subgraph"; readonly scope: DotSubgraph };

/**
 * Shared body of a graph or subgraph: attributes, default node/edge
 * statements and an ordered list of statement blocks and nested subgraphs.
 */
abstract class DotScope {
  private readonly graphAttributes: Array<[string, DotAttributeValue]> = [];
  private nodeDefaultAttributes: Array<[string, DotAttributeValue]> = [];
  private edgeDefaultAttributes: Array<[string, DotAttributeValue]> = [];
  private readonly items: ScopeItem[] = [];

  /** Appends `key = "value" ;` statements; later calls add after earlier ones. */
  attributes(attributes: DotAttributeMap): this {
    this.graphAttributes.push(...definedEntries(attributes));
    return this;
  }

  nodeDefaults(attributes: DotAttributeMap): this {
    this.nodeDefaultAttributes = definedEntries(attributes);
    return this;
  }

  edgeDefaults(attributes: DotAttributeMap): this {
    this.edgeDefaultAttributes = definedEntries(attributes);
    return this;
  }

  /** Appends the serialized node set, optionally preceded by a `//` comment. */
  nodes(set: NodeSet, comment?: string): this {
    this.items.push({ kind: "nodes", set, comment: comment ?? null });
    return this;
  }

  edges(set: EdgeSet, comment?: string): this {
    this.items.push({ kind: "edges", set, comment: comment ?? null });
    return this;
  }

  /** Appends a nested `subgraph <name> { ... }` populated by {@link build}. */
  subgraph(name: string, build: (subgraph: DotSubgraph) => void): this {
    const scope = new DotSubgraph(assertIdentifier("subgraph", name));
    build(scope);
    this.items.push({ kind: "subgraph", scope });
    return this;
  }

  /** Body lines at the given depth, without the enclosing braces. */
  protected renderBody(depth: number): string[] {
    const pad = "\t".repeat(depth);
    const groups: string[][] = [];

    if (this.graphAttributes.length > 0) {
      groups.push(this.graphAttributes.map(([key, value]) => `${pad}${key} = ${formatValue(value)} ;`));
    }

    const defaults: string[] = [];
    if (this.nodeDefaultAttributes.length > 0) {
      defaults.push(`${pad}node [ ${formatList(this.nodeDefaultAttributes)} ] ;`);
    }
    if (this.edgeDefaultAttributes.length > 0) {
      defaults.push(`${pad}edge [ ${formatList(this.edgeDefaultAttributes)} ] ;`);
    }
    if (defaults.length > 0) {
      groups.push(defaults);
    }

    for (const item of this.items) {
      if (item.kind === "subgraph") {
        groups.push([`${pad}subgraph ${item.scope.name} {`, ...item.scope.renderBody(depth + 1), `${pad}}`]);
        continue;
      }
      const text = item.kind === "nodes" ? renderNodes(item.set, { indent: depth }) : renderEdges(item.set, { indent: depth });
      const block = item.comment === null ? [] : [`${pad}// ${commentText(item.comment)}`];
      block.push(`${pad}${text}`);
      groups.push(block);
    }

    const lines: string[] = [];
    groups.forEach((group, index) => {
      if (index > 0) {
        lines.push("");
      }
      lines.push(...group);
    });
    return lines;
  }
}

function formatList(entries: Array<[string, DotAttributeValue]>): string {
  return entries.map(([key, value]) => `${key}=${formatValue(value)}`).join(", ");
}

/** A `subgraph` (or `cluster_*` subgraph) nested in a document. */
export class DotSubgraph extends DotScope {
  constructor(readonly name: string) {
    super();
  }
}

export interface DotDocumentOptions {
  /** Comment lines written above the graph, each prefixed with `// `. */
  readonly header?: readonly string[];
}

/**
 * Structured writer for one `strict digraph` artifact. Statement text comes
 * from the serializer so identifiers are always quoted and escaped, and the
 * output is a pure function of the calls made on the builder.
 */
export class DotDocument extends DotScope {
  private readonly header: readonly string[];
  readonly name: string;

  constructor(name: string, options: DotDocumentOptions = {}) {
    super();
    this.name = assertIdentifier("graph", name);
    this.header = options.header ?? [];
  }

  toString(): string {
    const lines: string[] = [];
    for (const comment of this.header) {
      lines.push(comment.length === 0 ? "//" : `// ${commentText(comment)}`);
    }
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(`strict digraph ${this.name} {`, ...this.renderBody(1), "}");
    return `${lines.join("\n")}\n`;
  }
}
