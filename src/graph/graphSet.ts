/**
 * Deduplicated node and edge collections backing one diagram. Entries are
 * keyed on their full tuple so the same identifier with two different
 * attribute strings yields two entries; Graphviz keeps the last one it reads.
 */

/** Node tuple: identifier and optional attribute text. */
export type NodeTuple = readonly [id: string, attributes: string | null];

/** Edge tuple: source, destination and optional attribute text. */
export type EdgeTuple = readonly [source: string, destination: string, attributes: string | null];

export interface DotNode {
  readonly id: string;
  readonly attributes: string | null;
}

export interface DotEdge {
  readonly source: string;
  readonly destination: string;
  readonly attributes: string | null;
}

/** Raised when a caller hands a tuple of the wrong shape to a graph set. */
export class GraphShapeError extends TypeError {
  public readonly code = "E-GRAPH-SHAPE";
  public readonly details: { expected: string; received: unknown };

  constructor(expected: string, received: unknown) {
    super(`malformed graph entry: expected ${expected}, received ${describe(received)}`);
    this.name = "GraphShapeError";
    this.details = { expected, received };
  }
}

function describe(value: unknown): string {
  if (Array.isArray(value)) {
    return `array of length ${value.length}`;
  }
  return value === null ? "null" : typeof value;
}

/** Empty attribute text is treated as "no attributes". */
function normaliseAttributes(attributes: string | null | undefined): string | null {
  return attributes === undefined || attributes === null || attributes.length === 0 ? null : attributes;
}

function isAttributeSlot(value: unknown): value is string | null | undefined {
  return value === null || value === undefined || typeof value === "string";
}

// JSON encoding keeps the key injective even when ids contain separators.
function nodeKey(node: DotNode): string {
  return JSON.stringify([node.id, node.attributes]);
}

function edgeKey(edge: DotEdge): string {
  return JSON.stringify([edge.source, edge.destination, edge.attributes]);
}

/** Set of node statements for one diagram section. */
export class NodeSet {
  private readonly entriesByKey = new Map<string, DotNode>();

  /** Builds a set from raw tuples, validating each one. */
  static fromTuples(tuples: Iterable<unknown>): NodeSet {
    const set = new NodeSet();
    for (const tuple of tuples) {
      set.addNodeTuple(tuple);
    }
    return set;
  }

  /** Adds a node; repeating an identical call has no effect. */
  addNode(id: string, attributes?: string | null): this {
    if (typeof id !== "string" || !isAttributeSlot(attributes)) {
      throw new GraphShapeError("(id: string, attributes?: string | null)", [id, attributes]);
    }
    const node: DotNode = { id, attributes: normaliseAttributes(attributes) };
    const key = nodeKey(node);
    if (!this.entriesByKey.has(key)) {
      this.entriesByKey.set(key, node);
    }
    return this;
  }

  /**
   * Adds a node from a raw `[id, attributes]` tuple.
   *
   * @throws {GraphShapeError} when the value is not a 2-tuple of the right types.
   */
  addNodeTuple(tuple: unknown): this {
    if (!Array.isArray(tuple) || tuple.length !== 2) {
      throw new GraphShapeError("[id, attributes] tuple", tuple);
    }
    const [id, attributes]: unknown[] = tuple;
    if (typeof id !== "string" || !isAttributeSlot(attributes)) {
      throw new GraphShapeError("[string, string | null] tuple", tuple);
    }
    return this.addNode(id, attributes);
  }

  has(id: string, attributes?: string | null): boolean {
    return this.entriesByKey.has(nodeKey({ id, attributes: normaliseAttributes(attributes) }));
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get isEmpty(): boolean {
    return this.entriesByKey.size === 0;
  }

  /** Entries in insertion order. */
  entries(): DotNode[] {
    return Array.from(this.entriesByKey.values());
  }
}

/** Set of edge statements for one diagram section. */
export class EdgeSet {
  private readonly entriesByKey = new Map<string, DotEdge>();

  static fromTuples(tuples: Iterable<unknown>): EdgeSet {
    const set = new EdgeSet();
    for (const tuple of tuples) {
      set.addEdgeTuple(tuple);
    }
    return set;
  }

  addEdge(source: string, destination: string, attributes?: string | null): this {
    if (typeof source !== "string" || typeof destination !== "string" || !isAttributeSlot(attributes)) {
      throw new GraphShapeError("(source: string, destination: string, attributes?: string | null)", [
        source,
        destination,
        attributes,
      ]);
    }
    const edge: DotEdge = { source, destination, attributes: normaliseAttributes(attributes) };
    const key = edgeKey(edge);
    if (!this.entriesByKey.has(key)) {
      this.entriesByKey.set(key, edge);
    }
    return this;
  }

  /**
   * Adds an edge from a raw `[source, destination, attributes]` tuple.
   *
   * @throws {GraphShapeError} when the value is not a 3-tuple of the right types.
   */
  addEdgeTuple(tuple: unknown): this {
    if (!Array.isArray(tuple) || tuple.length !== 3) {
      throw new GraphShapeError("[source, destination, attributes] tuple", tuple);
    }
    const [source, destination, attributes]: unknown[] = tuple;
    if (typeof source !== "string" || typeof destination !== "string" || !isAttributeSlot(attributes)) {
      throw new GraphShapeError("[string, string, string | null] tuple", tuple);
    }
    return this.addEdge(source, destination, attributes);
  }

  has(source: string, destination: string, attributes?: string | null): boolean {
    return this.entriesByKey.has(edgeKey({ source, destination, attributes: normaliseAttributes(attributes) }));
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get isEmpty(): boolean {
    return this.entriesByKey.size === 0;
  }

  entries(): DotEdge[] {
    return Array.from(this.entriesByKey.values());
  }
}
