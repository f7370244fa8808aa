import type { EnergySystemModel } from "../domain/types.js";
import { DotDocument } from "../graph/dotDocument.js";
import { EdgeSet, NodeSet } from "../graph/graphSet.js";
import { formatAttributes } from "../graph/serializer.js";
import { artifactHeader, DotDiagramJob } from "./diagramJob.js";
import { artifactRefs } from "./naming.js";
import type { DiagramJobContext } from "./types.js";

const EDGE_DEFAULTS = {
  arrowhead: "vee",
  fontsize: "8",
  label: "   ",
  labelfloat: "false",
  len: "2",
  weight: "0.5",
} as const;

/** Technologies consuming and producing one carrier. */
export class CommodityJob extends DotDiagramJob {
  constructor(readonly carrier: string) {
    super("commodity", { carrier }, artifactRefs.commodity(carrier));
  }

  protected override get emptyReason(): string {
    return `no process consumes or produces '${this.carrier}'`;
  }

  protected build(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const consumers = model.processesByInput(this.carrier);
    const producers = model.processesByOutput(this.carrier);
    if (consumers.length === 0 && producers.length === 0) {
      return null;
    }

    const techs = new NodeSet();
    const carriers = new NodeSet().addNode(
      this.carrier,
      formatAttributes({ href: this.link(context, artifactRefs.mainModel()) }),
    );
    const inputs = new EdgeSet();
    const outputs = new EdgeSet();
    const techNode = (tech: string) =>
      techs.addNode(tech, formatAttributes({ href: this.link(context, artifactRefs.process(tech)) }));

    for (const [tech] of consumers) {
      techNode(tech);
      inputs.addEdge(this.carrier, tech);
    }
    for (const [tech] of producers) {
      techNode(tech);
      outputs.addEdge(tech, this.carrier);
    }

    const { palette } = config;
    return new DotDocument("energy_carrier", {
      header: artifactHeader(`the flow of energy through the carrier '${this.carrier}'`, this.artifact.stem),
    })
      .attributes({
        label: this.carrier,
        color: "black",
        compound: true,
        concentrate: true,
        rankdir: "LR",
        splines: config.splines,
      })
      .nodeDefaults({ style: "filled" })
      .edgeDefaults(EDGE_DEFAULTS)
      .subgraph("techs", (s) => s.nodeDefaults({ color: palette.tech, shape: "box" }).nodes(techs))
      .subgraph("energy_carriers", (s) => s.nodeDefaults({ color: palette.commodity, shape: "circle" }).nodes(carriers))
      .subgraph("outputs", (s) => s.edgeDefaults({ color: palette.arrowOut }).edges(outputs))
      .subgraph("inputs", (s) => s.edgeDefaults({ color: palette.arrowIn }).edges(inputs));
  }
}

/** Which technologies and carriers carry any flow anywhere in the model. */
export interface ModelUsage {
  readonly usedTechs: ReadonlySet<string>;
  readonly usedCarriers: ReadonlySet<string>;
}

/**
 * A technology is in use once any of its (input, output) pairs has non-zero
 * input flow in some time slice; every carrier of such a process is in use.
 */
export function computeModelUsage(model: EnergySystemModel): ModelUsage {
  const usedTechs = new Set<string>();
  const usedCarriers = new Set<string>();
  const seasons = model.seasons();
  const timesOfDay = model.timesOfDay();

  for (const [period, tech, vintage] of model.processKeys()) {
    let flowing = false;
    for (const input of model.processInputs(period, tech, vintage)) {
      for (const output of model.processOutputsByInput(period, tech, vintage, input)) {
        for (const season of seasons) {
          for (const timeOfDay of timesOfDay) {
            if (model.flowIn(period, season, timeOfDay, input, tech, vintage, output) !== 0) {
              flowing = true;
            }
          }
        }
      }
    }
    if (!flowing) {
      continue;
    }
    usedTechs.add(tech);
    for (const carrier of model.processInputs(period, tech, vintage)) {
      usedCarriers.add(carrier);
    }
    for (const carrier of model.processOutputs(period, tech, vintage)) {
      usedCarriers.add(carrier);
    }
  }

  return { usedTechs, usedCarriers };
}

/**
 * One used carrier in one period: connected technologies split into those
 * carrying flow somewhere in the model and those that never do.
 */
export class CommodityResultsJob extends DotDiagramJob {
  constructor(
    readonly carrier: string,
    readonly period: string,
    private readonly usage: ModelUsage,
  ) {
    super("commodity_results", { carrier, period }, artifactRefs.commodityResults(carrier, period));
  }

  protected build(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const { palette } = config;
    const { usedTechs } = this.usage;

    const resource = new NodeSet().addNode(
      this.carrier,
      formatAttributes({
        color: palette.commodity,
        href: this.link(context, artifactRefs.periodResults(this.period)),
        shape: "circle",
      }),
    );
    const usedNodes = new NodeSet();
    const unusedNodes = new NodeSet();
    const usedEdges = new EdgeSet();
    const unusedEdges = new EdgeSet();
    const usedNode = (tech: string) =>
      usedNodes.addNode(tech, formatAttributes({ href: this.link(context, artifactRefs.techResults(tech, this.period)) }));

    for (const [tech] of model.processesByInput(this.carrier)) {
      if (usedTechs.has(tech)) {
        usedNode(tech);
        usedEdges.addEdge(this.carrier, tech);
      } else {
        unusedNodes.addNode(tech);
        unusedEdges.addEdge(this.carrier, tech);
      }
    }
    for (const [tech] of model.processesByOutput(this.carrier)) {
      if (usedTechs.has(tech)) {
        usedNode(tech);
        usedEdges.addEdge(tech, this.carrier);
      } else {
        unusedNodes.addNode(tech);
        unusedEdges.addEdge(tech, this.carrier);
      }
    }

    return new DotDocument("result_commodity", {
      header: artifactHeader(`the use of '${this.carrier}' in ${this.period}`, this.artifact.stem),
    })
      .attributes({
        label: `${this.carrier} - ${this.period}`,
        compound: true,
        concentrate: true,
        rankdir: "LR",
        splines: config.splines,
      })
      .nodeDefaults({ shape: "box", style: "filled" })
      .edgeDefaults({ ...EDGE_DEFAULTS, labelfloat: "False", labelfontcolor: "lightgreen" })
      .nodes(resource)
      .subgraph("used_techs", (s) => s.nodeDefaults({ color: palette.tech }).nodes(usedNodes))
      .subgraph("unused_techs", (s) => s.nodeDefaults({ color: palette.unused }).nodes(unusedNodes))
      .subgraph("in_use_flows", (s) => s.edgeDefaults({ color: palette.flowArrow }).edges(usedEdges))
      .subgraph("unused_flows", (s) => s.edgeDefaults({ color: palette.unused }).edges(unusedEdges));
  }
}
