import type { ProcessLayout } from "../config/diagramConfig.js";
import { DotDocument } from "../graph/dotDocument.js";
import { EdgeSet, NodeSet } from "../graph/graphSet.js";
import { formatAttributes, multilineLabel } from "../graph/serializer.js";
import { artifactHeader, DotDiagramJob } from "./diagramJob.js";
import { sortIdentifiers } from "../utils/identifiers.js";
import { artifactRefs, fixed2 } from "./naming.js";
import type { DiagramJobContext } from "./types.js";

/** Label printed on every edge so Graphviz leaves room beside it. */
const EDGE_SPACER = "   ";

/**
 * Inputs and outputs of one technology across its periods and vintages,
 * drawn either as two clusters (`separate_vintages`) or as one node per
 * (period, vintage) pair (`explicit_vintages`).
 */
export class ProcessJob extends DotDiagramJob {
  constructor(
    readonly tech: string,
    readonly processLayout: ProcessLayout,
  ) {
    super("process", { tech }, artifactRefs.process(tech));
  }

  protected override get emptyReason(): string {
    return `technology '${this.tech}' has no active process`;
  }

  protected build(context: DiagramJobContext): DotDocument | null {
    return this.processLayout === "separate_vintages" ? this.buildSeparate(context) : this.buildExplicit(context);
  }

  private activeProcesses(context: DiagramJobContext): Array<readonly [period: string, vintage: string]> {
    return context.model
      .processKeys()
      .filter(([, tech]) => tech === this.tech)
      .map(([period, , vintage]) => [period, vintage] as const);
  }

  private buildSeparate(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const { palette } = config;
    const processes = this.activeProcesses(context);
    if (processes.length === 0) {
      return null;
    }

    const periods = sortIdentifiers(processes.map(([period]) => period));
    const vintages = sortIdentifiers(processes.map(([, vintage]) => vintage));
    const midPeriod = periods[Math.floor(periods.length / 2)];
    const midVintage = vintages[Math.floor(vintages.length / 2)];

    const inputNodes = new NodeSet();
    const outputNodes = new NodeSet();
    const periodNodes = new NodeSet();
    const vintageNodes = new NodeSet();
    const externalEdges = new EdgeSet();
    const vintageEdges = new EdgeSet();

    let colourIndex = 0;
    for (const [period, vintage] of processes) {
      const periodNode = `p_${period}`;
      const vintageNode = `v_${vintage}`;
      periodNodes.addNode(
        periodNode,
        config.showCapacity
          ? formatAttributes({
              label: multilineLabel(`p${period}`, `Total Capacity: ${fixed2(model.capacityAvailable(period, this.tech) ?? 0)}`),
            })
          : null,
      );
      vintageNodes.addNode(
        vintageNode,
        config.showCapacity
          ? formatAttributes({ label: multilineLabel(`v${vintage}`, `Capacity: ${fixed2(model.capacity(this.tech, vintage))}`) })
          : null,
      );

      for (const input of model.processInputs(period, this.tech, vintage)) {
        for (const output of model.processOutputsByInput(period, this.tech, vintage, input)) {
          const colour = palette.rainbow[colourIndex];
          colourIndex = (colourIndex + 1) % palette.rainbow.length;

          inputNodes.addNode(
            input,
            formatAttributes({ color: palette.processInputCarrier, href: this.link(context, artifactRefs.commodity(input)) }),
          );
          outputNodes.addNode(
            output,
            formatAttributes({ color: palette.processOutputCarrier, href: this.link(context, artifactRefs.commodity(output)) }),
          );
          externalEdges.addEdge(input, `v_${midVintage}`, formatAttributes({ color: palette.arrowIn, lhead: "cluster_vintage" }));
          vintageEdges.addEdge(vintageNode, periodNode, formatAttributes({ color: colour }));
          externalEdges.addEdge(`p_${midPeriod}`, output, formatAttributes({ color: palette.arrowOut, ltail: "cluster_period" }));
        }
      }
    }

    const clusterHref = this.link(context, artifactRefs.mainModel());
    return new DotDocument("model", {
      header: artifactHeader(`the periods and vintages of the technology '${this.tech}'`, this.artifact.stem),
    })
      .attributes({
        label: this.tech,
        bgcolor: "transparent",
        color: "black",
        compound: true,
        concentrate: true,
        rankdir: "LR",
        splines: config.splines,
      })
      .nodeDefaults({ shape: "box", style: "filled" })
      .edgeDefaults({
        arrowhead: "vee",
        decorate: true,
        dir: "both",
        fontsize: "8",
        label: EDGE_SPACER,
        labelfloat: "false",
        labelfontcolor: "lightgreen",
        len: "2",
        weight: "0.5",
      })
      .subgraph("cluster_vintage", (s) =>
        s
          .attributes({ label: "Vintages", color: palette.clusterBackground, style: "filled", href: clusterHref })
          .nodeDefaults({ color: palette.clusterNode })
          .nodes(vintageNodes),
      )
      .subgraph("cluster_period", (s) =>
        s
          .attributes({ label: "Period", color: palette.clusterBackground, style: "filled", href: clusterHref })
          .nodeDefaults({ color: palette.clusterNode })
          .nodes(periodNodes),
      )
      .subgraph("energy_carriers", (s) =>
        s
          .nodeDefaults({ shape: "circle" })
          .nodes(inputNodes, "input carriers")
          .nodes(outputNodes, "output carriers"),
      )
      .subgraph("external_edges", (s) => s.edgeDefaults({ arrowhead: "normal", dir: "forward" }).edges(externalEdges))
      .subgraph("internal_edges", (s) => s.edges(vintageEdges, "edges between vintages and periods"));
  }

  private buildExplicit(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const { palette } = config;

    const inputNodes = new NodeSet();
    const outputNodes = new NodeSet();
    const vintageNodes = new NodeSet();
    const edges = new EdgeSet();
    const modelHref = this.link(context, artifactRefs.mainModel());

    for (const [period, vintage] of this.activeProcesses(context)) {
      const vintageNode = `p${period}_v${vintage}`;
      for (const input of model.processInputs(period, this.tech, vintage)) {
        for (const output of model.processOutputsByInput(period, this.tech, vintage, input)) {
          inputNodes.addNode(
            input,
            formatAttributes({ color: palette.commodity, href: this.link(context, artifactRefs.commodity(input)) }),
          );
          outputNodes.addNode(
            output,
            formatAttributes({ color: palette.commodity, href: this.link(context, artifactRefs.commodity(output)) }),
          );
          vintageNodes.addNode(
            vintageNode,
            formatAttributes({
              color: palette.tech,
              label: config.showCapacity
                ? multilineLabel(vintageNode, `Capacity = ${fixed2(model.capacity(this.tech, vintage))}`)
                : undefined,
              href: modelHref,
            }),
          );
          edges.addEdge(input, vintageNode, formatAttributes({ color: palette.arrowIn, sametail: input }));
          edges.addEdge(vintageNode, output, formatAttributes({ color: palette.arrowOut, samehead: output }));
        }
      }
    }

    if (vintageNodes.isEmpty) {
      return null;
    }

    return new DotDocument("model", {
      header: artifactHeader(`each (period, vintage) pair of the technology '${this.tech}'`, this.artifact.stem),
    })
      .attributes({ label: this.tech, color: "black", concentrate: true, rankdir: "LR" })
      .nodeDefaults({ shape: "box", style: "filled" })
      .edgeDefaults({ arrowhead: "vee", decorate: true, label: EDGE_SPACER, labelfontcolor: "lightgreen" })
      .subgraph("energy_carriers", (s) =>
        s
          .nodeDefaults({ shape: "circle" })
          .nodes(inputNodes, "input carriers")
          .nodes(outputNodes, "output carriers"),
      )
      .nodes(vintageNodes, "vintage nodes")
      .edges(edges);
  }
}
