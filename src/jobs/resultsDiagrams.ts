import { DotDocument } from "../graph/dotDocument.js";
import { EdgeSet, NodeSet } from "../graph/graphSet.js";
import { formatAttributes, multilineLabel } from "../graph/serializer.js";
import { artifactHeader, DotDiagramJob } from "./diagramJob.js";
import { artifactRefs, fixed2 } from "./naming.js";
import type { DiagramJobContext } from "./types.js";

/** Node defaults for a group of used or unused nodes. */
function nodeStyle(color: string, fontcolor: string, shape: "box" | "circle") {
  return { color, fontcolor, shape };
}

/**
 * Whole-system results for one optimised period. Technologies with zero
 * available capacity and flows below the significance threshold are drawn in
 * the "unused" colours.
 */
export class PeriodResultsJob extends DotDiagramJob {
  constructor(readonly period: string) {
    super("period_results", { period }, artifactRefs.periodResults(period));
  }

  protected override get emptyReason(): string {
    return `no technology has capacity available in ${this.period}`;
  }

  protected build(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const { palette, significanceThreshold } = config;
    const period = this.period;

    const usedTechs = new NodeSet();
    const unusedTechs = new NodeSet();
    const usedCarriers = new NodeSet();
    const usedEmissions = new NodeSet();
    const inputFlows = new EdgeSet();
    const outputFlows = new EdgeSet();
    const unusedFlows = new EdgeSet();
    const carriersInUse = new Set<string>();
    const emissionsInUse = new Set<string>();
    const carrierNode = (carrier: string) =>
      usedCarriers.addNode(carrier, formatAttributes({ href: this.link(context, artifactRefs.commodityResults(carrier, period)) }));

    for (const tech of model.technologies()) {
      const capacity = model.capacityAvailable(period, tech);
      if (capacity === null) {
        continue;
      }

      if (capacity !== 0) {
        usedTechs.addNode(
          tech,
          formatAttributes({
            label: multilineLabel(tech, `Capacity: ${fixed2(capacity)}`),
            href: this.link(context, artifactRefs.techResults(tech, period)),
          }),
        );
      } else {
        unusedTechs.addNode(tech);
      }

      for (const vintage of model.processVintages(period, tech)) {
        for (const input of model.processInputs(period, tech, vintage)) {
          const consumed = model.energyConsumption(period, input, tech);
          if (consumed >= significanceThreshold) {
            inputFlows.addEdge(input, tech, formatAttributes({ label: fixed2(consumed) }));
            carrierNode(input);
            carriersInUse.add(input);
          } else {
            unusedFlows.addEdge(input, tech);
          }
        }
        for (const output of model.processOutputs(period, tech, vintage)) {
          const produced = model.activityByOutput(period, tech, output);
          if (produced >= significanceThreshold) {
            outputFlows.addEdge(tech, output, formatAttributes({ label: fixed2(produced) }));
            carrierNode(output);
            carriersInUse.add(output);
          } else {
            unusedFlows.addEdge(tech, output);
          }
        }
      }
    }

    if (usedTechs.isEmpty && unusedTechs.isEmpty) {
      return null;
    }

    for (const [emission, , tech, vintage] of model.emissionActivityKeys()) {
      if (!model.isValidActivity(period, tech, vintage)) {
        continue;
      }
      const emitted = model.emissionActivity(emission, period, tech);
      if (emitted < significanceThreshold) {
        continue;
      }
      outputFlows.addEdge(tech, emission, formatAttributes({ label: fixed2(emitted) }));
      usedEmissions.addNode(emission);
      emissionsInUse.add(emission);
    }

    const unusedCarriers = new NodeSet();
    for (const carrier of model.carriers()) {
      if (!carriersInUse.has(carrier)) {
        unusedCarriers.addNode(carrier);
      }
    }
    const unusedEmissions = new NodeSet();
    for (const emission of model.emissionCommodities()) {
      if (!emissionsInUse.has(emission)) {
        unusedEmissions.addNode(emission);
      }
    }

    return new DotDocument("model", {
      header: artifactHeader(`the results of the energy system in ${period}`, this.artifact.stem),
    })
      .attributes({ label: `Results for ${period}`, rankdir: "LR", smoothtype: "power_dist", splines: config.splines })
      .nodeDefaults({ style: "filled" })
      .edgeDefaults({ arrowhead: "vee" })
      .subgraph("unused_techs", (s) => s.nodeDefaults(nodeStyle(palette.unused, palette.unusedFont, "box")).nodes(unusedTechs))
      .subgraph("unused_energy_carriers", (s) =>
        s.nodeDefaults(nodeStyle(palette.unused, palette.unusedFont, "circle")).nodes(unusedCarriers),
      )
      .subgraph("unused_emissions", (s) =>
        s.nodeDefaults(nodeStyle(palette.unused, palette.unusedFont, "circle")).nodes(unusedEmissions),
      )
      .subgraph("in_use_techs", (s) => s.nodeDefaults(nodeStyle(palette.tech, palette.usedFont, "box")).nodes(usedTechs))
      .subgraph("in_use_energy_carriers", (s) =>
        s.nodeDefaults(nodeStyle(palette.commodity, palette.usedFont, "circle")).nodes(usedCarriers),
      )
      .subgraph("in_use_emissions", (s) =>
        s.nodeDefaults(nodeStyle(palette.commodity, palette.usedFont, "circle")).nodes(usedEmissions),
      )
      .subgraph("unused_flows", (s) => s.edgeDefaults({ color: palette.unused }).edges(unusedFlows))
      .subgraph("in_use_flows", (s) =>
        s
          .subgraph("inputs", (inner) => inner.edgeDefaults({ color: palette.arrowIn }).edges(inputFlows))
          .subgraph("outputs", (inner) => inner.edgeDefaults({ color: palette.arrowOut }).edges(outputFlows)),
      );
  }
}

/** Sum of one process flow over every time slice of a period. */
function sumOverSlices(
  context: DiagramJobContext,
  read: (season: string, timeOfDay: string) => number,
): number {
  let total = 0;
  for (const season of context.model.seasons()) {
    for (const timeOfDay of context.model.timesOfDay()) {
      total += read(season, timeOfDay);
    }
  }
  return total;
}

/** Active vintages of one technology in one period, with summed flows. */
export class TechResultsJob extends DotDiagramJob {
  constructor(
    readonly tech: string,
    readonly period: string,
  ) {
    super("tech_results", { tech, period }, artifactRefs.techResults(tech, period));
  }

  protected override get emptyReason(): string {
    return `no vintage of '${this.tech}' is active in ${this.period}`;
  }

  protected build(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const { palette } = config;
    const { tech, period } = this;

    const carriers = new NodeSet();
    const vintageNodes = new NodeSet();
    const inputs = new EdgeSet();
    const outputs = new EdgeSet();
    const carrierNode = (carrier: string) =>
      carriers.addNode(carrier, formatAttributes({ href: this.link(context, artifactRefs.commodityResults(carrier, period)) }));

    for (const vintage of model.processVintages(period, tech)) {
      if (model.activity(period, tech, vintage) === 0) {
        continue;
      }

      const vintageAttributes = formatAttributes({
        href: this.link(context, artifactRefs.flowSegments(tech, period, vintage)),
        label: multilineLabel(vintage, `Cap: ${fixed2(model.capacity(tech, vintage))}`),
      });
      for (const input of model.processInputs(period, tech, vintage)) {
        for (const output of model.processOutputsByInput(period, tech, vintage, input)) {
          const flowIn = sumOverSlices(context, (season, timeOfDay) =>
            model.flowIn(period, season, timeOfDay, input, tech, vintage, output),
          );
          const flowOut = sumOverSlices(context, (season, timeOfDay) =>
            model.flowOut(period, season, timeOfDay, input, tech, vintage, output),
          );

          vintageNodes.addNode(vintage, vintageAttributes);
          carrierNode(input);
          carrierNode(output);
          inputs.addEdge(input, vintage, formatAttributes({ label: fixed2(flowIn) }));
          outputs.addEdge(vintage, output, formatAttributes({ label: fixed2(flowOut) }));
        }
      }
    }

    if (vintageNodes.isEmpty) {
      return null;
    }

    const totalCapacity = model.capacityAvailable(period, tech) ?? 0;
    return new DotDocument("model", {
      header: artifactHeader(`the results of '${tech}' in ${period}`, this.artifact.stem),
    })
      .attributes({
        label: `Results for ${tech} in ${period}`,
        compound: true,
        concentrate: true,
        rankdir: "LR",
        splines: config.splines,
      })
      .nodeDefaults({ style: "filled" })
      .edgeDefaults({ arrowhead: "vee" })
      .subgraph("cluster_vintages", (s) =>
        s
          .attributes({
            label: multilineLabel("Vintages", `Capacity: ${fixed2(totalCapacity)}`),
            href: this.link(context, artifactRefs.periodResults(period)),
            style: "filled",
            color: palette.clusterBackground,
          })
          .nodeDefaults({ color: palette.clusterNode, shape: "box" })
          .nodes(vintageNodes),
      )
      .subgraph("energy_carriers", (s) => s.nodeDefaults(nodeStyle(palette.commodity, palette.usedFont, "circle")).nodes(carriers))
      .subgraph("inputs", (s) => s.edgeDefaults({ color: palette.arrowIn }).edges(inputs))
      .subgraph("outputs", (s) => s.edgeDefaults({ color: palette.arrowOut }).edges(outputs));
  }
}

/**
 * Activity of one process split by time slice. Every (input, output) pair of
 * the process is drawn in the same diagram; slices without input flow are
 * left out.
 */
export class FlowSegmentsJob extends DotDiagramJob {
  constructor(
    readonly tech: string,
    readonly period: string,
    readonly vintage: string,
  ) {
    super("flow_segments", { tech, period, vintage }, artifactRefs.flowSegments(tech, period, vintage));
  }

  protected override get emptyReason(): string {
    return `process '${this.tech}' (${this.vintage}) has no input flow in ${this.period}`;
  }

  protected build(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const { palette } = config;
    const { tech, period, vintage } = this;

    const slices = new NodeSet();
    const carriers = new NodeSet();
    const inputs = new EdgeSet();
    const outputs = new EdgeSet();

    for (const input of model.processInputs(period, tech, vintage)) {
      for (const output of model.processOutputsByInput(period, tech, vintage, input)) {
        for (const season of model.seasons()) {
          for (const timeOfDay of model.timesOfDay()) {
            const flowIn = model.flowIn(period, season, timeOfDay, input, tech, vintage, output);
            if (flowIn === 0) {
              continue;
            }
            const flowOut = model.flowOut(period, season, timeOfDay, input, tech, vintage, output);
            const slice = `${season}, ${timeOfDay}`;
            slices.addNode(slice);
            carriers.addNode(input, formatAttributes({ href: this.link(context, artifactRefs.commodityResults(input, period)) }));
            carriers.addNode(output, formatAttributes({ href: this.link(context, artifactRefs.commodityResults(output, period)) }));
            inputs.addEdge(input, slice, formatAttributes({ label: fixed2(flowIn) }));
            outputs.addEdge(slice, output, formatAttributes({ label: fixed2(flowOut) }));
          }
        }
      }
    }

    if (slices.isEmpty) {
      return null;
    }

    return new DotDocument("model", {
      header: artifactHeader(`the time-slice activity of '${tech}' (${vintage}) in ${period}`, this.artifact.stem),
    })
      .attributes({
        label: `Activity split of process ${tech}, ${vintage} in year ${period}`,
        compound: true,
        concentrate: true,
        rankdir: "LR",
        splines: config.splines,
      })
      .nodeDefaults({ style: "filled" })
      .edgeDefaults({ arrowhead: "vee" })
      .subgraph("cluster_slices", (s) =>
        s
          .attributes({
            label: `${vintage} Capacity: ${fixed2(model.capacityAvailable(period, tech) ?? 0)}`,
            color: palette.clusterBackground,
            rank: "same",
            style: "filled",
          })
          .nodeDefaults({ color: palette.clusterNode, shape: "box" })
          .nodes(slices),
      )
      .subgraph("energy_carriers", (s) => s.nodeDefaults(nodeStyle(palette.commodity, palette.usedFont, "circle")).nodes(carriers))
      .subgraph("inputs", (s) => s.edgeDefaults({ color: palette.arrowIn }).edges(inputs))
      .subgraph("outputs", (s) => s.edgeDefaults({ color: palette.arrowOut }).edges(outputs));
  }
}
