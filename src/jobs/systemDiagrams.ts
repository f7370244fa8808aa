import { DotDocument } from "../graph/dotDocument.js";
import { EdgeSet, NodeSet } from "../graph/graphSet.js";
import { formatAttributes } from "../graph/serializer.js";
import { artifactHeader, DotDiagramJob } from "./diagramJob.js";
import { artifactRefs } from "./naming.js";
import type { DiagramJobContext } from "./types.js";

/**
 * Every active process as its own node (`"<period>, <tech>, <vintage>"`),
 * wired to the carriers it consumes and produces.
 */
export class CompleteSystemJob extends DotDiagramJob {
  constructor() {
    super("complete_system", {}, artifactRefs.completeSystem());
  }

  protected override get emptyReason(): string {
    return "model has no active processes";
  }

  protected build({ model, config }: DiagramJobContext): DotDocument | null {
    const keys = model.processKeys();
    if (keys.length === 0) {
      return null;
    }

    const techs = new NodeSet();
    const carriers = new NodeSet();
    const inputs = new EdgeSet();
    const outputs = new EdgeSet();

    for (const [period, tech, vintage] of keys) {
      const processNode = `${period}, ${tech}, ${vintage}`;
      techs.addNode(processNode);
      for (const input of model.processInputs(period, tech, vintage)) {
        carriers.addNode(input);
        inputs.addEdge(input, processNode);
      }
      for (const output of model.processOutputs(period, tech, vintage)) {
        carriers.addNode(output);
        outputs.addEdge(processNode, output);
      }
    }

    const { palette } = config;
    return new DotDocument("energy_system", {
      header: artifactHeader("every active process of the energy system", this.artifact.stem),
    })
      .attributes({ rankdir: "LR" })
      .nodeDefaults({ style: "filled" })
      .edgeDefaults({ arrowhead: "vee", label: "   " })
      .subgraph("technologies", (s) => s.nodeDefaults({ color: palette.tech, shape: "box" }).nodes(techs))
      .subgraph("energy_carriers", (s) => s.nodeDefaults({ color: palette.commodity, shape: "circle" }).nodes(carriers))
      .subgraph("inputs", (s) => s.edgeDefaults({ color: palette.arrowIn }).edges(inputs))
      .subgraph("outputs", (s) => s.edgeDefaults({ color: palette.arrowOut }).edges(outputs));
  }
}

/**
 * One node per technology and per carrier, vintages and periods folded
 * together. Nodes link to the per-technology and per-carrier diagrams.
 */
export class MainModelJob extends DotDiagramJob {
  constructor() {
    super("main_model", {}, artifactRefs.mainModel());
  }

  protected override get emptyReason(): string {
    return "model has no active processes";
  }

  protected build(context: DiagramJobContext): DotDocument | null {
    const { model, config } = context;
    const keys = model.processKeys();
    if (keys.length === 0) {
      return null;
    }

    const techs = new NodeSet();
    const carriers = new NodeSet();
    const inputs = new EdgeSet();
    const outputs = new EdgeSet();
    const carrierNode = (carrier: string) =>
      carriers.addNode(carrier, formatAttributes({ href: this.link(context, artifactRefs.commodity(carrier)) }));

    for (const [period, tech, vintage] of keys) {
      techs.addNode(tech, formatAttributes({ href: this.link(context, artifactRefs.process(tech)) }));
      for (const input of model.processInputs(period, tech, vintage)) {
        carrierNode(input);
        for (const output of model.processOutputsByInput(period, tech, vintage, input)) {
          carrierNode(output);
          inputs.addEdge(input, tech);
          outputs.addEdge(tech, output);
        }
      }
    }

    const { palette } = config;
    return new DotDocument("model", {
      header: artifactHeader("the technologies and energy carriers of the energy system", this.artifact.stem),
    })
      .attributes({ rankdir: "LR" })
      .nodeDefaults({ style: "filled" })
      .edgeDefaults({ arrowhead: "vee", labelfontcolor: "lightgreen" })
      .subgraph("techs", (s) => s.nodeDefaults({ color: palette.tech, shape: "box" }).nodes(techs))
      .subgraph("energy_carriers", (s) => s.nodeDefaults({ color: palette.commodity, shape: "circle" }).nodes(carriers))
      .subgraph("inputs", (s) => s.edgeDefaults({ color: palette.arrowIn }).edges(inputs))
      .subgraph("outputs", (s) => s.edgeDefaults({ color: palette.arrowOut }).edges(outputs));
  }
}
