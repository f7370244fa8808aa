import type { DiagramConfig } from "../config/diagramConfig.js";
import type { EnergySystemModel } from "../domain/types.js";
import { sortIdentifiers } from "../utils/identifiers.js";
import { CommodityJob, CommodityResultsJob, computeModelUsage } from "./commodityDiagrams.js";
import { ProcessJob } from "./processDiagram.js";
import { FlowSegmentsJob, PeriodResultsJob, TechResultsJob } from "./resultsDiagrams.js";
import { CompleteSystemJob, MainModelJob } from "./systemDiagrams.js";
import { DIAGRAM_FAMILIES, type DiagramFamily, type DiagramJob } from "./types.js";

export interface PlanOptions extends Pick<DiagramConfig, "processLayout"> {
  /** Restricts the plan to these families. Defaults to all of them. */
  readonly families?: readonly DiagramFamily[];
}

/**
 * Expands the model into one job per scope, families in a fixed order and
 * scopes sorted within each family.
 */
export function planDiagramJobs(model: EnergySystemModel, options: PlanOptions): DiagramJob[] {
  const wanted = new Set<DiagramFamily>(options.families ?? DIAGRAM_FAMILIES);
  const jobs: DiagramJob[] = [];
  const keys = model.processKeys();

  if (wanted.has("complete_system")) {
    jobs.push(new CompleteSystemJob());
  }
  if (wanted.has("main_model")) {
    jobs.push(new MainModelJob());
  }

  if (wanted.has("commodity")) {
    const carriers: string[] = [];
    for (const [period, tech, vintage] of keys) {
      carriers.push(...model.processInputs(period, tech, vintage), ...model.processOutputs(period, tech, vintage));
    }
    for (const carrier of sortIdentifiers(carriers)) {
      jobs.push(new CommodityJob(carrier));
    }
  }

  if (wanted.has("process")) {
    for (const tech of sortIdentifiers(model.technologies())) {
      jobs.push(new ProcessJob(tech, options.processLayout));
    }
  }

  // Result families only cover (period, tech) pairs with an available-capacity variable.
  const activePairs: Array<readonly [period: string, tech: string]> = [];
  for (const period of sortIdentifiers(model.optimisedPeriods())) {
    for (const tech of sortIdentifiers(model.technologies())) {
      if (model.capacityAvailable(period, tech) !== null) {
        activePairs.push([period, tech]);
      }
    }
  }

  if (wanted.has("period_results")) {
    for (const period of sortIdentifiers(model.optimisedPeriods())) {
      jobs.push(new PeriodResultsJob(period));
    }
  }

  if (wanted.has("tech_results")) {
    for (const [period, tech] of activePairs) {
      jobs.push(new TechResultsJob(tech, period));
    }
  }

  if (wanted.has("flow_segments")) {
    for (const [period, tech] of activePairs) {
      for (const vintage of sortIdentifiers(model.processVintages(period, tech))) {
        if (model.activity(period, tech, vintage) !== 0) {
          jobs.push(new FlowSegmentsJob(tech, period, vintage));
        }
      }
    }
  }

  if (wanted.has("commodity_results")) {
    const usage = computeModelUsage(model);
    for (const period of sortIdentifiers(model.optimisedPeriods())) {
      for (const carrier of sortIdentifiers(usage.usedCarriers)) {
        jobs.push(new CommodityResultsJob(carrier, period, usage));
      }
    }
  }

  return jobs;
}
