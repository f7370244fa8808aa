/**
 * Read-only query surface over a solved energy system model. It is the only
 * coupling point between the diagram jobs and whatever produced the data;
 * implementations must be safe to share between concurrent jobs.
 *
 * Identifiers (periods and vintages included) are strings so they can be used
 * verbatim in node ids and file names.
 */
export interface EnergySystemModel {
  /** Every period of the time horizon, ascending. */
  periods(): readonly string[];
  /** Periods the optimisation actually solved, ascending. */
  optimisedPeriods(): readonly string[];
  technologies(): readonly string[];
  /** Physical energy carriers (emission commodities excluded). */
  carriers(): readonly string[];
  emissionCommodities(): readonly string[];
  seasons(): readonly string[];
  timesOfDay(): readonly string[];

  /** Active processes as `[period, tech, vintage]` triples. */
  processKeys(): readonly ProcessKey[];
  processInputs(period: string, tech: string, vintage: string): readonly string[];
  processOutputs(period: string, tech: string, vintage: string): readonly string[];
  processOutputsByInput(period: string, tech: string, vintage: string, input: string): readonly string[];
  /** `[tech, vintage]` pairs consuming the carrier in some period. */
  processesByInput(carrier: string): readonly TechVintage[];
  /** `[tech, vintage]` pairs producing the carrier in some period. */
  processesByOutput(carrier: string): readonly TechVintage[];
  processVintages(period: string, tech: string): readonly string[];
  isValidActivity(period: string, tech: string, vintage: string): boolean;

  /** Installed capacity of a vintage; 0 when unknown. */
  capacity(tech: string, vintage: string): number;
  /** Capacity available in a period, or `null` when the pair has no such variable. */
  capacityAvailable(period: string, tech: string): number | null;
  /** Activity of a process over a period; 0 when unknown. */
  activity(period: string, tech: string, vintage: string): number;
  flowIn(period: string, season: string, timeOfDay: string, input: string, tech: string, vintage: string, output: string): number;
  flowOut(period: string, season: string, timeOfDay: string, input: string, tech: string, vintage: string, output: string): number;
  /** Energy of `input` consumed by `tech` over a period. */
  energyConsumption(period: string, input: string, tech: string): number;
  /** Energy of `output` produced by `tech` over a period. */
  activityByOutput(period: string, tech: string, output: string): number;
  /** Declared emission factors as `[emission, input, tech, vintage, output]`. */
  emissionActivityKeys(): readonly EmissionKey[];
  emissionActivity(emission: string, period: string, tech: string): number;
}

export type ProcessKey = readonly [period: string, tech: string, vintage: string];
export type TechVintage = readonly [tech: string, vintage: string];
export type EmissionKey = readonly [emission: string, input: string, tech: string, vintage: string, output: string];
