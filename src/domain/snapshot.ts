import { readFile } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { z } from "zod";

import { sortIdentifiers } from "../utils/identifiers.js";
import type { EmissionKey, EnergySystemModel, ProcessKey, TechVintage } from "./types.js";

/** Periods and vintages are years in most datasets; both spellings are accepted. */
const IdentifierSchema = z.union([z.string().min(1), z.number().int()]).transform((value) => String(value));
const MagnitudeSchema = z.number().finite();

const ProcessSchema = z
  .object({
    period: IdentifierSchema,
    tech: z.string().min(1),
    vintage: IdentifierSchema,
    efficiency: z
      .array(z.object({ input: z.string().min(1), output: z.string().min(1) }).strict())
      .min(1, "a process needs at least one input/output pair"),
  })
  .strict();

const FlowSchema = z
  .object({
    period: IdentifierSchema,
    season: z.string().min(1),
    timeOfDay: z.string().min(1),
    input: z.string().min(1),
    tech: z.string().min(1),
    vintage: IdentifierSchema,
    output: z.string().min(1),
    in: MagnitudeSchema,
    out: MagnitudeSchema,
  })
  .strict();

/** JSON layout of a solved dataset. */
export const EnergySystemDatasetSchema = z
  .object({
    name: z.string().min(1).optional(),
    periods: z
      .object({
        horizon: z.array(IdentifierSchema).min(1),
        optimised: z.array(IdentifierSchema).optional(),
      })
      .strict(),
    seasons: z.array(z.string().min(1)).min(1),
    timesOfDay: z.array(z.string().min(1)).min(1),
    technologies: z.array(z.string().min(1)),
    carriers: z.array(z.string().min(1)),
    emissions: z.array(z.string().min(1)).default([]),
    processes: z.array(ProcessSchema),
    capacity: z
      .array(z.object({ tech: z.string().min(1), vintage: IdentifierSchema, value: MagnitudeSchema }).strict())
      .default([]),
    capacityAvailable: z
      .array(z.object({ period: IdentifierSchema, tech: z.string().min(1), value: MagnitudeSchema }).strict())
      .default([]),
    activity: z
      .array(
        z
          .object({ period: IdentifierSchema, tech: z.string().min(1), vintage: IdentifierSchema, value: MagnitudeSchema })
          .strict(),
      )
      .default([]),
    flows: z.array(FlowSchema).default([]),
    emissionFactors: z
      .array(
        z
          .object({
            emission: z.string().min(1),
            input: z.string().min(1),
            tech: z.string().min(1),
            vintage: IdentifierSchema,
            output: z.string().min(1),
          })
          .strict(),
      )
      .default([]),
    emissionTotals: z
      .array(
        z
          .object({ emission: z.string().min(1), period: IdentifierSchema, tech: z.string().min(1), value: MagnitudeSchema })
          .strict(),
      )
      .default([]),
  })
  .strict()
  .superRefine((dataset, ctx) => {
    const techs = new Set(dataset.technologies);
    const carriers = new Set(dataset.carriers);
    const horizon = new Set(dataset.periods.horizon);
    dataset.processes.forEach((process, index) => {
      if (!techs.has(process.tech)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["processes", index, "tech"], message: `unknown technology '${process.tech}'` });
      }
      if (!horizon.has(process.period)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["processes", index, "period"], message: `period '${process.period}' is not in the horizon` });
      }
      process.efficiency.forEach((pair, pairIndex) => {
        for (const field of ["input", "output"] as const) {
          if (!carriers.has(pair[field])) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["processes", index, "efficiency", pairIndex, field],
              message: `unknown carrier '${pair[field]}'`,
            });
          }
        }
      });
    });
    for (const period of dataset.periods.optimised ?? []) {
      if (!horizon.has(period)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["periods", "optimised"], message: `period '${period}' is not in the horizon` });
      }
    }
  });

export type EnergySystemDataset = z.output<typeof EnergySystemDatasetSchema>;

/** Raised when a dataset does not match {@link EnergySystemDatasetSchema}. */
export class DatasetValidationError extends Error {
  public readonly code = "E-DATASET-INVALID";
  public readonly details: { source: string | null; issues: Array<{ path: string; message: string }> };

  constructor(source: string | null, issues: Array<{ path: string; message: string }>) {
    super(
      `invalid energy system dataset${source ? ` '${source}'` : ""}: ${issues
        .slice(0, 5)
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join("; ")}`,
    );
    this.name = "DatasetValidationError";
    this.details = { source, issues };
  }
}

function key(...parts: string[]): string {
  return JSON.stringify(parts);
}

function pushUnique<T>(index: Map<string, T[]>, indexKey: string, value: T, identity: string, seen: Set<string>): void {
  if (seen.has(identity)) {
    return;
  }
  seen.add(identity);
  const bucket = index.get(indexKey);
  if (bucket) {
    bucket.push(value);
  } else {
    index.set(indexKey, [value]);
  }
}

function addTo(totals: Map<string, number>, totalKey: string, amount: number): void {
  totals.set(totalKey, (totals.get(totalKey) ?? 0) + amount);
}

/**
 * In-memory {@link EnergySystemModel} built from a validated dataset. Indexes
 * are computed once in the constructor; every query is a lookup afterwards,
 * so one instance can be shared by all jobs of a batch.
 */
export class EnergySystemSnapshot implements EnergySystemModel {
  readonly name: string | null;
  private readonly dataset: EnergySystemDataset;
  private readonly horizon: readonly string[];
  private readonly optimised: readonly string[];
  private readonly keys: ProcessKey[] = [];
  private readonly inputsByProcess = new Map<string, string[]>();
  private readonly outputsByProcess = new Map<string, string[]>();
  private readonly outputsByProcessInput = new Map<string, string[]>();
  private readonly consumersByCarrier = new Map<string, TechVintage[]>();
  private readonly producersByCarrier = new Map<string, TechVintage[]>();
  private readonly vintagesByPeriodTech = new Map<string, string[]>();
  private readonly capacities = new Map<string, number>();
  private readonly available = new Map<string, number>();
  private readonly explicitActivity = new Map<string, number>();
  private readonly derivedActivity = new Map<string, number>();
  private readonly flowsIn = new Map<string, number>();
  private readonly flowsOut = new Map<string, number>();
  private readonly consumption = new Map<string, number>();
  private readonly production = new Map<string, number>();
  private readonly emissionTotals = new Map<string, number>();
  private readonly emissionKeys: EmissionKey[];

  constructor(dataset: EnergySystemDataset) {
    this.dataset = dataset;
    this.name = dataset.name ?? null;
    this.horizon = sortIdentifiers(dataset.periods.horizon);
    this.optimised = dataset.periods.optimised ? sortIdentifiers(dataset.periods.optimised) : this.horizon;

    const seen = new Set<string>();
    for (const process of dataset.processes) {
      const { period, tech, vintage } = process;
      const processKey = key(period, tech, vintage);
      if (!seen.has(`process:${processKey}`)) {
        seen.add(`process:${processKey}`);
        this.keys.push([period, tech, vintage]);
        pushUnique(this.vintagesByPeriodTech, key(period, tech), vintage, `vintage:${processKey}`, seen);
      }
      for (const { input, output } of process.efficiency) {
        pushUnique(this.inputsByProcess, processKey, input, `in:${key(period, tech, vintage, input)}`, seen);
        pushUnique(this.outputsByProcess, processKey, output, `out:${key(period, tech, vintage, output)}`, seen);
        pushUnique(
          this.outputsByProcessInput,
          key(period, tech, vintage, input),
          output,
          `io:${key(period, tech, vintage, input, output)}`,
          seen,
        );
        pushUnique(this.consumersByCarrier, input, [tech, vintage], `consumer:${key(input, tech, vintage)}`, seen);
        pushUnique(this.producersByCarrier, output, [tech, vintage], `producer:${key(output, tech, vintage)}`, seen);
      }
    }

    for (const entry of dataset.capacity) {
      this.capacities.set(key(entry.tech, entry.vintage), entry.value);
    }
    for (const entry of dataset.capacityAvailable) {
      this.available.set(key(entry.period, entry.tech), entry.value);
    }
    for (const entry of dataset.activity) {
      this.explicitActivity.set(key(entry.period, entry.tech, entry.vintage), entry.value);
    }
    for (const flow of dataset.flows) {
      const sliceKey = key(flow.period, flow.season, flow.timeOfDay, flow.input, flow.tech, flow.vintage, flow.output);
      addTo(this.flowsIn, sliceKey, flow.in);
      addTo(this.flowsOut, sliceKey, flow.out);
      addTo(this.consumption, key(flow.period, flow.input, flow.tech), flow.in);
      addTo(this.production, key(flow.period, flow.tech, flow.output), flow.out);
      addTo(this.derivedActivity, key(flow.period, flow.tech, flow.vintage), flow.out);
    }
    for (const entry of dataset.emissionTotals) {
      addTo(this.emissionTotals, key(entry.emission, entry.period, entry.tech), entry.value);
    }
    this.emissionKeys = dataset.emissionFactors.map(
      (factor): EmissionKey => [factor.emission, factor.input, factor.tech, factor.vintage, factor.output],
    );
  }

  /**
   * Validates an already parsed JSON value.
   *
   * @throws {DatasetValidationError} when the value does not match the schema.
   */
  static fromDataset(raw: unknown, source: string | null = null): EnergySystemSnapshot {
    const parsed = EnergySystemDatasetSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DatasetValidationError(
        source,
        parsed.error.issues.map((issue) => ({ path: issue.path.join(".") || "(root)", message: issue.message })),
      );
    }
    return new EnergySystemSnapshot(parsed.data);
  }

  periods(): readonly string[] {
    return this.horizon;
  }

  optimisedPeriods(): readonly string[] {
    return this.optimised;
  }

  technologies(): readonly string[] {
    return this.dataset.technologies;
  }

  carriers(): readonly string[] {
    return this.dataset.carriers;
  }

  emissionCommodities(): readonly string[] {
    return this.dataset.emissions;
  }

  seasons(): readonly string[] {
    return this.dataset.seasons;
  }

  timesOfDay(): readonly string[] {
    return this.dataset.timesOfDay;
  }

  processKeys(): readonly ProcessKey[] {
    return this.keys;
  }

  processInputs(period: string, tech: string, vintage: string): readonly string[] {
    return this.inputsByProcess.get(key(period, tech, vintage)) ?? [];
  }

  processOutputs(period: string, tech: string, vintage: string): readonly string[] {
    return this.outputsByProcess.get(key(period, tech, vintage)) ?? [];
  }

  processOutputsByInput(period: string, tech: string, vintage: string, input: string): readonly string[] {
    return this.outputsByProcessInput.get(key(period, tech, vintage, input)) ?? [];
  }

  processesByInput(carrier: string): readonly TechVintage[] {
    return this.consumersByCarrier.get(carrier) ?? [];
  }

  processesByOutput(carrier: string): readonly TechVintage[] {
    return this.producersByCarrier.get(carrier) ?? [];
  }

  processVintages(period: string, tech: string): readonly string[] {
    return this.vintagesByPeriodTech.get(key(period, tech)) ?? [];
  }

  isValidActivity(period: string, tech: string, vintage: string): boolean {
    return this.inputsByProcess.has(key(period, tech, vintage));
  }

  capacity(tech: string, vintage: string): number {
    return this.capacities.get(key(tech, vintage)) ?? 0;
  }

  capacityAvailable(period: string, tech: string): number | null {
    return this.available.get(key(period, tech)) ?? null;
  }

  /** Explicit activity when the dataset lists one, otherwise the summed output flows. */
  activity(period: string, tech: string, vintage: string): number {
    const processKey = key(period, tech, vintage);
    return this.explicitActivity.get(processKey) ?? this.derivedActivity.get(processKey) ?? 0;
  }

  flowIn(period: string, season: string, timeOfDay: string, input: string, tech: string, vintage: string, output: string): number {
    return this.flowsIn.get(key(period, season, timeOfDay, input, tech, vintage, output)) ?? 0;
  }

  flowOut(period: string, season: string, timeOfDay: string, input: string, tech: string, vintage: string, output: string): number {
    return this.flowsOut.get(key(period, season, timeOfDay, input, tech, vintage, output)) ?? 0;
  }

  energyConsumption(period: string, input: string, tech: string): number {
    return this.consumption.get(key(period, input, tech)) ?? 0;
  }

  activityByOutput(period: string, tech: string, output: string): number {
    return this.production.get(key(period, tech, output)) ?? 0;
  }

  emissionActivityKeys(): readonly EmissionKey[] {
    return this.emissionKeys;
  }

  emissionActivity(emission: string, period: string, tech: string): number {
    return this.emissionTotals.get(key(emission, period, tech)) ?? 0;
  }
}

/**
 * Reads and validates a JSON dataset from disk.
 *
 * @throws {DatasetValidationError} when the file is not valid JSON or does not match the schema.
 */
export async function loadEnergySystemSnapshot(filePath: string): Promise<EnergySystemSnapshot> {
  const contents = await readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new DatasetValidationError(filePath, [
      { path: "(root)", message: error instanceof Error ? error.message : String(error) },
    ]);
  }
  return EnergySystemSnapshot.fromDataset(raw, filePath);
}
