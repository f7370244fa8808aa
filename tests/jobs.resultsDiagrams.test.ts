import { readFile } from "node:fs/promises";

import { describe, it } from "mocha";
import { expect } from "chai";

import { EnergySystemSnapshot } from "../src/domain/snapshot.js";
import { CommodityResultsJob, computeModelUsage } from "../src/jobs/commodityDiagrams.js";
import { FlowSegmentsJob, PeriodResultsJob, TechResultsJob } from "../src/jobs/resultsDiagrams.js";
import { listFiles, prepareJobContext, withTempDir } from "./helpers/diagramContext.js";

describe("period results diagram", () => {
  it("labels used technologies with capacity and flows with magnitudes", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      const result = await new PeriodResultsJob("2020").run(context);
      expect(result.status).to.equal("succeeded");

      const text = await readFile(layout.artifactPaths("results", "results2020", "svg").dotPath, "utf8");
      expect(text).to.include('\tlabel = "Results for 2020" ;');
      expect(text).to.include(
        [
          '\t\t"GASPLANT" [ label="GASPLANT\\nCapacity: 5.00", href="results_GASPLANT_2020.svg" ] ;',
          '\t\t"HEATER"   [ label="HEATER\\nCapacity: 3.00", href="results_HEATER_2020.svg" ] ;',
          '\t\t"IMPGAS"   [ label="IMPGAS\\nCapacity: 10.00", href="results_IMPGAS_2020.svg" ] ;',
        ].join("\n"),
      );
      expect(text).to.include(
        [
          "\t\tsubgraph outputs {",
          '\t\t\tedge [ color="forestgreen" ] ;',
          "",
          '\t\t\t"GASPLANT" -> "CO2"  [ label="1.20" ] ;',
          '\t\t\t"GASPLANT" -> "ELC"  [ label="3.00" ] ;',
          '\t\t\t"HEATER"   -> "HEAT" [ label="1.80" ] ;',
          '\t\t\t"IMPGAS"   -> "GAS"  [ label="6.00" ] ;',
          "\t\t}",
        ].join("\n"),
      );
      expect(text).to.include('\t\t"ethos" [ href="../commodities/rc_ethos_2020.svg" ] ;');
      expect(text).to.include(
        [
          "\tsubgraph unused_techs {",
          '\t\tnode [ color="powderblue", fontcolor="chocolate", shape="box" ] ;',
          "",
          "\t\t// no nodes in this section",
          "\t}",
        ].join("\n"),
      );
    });
  });

  it("moves flows under the significance threshold to the unused sections", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory, { significanceThreshold: 2.5 });
      await new PeriodResultsJob("2020").run(context);
      const text = await readFile(layout.artifactPaths("results", "results2020", "svg").dotPath, "utf8");

      expect(text).to.include(
        [
          "\tsubgraph unused_flows {",
          '\t\tedge [ color="powderblue" ] ;',
          "",
          '\t\t"ELC"    -> "HEATER" ;',
          '\t\t"HEATER" -> "HEAT" ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include(
        [
          "\tsubgraph unused_energy_carriers {",
          '\t\tnode [ color="powderblue", fontcolor="chocolate", shape="circle" ] ;',
          "",
          '\t\t"HEAT" ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include(
        [
          "\tsubgraph unused_emissions {",
          '\t\tnode [ color="powderblue", fontcolor="chocolate", shape="circle" ] ;',
          "",
          '\t\t"CO2" ;',
          "\t}",
        ].join("\n"),
      );
    });
  });

  it("draws technologies with zero available capacity as unused", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      await new PeriodResultsJob("2030").run(context);
      const text = await readFile(layout.artifactPaths("results", "results2030", "svg").dotPath, "utf8");

      expect(text).to.include(
        [
          "\tsubgraph unused_techs {",
          '\t\tnode [ color="powderblue", fontcolor="chocolate", shape="box" ] ;',
          "",
          '\t\t"SOLAR" ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include('\t\t"ethos" -> "SOLAR" ;');
    });
  });

  it("skips a period without available capacity", async () => {
    await withTempDir(async (directory) => {
      const { context } = await prepareJobContext(directory);
      const model = EnergySystemSnapshot.fromDataset({
        periods: { horizon: [2020] },
        seasons: ["all"],
        timesOfDay: ["all"],
        technologies: ["PUMP"],
        carriers: ["ELC", "WATER"],
        processes: [{ period: 2020, tech: "PUMP", vintage: 2020, efficiency: [{ input: "ELC", output: "WATER" }] }],
      });
      const result = await new PeriodResultsJob("2020").run({ ...context, model });

      expect(result).to.deep.equal({ status: "skipped", reason: "no technology has capacity available in 2020" });
    });
  });
});

describe("technology results diagram", () => {
  it("sums flows over time slices per active vintage", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      await new TechResultsJob("GASPLANT", "2020").run(context);
      const text = await readFile(layout.artifactPaths("results", "results_GASPLANT_2020", "svg").dotPath, "utf8");

      expect(text).to.include(
        [
          "\tsubgraph cluster_vintages {",
          '\t\tlabel = "Vintages\\nCapacity: 5.00" ;',
          '\t\thref = "results2020.svg" ;',
          '\t\tstyle = "filled" ;',
          '\t\tcolor = "lightgrey" ;',
          "",
          '\t\tnode [ color="white", shape="box" ] ;',
          "",
          '\t\t"2020" [ href="results_GASPLANT_p2020v2020_segments.svg", label="2020\\nCap: 5.00" ] ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include('\t\t"GAS" -> "2020" [ label="6.00" ] ;');
      expect(text).to.include('\t\t"2020" -> "ELC" [ label="3.00" ] ;');
    });
  });

  it("skips a technology with no activity in the period", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      const result = await new TechResultsJob("SOLAR", "2030").run(context);

      expect(result).to.deep.equal({ status: "skipped", reason: "no vintage of 'SOLAR' is active in 2030" });
      expect(await listFiles(layout.directory("results"))).to.deep.equal([]);
    });
  });
});

describe("flow segments diagram", () => {
  it("splits one process's activity by time slice", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      await new FlowSegmentsJob("GASPLANT", "2020", "2020").run(context);
      const text = await readFile(
        layout.artifactPaths("results", "results_GASPLANT_p2020v2020_segments", "svg").dotPath,
        "utf8",
      );

      expect(text).to.include('\tlabel = "Activity split of process GASPLANT, 2020 in year 2020" ;');
      expect(text).to.include('\t\tlabel = "2020 Capacity: 5.00" ;');
      expect(text).to.include(
        [
          "\tsubgraph outputs {",
          '\t\tedge [ color="forestgreen" ] ;',
          "",
          '\t\t"summer, day" -> "ELC" [ label="1.00" ] ;',
          '\t\t"winter, day" -> "ELC" [ label="2.00" ] ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include(
        [
          '\t\t"GAS" -> "summer, day" [ label="2.00" ] ;',
          '\t\t"GAS" -> "winter, day" [ label="4.00" ] ;',
        ].join("\n"),
      );
    });
  });

  it("labels the slice cluster with the capacity available in the period", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      const model = EnergySystemSnapshot.fromDataset({
        periods: { horizon: [2020] },
        seasons: ["winter"],
        timesOfDay: ["day"],
        technologies: ["CHP"],
        carriers: ["GAS", "ELC"],
        processes: [{ period: 2020, tech: "CHP", vintage: 2015, efficiency: [{ input: "GAS", output: "ELC" }] }],
        capacity: [{ tech: "CHP", vintage: 2015, value: 7 }],
        capacityAvailable: [{ period: 2020, tech: "CHP", value: 4.5 }],
        flows: [
          { period: 2020, season: "winter", timeOfDay: "day", input: "GAS", tech: "CHP", vintage: 2015, output: "ELC", in: 2, out: 1 },
        ],
      });
      await new FlowSegmentsJob("CHP", "2020", "2015").run({ ...context, model });
      const text = await readFile(layout.artifactPaths("results", "results_CHP_p2020v2015_segments", "svg").dotPath, "utf8");

      expect(text).to.include('\t\tlabel = "2015 Capacity: 4.50" ;');
    });
  });

  it("draws every input/output pair of the process in one artifact", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      const model = EnergySystemSnapshot.fromDataset({
        periods: { horizon: [2020] },
        seasons: ["winter"],
        timesOfDay: ["day"],
        technologies: ["CHP"],
        carriers: ["GAS", "ELC", "HEAT"],
        processes: [
          {
            period: 2020,
            tech: "CHP",
            vintage: 2020,
            efficiency: [
              { input: "GAS", output: "ELC" },
              { input: "GAS", output: "HEAT" },
            ],
          },
        ],
        flows: [
          { period: 2020, season: "winter", timeOfDay: "day", input: "GAS", tech: "CHP", vintage: 2020, output: "ELC", in: 2, out: 1 },
          { period: 2020, season: "winter", timeOfDay: "day", input: "GAS", tech: "CHP", vintage: 2020, output: "HEAT", in: 3, out: 2.5 },
        ],
      });
      await new FlowSegmentsJob("CHP", "2020", "2020").run({ ...context, model });
      const text = await readFile(layout.artifactPaths("results", "results_CHP_p2020v2020_segments", "svg").dotPath, "utf8");

      expect(text).to.include(
        [
          '\t\t"winter, day" -> "ELC"  [ label="1.00" ] ;',
          '\t\t"winter, day" -> "HEAT" [ label="2.50" ] ;',
        ].join("\n"),
      );
    });
  });

  it("skips a process without input flow", async () => {
    await withTempDir(async (directory) => {
      const { context } = await prepareJobContext(directory);
      const result = await new FlowSegmentsJob("SOLAR", "2030", "2030").run(context);

      expect(result).to.deep.equal({ status: "skipped", reason: "process 'SOLAR' (2030) has no input flow in 2030" });
    });
  });
});

describe("commodity results diagram", () => {
  it("splits connected technologies into used and unused", async () => {
    await withTempDir(async (directory) => {
      const { context, layout } = await prepareJobContext(directory);
      const usage = computeModelUsage(context.model);
      const result = await new CommodityResultsJob("ELC", "2020", usage).run(context);
      expect(result.status).to.equal("succeeded");

      const text = await readFile(layout.artifactPaths("commodities", "rc_ELC_2020", "svg").dotPath, "utf8");
      expect(text).to.include('\tlabel = "ELC - 2020" ;');
      expect(text).to.include('\t"ELC" [ color="lightsteelblue", href="../results/results2020.svg", shape="circle" ] ;');
      expect(text).to.include(
        [
          "\tsubgraph used_techs {",
          '\t\tnode [ color="darkseagreen" ] ;',
          "",
          '\t\t"GASPLANT" [ href="../results/results_GASPLANT_2020.svg" ] ;',
          '\t\t"HEATER"   [ href="../results/results_HEATER_2020.svg" ] ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include(
        [
          "\tsubgraph unused_techs {",
          '\t\tnode [ color="powderblue" ] ;',
          "",
          '\t\t"SOLAR" ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include(
        [
          "\tsubgraph in_use_flows {",
          '\t\tedge [ color="forestgreen" ] ;',
          "",
          '\t\t"ELC"      -> "HEATER" ;',
          '\t\t"GASPLANT" -> "ELC" ;',
          "\t}",
        ].join("\n"),
      );
      expect(text).to.include('\t\t"SOLAR" -> "ELC" ;');
    });
  });
});
