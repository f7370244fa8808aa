import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, it } from "mocha";
import { expect } from "chai";

import { DatasetValidationError } from "../src/domain/snapshot.js";
import { runDiagramBatch } from "../src/runner.js";
import { DEMO_DATASET_PATH, FakeRenderer, listFiles, loadDemoModel, testConfig, withTempDir } from "./helpers/diagramContext.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const EXPECTED_ARTIFACTS = [
  "all_vintages_model.dot",
  "commodities/commodity_ELC.dot",
  "commodities/commodity_GAS.dot",
  "commodities/commodity_HEAT.dot",
  "commodities/commodity_ethos.dot",
  "commodities/rc_ELC_2020.dot",
  "commodities/rc_ELC_2030.dot",
  "commodities/rc_GAS_2020.dot",
  "commodities/rc_GAS_2030.dot",
  "commodities/rc_HEAT_2020.dot",
  "commodities/rc_HEAT_2030.dot",
  "commodities/rc_ethos_2020.dot",
  "commodities/rc_ethos_2030.dot",
  "processes/process_GASPLANT.dot",
  "processes/process_HEATER.dot",
  "processes/process_IMPGAS.dot",
  "processes/process_SOLAR.dot",
  "results/results2020.dot",
  "results/results2030.dot",
  "results/results_GASPLANT_2020.dot",
  "results/results_GASPLANT_2030.dot",
  "results/results_GASPLANT_p2020v2020_segments.dot",
  "results/results_GASPLANT_p2030v2020_segments.dot",
  "results/results_HEATER_2020.dot",
  "results/results_HEATER_p2020v2020_segments.dot",
  "results/results_IMPGAS_2020.dot",
  "results/results_IMPGAS_p2020v2020_segments.dot",
  "simple_model.dot",
];

describe("runDiagramBatch", () => {
  it("writes every diagram of the demo dataset and reports a clean batch", async () => {
    await withTempDir(async (directory) => {
      const logger = new RecordingLogger("info");
      const renderer = new FakeRenderer();
      const { layout, report } = await runDiagramBatch({
        datasetPath: DEMO_DATASET_PATH,
        config: testConfig(directory),
        logger,
        renderer,
      });

      expect(layout.root).to.equal(path.join(directory, "images_demo-system"));
      expect(report.status).to.equal("clean");
      expect(report.outcomes).to.have.length(29);
      expect(report.counts).to.deep.equal({
        succeeded: 28,
        skipped: 1,
        renderer_failed: 0,
        write_failed: 0,
        failed: 0,
        timed_out: 0,
        cancelled: 0,
      });
      expect(renderer.requests).to.have.length(28);
      expect(await listFiles(layout.root)).to.deep.equal(EXPECTED_ARTIFACTS);

      const [planned] = logger.byMessage("batch_planned");
      expect(planned?.payload).to.deep.equal({ jobs: 29, concurrency: 2 });
      const [skipped] = logger.byMessage("job_skipped");
      expect(skipped?.payload).to.deep.include({
        job_id: "tech_results:SOLAR/2030",
        reason: "no vintage of 'SOLAR' is active in 2030",
      });
      const [complete] = logger.byMessage("batch_complete");
      expect(complete?.level).to.equal("info");
      expect(complete?.payload).to.deep.include({ status: "clean", succeeded: 28, skipped: 1 });
      expect(logger.byMessage("job_succeeded")).to.have.length(28);
      expect(logger.messages()[0]).to.equal("run_directory_ready");
    });
  });

  it("isolates a renderer failure and degrades the batch", async () => {
    await withTempDir(async (directory) => {
      const logger = new RecordingLogger("info");
      const renderer = new FakeRenderer((request) =>
        request.inputPath.endsWith("commodity_GAS.dot")
          ? { ok: false, reason: "exit_code", exitCode: 1, signal: null, stderr: "Error: syntax", message: "dot exited with code 1" }
          : { ok: true },
      );
      const { layout, report } = await runDiagramBatch({
        datasetPath: DEMO_DATASET_PATH,
        config: testConfig(directory, { mode: "sequential" }),
        logger,
        renderer,
      });

      expect(report.status).to.equal("degraded");
      expect(report.counts.succeeded).to.equal(27);
      expect(report.counts.renderer_failed).to.equal(1);
      const failed = report.outcomes.find((outcome) => outcome.status === "renderer_failed");
      expect(failed?.jobId).to.equal("commodity:GAS");
      expect(failed?.error).to.deep.equal({
        name: "RendererFailure",
        code: "exit_code",
        message: "dot exited with code 1",
        stderr: "Error: syntax",
      });
      expect(await listFiles(layout.directory("commodities"))).to.include("commodity_GAS.dot");

      const [jobFailed] = logger.byMessage("job_failed");
      expect(jobFailed?.level).to.equal("error");
      expect(jobFailed?.payload).to.deep.include({ job_id: "commodity:GAS", status: "renderer_failed" });
      const [complete] = logger.byMessage("batch_complete");
      expect(complete?.level).to.equal("warn");
    });
  });

  it("plans only the requested families", async () => {
    await withTempDir(async (directory) => {
      const { layout, report } = await runDiagramBatch({
        datasetPath: DEMO_DATASET_PATH,
        config: testConfig(directory),
        logger: new RecordingLogger(),
        renderer: new FakeRenderer(),
        families: ["main_model", "period_results"],
      });

      expect(report.outcomes.map((outcome) => outcome.jobId)).to.deep.equal([
        "main_model",
        "period_results:2020",
        "period_results:2030",
      ]);
      expect(await listFiles(layout.root)).to.deep.equal([
        "results/results2020.dot",
        "results/results2030.dot",
        "simple_model.dot",
      ]);
    });
  });

  it("replaces artifacts left by a previous run", async () => {
    await withTempDir(async (directory) => {
      const stale = path.join(directory, "images_demo-system", "results", "stale.dot");
      await mkdir(path.dirname(stale), { recursive: true });
      await writeFile(stale, "digraph old {}\n", "utf8");

      const { layout } = await runDiagramBatch({
        datasetPath: DEMO_DATASET_PATH,
        config: testConfig(directory),
        logger: new RecordingLogger(),
        renderer: new FakeRenderer(),
        families: ["main_model"],
      });

      expect(await listFiles(layout.root)).to.deep.equal(["simple_model.dot"]);
    });
  });

  it("cancels every job when the signal is already aborted", async () => {
    await withTempDir(async (directory) => {
      const controller = new AbortController();
      controller.abort();
      const renderer = new FakeRenderer();
      const { report } = await runDiagramBatch({
        datasetPath: DEMO_DATASET_PATH,
        config: testConfig(directory),
        logger: new RecordingLogger(),
        renderer,
        signal: controller.signal,
      });

      expect(report.status).to.equal("degraded");
      expect(report.counts.cancelled).to.equal(29);
      expect(renderer.requests).to.have.length(0);
    });
  });

  it("rejects an invalid dataset before touching the output root", async () => {
    await withTempDir(async (directory) => {
      const datasetPath = path.join(directory, "broken.json");
      await writeFile(datasetPath, "{ not json", "utf8");
      const outputRoot = path.join(directory, "out");

      let caught: unknown = null;
      try {
        await runDiagramBatch({
          datasetPath,
          config: testConfig(outputRoot),
          logger: new RecordingLogger(),
          renderer: new FakeRenderer(),
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(DatasetValidationError);
      expect(await listFiles(directory)).to.deep.equal(["broken.json"]);
    });
  });

  it("uses a pre-loaded model without reading the dataset path", async () => {
    await withTempDir(async (directory) => {
      const { layout, report } = await runDiagramBatch({
        datasetPath: path.join(directory, "missing.json"),
        config: testConfig(path.join(directory, "out")),
        logger: new RecordingLogger(),
        renderer: new FakeRenderer(),
        model: await loadDemoModel(),
        families: ["main_model"],
      });

      expect(layout.runName).to.equal("images_missing");
      expect(report.counts.succeeded).to.equal(1);
    });
  });
});
