import { describe, it } from "mocha";
import { expect } from "chai";

import { CliUsageError, parseCliOptions } from "../src/cliOptions.js";

describe("parseCliOptions", () => {
  it("resolves the dataset and collects overrides", () => {
    const options = parseCliOptions(
      [
        "data/utopia.json",
        "--format",
        "png",
        "--concurrency=3",
        "--sequential",
        "--no-splines",
        "--show-capacity",
        "--threshold",
        "0.5",
        "--output",
        "out",
        "--log-file=logs/run.log",
      ],
      "/work",
    );

    expect(options).to.deep.equal({
      datasetPath: "/work/data/utopia.json",
      overrides: {
        imageFormat: "png",
        concurrency: 3,
        mode: "sequential",
        splines: false,
        showCapacity: true,
        significanceThreshold: 0.5,
        outputRoot: "/work/out",
        logFile: "/work/logs/run.log",
      },
      families: null,
      help: false,
    });
  });

  it("normalises choices and splits the family list", () => {
    const options = parseCliOptions(
      ["model.json", "--layout", "EXPLICIT_VINTAGES", "--families", "commodity, process", "--mode=parallel"],
      "/work",
    );

    expect(options.overrides).to.deep.equal({ processLayout: "explicit_vintages", mode: "parallel" });
    expect(options.families).to.deep.equal(["commodity", "process"]);
  });

  it("keeps values containing '=' after the first one", () => {
    const options = parseCliOptions(["model.json", "--renderer=/opt/graphviz=9/bin/dot"], "/work");
    expect(options.overrides.rendererCommand).to.equal("/opt/graphviz=9/bin/dot");
  });

  it("accepts --help without a dataset", () => {
    expect(parseCliOptions(["--help"], "/work")).to.deep.equal({
      datasetPath: null,
      overrides: {},
      families: null,
      help: true,
    });
  });

  const failures: Array<[string, string[], string]> = [
    ["a missing dataset", [], "a dataset path is required."],
    ["a second dataset", ["a.json", "b.json"], "unexpected argument 'b.json': only one dataset can be given."],
    ["an unknown flag", ["a.json", "--bogus"], "unknown option '--bogus'."],
    ["a flag without its value", ["a.json", "--format"], "--format requires a value."],
    ["a flag followed by another flag", ["a.json", "--output", "--sequential"], "--output requires a value."],
    ["an unknown format", ["a.json", "--format", "bmp"], "--format must be one of svg, png, pdf, gif, jpg, ps; received 'bmp'."],
    ["a zero concurrency", ["a.json", "--concurrency=0"], "--concurrency must be an integer >= 1; received '0'."],
    ["a negative threshold", ["a.json", "--threshold", "-1"], "--threshold must be a non-negative number; received '-1'."],
    ["an empty family list", ["a.json", "--families="], "--families requires at least one family."],
    [
      "an unknown family",
      ["a.json", "--families", "commodity,maps"],
      "--families must be one of complete_system, main_model, commodity, process, period_results, tech_results, flow_segments, commodity_results; received 'maps'.",
    ],
  ];

  for (const [label, argv, message] of failures) {
    it(`rejects ${label}`, () => {
      expect(() => parseCliOptions(argv, "/work"))
        .to.throw(CliUsageError)
        .with.property("message", message);
    });
  }
});
