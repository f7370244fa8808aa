import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdir, readdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { prepareRunDirectory, RunDirectoryError, RunLayout, runNameFor } from "../src/output/runLayout.js";
import { PathResolutionError } from "../src/paths.js";
import { listFiles, withTempDir } from "./helpers/diagramContext.js";

async function directoryTree(root: string): Promise<Record<string, string[]>> {
  const tree: Record<string, string[]> = {};
  for (const name of (await readdir(root)).sort()) {
    tree[name] = (await readdir(path.join(root, name))).sort();
  }
  return tree;
}

describe("output/runLayout", () => {
  it("names the run after the dataset", () => {
    expect(runNameFor("/data/utopia.json")).to.equal("images_utopia");
    expect(runNameFor("models/two words.json")).to.equal("images_two_words");
  });

  it("creates the run tree with one folder per category", async () => {
    await withTempDir(async (outputRoot) => {
      const layout = await prepareRunDirectory({ outputRoot, datasetPath: "/data/utopia.json" });

      expect(layout.root).to.equal(path.join(outputRoot, "images_utopia"));
      expect(await directoryTree(layout.root)).to.deep.equal({ commodities: [], processes: [], results: [] });
    });
  });

  it("leaves the same empty tree behind on every call", async () => {
    await withTempDir(async (outputRoot) => {
      const first = await prepareRunDirectory({ outputRoot, datasetPath: "utopia.json" });
      await writeFile(path.join(first.directory("results"), "results2020.dot"), "strict digraph model {}\n");
      await writeFile(path.join(first.root, "simple_model.svg"), "<svg/>");
      await mkdir(path.join(first.root, "stale"));

      const second = await prepareRunDirectory({ outputRoot, datasetPath: "utopia.json" });

      expect(second.root).to.equal(first.root);
      expect(await directoryTree(second.root)).to.deep.equal({ commodities: [], processes: [], results: [] });
      expect(await listFiles(second.root)).to.deep.equal([]);
    });
  });

  it("does not touch siblings of the run directory", async () => {
    await withTempDir(async (outputRoot) => {
      await writeFile(path.join(outputRoot, "keep.txt"), "keep");
      await prepareRunDirectory({ outputRoot, datasetPath: "utopia.json" });
      expect(await listFiles(outputRoot)).to.deep.equal(["keep.txt"]);
    });
  });

  it("computes absolute artifact paths and root-relative links", () => {
    const layout = new RunLayout("/srv/out", "images_utopia");

    expect(layout.artifactPaths("commodities", "commodity_ELC", "svg")).to.deep.equal({
      dotPath: "/srv/out/images_utopia/commodities/commodity_ELC.dot",
      imagePath: "/srv/out/images_utopia/commodities/commodity_ELC.svg",
      relativeImagePath: "commodities/commodity_ELC.svg",
    });
    expect(layout.artifactPaths("root", "simple_model", "png").relativeImagePath).to.equal("simple_model.png");
  });

  it("refuses stems leaving their category folder", () => {
    const layout = new RunLayout("/srv/out", "images_utopia");
    expect(() => layout.artifactPaths("results", "../../escape", "svg")).to.throw(PathResolutionError);
  });

  it("reports filesystem failures as RunDirectoryError", async () => {
    await withTempDir(async (directory) => {
      const blocker = path.join(directory, "blocker");
      await writeFile(blocker, "not a directory");

      try {
        await prepareRunDirectory({ outputRoot: blocker, datasetPath: "utopia.json" });
        expect.fail("expected a RunDirectoryError");
      } catch (error) {
        expect(error).to.be.instanceOf(RunDirectoryError);
        if (error instanceof RunDirectoryError) {
          expect(error.code).to.equal("E-RUN-DIRECTORY");
          expect(error.details.runDirectory).to.equal(path.join(blocker, "images_utopia"));
        }
      }
    });
  });
});
