import { describe, it } from "mocha";
import { expect } from "chai";

import {
  readOptionalBool,
  readOptionalEnum,
  readOptionalInt,
  readOptionalNumber,
  readOptionalString,
} from "../src/config/env.js";

describe("config/env", () => {
  it("parses boolean literals case-insensitively", () => {
    expect(readOptionalBool("FLAG", { FLAG: " On " })).to.equal(true);
    expect(readOptionalBool("FLAG", { FLAG: "NO" })).to.equal(false);
    expect(readOptionalBool("FLAG", { FLAG: "maybe" })).to.equal(undefined);
    expect(readOptionalBool("FLAG", {})).to.equal(undefined);
  });

  it("parses integers within bounds", () => {
    expect(readOptionalInt("N", { min: 1 }, { N: "+4" })).to.equal(4);
    expect(readOptionalInt("N", { min: 1 }, { N: "0" })).to.equal(undefined);
    expect(readOptionalInt("N", { max: 10 }, { N: "11" })).to.equal(undefined);
    expect(readOptionalInt("N", undefined, { N: "4.5" })).to.equal(undefined);
  });

  it("parses finite numbers", () => {
    expect(readOptionalNumber("X", { min: 0 }, { X: "1e-3" })).to.equal(0.001);
    expect(readOptionalNumber("X", undefined, { X: "Infinity" })).to.equal(undefined);
    expect(readOptionalNumber("X", undefined, { X: "abc" })).to.equal(undefined);
  });

  it("treats blank strings as unset", () => {
    expect(readOptionalString("S", { S: "   " })).to.equal(undefined);
    expect(readOptionalString("S", { S: "  dot " })).to.equal("dot");
  });

  it("returns the canonical spelling of enum values", () => {
    const formats = ["svg", "png"] as const;
    expect(readOptionalEnum("F", formats, { F: "SVG" })).to.equal("svg");
    expect(readOptionalEnum("F", formats, { F: "bmp" })).to.equal(undefined);
  });
});
