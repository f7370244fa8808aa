import { describe, it } from "mocha";
import { expect } from "chai";
import type { SpawnOptions } from "node:child_process";

import { createChildProcessGateway } from "../src/gateways/childProcess.js";
import { RendererInvoker, STDERR_CAPTURE_LIMIT } from "../src/render/renderer.js";
import { FakeChildProcess } from "./helpers/fakeChildProcess.js";

const REQUEST = { format: "svg", inputPath: "/run/commodities/commodity_ELC.dot", outputPath: "/run/commodities/commodity_ELC.svg" };

/** Gateway whose children follow {@link script}; spawn calls are recorded. */
function scriptedGateway(script: (child: FakeChildProcess) => void) {
  const calls: Array<{ command: string; args: readonly string[]; options: SpawnOptions; child: FakeChildProcess }> = [];
  const gateway = createChildProcessGateway({
    spawnImpl(command, args, options) {
      const child = new FakeChildProcess();
      calls.push({ command, args, options, child });
      script(child);
      return child;
    },
  });
  return { gateway, calls };
}

describe("render/renderer", () => {
  it("builds the Graphviz argument list", () => {
    expect(RendererInvoker.argumentsFor(REQUEST)).to.deep.equal([
      "-Tsvg",
      "-o/run/commodities/commodity_ELC.svg",
      "/run/commodities/commodity_ELC.dot",
    ]);
  });

  it("reports success when the renderer exits with code 0", async () => {
    const { gateway, calls } = scriptedGateway((child) => child.exitWith(0));
    const renderer = new RendererInvoker({ gateway, inheritEnv: { PATH: "/usr/bin", API_TOKEN: "test-secret" } });

    const result = await renderer.render(REQUEST);

    expect(result).to.deep.equal({ ok: true });
    expect(calls[0].command).to.equal("dot");
    expect(calls[0].args).to.deep.equal(RendererInvoker.argumentsFor(REQUEST));
    expect(calls[0].options.stdio).to.deep.equal(["ignore", "ignore", "pipe"]);
    expect(calls[0].options.shell).to.equal(false);
    expect(calls[0].options.env).to.deep.equal({ PATH: "/usr/bin" });
  });

  it("uses the configured command", async () => {
    const { gateway, calls } = scriptedGateway((child) => child.exitWith(0));
    await new RendererInvoker({ command: "/opt/graphviz/bin/dot", gateway }).render(REQUEST);
    expect(calls[0].command).to.equal("/opt/graphviz/bin/dot");
  });

  it("captures stderr of a non-zero exit", async () => {
    const { gateway } = scriptedGateway((child) => child.exitWith(1, "Error: syntax error in line 3\n"));

    const result = await new RendererInvoker({ gateway }).render(REQUEST);

    expect(result).to.deep.equal({
      ok: false,
      reason: "exit_code",
      exitCode: 1,
      signal: null,
      stderr: "Error: syntax error in line 3\n",
      message: "renderer exited with code 1",
    });
  });

  it("truncates captured stderr", async () => {
    const { gateway } = scriptedGateway((child) => child.exitWith(2, "x".repeat(STDERR_CAPTURE_LIMIT + 500)));

    const result = await new RendererInvoker({ gateway }).render(REQUEST);

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.stderr).to.have.length(STDERR_CAPTURE_LIMIT);
    }
  });

  it("reports termination by a signal", async () => {
    const { gateway } = scriptedGateway((child) => setImmediate(() => child.finish(null, "SIGSEGV")));

    const result = await new RendererInvoker({ gateway }).render(REQUEST);

    expect(result).to.deep.equal({
      ok: false,
      reason: "signal",
      exitCode: null,
      signal: "SIGSEGV",
      stderr: "",
      message: "renderer terminated by SIGSEGV",
    });
  });

  it("reports a missing executable as a spawn error", async () => {
    const { gateway } = scriptedGateway((child) => setImmediate(() => child.emit("error", new Error("spawn dot ENOENT"))));

    const result = await new RendererInvoker({ gateway }).render(REQUEST);

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.reason).to.equal("spawn_error");
      expect(result.message).to.equal("spawn dot ENOENT");
    }
  });

  it("reports a synchronous spawn failure without rejecting", async () => {
    const gateway = createChildProcessGateway({
      spawnImpl() {
        throw new Error("EAGAIN");
      },
    });

    const result = await new RendererInvoker({ gateway }).render(REQUEST);

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.reason).to.equal("spawn_error");
      expect(result.message).to.equal("EAGAIN");
    }
  });

  it("kills a renderer that outlives its timeout", async () => {
    const { gateway, calls } = scriptedGateway(() => undefined);

    const result = await new RendererInvoker({ gateway, timeoutMs: 20 }).render(REQUEST);

    expect(calls[0].child.killSignals).to.deep.equal(["SIGKILL"]);
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.reason).to.equal("timeout");
      expect(result.signal).to.equal("SIGKILL");
      expect(result.message).to.equal("Child process exceeded its timeout of 20ms.");
    }
  });

  it("kills the renderer when the caller aborts", async () => {
    const controller = new AbortController();
    const { gateway, calls } = scriptedGateway(() => setImmediate(() => controller.abort(new Error("job timed out"))));

    const result = await new RendererInvoker({ gateway }).render({ ...REQUEST, signal: controller.signal });

    expect(calls[0].child.killSignals).to.deep.equal(["SIGKILL"]);
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.reason).to.equal("aborted");
      expect(result.message).to.equal("job timed out");
    }
  });

  it("does not spawn for an already aborted request", async () => {
    const { gateway, calls } = scriptedGateway((child) => child.exitWith(0));
    const controller = new AbortController();
    controller.abort(new Error("batch stopped"));

    const result = await new RendererInvoker({ gateway }).render({ ...REQUEST, signal: controller.signal });

    expect(calls).to.have.length(0);
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.reason).to.equal("aborted");
    }
  });
});
