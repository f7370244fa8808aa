import type { ChildProcess } from "node:child_process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import {
  ChildProcessTimeoutError,
  type ChildProcessGateway,
  createChildProcessGateway,
  DEFAULT_ALLOWED_ENV_KEYS,
  type SpawnedChildProcess,
} from "../gateways/childProcess.js";

/** Bytes of renderer stderr kept for diagnostics. */
export const STDERR_CAPTURE_LIMIT = 4096;

export interface RenderRequest {
  /** Graphviz output format passed as `-T<format>`. */
  readonly format: string;
  /** Absolute path of the `.dot` source. */
  readonly inputPath: string;
  /** Absolute path of the image to produce. */
  readonly outputPath: string;
  /** Aborting kills the renderer; a {@link ChildProcessTimeoutError} reason is reported as a timeout. */
  readonly signal?: AbortSignal;
}

export type RenderFailureReason = "exit_code" | "signal" | "spawn_error" | "timeout" | "aborted";

export type RenderResult =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly reason: RenderFailureReason;
      readonly exitCode: number | null;
      readonly signal: NodeJS.Signals | null;
      /** Captured stderr, truncated to {@link STDERR_CAPTURE_LIMIT} bytes. */
      readonly stderr: string;
      readonly message: string;
    };

/** Anything able to turn one DOT file into one image. Jobs only see this. */
export interface DiagramRenderer {
  render(request: RenderRequest): Promise<RenderResult>;
}

export interface RendererInvokerOptions {
  /** Executable to run. Defaults to `dot`. */
  readonly command?: string;
  /** Deadline per invocation; `0` or absent disables it. */
  readonly timeoutMs?: number;
  readonly gateway?: ChildProcessGateway;
  readonly allowedEnvKeys?: readonly string[];
  readonly inheritEnv?: NodeJS.ProcessEnv;
}

/**
 * Runs `<command> -T<format> -o<output> <input>` as a subprocess. The image is
 * never read back: success means exit code 0, anything else becomes a failed
 * {@link RenderResult}. The promise never rejects.
 */
export class RendererInvoker implements DiagramRenderer {
  readonly command: string;
  private readonly timeoutMs: number | undefined;
  private readonly gateway: ChildProcessGateway;
  private readonly allowedEnvKeys: readonly string[];
  private readonly inheritEnv: NodeJS.ProcessEnv | undefined;

  constructor(options: RendererInvokerOptions = {}) {
    this.command = options.command ?? "dot";
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined;
    this.gateway = options.gateway ?? createChildProcessGateway();
    this.allowedEnvKeys = options.allowedEnvKeys ?? DEFAULT_ALLOWED_ENV_KEYS;
    this.inheritEnv = options.inheritEnv;
  }

  /** Arguments for one invocation. */
  static argumentsFor(request: Pick<RenderRequest, "format" | "inputPath" | "outputPath">): string[] {
    return [`-T${request.format}`, `-o${request.outputPath}`, request.inputPath];
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    if (request.signal?.aborted) {
      return failure(abortReason(request.signal.reason), null, null, "", describeAbort(request.signal.reason));
    }

    let spawned: SpawnedChildProcess;
    try {
      spawned = this.gateway.spawn({
        command: this.command,
        args: RendererInvoker.argumentsFor(request),
        allowedEnvKeys: this.allowedEnvKeys,
        stdio: ["ignore", "ignore", "pipe"],
        ...(this.inheritEnv ? { inheritEnv: this.inheritEnv } : {}),
        ...(this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : {}),
        ...(request.signal ? { signal: request.signal } : {}),
      });
    } catch (error) {
      return failure("spawn_error", null, null, "", error instanceof Error ? error.message : String(error));
    }

    const { child, signal } = spawned;
    try {
      return await waitForExit(child, signal);
    } finally {
      spawned.dispose();
    }
  }
}

function waitForExit(child: ChildProcess, signal: AbortSignal | undefined): Promise<RenderResult> {
  return new Promise<RenderResult>((resolve) => {
    const stderr = new StderrCapture();
    child.stderr?.on("data", (chunk: Buffer | string) => stderr.append(chunk));

    let settled = false;
    const finish = (result: RenderResult) => {
      if (settled) {
        return;
      }
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      resolve(result);
    };

    // Node kills the child itself when `signal` is passed to spawn; doubles
    // and custom gateways may not, so the kill is repeated here.
    const onAbort = () => {
      if (!child.killed) {
        child.kill("SIGKILL");
      }
    };
    if (signal) {
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
      }
    }

    child.once("error", (error: Error) => {
      if (signal?.aborted) {
        finish(failure(abortReason(signal.reason), null, null, stderr.text(), describeAbort(signal.reason)));
        return;
      }
      finish(failure("spawn_error", null, null, stderr.text(), error.message));
    });

    child.once("close", (code: number | null, exitSignal: NodeJS.Signals | null) => {
      if (signal?.aborted) {
        finish(failure(abortReason(signal.reason), code, exitSignal, stderr.text(), describeAbort(signal.reason)));
        return;
      }
      if (code === 0) {
        finish({ ok: true });
        return;
      }
      if (code !== null) {
        finish(failure("exit_code", code, exitSignal, stderr.text(), `renderer exited with code ${code}`));
        return;
      }
      finish(failure("signal", null, exitSignal, stderr.text(), `renderer terminated by ${exitSignal ?? "an unknown signal"}`));
    });
  });
}

class StderrCapture {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;

  append(chunk: Buffer | string): void {
    if (this.bytes >= STDERR_CAPTURE_LIMIT) {
      return;
    }
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    const slice = buffer.subarray(0, STDERR_CAPTURE_LIMIT - this.bytes);
    this.chunks.push(slice);
    this.bytes += slice.length;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

function abortReason(reason: unknown): RenderFailureReason {
  return reason instanceof ChildProcessTimeoutError ? "timeout" : "aborted";
}

function describeAbort(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  return "renderer aborted";
}

function failure(
  reason: RenderFailureReason,
  exitCode: number | null,
  signal: NodeJS.Signals | null,
  stderr: string,
  message: string,
): RenderResult {
  return { ok: false, reason, exitCode, signal, stderr, message };
}
