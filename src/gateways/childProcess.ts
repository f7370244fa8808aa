/**
 * Spawn gateway used for the external renderer. Commands run without a shell,
 * with an allow-listed environment, and are killed when their timeout elapses
 * or the caller's signal aborts.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";

import { omitUndefinedEntries } from "../utils/object.js";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Variables forwarded to the renderer unless the caller narrows the list. */
export const DEFAULT_ALLOWED_ENV_KEYS = [
  "PATH",
  "HOME",
  "TMPDIR",
  "TEMP",
  "TMP",
  "SYSTEMROOT",
  "LANG",
  "LC_ALL",
  "FONTCONFIG_PATH",
  "FONTCONFIG_FILE",
  "GVBINDIR",
] as const;

export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  readonly args?: readonly string[];
  /** Keys propagated from {@link inheritEnv}. Everything else is dropped. */
  readonly allowedEnvKeys: readonly string[];
  /** Environment snapshot to inherit from (defaults to `process.env`). */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  readonly stdio?: SpawnOptions["stdio"];
  /** Milliseconds after which the child is killed with `SIGKILL`. */
  readonly timeoutMs?: number;
  /** Aborting this signal kills the child. */
  readonly signal?: AbortSignal;
}

export interface SpawnedChildProcess {
  readonly child: ChildProcess;
  /** Signal that fires on timeout or external abort; its reason tells which. */
  readonly signal: AbortSignal | undefined;
  /** Clears the timeout guard and abort listener. Safe to call more than once. */
  dispose(): void;
}

export class InvalidChildProcessCommandError extends Error {
  public readonly code = "E-CHILD-COMMAND";

  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends TypeError {
  public readonly code = "E-CHILD-ARGUMENT";

  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is ${typeof value}.`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/** Abort reason used when a child exceeds its timeout. */
export class ChildProcessTimeoutError extends Error {
  public readonly code = "E-CHILD-TIMEOUT";
  public readonly details: { timeoutMs: number };

  constructor(timeoutMs: number) {
    super(`Child process exceeded its timeout of ${timeoutMs}ms.`);
    this.name = "ChildProcessTimeoutError";
    this.details = { timeoutMs };
  }
}

export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): SpawnedChildProcess;
}

/** Narrowed `spawn` signature; the Node.js implementation satisfies it. */
export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

interface ChildProcessGatewayDeps {
  /** Tests inject a fake to emulate exit codes and hangs. */
  readonly spawnImpl?: SpawnFunction;
}

export function createChildProcessGateway({ spawnImpl = nodeSpawn }: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): SpawnedChildProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const args = normaliseArgs(options.args);
      const env = buildWhitelistedEnv(options.allowedEnvKeys, options.inheritEnv ?? process.env);

      const guard = prepareAbortHandling(options.timeoutMs, options.signal);

      const spawnOptions: SpawnOptions = omitUndefinedEntries({
        env,
        stdio: options.stdio ?? "pipe",
        shell: false,
        windowsVerbatimArguments: false,
        signal: guard.signal,
      });

      let child: ChildProcess;
      try {
        child = spawnImpl(command, args, spawnOptions);
      } catch (error) {
        guard.dispose();
        throw error;
      }

      guard.arm(child);

      // `error` and `close` can both fire for one failure.
      let disposed = false;
      const settle = () => {
        if (disposed) {
          return;
        }
        disposed = true;
        guard.dispose();
      };

      child.once("error", settle);
      child.once("close", settle);

      return {
        child,
        signal: guard.signal,
        dispose(): void {
          child.removeListener("error", settle);
          child.removeListener("close", settle);
          settle();
        },
      };
    },
  };
}

function normaliseArgs(args: SpawnChildProcessOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }

  if (!Array.isArray(args)) {
    throw new InvalidChildProcessArgumentError(args, -1);
  }

  return args.map((value: unknown, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

function buildWhitelistedEnv(allowedKeys: readonly string[], inheritEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};

  for (const key of new Set(allowedKeys)) {
    const value = inheritEnv[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }

  return env;
}

interface AbortManagement {
  readonly signal: AbortSignal | undefined;
  arm(child: ChildProcess): void;
  dispose(): void;
}

function prepareAbortHandling(timeoutMs: number | undefined, externalSignal: AbortSignal | undefined): AbortManagement {
  const effectiveTimeout = timeoutMs !== undefined && timeoutMs > 0 ? timeoutMs : undefined;
  if (effectiveTimeout === undefined && externalSignal === undefined) {
    return {
      signal: undefined,
      arm(): void {},
      dispose(): void {},
    };
  }

  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | null = null;
  let externalAbortListener: (() => void) | null = null;

  if (externalSignal !== undefined) {
    if (externalSignal.aborted) {
      controller.abort(externalSignal.reason);
    } else {
      externalAbortListener = () => {
        controller.abort(externalSignal.reason);
      };
      externalSignal.addEventListener("abort", externalAbortListener, { once: true });
    }
  }

  return {
    signal: controller.signal,
    arm(child: ChildProcess): void {
      if (effectiveTimeout === undefined || controller.signal.aborted) {
        return;
      }

      timeoutHandle = setTimeout(() => {
        if (!controller.signal.aborted) {
          controller.abort(new ChildProcessTimeoutError(effectiveTimeout));
        }
        if (!child.killed) {
          child.kill("SIGKILL");
        }
      }, effectiveTimeout);
      timeoutHandle.unref();
    },
    dispose(): void {
      if (timeoutHandle !== null) {
        clearTimeout(timeoutHandle);
        timeoutHandle = null;
      }
      if (externalAbortListener !== null && externalSignal !== undefined) {
        externalSignal.removeEventListener("abort", externalAbortListener);
        externalAbortListener = null;
      }
    },
  };
}
