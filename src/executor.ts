import path from "node:path";
import type { TriageSettings } from "./config/index.ts";
import { ExecutionFailedError, ExecutorTimeoutError, TriageError } from "./errors.ts";
import { createLogger, type Logger } from "./lib.ts";
import type { ExitStatus, ProcessRunner } from "./process-runner.ts";
import { WrapperScript, type SuiteInvocation } from "./wrapper-script.ts";

export type ExecutorState =
  | "idle"
  | "script-generated"
  | "running"
  | "completed"
  | "timed-out"
  | "reported";

export interface BatchResult {
  passed: true;
  testPaths: string[];
  status: ExitStatus;
}

export interface BatchExecutorOptions {
  settings: TriageSettings;
  /** Working directory of the engine; test paths are relative to it. */
  root: string;
  processRunner: ProcessRunner;
  logger?: Logger;
}

/** Engine flags: root mode, every log section, log directory. */
export function engineFlags(logDir: string): string[] {
  return ["-root", "-log_sections=all", `-logdir=${logDir}`];
}

/**
 * Engine-relative path of each partition: the file name under the test root.
 */
export function resolveTestPaths(testRoot: string, partitionPaths: string[]): string[] {
  const prefix = testRoot.endsWith("/") ? testRoot : `${testRoot}/`;
  return partitionPaths.map((file) => `${prefix}${path.basename(file)}`);
}

export interface RunSuiteOptions {
  root: string;
  timeoutMs: number;
  processRunner: ProcessRunner;
  /** Keep the generated wrapper script after the run. */
  debug?: boolean;
  logger?: Logger;
}

export interface RunSuiteHooks {
  onScriptGenerated?(script: WrapperScript): void;
  onRunning?(): void;
}

/**
 * Write the wrapper for `invocation`, run it and remove it again (unless
 * `debug`), whatever the outcome.
 */
export async function runExternalSuite(
  invocation: SuiteInvocation,
  options: RunSuiteOptions,
  hooks: RunSuiteHooks = {},
): Promise<ExitStatus> {
  const { root, timeoutMs, processRunner, debug = false, logger } = options;

  const script = await WrapperScript.create(root, invocation);
  hooks.onScriptGenerated?.(script);
  logger?.debug(`Generated ${script.path}`);

  try {
    hooks.onRunning?.();
    return await processRunner.run(script.path, { cwd: root, timeoutMs });
  } finally {
    if (debug) {
      logger?.debug(`Keeping ${script.path}`);
    } else {
      await script.remove();
    }
  }
}

/**
 * Runs the external engine once over both partitions and turns its exit
 * status into pass or fail. One instance serves exactly one run.
 */
export class BatchExecutor {
  private _state: ExecutorState = "idle";
  private _script: WrapperScript | null = null;
  readonly history: ExecutorState[] = ["idle"];

  constructor(private readonly options: BatchExecutorOptions) {}

  get state(): ExecutorState {
    return this._state;
  }

  /** The generated wrapper, once there is one. */
  get script(): WrapperScript | null {
    return this._script;
  }

  private transition(next: ExecutorState): void {
    this._state = next;
    this.history.push(next);
  }

  invocation(stablePath: string, flakeyPath: string): SuiteInvocation {
    const { settings } = this.options;
    return {
      executorPath: settings.executorPath,
      interpreter: settings.executorInterpreter,
      flags: engineFlags(settings.logDir),
      testPaths: resolveTestPaths(settings.testRoot, [stablePath, flakeyPath]),
    };
  }

  async execute(stablePath: string, flakeyPath: string): Promise<BatchResult> {
    if (this._state !== "idle") {
      throw new TriageError(`BatchExecutor already used (state: ${this._state})`);
    }
    const { settings, root, processRunner, logger } = this.options;
    const invocation = this.invocation(stablePath, flakeyPath);

    let status: ExitStatus;
    try {
      status = await runExternalSuite(
        invocation,
        { root, timeoutMs: settings.suiteTimeoutMs, processRunner, debug: settings.debug, logger },
        {
          onScriptGenerated: (script) => {
            this._script = script;
            this.transition("script-generated");
          },
          onRunning: () => this.transition("running"),
        },
      );
    } catch (error) {
      this.transition("reported");
      throw error;
    }

    this.transition(status.kind === "timed-out" ? "timed-out" : "completed");
    if (settings.debug && logger && !logger.config.silent) {
      const print = createLogger("engine");
      print(status.stdout, "stdout");
      print(status.stderr, "stderr");
    }

    this.transition("reported");
    if (status.kind === "timed-out") {
      throw new ExecutorTimeoutError(status.timeoutMs);
    }
    if (status.exitCode !== 0) {
      throw new ExecutionFailedError(status.exitCode, status.signal);
    }
    return { passed: true, testPaths: invocation.testPaths, status };
  }
}
