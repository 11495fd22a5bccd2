import fs from "node:fs";
import { describe, it, expect, vi } from "vitest";
import { tempdir } from "zx";
import { ExecutionFailedError, ExecutorTimeoutError } from "../src/errors.ts";
import { BatchExecutor, engineFlags, resolveTestPaths, runExternalSuite } from "../src/executor.ts";
import { ZxProcessRunner } from "../src/process-runner.ts";
import {
  TEST_ROOT,
  completed,
  createFakeRunner,
  createTestConfig,
  listDir,
  readLines,
  timedOut,
  writeFakeEngine,
} from "./utils.ts";

const STABLE = "/work/partitions/crypto_tests_stable_0123456789ab.list";
const FLAKEY = "/work/partitions/crypto_tests_flakey_0123456789ab.list";

describe("resolveTestPaths", () => {
  it("prefixes the file names with the test root", () => {
    expect(resolveTestPaths(TEST_ROOT, [STABLE, FLAKEY])).toEqual([
      "tests/root/cryptoserver/crypto_tests_stable_0123456789ab.list",
      "tests/root/cryptoserver/crypto_tests_flakey_0123456789ab.list",
    ]);
  });

  it("adds a missing trailing slash", () => {
    expect(resolveTestPaths("suites", ["a/b.list"])).toEqual(["suites/b.list"]);
  });
});

describe("engineFlags", () => {
  it("enables root mode and full logging into the log directory", () => {
    expect(engineFlags("logs/")).toEqual(["-root", "-log_sections=all", "-logdir=logs/"]);
  });
});

describe("BatchExecutor", () => {
  function setup(status = completed(0), settings: Record<string, unknown> = {}) {
    const config = createTestConfig({ suite_timeout: 30, ...settings });
    const fake = createFakeRunner(status);
    const executor = new BatchExecutor({
      settings: config.settings,
      root: config.root,
      processRunner: fake.runner,
    });
    return { config, fake, executor };
  }

  it("reports success for a zero exit", async () => {
    const { config, fake, executor } = setup(completed(0));

    const result = await executor.execute(STABLE, FLAKEY);

    expect(result.passed).toBe(true);
    expect(result.testPaths).toEqual([
      "tests/root/cryptoserver/crypto_tests_stable_0123456789ab.list",
      "tests/root/cryptoserver/crypto_tests_flakey_0123456789ab.list",
    ]);
    expect(fake.run).toHaveBeenCalledWith(expect.stringMatching(/triage_wrapper_[0-9a-f]{12}\.sh$/), {
      cwd: config.root,
      timeoutMs: 30_000,
    });
  });

  it("walks idle, script-generated, running, completed, reported", async () => {
    const { executor } = setup(completed(0));

    await executor.execute(STABLE, FLAKEY);

    expect(executor.state).toBe("reported");
    expect(executor.history).toEqual(["idle", "script-generated", "running", "completed", "reported"]);
  });

  it("hands the engine its flags and the prefixed partitions", async () => {
    const { fake, executor } = setup(completed(0));

    await executor.execute(STABLE, FLAKEY);

    expect(fake.scripts).toHaveLength(1);
    expect(fake.scripts[0]).toContain(
      "exec perl ./ESTest.pl -root -log_sections=all -logdir=logs/ ",
    );
    expect(fake.scripts[0]).toContain(
      "tests/root/cryptoserver/crypto_tests_stable_0123456789ab.list tests/root/cryptoserver/crypto_tests_flakey_0123456789ab.list",
    );
  });

  it.each([1, 2, 255])("fails with ExecutionFailedError for exit code %i", async (code) => {
    const { executor } = setup(completed(code));

    const error = await executor.execute(STABLE, FLAKEY).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutionFailedError);
    expect(error).toMatchObject({ exitCode: code, signal: null });
    expect(executor.state).toBe("reported");
  });

  it("fails when the engine dies from a signal", async () => {
    const { executor } = setup({
      kind: "completed",
      exitCode: null,
      signal: "SIGSEGV",
      stdout: "",
      stderr: "",
    });

    await expect(executor.execute(STABLE, FLAKEY)).rejects.toThrow(
      "Test engine was terminated by SIGSEGV",
    );
  });

  it("fails with ExecutorTimeoutError on timeout", async () => {
    const { executor } = setup(timedOut(30_000));

    await expect(executor.execute(STABLE, FLAKEY)).rejects.toBeInstanceOf(ExecutorTimeoutError);
    expect(executor.history).toEqual(["idle", "script-generated", "running", "timed-out", "reported"]);
  });

  it("removes the wrapper script after the run", async () => {
    const { config, executor } = setup(completed(1));

    await executor.execute(STABLE, FLAKEY).catch(() => undefined);

    expect(executor.script?.exists).toBe(false);
    expect(listDir(config.root)).toEqual(["triage.yml"]);
  });

  it("keeps the wrapper script in debug mode", async () => {
    const { executor } = setup(completed(0), { debug: true });

    await executor.execute(STABLE, FLAKEY);

    const script = executor.script;
    expect(script).not.toBeNull();
    expect(script && fs.existsSync(script.path)).toBe(true);
  });

  it("removes the wrapper script and reports when the runner throws", async () => {
    const config = createTestConfig({});
    const executor = new BatchExecutor({
      settings: config.settings,
      root: config.root,
      processRunner: { run: vi.fn().mockRejectedValue(new Error("spawn bash ENOENT")) },
    });

    await expect(executor.execute(STABLE, FLAKEY)).rejects.toThrow("spawn bash ENOENT");
    expect(executor.state).toBe("reported");
    expect(listDir(config.root)).toEqual(["triage.yml"]);
  });

  it("runs only once", async () => {
    const { executor } = setup(completed(0));
    await executor.execute(STABLE, FLAKEY);

    await expect(executor.execute(STABLE, FLAKEY)).rejects.toThrow(/already used/);
  });
});

describe("runExternalSuite", () => {
  it("returns the runner's exit status and cleans up", async () => {
    const config = createTestConfig({});
    const fake = createFakeRunner(completed(4, "out", "err"));

    const status = await runExternalSuite(
      { executorPath: "./engine", interpreter: "", flags: ["-root"], testPaths: ["a.list"] },
      { root: config.root, timeoutMs: 1000, processRunner: fake.runner },
    );

    expect(status).toEqual(completed(4, "out", "err"));
    expect(fake.scripts[0]).toBe("#!/usr/bin/env bash\nexec ./engine -root a.list\n");
    expect(listDir(config.root)).toEqual(["triage.yml"]);
  });
});

describe("BatchExecutor with a real engine", () => {
  function setupEngine(exitCode: number, body = "", settings: Record<string, unknown> = {}) {
    const engine = writeFakeEngine(tempdir(), exitCode, body);
    const config = createTestConfig({
      executor_path: engine.enginePath,
      executor_interpreter: "sh",
      ...settings,
    });
    const executor = new BatchExecutor({
      settings: config.settings,
      root: config.root,
      processRunner: new ZxProcessRunner(),
    });
    return { executor, engine };
  }

  it("passes the flags and one combined path argument to the engine", async () => {
    const { executor, engine } = setupEngine(0);

    await executor.execute(STABLE, FLAKEY);

    expect(readLines(engine.argsPath)).toEqual([
      "-root",
      "-log_sections=all",
      "-logdir=logs/",
      "tests/root/cryptoserver/crypto_tests_stable_0123456789ab.list tests/root/cryptoserver/crypto_tests_flakey_0123456789ab.list",
    ]);
  });

  it("reports failure when the engine exits 1", async () => {
    const { executor } = setupEngine(1);

    await expect(executor.execute(STABLE, FLAKEY)).rejects.toMatchObject({ exitCode: 1 });
  });

  it(
    "reports a timeout instead of hanging",
    async () => {
      const { executor } = setupEngine(0, "sleep 5\n", { suite_timeout: 0.2 });

      await expect(executor.execute(STABLE, FLAKEY)).rejects.toBeInstanceOf(ExecutorTimeoutError);
    },
    15_000,
  );
});
