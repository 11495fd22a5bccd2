import fs from "node:fs";
import path from "node:path";
import { stringify } from "yaml";
import { tempdir } from "zx";
import { vi } from "vitest";
import { createConfig, type Config, type CreateConfigOptions } from "../src/lib.ts";
import type { ExitStatus, ProcessRunner } from "../src/process-runner.ts";

export const TEST_ROOT = "tests/root/cryptoserver/";

/**
 * Config rooted in a fresh temp directory, with `settings` written to its
 * triage.yml.
 */
export function createTestConfig(
  settings: Record<string, unknown> = {},
  options: CreateConfigOptions = {},
): Config {
  const root = tempdir();
  fs.writeFileSync(path.join(root, "triage.yml"), stringify(settings));
  return createConfig({ rootDir: root, silent: true, processEnv: {}, ...options });
}

export function writeFile(root: string, relative: string, contents: string): string {
  const filePath = path.join(root, relative);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, contents);
  return filePath;
}

export function readLines(filePath: string): string[] {
  const contents = fs.readFileSync(filePath, "utf-8");
  return contents === "" ? [] : contents.replace(/\n$/, "").split("\n");
}

export function listDir(dir: string): string[] {
  return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
}

export function completed(exitCode: number, stdout = "", stderr = ""): ExitStatus {
  return { kind: "completed", exitCode, signal: null, stdout, stderr };
}

export function timedOut(timeoutMs: number): ExitStatus {
  return { kind: "timed-out", timeoutMs, stdout: "", stderr: "" };
}

/** Process runner that records the wrapper it was handed instead of running it. */
export function createFakeRunner(status: ExitStatus = completed(0)) {
  const scripts: string[] = [];
  const run = vi.fn(async (scriptPath: string) => {
    scripts.push(fs.readFileSync(scriptPath, "utf-8"));
    return status;
  });
  const runner: ProcessRunner = { run };
  return { runner, run, scripts };
}

/**
 * A stand-in engine: records its arguments one per line in `args.txt` next
 * to itself, then exits with `exitCode`.
 */
export function writeFakeEngine(dir: string, exitCode = 0, body = ""): { enginePath: string; argsPath: string } {
  const argsPath = path.join(dir, "args.txt");
  const enginePath = writeFile(
    dir,
    "engine.sh",
    `printf '%s\\n' "$@" > '${argsPath}'\n${body}exit ${exitCode}\n`,
  );
  return { enginePath, argsPath };
}
