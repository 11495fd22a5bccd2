import path from "node:path";
import { chalk, glob } from "zx";
import type { Logger } from "../lib.ts";
import { describeError, type CollectorSource, type TestItem } from "./types.ts";

export type TestOutcome =
  | { item: TestItem; status: "passed" }
  | { item: TestItem; status: "failed"; message: string; error: unknown };

export interface CollectionError {
  path: string;
  source: string;
  message: string;
  error: unknown;
}

export interface SessionReport {
  outcomes: TestOutcome[];
  errors: CollectionError[];
  passed: number;
  failed: number;
  exitCode: number;
}

const DISCOVERY_PATTERNS = ["**/*.list", "**/*.yaml"];

/**
 * One collection and execution pass: discover files, collect their items,
 * run each, then tear every collected item down.
 */
export class Session {
  constructor(
    private readonly sources: CollectorSource[],
    private readonly logger?: Logger,
  ) {}

  async discover(dir: string): Promise<string[]> {
    const files = await glob(DISCOVERY_PATTERNS, {
      cwd: dir,
      absolute: true,
      onlyFiles: true,
      ignore: ["**/node_modules/**"],
    });
    return files.sort();
  }

  async run(dir: string): Promise<SessionReport> {
    return this.runFiles(await this.discover(dir));
  }

  async runFiles(files: string[]): Promise<SessionReport> {
    const items: TestItem[] = [];
    const errors: CollectionError[] = [];
    const outcomes: TestOutcome[] = [];

    try {
      for (const file of files) {
        const source = this.sources.find((candidate) => candidate.matches(file));
        if (!source) continue;
        try {
          items.push(...(await source.open(file).collect()));
        } catch (error) {
          const message = describeError(error);
          errors.push({ path: file, source: source.name, message, error });
          this.logger?.error(`ERROR ${path.relative(process.cwd(), file)}: ${message}`);
        }
      }

      for (const item of items) {
        outcomes.push(await this.runItem(item));
      }
    } finally {
      await this.teardown(items, errors);
    }

    const passed = outcomes.filter((outcome) => outcome.status === "passed").length;
    const failed = outcomes.length - passed;
    const exitCode = failed === 0 && errors.length === 0 ? 0 : 1;

    const summary = `${passed} passed, ${failed} failed, ${errors.length} errors`;
    this.logger?.log(exitCode === 0 ? chalk.green(summary) : chalk.red(summary));

    return { outcomes, errors, passed, failed, exitCode };
  }

  private async runItem(item: TestItem): Promise<TestOutcome> {
    const info = item.reportInfo();
    this.logger?.debug(`${info.path}:${info.line} ${info.message}`);
    try {
      await item.run();
      this.logger?.log(`${chalk.green("PASSED")} ${item.name}`);
      return { item, status: "passed" };
    } catch (error) {
      const message = item.describeFailure(error);
      this.logger?.log(`${chalk.red("FAILED")} ${item.name}`);
      this.logger?.log(message);
      return { item, status: "failed", message, error };
    }
  }

  private async teardown(items: TestItem[], errors: CollectionError[]): Promise<void> {
    for (const item of items) {
      try {
        await item.teardown?.();
      } catch (error) {
        const message = describeError(error);
        errors.push({ path: item.path, source: "teardown", message, error });
        this.logger?.error(`Teardown of ${item.name} failed: ${message}`);
      }
    }
  }
}
