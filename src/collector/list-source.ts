import path from "node:path";
import { createClassifier, type Classifier } from "../classifier.ts";
import type { TriageSettings } from "../config/index.ts";
import { ExecutionFailedError, ExecutorTimeoutError } from "../errors.ts";
import { BatchExecutor } from "../executor.ts";
import type { Logger } from "../lib.ts";
import { ZxProcessRunner, type ProcessRunner } from "../process-runner.ts";
import { ListSplitter, PARTITION_FILE_PATTERN, type PartitionSet } from "../splitter.ts";
import { describeError, type CollectorSource, type ReportInfo, type TestFile, type TestItem } from "./types.ts";

export interface TestListContext {
  settings: TriageSettings;
  root: string;
  logger?: Logger;
  classifier?: Classifier;
  processRunner?: ProcessRunner;
}

/**
 * The whole list as one item: both partitions go to the engine in a single
 * run, stable tests first.
 */
export class TestListItem implements TestItem {
  readonly name: string;
  private tornDown = false;

  constructor(
    readonly path: string,
    readonly partitions: PartitionSet,
    private readonly context: TestListContext,
  ) {
    this.name = context.settings.suiteName;
  }

  async run(): Promise<void> {
    const { settings, root, logger } = this.context;
    const executor = new BatchExecutor({
      settings,
      root,
      logger,
      processRunner: this.context.processRunner ?? new ZxProcessRunner(logger),
    });
    await executor.execute(this.partitions.stablePath, this.partitions.flakeyPath);
  }

  reportInfo(): ReportInfo {
    return {
      path: this.path,
      line: 0,
      message: `test lists: ${this.partitions.stablePath} ${this.partitions.flakeyPath}`,
    };
  }

  describeFailure(error: unknown): string {
    if (error instanceof ExecutorTimeoutError) {
      return `execution failed (timed out after ${error.timeoutMs / 1000}s)`;
    }
    if (error instanceof ExecutionFailedError) {
      return "execution failed";
    }
    return describeError(error);
  }

  async teardown(): Promise<void> {
    if (this.tornDown) return;
    this.tornDown = true;
    await this.partitions.dispose();
  }
}

export class TestListFile implements TestFile {
  constructor(
    readonly path: string,
    private readonly context: TestListContext,
  ) {}

  async collect(): Promise<TestItem[]> {
    const { settings, logger } = this.context;
    const splitter = new ListSplitter({
      classifier: this.context.classifier ?? createClassifier(settings, logger),
      partitionDir: settings.partitionDir,
      debug: settings.debug,
      logger,
    });
    const partitions = await splitter.split(this.path);
    logger?.log(
      `Split ${path.basename(this.path)}: ${partitions.stableCount} stable, ${partitions.flakeyCount} flakey`,
    );
    return [new TestListItem(this.path, partitions, this.context)];
  }
}

export class TestListSource implements CollectorSource {
  readonly name = "test-list";

  constructor(private readonly context: TestListContext) {}

  matches(filePath: string): boolean {
    const name = path.basename(filePath);
    return (
      name.endsWith(".list") &&
      name.startsWith(this.context.settings.testListFilenamePrefix) &&
      !PARTITION_FILE_PATTERN.test(name)
    );
  }

  open(filePath: string): TestFile {
    this.context.logger?.log(`Found test suite file ${filePath}`);
    return new TestListFile(filePath, this.context);
  }
}
