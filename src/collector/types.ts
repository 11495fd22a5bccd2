export interface ReportInfo {
  path: string;
  line: number;
  message: string;
}

/** One runnable unit produced by a {@link TestFile}. */
export interface TestItem {
  readonly name: string;
  readonly path: string;
  run(): Promise<void>;
  reportInfo(): ReportInfo;
  /** Text shown for a failed run. */
  describeFailure(error: unknown): string;
  /** Releases what collection acquired. Runs once, whether or not `run` did. */
  teardown?(): Promise<void>;
}

export interface TestFile {
  readonly path: string;
  collect(): Promise<TestItem[]>;
}

export interface CollectorSource {
  readonly name: string;
  matches(filePath: string): boolean;
  open(filePath: string): TestFile;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
