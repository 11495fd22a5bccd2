export class TriageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends TriageError {}

/**
 * The classifier could not be consulted (network error, timeout, unreadable
 * body). Recovered by {@link FailOpenClassifier}.
 */
export class ClassificationUnavailableError extends TriageError {
  constructor(
    public readonly testId: string,
    public readonly url: string,
    cause: unknown,
  ) {
    super(
      `Failed to check ${url} for ${testId}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class InputListMissingError extends TriageError {
  constructor(
    public readonly listPath: string,
    cause?: unknown,
  ) {
    super(`Cannot read test list ${listPath}`, { cause });
  }
}

export class ExecutorTimeoutError extends TriageError {
  constructor(public readonly timeoutMs: number) {
    super(`Test engine did not finish within ${timeoutMs / 1000}s`);
  }
}

export class ExecutionFailedError extends TriageError {
  constructor(
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null = null,
  ) {
    super(
      signal
        ? `Test engine was terminated by ${signal}`
        : `Test engine exited with code ${exitCode}`,
    );
  }
}

export class SpecMismatchError extends TriageError {
  constructor(
    public readonly key: string,
    public readonly value: unknown,
  ) {
    super(`spec failed: ${JSON.stringify(key)}: ${JSON.stringify(value)}`);
  }
}
