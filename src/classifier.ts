import type { TriageSettings } from "./config/index.ts";
import { ClassificationUnavailableError } from "./errors.ts";
import type { Logger } from "./lib.ts";
import { LeakyBucket } from "./rate-limit.ts";

export type Classification = "stable" | "flakey";

/** Response body the classification service returns for a flakey test. */
export const FLAKEY_SENTINEL = "FALSE";

export interface Classifier {
  classify(testId: string): Promise<Classification>;
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClassifierOptions {
  url: string;
  timeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Asks the classification service about one test: `GET <url>?test=<id>`.
 * A body of exactly `FALSE` means flakey, any other body means stable.
 */
export class HttpClassifier implements Classifier {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetch: FetchLike;
  private readonly logger?: Logger;

  constructor(options: HttpClassifierOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  requestUrl(testId: string): string {
    const url = new URL(this.url);
    url.searchParams.set("test", testId);
    return url.toString();
  }

  async classify(testId: string): Promise<Classification> {
    const url = this.requestUrl(testId);
    this.logger?.debug(`Checking status for ${testId}`);

    let body: string;
    try {
      const response = await this.fetch(url, {
        method: "GET",
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      throw new ClassificationUnavailableError(testId, this.url, error);
    }

    return body === FLAKEY_SENTINEL ? "flakey" : "stable";
  }
}

/**
 * Never lets a classifier failure block a run: any error becomes `fallback`.
 */
export class FailOpenClassifier implements Classifier {
  constructor(
    private readonly inner: Classifier,
    private readonly fallback: Classification = "stable",
    private readonly logger?: Logger,
  ) {}

  async classify(testId: string): Promise<Classification> {
    try {
      return await this.inner.classify(testId);
    } catch (error) {
      this.logger?.warn(
        error instanceof Error ? error.message : String(error),
      );
      this.logger?.warn(`Assuming ${testId} is ${this.fallback}`);
      return this.fallback;
    }
  }
}

export class RateLimitedClassifier implements Classifier {
  constructor(
    private readonly inner: Classifier,
    private readonly bucket: LeakyBucket,
  ) {}

  async classify(testId: string): Promise<Classification> {
    await this.bucket.acquire();
    return this.inner.classify(testId);
  }
}

export class StaticClassifier implements Classifier {
  private readonly known: Map<string, Classification>;

  constructor(
    known: Iterable<[string, Classification]> = [],
    private readonly otherwise: Classification = "stable",
  ) {
    this.known = new Map(known);
  }

  async classify(testId: string): Promise<Classification> {
    return this.known.get(testId) ?? this.otherwise;
  }
}

/**
 * The classifier a run uses for its settings. Outside green mode every test
 * is stable and the service is never contacted.
 */
export function createClassifier(
  settings: TriageSettings,
  logger?: Logger,
  fetch?: FetchLike,
): Classifier {
  if (!settings.greenMode) {
    return new StaticClassifier();
  }

  let classifier: Classifier = new HttpClassifier({
    url: settings.classifierUrl,
    timeoutMs: settings.classifierTimeoutMs,
    fetch,
    logger,
  });

  if (settings.classifierRateLimit) {
    const { capacity, leakRate } = settings.classifierRateLimit;
    classifier = new RateLimitedClassifier(
      classifier,
      new LeakyBucket(capacity, leakRate),
    );
  }

  return new FailOpenClassifier(classifier, "stable", logger);
}
