import { sleep } from "zx";

/**
 * Leaky bucket admitting at most `capacity` requests in flight, draining at
 * `leakRate` requests per second.
 */
export class LeakyBucket {
  private level = 0;
  private lastChecked: number;

  constructor(
    readonly capacity: number,
    readonly leakRate: number,
    private readonly now: () => number = Date.now,
  ) {
    this.lastChecked = this.now();
  }

  get waterLevel(): number {
    this.leak();
    return this.level;
  }

  private leak(): void {
    const now = this.now();
    const elapsedSeconds = (now - this.lastChecked) / 1000;
    this.level = Math.max(0, this.level - elapsedSeconds * this.leakRate);
    this.lastChecked = now;
  }

  allowRequest(): boolean {
    this.leak();
    if (this.level < this.capacity) {
      this.level += 1;
      return true;
    }
    return false;
  }

  /** Milliseconds until {@link allowRequest} would succeed. */
  delayUntilAllowed(): number {
    this.leak();
    if (this.level < this.capacity) return 0;
    const excess = this.level - this.capacity;
    // The level has to drop strictly below capacity.
    return Math.floor((excess / this.leakRate) * 1000) + 1;
  }

  async acquire(wait: (ms: number) => Promise<unknown> = sleep): Promise<void> {
    while (!this.allowRequest()) {
      await wait(this.delayUntilAllowed());
    }
  }
}
