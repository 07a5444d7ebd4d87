/**
 * Simple pacing between page requests
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  private lastCallTime = 0;
  private readonly minIntervalMs: number;

  /**
   * @param minIntervalMs minimum gap between two calls; 0 disables waiting
   */
  constructor(minIntervalMs: number) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
  }

  async waitForSlot(): Promise<void> {
    if (this.minIntervalMs === 0) {
      return;
    }

    const now = Date.now();
    const timeSinceLastCall = now - this.lastCallTime;
    const waitTime = Math.max(0, this.minIntervalMs - timeSinceLastCall);

    if (waitTime > 0) {
      await sleep(waitTime);
    }

    this.lastCallTime = Date.now();
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    return fn();
  }
}
