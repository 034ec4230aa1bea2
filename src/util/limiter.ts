export class TokenBucketLimiter {
  private capacity: number;
  private tokens: number;
  private refillRatePerSec: number;
  private last: number;
  private now: () => number;

  constructor(rps = 5, now: () => number = Date.now) {
    this.capacity = Math.max(1, rps);
    this.tokens = this.capacity;
    this.refillRatePerSec = rps;
    this.now = now;
    this.last = now();
  }

  private refill() {
    const now = this.now();
    const elapsed = (now - this.last) / 1000;
    this.last = now;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRatePerSec);
  }

  /** Takes a token if one is available right now; never waits. */
  tryTake(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  async take(): Promise<void> {
    while (!this.tryTake()) {
      await new Promise((r) => setTimeout(r, 50));
    }
  }
}
