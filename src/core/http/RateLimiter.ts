/**
 * Keeps at least `delayMs` between the end of one `wait()` and the end of the
 * next. One instance gates every outbound request of a run.
 */
export class RateLimiter {
  private lastCall: number | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((r) => setTimeout(r, ms))
  ) {}

  async wait(): Promise<void> {
    if (this.lastCall !== null) {
      // timers may fire a tick early; re-check against the clock
      let remaining = this.lastCall + this.delayMs - this.now();
      while (remaining > 0) {
        await this.sleep(remaining);
        remaining = this.lastCall + this.delayMs - this.now();
      }
    }
    this.lastCall = this.now();
  }
}
