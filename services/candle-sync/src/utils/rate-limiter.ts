export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

/**
 * Spaces acquisitions at least `intervalMs` apart, first come first served.
 * One instance is shared by every request of a run.
 */
export class RateLimiter {
  private nextSlot = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly intervalMs: number,
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = () => Date.now(),
  ) {}

  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    this.tail = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    const delay = this.nextSlot - this.now();
    if (delay > 0) await this.sleep(delay);
    this.nextSlot = this.now() + this.intervalMs;
  }
}
