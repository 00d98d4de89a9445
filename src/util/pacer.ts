export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Keeps successive remote calls at least `delayMs` apart.
 * Calls are granted in the order `pace()` was invoked.
 */
export class Pacer {
  private lastGrant: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly delayMs: number,
    private readonly wait: (ms: number) => Promise<void> = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  pace(): Promise<void> {
    const turn = this.queue.then(() => this.grant());
    this.queue = turn;
    return turn;
  }

  private async grant(): Promise<void> {
    if (this.lastGrant !== null && this.delayMs > 0) {
      const remaining = this.lastGrant + this.delayMs - this.now();
      if (remaining > 0) {
        await this.wait(remaining);
      }
    }
    this.lastGrant = this.now();
  }
}
