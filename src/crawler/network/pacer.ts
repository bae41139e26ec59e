export interface PacerClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: PacerClock = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise((resolve) => {
      setTimeout(resolve, ms);
    }),
};

/**
 * Spaces consecutive requests at least `intervalMs` apart. The first call
 * never waits. One pacer is shared by every fetch of a crawl run.
 */
export class RequestPacer {
  private lastIssuedAt: number | undefined;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: PacerClock = systemClock,
  ) {}

  async wait(): Promise<void> {
    if (this.lastIssuedAt !== undefined && this.intervalMs > 0) {
      const remaining = this.lastIssuedAt + this.intervalMs - this.clock.now();
      if (remaining > 0) {
        await this.clock.sleep(remaining);
      }
    }

    this.lastIssuedAt = this.clock.now();
  }
}
