export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Spaces consecutive calls at least `intervalMs` apart
 */
export class Pacer {
  private lastCallAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly wait: Sleep = sleep,
    private readonly now: () => number = Date.now
  ) {}

  async pace(): Promise<number> {
    let waited = 0;
    if (this.lastCallAt !== null && this.intervalMs > 0) {
      const elapsed = this.now() - this.lastCallAt;
      if (elapsed < this.intervalMs) {
        waited = this.intervalMs - elapsed;
        await this.wait(waited);
      }
    }
    this.lastCallAt = this.now();
    return waited;
  }
}
