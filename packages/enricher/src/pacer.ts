export interface PacerConfig {
  minMs: number;
  maxMs: number;
}

/** Waits a random time in [minMs, maxMs] between remote lookups. */
export class Pacer {
  private readonly minMs: number;
  private readonly maxMs: number;

  constructor(
    config: PacerConfig,
    private readonly random: () => number = Math.random,
    private readonly sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((resolve) => setTimeout(resolve, ms))
  ) {
    this.minMs = Math.max(0, Math.min(config.minMs, config.maxMs));
    this.maxMs = Math.max(0, config.maxMs, config.minMs);
  }

  nextDelay(): number {
    return this.minMs + this.random() * (this.maxMs - this.minMs);
  }

  async pause(): Promise<void> {
    const delay = this.nextDelay();
    if (delay > 0) {
      await this.sleep(delay);
    }
  }
}
