/**
 * Simulated I/O latency for the demo services.
 */

export interface LatencyRange {
  minMs: number;
  maxMs: number;
}

export type RandomSource = () => number;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class LatencySimulator {
  constructor(
    private readonly range: LatencyRange,
    private readonly random: RandomSource = Math.random,
  ) {}

  /** Uniform delay in [minMs, maxMs]. */
  nextDelayMs(): number {
    const { minMs, maxMs } = this.range;
    return Math.round(minMs + this.random() * (maxMs - minMs));
  }

  /** Waits a random delay and resolves with it. */
  async wait(): Promise<number> {
    const delay = this.nextDelayMs();
    await sleep(delay);
    return delay;
  }
}
