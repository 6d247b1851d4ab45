import { MomentAccumulator, type MomentSummary } from "./moments.js";

/** One accumulator per key, created on first observation. */
export class KeyedMoments {
  private accumulators = new Map<string, MomentAccumulator>();

  push(key: string, value: number): this {
    this.ensure(key).push(value);
    return this;
  }

  get(key: string): MomentAccumulator | undefined {
    return this.accumulators.get(key);
  }

  keys(): string[] {
    return [...this.accumulators.keys()];
  }

  get size(): number {
    return this.accumulators.size;
  }

  merge(other: KeyedMoments): this {
    for (const [key, acc] of other.accumulators) {
      this.ensure(key).merge(acc);
    }
    return this;
  }

  summaries(): Record<string, MomentSummary> {
    return Object.fromEntries([...this.accumulators].map(([key, acc]) => [key, acc.summary()]));
  }

  private ensure(key: string): MomentAccumulator {
    let acc = this.accumulators.get(key);
    if (!acc) {
      acc = new MomentAccumulator();
      this.accumulators.set(key, acc);
    }
    return acc;
  }
}
