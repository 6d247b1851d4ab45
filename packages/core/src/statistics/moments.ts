import { InsufficientDataError } from "../errors.js";

export interface MomentState {
  readonly count: number;
  readonly m1: number;
  readonly m2: number;
  readonly m3: number;
  readonly m4: number;
}

export interface MomentSummary {
  count: number;
  mean: number | null;
  variance: number | null;
  sampleVariance: number | null;
  standardDeviation: number | null;
  sampleStandardDeviation: number | null;
  skewness: number | null;
  kurtosis: number | null;
}

/**
 * Single-pass accumulator of the first four centered moments.
 *
 * Only the count, the running mean and the centered moment sums are kept, so
 * every update is O(1) in time and space. Two accumulators built over disjoint
 * data can be merged into one that describes the union of both.
 */
export class MomentAccumulator {
  private n = 0;
  private m1 = 0;
  private m2 = 0;
  private m3 = 0;
  private m4 = 0;

  constructor(data?: number | Iterable<number>) {
    if (data === undefined) return;
    if (typeof data === "number") {
      this.push(data);
    } else {
      this.pushAll(data);
    }
  }

  /**
   * Restores an accumulator without checking the moment invariants.
   * State from outside the process should go through `parseMomentState` first.
   */
  static fromState(state: MomentState): MomentAccumulator {
    const acc = new MomentAccumulator();
    acc.n = state.count;
    acc.m1 = state.m1;
    acc.m2 = state.m2;
    acc.m3 = state.m3;
    acc.m4 = state.m4;
    return acc;
  }

  static combine(a: MomentAccumulator, b: MomentAccumulator): MomentAccumulator {
    return a.clone().merge(b);
  }

  push(x: number): this {
    const n1 = this.n;
    this.n += 1;
    const n = this.n;

    const delta = x - this.m1;
    const deltaN = delta / n;
    const deltaN2 = deltaN * deltaN;
    const term1 = delta * deltaN * n1;

    this.m1 += deltaN;
    // m4 and m3 read the previous m3 and m2, so the order below is fixed.
    this.m4 += term1 * deltaN2 * (n * n - 3 * n + 3) + 6 * deltaN2 * this.m2 - 4 * deltaN * this.m3;
    this.m3 += term1 * deltaN * (n - 2) - 3 * deltaN * this.m2;
    this.m2 += term1;
    return this;
  }

  pushAll(values: Iterable<number>): this {
    for (const value of values) {
      this.push(value);
    }
    return this;
  }

  add(value: number | MomentAccumulator): this {
    return typeof value === "number" ? this.push(value) : this.merge(value);
  }

  merge(other: MomentAccumulator): this {
    const { count: nb, m1: bm1, m2: bm2, m3: bm3, m4: bm4 } = other.state;
    if (nb === 0) {
      return this;
    }

    const na = this.n;
    if (na === 0) {
      this.n = nb;
      this.m1 = bm1;
      this.m2 = bm2;
      this.m3 = bm3;
      this.m4 = bm4;
      return this;
    }

    const n = na + nb;
    const delta = bm1 - this.m1;
    const delta2 = delta * delta;
    const delta3 = delta2 * delta;
    const delta4 = delta3 * delta;

    const m1 = this.m1 + (delta * nb) / n;
    const m2 = this.m2 + bm2 + (delta2 * na * nb) / n;
    const m3 =
      this.m3 +
      bm3 +
      (delta3 * na * nb * (na - nb)) / (n * n) +
      (3 * delta * (na * bm2 - nb * this.m2)) / n;
    const m4 =
      this.m4 +
      bm4 +
      (delta4 * na * nb * (na * na - na * nb + nb * nb)) / (n * n * n) +
      (6 * delta2 * (na * na * bm2 + nb * nb * this.m2)) / (n * n) +
      (4 * delta * (na * bm3 - nb * this.m3)) / n;

    this.n = n;
    this.m1 = m1;
    this.m2 = m2;
    this.m3 = m3;
    this.m4 = m4;
    return this;
  }

  clone(): MomentAccumulator {
    return MomentAccumulator.fromState(this.state);
  }

  reset(): void {
    this.n = 0;
    this.m1 = 0;
    this.m2 = 0;
    this.m3 = 0;
    this.m4 = 0;
  }

  get count(): number {
    return this.n;
  }

  get state(): MomentState {
    return { count: this.n, m1: this.m1, m2: this.m2, m3: this.m3, m4: this.m4 };
  }

  get mean(): number {
    this.require("mean", 1);
    return this.m1;
  }

  /** Population variance. */
  get variance(): number {
    this.require("variance", 1);
    return this.m2 / this.n;
  }

  /** Unbiased (n - 1) variance. */
  get sampleVariance(): number {
    this.require("sampleVariance", 2);
    return this.m2 / (this.n - 1);
  }

  get standardDeviation(): number {
    this.require("standardDeviation", 1);
    return Math.sqrt(this.m2 / this.n);
  }

  get sampleStandardDeviation(): number {
    this.require("sampleStandardDeviation", 2);
    return Math.sqrt(this.m2 / (this.n - 1));
  }

  get skewness(): number {
    this.requireSpread("skewness");
    return (Math.sqrt(this.n) * this.m3) / Math.pow(this.m2, 1.5);
  }

  /** Excess kurtosis: 0 for a normal distribution. */
  get kurtosis(): number {
    this.requireSpread("kurtosis");
    return (this.n * this.m4) / (this.m2 * this.m2) - 3.0;
  }

  summary(): MomentSummary {
    return {
      count: this.n,
      mean: orNull(() => this.mean),
      variance: orNull(() => this.variance),
      sampleVariance: orNull(() => this.sampleVariance),
      standardDeviation: orNull(() => this.standardDeviation),
      sampleStandardDeviation: orNull(() => this.sampleStandardDeviation),
      skewness: orNull(() => this.skewness),
      kurtosis: orNull(() => this.kurtosis)
    };
  }

  toJSON(): MomentState {
    return this.state;
  }

  toString(): string {
    return `(${this.n}, ${this.m1}, ${this.m2}, ${this.m3}, ${this.m4})`;
  }

  private require(statistic: string, required: number): void {
    if (this.n < required) {
      throw new InsufficientDataError(statistic, this.n, required, "too_few_observations");
    }
  }

  private requireSpread(statistic: string): void {
    this.require(statistic, 2);
    if (this.m2 === 0) {
      throw new InsufficientDataError(statistic, this.n, 2, "zero_variance");
    }
  }
}

function orNull(read: () => number): number | null {
  try {
    return read();
  } catch (error) {
    if (error instanceof InsufficientDataError) {
      return null;
    }
    throw error;
  }
}
