import { MomentAccumulator } from "./moments.js";

export function splitIntoShards<T>(values: readonly T[], shardCount: number): T[][] {
  if (!Number.isInteger(shardCount) || shardCount < 1) {
    throw new RangeError(`Shard count must be a positive integer, got ${shardCount}`);
  }

  const shards: T[][] = [];
  const base = Math.floor(values.length / shardCount);
  const extra = values.length % shardCount;
  let offset = 0;
  for (let i = 0; i < shardCount; i++) {
    const size = base + (i < extra ? 1 : 0);
    shards.push(values.slice(offset, offset + size));
    offset += size;
  }
  return shards;
}

export function accumulateShards(values: readonly number[], shardCount: number): MomentAccumulator[] {
  return splitIntoShards(values, shardCount).map((shard) => new MomentAccumulator(shard));
}

export function mergeAll(accumulators: Iterable<MomentAccumulator>): MomentAccumulator {
  const total = new MomentAccumulator();
  for (const acc of accumulators) {
    total.merge(acc);
  }
  return total;
}
