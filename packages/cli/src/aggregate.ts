import {
  KeyedMoments,
  MomentAccumulator,
  accumulateShards,
  mergeAll,
  parseMomentState,
  splitIntoShards,
  type KeyedValue
} from "@streamstat/core";
import { detail } from "./log.js";

export function aggregateValues(values: readonly number[], shards: number): MomentAccumulator {
  const partials = accumulateShards(values, shards);
  partials.forEach((partial, index) => {
    detail(`shard ${index + 1}/${partials.length}: ${partial.count} values`);
  });
  return mergeAll(partials);
}

export function aggregateKeyed(entries: readonly KeyedValue[], shards: number): KeyedMoments {
  const total = new KeyedMoments();
  splitIntoShards(entries, shards).forEach((shard, index) => {
    const partial = new KeyedMoments();
    for (const { key, value } of shard) {
      partial.push(key, value);
    }
    detail(`shard ${index + 1}/${shards}: ${shard.length} values over ${partial.size} keys`);
    total.merge(partial);
  });
  return total;
}

const MOMENT_KEYS = ["m1", "m2", "m3", "m4"] as const;

/** JSON for the `state` command; refuses moments that JSON would turn into null. */
export function serializeState(acc: MomentAccumulator): string {
  const state = acc.state;
  const nonFinite = MOMENT_KEYS.filter((key) => !Number.isFinite(state[key]));
  if (nonFinite.length > 0) {
    const found = nonFinite.map((key) => `${key}=${state[key]}`).join(", ");
    throw new Error(`Non-finite state cannot be serialized: ${found}`);
  }
  return JSON.stringify(state);
}

/** Merges serialized accumulator states, labelling validation errors with their source. */
export function mergeStates(sources: ReadonlyArray<{ name: string; json: string }>): MomentAccumulator {
  return mergeAll(
    sources.map(({ name, json }) => {
      try {
        return MomentAccumulator.fromState(parseMomentState(JSON.parse(json)));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`${name}: ${message}`);
      }
    })
  );
}
