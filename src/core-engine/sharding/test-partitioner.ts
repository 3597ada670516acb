// ============================================================
// TestPartitioner — Splits a test corpus into balanced shards.
//
// WHY: Shard wall time is the slowest shard's time. Greedy LPT
// (heaviest first, onto the lightest shard) keeps every shard
// within total/N + heaviest item, using last observed timings.
// ============================================================

import {ConfigError, PartitionImbalance} from "../../errors";
import type {Shard, TimingSnapshot} from "../../shared-types";
import {MinHeap} from "./min-heap";

export interface PartitionerOptions {
  /** Weight of identifiers that have no recorded timing */
  fallbackWeight: number;
}

interface Bin {
  index: number;
  weight: number;
  /** Input positions of the assigned identifiers */
  positions: number[];
}

function assertShardCount(shardCount: number): void {
  if (!Number.isInteger(shardCount) || shardCount < 1) {
    throw new ConfigError(`Shard count must be a positive integer, got ${shardCount}`);
  }
}

export class TestPartitioner {
  private readonly fallbackWeight: number;

  constructor(options: Partial<PartitionerOptions> = {}) {
    const fallback = options.fallbackWeight ?? 1;
    if (!Number.isFinite(fallback) || fallback < 0) {
      throw new ConfigError(`fallbackWeight must be a non-negative number, got ${fallback}`);
    }
    this.fallbackWeight = fallback;
  }

  weightOf(id: string, snapshot: TimingSnapshot): number {
    const recorded = snapshot.durations.get(id);
    return recorded !== undefined && Number.isFinite(recorded) && recorded >= 0 ? recorded : this.fallbackWeight;
  }

  /**
   * Assign every identifier to exactly one of `shardCount` shards.
   * Identical inputs always produce identical shards.
   */
  partition(ids: readonly string[], snapshot: TimingSnapshot, shardCount: number): Shard[] {
    assertShardCount(shardCount);

    const unique = Array.from(new Set(ids));
    const weights = unique.map((id) => this.weightOf(id, snapshot));

    // Heaviest first; equal weights keep input order.
    const order = unique.map((_, position) => position);
    order.sort((a, b) => weights[b] - weights[a] || a - b);

    const heap = new MinHeap<Bin>((a, b) => a.weight - b.weight || a.index - b.index);
    const bins: Bin[] = [];
    for (let index = 0; index < shardCount; index++) {
      const bin: Bin = {index, weight: 0, positions: []};
      bins.push(bin);
      heap.push(bin);
    }

    for (const position of order) {
      const lightest = heap.pop();
      if (!lightest) break;
      lightest.positions.push(position);
      lightest.weight += weights[position];
      heap.push(lightest);
    }

    return bins.map((bin) => ({
      index: bin.index,
      total: shardCount,
      ids: bin.positions.sort((a, b) => a - b).map((position) => unique[position]),
      weight: bin.weight,
    }));
  }
}

/**
 * Advisory skew check. Returns a warning when the heaviest shard exceeds
 * `threshold` times the mean shard weight; not evaluated when there are
 * fewer identifiers than shards (empty shards are expected then).
 */
export function assessBalance(shards: readonly Shard[], threshold: number): PartitionImbalance | null {
  if (shards.length === 0) return null;
  const itemCount = shards.reduce((sum, s) => sum + s.ids.length, 0);
  if (itemCount < shards.length) return null;

  const total = shards.reduce((sum, s) => sum + s.weight, 0);
  const mean = total / shards.length;
  const max = Math.max(...shards.map((s) => s.weight));
  if (mean <= 0 || max <= threshold * mean) return null;
  return new PartitionImbalance(max, mean, threshold);
}

/** The identifiers of one shard (0-based `index`) out of `total`. */
export function splitForShard(
  ids: readonly string[],
  snapshot: TimingSnapshot,
  index: number,
  total: number,
  options: Partial<PartitionerOptions> = {},
): string[] {
  assertShardCount(total);
  if (!Number.isInteger(index) || index < 0 || index >= total) {
    throw new ConfigError(`Shard index must be an integer in [0, ${total - 1}], got ${index}`);
  }
  const shards = new TestPartitioner(options).partition(ids, snapshot, total);
  return shards[index].ids;
}
