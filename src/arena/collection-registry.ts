/**
 * Collection Registry (ListingList / veZoo)
 *
 * Tracks which collections may be staked and the veZoo weight locked per
 * collection. Weights only feed the incentive-reward split.
 */

import type { CollectionId } from "../types/arena.js";
import type { Checkpointable, CollectionRegistryPort } from "./interfaces.js";
import {
  catchUp,
  createEpochSeries,
  decrease,
  increase,
  seriesFor,
  valueAt,
  type EpochSeries,
} from "./epoch-series.js";
import { requirePositive } from "./math.js";
import { info } from "../lib/logger.js";

interface RegistryState {
  eligible: Set<CollectionId>;
  poolWeight: Map<CollectionId, EpochSeries>;
  globalWeight: EpochSeries;
}

export class CollectionRegistry implements CollectionRegistryPort, Checkpointable {
  private state: RegistryState;

  constructor(collections: CollectionId[] = [], firstEpoch = 1) {
    this.state = {
      eligible: new Set(collections.map(normalizeCollection)),
      poolWeight: new Map(),
      globalWeight: createEpochSeries(firstEpoch),
    };
  }

  allowCollection(collection: CollectionId): void {
    const key = normalizeCollection(collection);
    this.state.eligible.add(key);
    info("Collection allowed for staking", { collection: key });
  }

  disallowCollection(collection: CollectionId): void {
    const key = normalizeCollection(collection);
    this.state.eligible.delete(key);
    info("Collection disallowed for staking", { collection: key });
  }

  isEligible(collection: CollectionId): boolean {
    return this.state.eligible.has(normalizeCollection(collection));
  }

  eligibleCollections(): CollectionId[] {
    return [...this.state.eligible];
  }

  addVotesToVeZoo(collection: CollectionId, amount: bigint, epoch: number): void {
    requirePositive(amount, "veZoo amount");
    const key = normalizeCollection(collection);
    increase(seriesFor(this.state.poolWeight, key, epoch), epoch, amount);
    increase(this.state.globalWeight, epoch, amount);
  }

  removeVotesFromVeZoo(collection: CollectionId, amount: bigint, epoch: number): void {
    requirePositive(amount, "veZoo amount");
    const key = normalizeCollection(collection);
    decrease(seriesFor(this.state.poolWeight, key, epoch), epoch, amount, "Collection weight");
    decrease(this.state.globalWeight, epoch, amount, "Global weight");
  }

  /**
   * Materialize the weight ledgers up to `epoch`
   */
  updateCollectionWeights(collection: CollectionId, epoch: number): void {
    catchUp(seriesFor(this.state.poolWeight, normalizeCollection(collection), epoch), epoch);
    catchUp(this.state.globalWeight, epoch);
  }

  getCollectionWeight(collection: CollectionId, epoch: number): bigint {
    const series = this.state.poolWeight.get(normalizeCollection(collection));
    return series ? valueAt(series, epoch) : 0n;
  }

  getGlobalWeight(epoch: number): bigint {
    return valueAt(this.state.globalWeight, epoch);
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }
}

export function normalizeCollection(collection: CollectionId): CollectionId {
  return collection.toLowerCase();
}
