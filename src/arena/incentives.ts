/**
 * Incentive Distributor
 *
 * Splits a fixed incentive amount per epoch between collections by veZoo weight,
 * then between the stakers (per staked NFT) or the voters (per vote that played)
 * of each collection. Nothing accrues after endEpochOfIncentiveRewards.
 */

import type { CollectionId } from "../types/arena.js";
import type { CollectionRegistryPort } from "./interfaces.js";
import { decrease, increase, seriesFor, valueAt } from "./epoch-series.js";
import { peekRecord, playedVotesOf, type ArenaState } from "./state.js";

export interface IncentiveParams {
  stakerIncentivePerEpoch: bigint;
  voterIncentivePerEpoch: bigint;
  endEpochOfIncentiveRewards: number;
}

export function recordStaked(state: ArenaState, collection: CollectionId, epoch: number): void {
  increase(seriesFor(state.stakedInCollection, collection, epoch), epoch, 1n);
}

export function recordUnstaked(state: ArenaState, collection: CollectionId, epoch: number): void {
  decrease(seriesFor(state.stakedInCollection, collection, epoch), epoch, 1n, "Staked count");
}

export function stakedCount(state: ArenaState, collection: CollectionId, epoch: number): bigint {
  const series = state.stakedInCollection.get(collection);
  return series ? valueAt(series, epoch) : 0n;
}

/** Last epoch (exclusive) an accrual over [from, until) may reach */
function cappedUntil(params: IncentiveParams, until: number): number {
  return Math.min(until, params.endEpochOfIncentiveRewards + 1);
}

export function stakerIncentiveForEpoch(
  state: ArenaState,
  registry: CollectionRegistryPort,
  params: IncentiveParams,
  collection: CollectionId,
  epoch: number
): bigint {
  const global = registry.getGlobalWeight(epoch);
  const count = stakedCount(state, collection, epoch);
  if (global === 0n || count === 0n) return 0n;
  const weight = registry.getCollectionWeight(collection, epoch);
  return (params.stakerIncentivePerEpoch * weight) / (global * count);
}

export function voterIncentiveForEpoch(
  state: ArenaState,
  registry: CollectionRegistryPort,
  params: IncentiveParams,
  collection: CollectionId,
  epoch: number,
  votes: bigint
): bigint {
  const global = registry.getGlobalWeight(epoch);
  const played = playedVotesOf(state, epoch, collection);
  if (global === 0n || played === 0n) return 0n;
  const weight = registry.getCollectionWeight(collection, epoch);
  return (params.voterIncentivePerEpoch * weight * votes) / (global * played);
}

/**
 * Incentive earned by a staker position over [lastEpochOfIncentiveReward, until)
 */
export function accrueStakerIncentive(
  state: ArenaState,
  registry: CollectionRegistryPort,
  params: IncentiveParams,
  stakingId: number,
  until: number
): bigint {
  const staker = state.stakerPositions.get(stakingId);
  if (!staker || until <= staker.lastEpochOfIncentiveReward) return 0n;

  registry.updateCollectionWeights(staker.collection, until);
  let reward = 0n;
  for (let e = staker.lastEpochOfIncentiveReward; e < cappedUntil(params, until); e++) {
    reward += stakerIncentiveForEpoch(state, registry, params, staker.collection, e);
  }
  staker.lastEpochOfIncentiveReward = until;
  return reward;
}

/**
 * Incentive earned by a voter over [from, until); `votesAt` gives the voter's votes per epoch
 */
export function accrueVoterIncentive(
  state: ArenaState,
  registry: CollectionRegistryPort,
  params: IncentiveParams,
  stakingId: number,
  from: number,
  until: number,
  votesAt: (epoch: number) => bigint
): bigint {
  const staker = state.stakerPositions.get(stakingId);
  if (!staker || until <= from) return 0n;

  registry.updateCollectionWeights(staker.collection, until);
  let reward = 0n;
  for (let e = from; e < cappedUntil(params, until); e++) {
    if (!peekRecord(state, stakingId, e).battlePlayed) continue;
    reward += voterIncentiveForEpoch(state, registry, params, staker.collection, e, votesAt(e));
  }
  return reward;
}
