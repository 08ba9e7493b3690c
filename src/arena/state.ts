/**
 * Arena State
 *
 * Plain data so one structuredClone captures everything an operation may roll back.
 */

import type {
  BattleRewardForEpoch,
  CollectionId,
  NftPair,
  StakerPosition,
  VotingPosition,
} from "../types/arena.js";
import type { ClockState } from "./stage-clock.js";
import { createPositionIndex, type PositionIndex } from "./position-index.js";
import type { EpochSeries } from "./epoch-series.js";
import { ArenaError } from "./errors.js";

export interface ArenaState {
  clock: ClockState;
  stakerPositions: Map<number, StakerPosition>;
  votingPositions: Map<number, VotingPosition>;
  nextStakerId: number;
  nextVotingId: number;
  /** stakingPositionId -> epoch -> record */
  rewards: Map<number, Map<number, BattleRewardForEpoch>>;
  pairs: Map<number, NftPair[]>;
  playedPairs: Map<number, number>;
  index: PositionIndex;
  stakedInCollection: Map<CollectionId, EpochSeries>;
  /** epoch -> collection -> votes of decided battles */
  playedVotes: Map<number, Map<CollectionId, bigint>>;
  /** Epoch in which the random number was last requested, 0 if never */
  randomRequestedEpoch: number;
}

export function createArenaState(epochStartDate: number, firstEpoch = 1): ArenaState {
  return {
    clock: { currentEpoch: firstEpoch, epochStartDate },
    stakerPositions: new Map(),
    votingPositions: new Map(),
    nextStakerId: 1,
    nextVotingId: 1,
    rewards: new Map(),
    pairs: new Map(),
    playedPairs: new Map(),
    index: createPositionIndex(),
    stakedInCollection: new Map(),
    playedVotes: new Map(),
    randomRequestedEpoch: 0,
  };
}

export function emptyRecord(): BattleRewardForEpoch {
  return {
    yTokensSaldo: 0n,
    votes: 0n,
    yTokens: 0n,
    tokensAtBattleStart: 0n,
    pricePerShareAtBattleStart: 0n,
    pricePerShareCoef: 0n,
    zooRewards: 0n,
    league: 0,
    battlePlayed: false,
  };
}

/**
 * Get-or-create the record of a staker position for an epoch
 */
export function rewardRecord(state: ArenaState, stakingId: number, epoch: number): BattleRewardForEpoch {
  let byEpoch = state.rewards.get(stakingId);
  if (!byEpoch) {
    byEpoch = new Map();
    state.rewards.set(stakingId, byEpoch);
  }
  let record = byEpoch.get(epoch);
  if (!record) {
    record = emptyRecord();
    byEpoch.set(epoch, record);
  }
  return record;
}

/** Read without materializing */
export function peekRecord(state: ArenaState, stakingId: number, epoch: number): BattleRewardForEpoch {
  return state.rewards.get(stakingId)?.get(epoch) ?? emptyRecord();
}

export function getStaker(state: ArenaState, stakingId: number): StakerPosition {
  const position = state.stakerPositions.get(stakingId);
  if (!position) {
    throw new ArenaError("NotFound", `Staker position ${stakingId} does not exist`, { stakingId });
  }
  return position;
}

export function getVoting(state: ArenaState, votingId: number): VotingPosition {
  const position = state.votingPositions.get(votingId);
  if (!position) {
    throw new ArenaError("NotFound", `Voting position ${votingId} does not exist`, { votingId });
  }
  return position;
}

export function pairsOf(state: ArenaState, epoch: number): NftPair[] {
  let pairs = state.pairs.get(epoch);
  if (!pairs) {
    pairs = [];
    state.pairs.set(epoch, pairs);
  }
  return pairs;
}

export function playedVotesOf(state: ArenaState, epoch: number, collection: CollectionId): bigint {
  return state.playedVotes.get(epoch)?.get(collection) ?? 0n;
}

export function addPlayedVotes(state: ArenaState, epoch: number, collection: CollectionId, votes: bigint): void {
  let byCollection = state.playedVotes.get(epoch);
  if (!byCollection) {
    byCollection = new Map();
    state.playedVotes.set(epoch, byCollection);
  }
  byCollection.set(collection, (byCollection.get(collection) ?? 0n) + votes);
}
