/**
 * Reward Accountant
 *
 * Lazy per-position catch-up and settlement of voter and staker rewards.
 * updateInfo must run before anything reads or changes a position's
 * current-epoch record.
 */

import type { VotingPosition } from "../types/arena.js";
import type { CollectionRegistryPort, RandomnessPolicy } from "./interfaces.js";
import { WAD, mulDiv } from "./math.js";
import { contains, movePosition, partitionOf } from "./position-index.js";
import { getStaker, getVoting, peekRecord, rewardRecord, type ArenaState } from "./state.js";
import { accrueVoterIncentive, type IncentiveParams } from "./incentives.js";
import { STAKER_SALDO_DIVISOR } from "../lib/constants.js";

export interface AccountingContext {
  state: ArenaState;
  policy: RandomnessPolicy;
  registry: CollectionRegistryPort;
  incentives: IncentiveParams;
}

/**
 * Carry votes and shares of a staker position forward to the current epoch
 */
export function updateInfo(state: ArenaState, policy: RandomnessPolicy, stakingId: number): void {
  const staker = getStaker(state, stakingId);
  const current = state.clock.currentEpoch;
  if (staker.endEpoch !== 0 || staker.lastUpdateEpoch >= current) return;

  for (let e = staker.lastUpdateEpoch + 1; e <= current; e++) {
    const previous = rewardRecord(state, stakingId, e - 1);
    const record = rewardRecord(state, stakingId, e);
    record.votes += previous.votes;
    record.yTokens += previous.yTokens;
    record.league = policy.getNftLeague(record.votes);
  }
  staker.lastUpdateEpoch = current;
  syncPartition(state, stakingId);
}

/**
 * Keep the index partition in line with the current-epoch votes
 */
export function syncPartition(state: ArenaState, stakingId: number): void {
  if (!contains(state.index, stakingId)) return;
  const votes = peekRecord(state, stakingId, state.clock.currentEpoch).votes;
  const partition = partitionOf(state.index, stakingId);
  if (votes > 0n && partition === "zeroVotes") {
    movePosition(state.index, stakingId, "eligible");
  } else if (votes === 0n && partition !== "zeroVotes") {
    movePosition(state.index, stakingId, "zeroVotes");
  }
}

/**
 * Last epoch (exclusive) whose results a voter can still collect
 */
export function voterLastEpoch(state: ArenaState, position: VotingPosition): number {
  const staker = getStaker(state, position.stakingPositionId);
  let last = state.clock.currentEpoch;
  if (staker.endEpoch !== 0) last = Math.min(last, staker.endEpoch);
  if (position.endEpoch !== 0) last = Math.min(last, position.endEpoch);
  return last;
}

/** Votes a voter had in `epoch`, leaving out votes still pending then */
export function activeVotes(position: VotingPosition, epoch: number): bigint {
  return epoch < position.pendingVotesEpoch ? position.votes - position.pendingVotes : position.votes;
}

function scaleByCoef(shares: bigint, coef: bigint): bigint {
  return coef === 0n ? shares : mulDiv(shares, coef, WAD);
}

/**
 * Voter shares after removing the battle income of every completed epoch
 * since the last deduction. Pending shares join at their epoch.
 */
export function calculateVotersYTokensExcludingRewards(
  state: ArenaState,
  position: VotingPosition,
  until: number
): bigint {
  let shares = position.yTokensNumber;
  for (let e = position.lastEpochYTokensWereDeductedForRewards; e < until; e++) {
    const coef = peekRecord(state, position.stakingPositionId, e).pricePerShareCoef;
    if (e < position.pendingVotesEpoch) {
      shares = scaleByCoef(shares - position.pendingYTokens, coef) + position.pendingYTokens;
    } else {
      shares = scaleByCoef(shares, coef);
    }
  }
  return shares;
}

/**
 * Settle a voter up to its last collectible epoch: deduct released shares
 * and move earned rewards into the debt fields.
 */
export function settleVoter(ctx: AccountingContext, votingId: number): VotingPosition {
  const { state } = ctx;
  const position = getVoting(state, votingId);
  updateInfo(state, ctx.policy, position.stakingPositionId);
  const until = voterLastEpoch(state, position);

  if (until > position.lastEpochYTokensWereDeductedForRewards) {
    position.yTokensNumber = calculateVotersYTokensExcludingRewards(state, position, until);
    position.lastEpochYTokensWereDeductedForRewards = until;
  }

  if (until > position.lastRewardedEpoch) {
    for (let e = position.lastRewardedEpoch; e < until; e++) {
      const record = peekRecord(state, position.stakingPositionId, e);
      if (record.votes === 0n) continue;
      const votes = activeVotes(position, e);
      if (record.yTokensSaldo > 0n) {
        const votersSaldo = record.yTokensSaldo - record.yTokensSaldo / STAKER_SALDO_DIVISOR;
        position.yTokensRewardDebt += mulDiv(votersSaldo, votes, record.votes);
      }
      position.zooRewardDebt += mulDiv(record.zooRewards, votes, record.votes);
    }
    position.lastRewardedEpoch = until;
  }

  if (until > position.lastEpochOfIncentiveReward) {
    position.incentiveRewardDebt += accrueVoterIncentive(
      state,
      ctx.registry,
      ctx.incentives,
      position.stakingPositionId,
      position.lastEpochOfIncentiveReward,
      until,
      (epoch) => activeVotes(position, epoch)
    );
    position.lastEpochOfIncentiveReward = until;
  }

  if (position.pendingVotesEpoch !== 0 && until >= position.pendingVotesEpoch) {
    position.pendingVotes = 0n;
    position.pendingYTokens = 0n;
    position.pendingVotesEpoch = 0;
  }
  return position;
}

/**
 * Staker share of positive saldo over [lastRewardedEpoch, until)
 */
export function settleStaker(state: ArenaState, stakingId: number, until: number): bigint {
  const staker = getStaker(state, stakingId);
  if (until <= staker.lastRewardedEpoch) return 0n;
  let shares = 0n;
  for (let e = staker.lastRewardedEpoch; e < until; e++) {
    const saldo = peekRecord(state, stakingId, e).yTokensSaldo;
    if (saldo > 0n) {
      shares += saldo / STAKER_SALDO_DIVISOR;
    }
  }
  staker.lastRewardedEpoch = until;
  return shares;
}

export function stakerLastEpoch(state: ArenaState, stakingId: number): number {
  const staker = getStaker(state, stakingId);
  const current = state.clock.currentEpoch;
  return staker.endEpoch !== 0 ? Math.min(current, staker.endEpoch) : current;
}
