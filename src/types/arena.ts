/**
 * Arena Domain Types
 *
 * Positions, per-epoch battle records and pairings.
 * All token, share and vote amounts are bigint; epochs are plain numbers starting at 1.
 */

/** Stages of one epoch, in order */
export const STAGES = ["Stake", "DaiVote", "Pair", "ZooVote", "Winner"] as const;
export type Stage = (typeof STAGES)[number];

/** Identifier of a collection (contract address) */
export type CollectionId = string;

/** Account identifier (address) */
export type Address = string;

/**
 * One staked NFT.
 * `endEpoch === 0` while the position is active.
 */
export interface StakerPosition {
  startEpoch: number;
  endEpoch: number;
  lastRewardedEpoch: number;
  lastUpdateEpoch: number;
  collection: CollectionId;
  lastEpochOfIncentiveReward: number;
}

/**
 * A bundle of votes backing one staker position.
 *
 * `yTokensNumber` is the voter's own vault share count as of
 * `lastEpochYTokensWereDeductedForRewards`. Votes added after the dai-vote
 * window are tracked in the pending fields until `pendingVotesEpoch`.
 */
export interface VotingPosition {
  stakingPositionId: number;
  daiInvested: bigint;
  yTokensNumber: bigint;
  zooInvested: bigint;
  daiVotes: bigint;
  votes: bigint;
  startEpoch: number;
  endEpoch: number;
  lastRewardedEpoch: number;
  lastEpochYTokensWereDeductedForRewards: number;
  yTokensRewardDebt: bigint;
  zooRewardDebt: bigint;
  incentiveRewardDebt: bigint;
  lastEpochOfIncentiveReward: number;
  pendingVotes: bigint;
  pendingYTokens: bigint;
  pendingVotesEpoch: number;
}

/** Aggregate of one staker position in one epoch */
export interface BattleRewardForEpoch {
  /** Signed net yield delta in vault shares */
  yTokensSaldo: bigint;
  votes: bigint;
  yTokens: bigint;
  tokensAtBattleStart: bigint;
  pricePerShareAtBattleStart: bigint;
  pricePerShareCoef: bigint;
  zooRewards: bigint;
  league: number;
  /** Set once this position's pair is decided in the epoch */
  battlePlayed: boolean;
}

/** Pairing of two staker positions; `token2 === 0` is the arena */
export interface NftPair {
  token1: number;
  token2: number;
  playedInEpoch: boolean;
  win: boolean;
}

/** Outcome of one decided pair, returned to callers and logged */
export interface BattleOutcome {
  pairIndex: number;
  epoch: number;
  winner: number;
  loser: number;
  income1: bigint;
  income2: bigint;
  treasuryShares: bigint;
  winnerSaldoDelta: bigint;
  loserSaldoDelta: bigint;
  zooRewards: bigint;
}

/** Stage durations in seconds, plus the full epoch length */
export interface StageDurations {
  stake: number;
  daiVote: number;
  pair: number;
  zooVote: number;
  winner: number;
  total: number;
}

/** Result of a reward claim */
export interface ClaimResult {
  shares: bigint;
  assets: bigint;
  zoo: bigint;
}
