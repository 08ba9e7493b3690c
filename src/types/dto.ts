/**
 * Data Transfer Objects (DTOs)
 *
 * Compact JSON representations stored in KV.
 * All token, share and vote amounts are stored as decimal strings.
 */

import type { Stage } from "./arena.js";

export type PairDTO = {
  token1: number;
  token2: number; // 0 = arena
  playedInEpoch: boolean;
  win: boolean;
};

export type EpochDTO = {
  epoch: number;
  stage: Stage;
  epochStartDate: number; // Unix seconds
  pairs: PairDTO[];
  playedPairs: number;
  nftsInGame: number;
  nftsWithVotes: number;
  stakerCount: number;
  votingCount: number;
  updatedAt: string; // ISO 8601
};

export type RewardRecordDTO = {
  epoch: number;
  yTokensSaldo: string;
  votes: string;
  yTokens: string;
  tokensAtBattleStart: string;
  pricePerShareAtBattleStart: string;
  pricePerShareCoef: string;
  zooRewards: string;
  league: number;
  battlePlayed: boolean;
};

export type StakerPositionDTO = {
  id: number;
  collection: string;
  startEpoch: number;
  endEpoch: number | null;
  lastRewardedEpoch: number;
  lastUpdateEpoch: number;
  currentRecord: RewardRecordDTO;
  updatedAt: string;
};

export type VotingPositionDTO = {
  id: number;
  stakingPositionId: number;
  daiInvested: string;
  yTokensNumber: string;
  zooInvested: string;
  daiVotes: string;
  votes: string;
  startEpoch: number;
  endEpoch: number | null;
  lastRewardedEpoch: number;
  yTokensRewardDebt: string;
  zooRewardDebt: string;
  incentiveRewardDebt: string;
  pendingVotes: string;
  pendingVotesEpoch: number | null;
  updatedAt: string;
};
