/**
 * Arena Snapshots
 *
 * Converts arena state to DTOs and publishes them to KV in one MULTI,
 * so readers never see an epoch summary from a different commit than its positions.
 */

import type { NftBattleArena } from "../arena/battle-arena.js";
import type { BattleRewardForEpoch } from "../types/arena.js";
import type { EpochDTO, RewardRecordDTO, StakerPositionDTO, VotingPositionDTO } from "../types/dto.js";
import { isKvEnabled, pipeline, prefixKey } from "./kv.js";
import { kEpochHistoryJson, kEpochJson, kStakerJson, kVotingJson } from "./keys.js";
import { info } from "./logger.js";

export interface ArenaSnapshot {
  epoch: EpochDTO;
  stakers: StakerPositionDTO[];
  votings: VotingPositionDTO[];
}

export function toRewardRecordDTO(epoch: number, record: BattleRewardForEpoch): RewardRecordDTO {
  return {
    epoch,
    yTokensSaldo: record.yTokensSaldo.toString(),
    votes: record.votes.toString(),
    yTokens: record.yTokens.toString(),
    tokensAtBattleStart: record.tokensAtBattleStart.toString(),
    pricePerShareAtBattleStart: record.pricePerShareAtBattleStart.toString(),
    pricePerShareCoef: record.pricePerShareCoef.toString(),
    zooRewards: record.zooRewards.toString(),
    league: record.league,
    battlePlayed: record.battlePlayed,
  };
}

export function toArenaSnapshot(arena: NftBattleArena, now: Date = new Date()): ArenaSnapshot {
  const updatedAt = now.toISOString();
  const epoch = arena.currentEpoch;
  const stakerIds = arena.stakerPositionIds();
  const votingIds = arena.votingPositionIds();

  const stakers = stakerIds.map((id): StakerPositionDTO => {
    const p = arena.getStakerPosition(id);
    const recordEpoch = p.endEpoch === 0 ? p.lastUpdateEpoch : p.endEpoch;
    return {
      id,
      collection: p.collection,
      startEpoch: p.startEpoch,
      endEpoch: p.endEpoch === 0 ? null : p.endEpoch,
      lastRewardedEpoch: p.lastRewardedEpoch,
      lastUpdateEpoch: p.lastUpdateEpoch,
      currentRecord: toRewardRecordDTO(recordEpoch, arena.getRewardRecord(id, recordEpoch)),
      updatedAt,
    };
  });

  const votings = votingIds.map((id): VotingPositionDTO => {
    const p = arena.getVotingPosition(id);
    return {
      id,
      stakingPositionId: p.stakingPositionId,
      daiInvested: p.daiInvested.toString(),
      yTokensNumber: p.yTokensNumber.toString(),
      zooInvested: p.zooInvested.toString(),
      daiVotes: p.daiVotes.toString(),
      votes: p.votes.toString(),
      startEpoch: p.startEpoch,
      endEpoch: p.endEpoch === 0 ? null : p.endEpoch,
      lastRewardedEpoch: p.lastRewardedEpoch,
      yTokensRewardDebt: p.yTokensRewardDebt.toString(),
      zooRewardDebt: p.zooRewardDebt.toString(),
      incentiveRewardDebt: p.incentiveRewardDebt.toString(),
      pendingVotes: p.pendingVotes.toString(),
      pendingVotesEpoch: p.pendingVotesEpoch === 0 ? null : p.pendingVotesEpoch,
      updatedAt,
    };
  });

  return {
    epoch: {
      epoch,
      stage: arena.getCurrentStage(),
      epochStartDate: arena.epochStartDate,
      pairs: arena.getPairs(epoch),
      playedPairs: arena.numberOfPlayedPairs(epoch),
      nftsInGame: arena.nftsInGame,
      nftsWithVotes: arena.numberOfNftsWithNonZeroVotes,
      stakerCount: stakerIds.length,
      votingCount: votingIds.length,
      updatedAt,
    },
    stakers,
    votings,
  };
}

/**
 * Write the current snapshot: epoch summary, its history entry and every position.
 * Without a configured store the snapshot is built and returned unwritten.
 */
export async function publishArenaSnapshot(arena: NftBattleArena): Promise<ArenaSnapshot> {
  const snapshot = toArenaSnapshot(arena);
  if (!isKvEnabled()) {
    return snapshot;
  }

  await pipeline((pipe) => {
    const epochBody = JSON.stringify(snapshot.epoch);
    pipe.set(prefixKey(kEpochJson()), epochBody);
    pipe.set(prefixKey(kEpochHistoryJson(snapshot.epoch.epoch)), epochBody);
    for (const staker of snapshot.stakers) {
      pipe.set(prefixKey(kStakerJson(staker.id)), JSON.stringify(staker));
    }
    for (const voting of snapshot.votings) {
      pipe.set(prefixKey(kVotingJson(voting.id)), JSON.stringify(voting));
    }
  });

  info("Arena snapshot published", {
    epoch: snapshot.epoch.epoch,
    stakers: snapshot.stakers.length,
    votings: snapshot.votings.length,
  });
  return snapshot;
}
