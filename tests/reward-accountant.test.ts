/**
 * Reward Accountant Tests
 */

import { describe, it, expect } from "vitest";
import type { VotingPosition } from "../src/types/arena.js";
import { createArenaState, peekRecord, rewardRecord } from "../src/arena/state.js";
import { addPosition, partitionOf } from "../src/arena/position-index.js";
import {
  activeVotes,
  calculateVotersYTokensExcludingRewards,
  settleStaker,
  updateInfo,
} from "../src/arena/reward-accountant.js";
import { ZooFunctions } from "../src/arena/policy.js";
import { WAD } from "../src/arena/math.js";

const COLLECTION = `0x${"c".repeat(40)}`;

function stateWithStaker() {
  const state = createArenaState(0);
  state.stakerPositions.set(1, {
    startEpoch: 1,
    endEpoch: 0,
    lastRewardedEpoch: 1,
    lastUpdateEpoch: 1,
    collection: COLLECTION,
    lastEpochOfIncentiveReward: 1,
  });
  addPosition(state.index, 1);
  return state;
}

function votingPosition(overrides: Partial<VotingPosition>): VotingPosition {
  return {
    stakingPositionId: 1,
    daiInvested: 0n,
    yTokensNumber: 0n,
    zooInvested: 0n,
    daiVotes: 0n,
    votes: 0n,
    startEpoch: 1,
    endEpoch: 0,
    lastRewardedEpoch: 1,
    lastEpochYTokensWereDeductedForRewards: 1,
    yTokensRewardDebt: 0n,
    zooRewardDebt: 0n,
    incentiveRewardDebt: 0n,
    lastEpochOfIncentiveReward: 1,
    pendingVotes: 0n,
    pendingYTokens: 0n,
    pendingVotesEpoch: 0,
    ...overrides,
  };
}

describe("Reward accountant", () => {
  const policy = new ZooFunctions();

  describe("updateInfo", () => {
    it("should carry votes and shares into the current epoch", () => {
      const state = stateWithStaker();
      const record = rewardRecord(state, 1, 1);
      record.votes = 20_000n * WAD;
      record.yTokens = 500n * WAD;
      state.clock.currentEpoch = 3;

      updateInfo(state, policy, 1);

      const current = peekRecord(state, 1, 3);
      expect(current.votes).toBe(20_000n * WAD);
      expect(current.yTokens).toBe(500n * WAD);
      expect(current.league).toBe(1);
      expect(peekRecord(state, 1, 2).votes).toBe(20_000n * WAD);
      expect(partitionOf(state.index, 1)).toBe("eligible");
    });

    it("should add carried votes onto votes already injected for the epoch", () => {
      const state = stateWithStaker();
      rewardRecord(state, 1, 1).votes = 500n;
      rewardRecord(state, 1, 2).votes = 300n;
      state.clock.currentEpoch = 2;

      updateInfo(state, policy, 1);

      expect(peekRecord(state, 1, 2).votes).toBe(800n);
    });

    it("should be a no-op on a second call in the same epoch", () => {
      const state = stateWithStaker();
      rewardRecord(state, 1, 1).votes = 500n;
      state.clock.currentEpoch = 2;

      updateInfo(state, policy, 1);
      updateInfo(state, policy, 1);

      expect(peekRecord(state, 1, 2).votes).toBe(500n);
    });

    it("should leave ended positions alone", () => {
      const state = stateWithStaker();
      const staker = state.stakerPositions.get(1);
      if (!staker) throw new Error("missing staker");
      staker.endEpoch = 1;
      rewardRecord(state, 1, 1).votes = 500n;
      state.clock.currentEpoch = 2;

      updateInfo(state, policy, 1);

      expect(state.rewards.get(1)?.has(2)).toBe(false);
    });
  });

  describe("calculateVotersYTokensExcludingRewards", () => {
    it("should scale shares by every completed epoch's coefficient", () => {
      const state = stateWithStaker();
      rewardRecord(state, 1, 1).pricePerShareCoef = 8n * 10n ** 17n;
      rewardRecord(state, 1, 2).pricePerShareCoef = WAD / 2n;
      const position = votingPosition({ yTokensNumber: 1000n * WAD });

      expect(calculateVotersYTokensExcludingRewards(state, position, 2)).toBe(800n * WAD);
      expect(calculateVotersYTokensExcludingRewards(state, position, 3)).toBe(400n * WAD);
    });

    it("should skip epochs without a battle", () => {
      const state = stateWithStaker();
      const position = votingPosition({ yTokensNumber: 1000n * WAD });
      expect(calculateVotersYTokensExcludingRewards(state, position, 4)).toBe(1000n * WAD);
    });

    it("should keep pending shares out of earlier epochs", () => {
      const state = stateWithStaker();
      rewardRecord(state, 1, 1).pricePerShareCoef = 8n * 10n ** 17n;
      const position = votingPosition({
        yTokensNumber: 1000n * WAD,
        pendingYTokens: 500n * WAD,
        pendingVotesEpoch: 2,
      });

      expect(calculateVotersYTokensExcludingRewards(state, position, 2)).toBe(900n * WAD);
    });
  });

  it("should count pending votes only from their epoch on", () => {
    const position = votingPosition({ votes: 1000n, pendingVotes: 400n, pendingVotesEpoch: 3 });
    expect(activeVotes(position, 2)).toBe(600n);
    expect(activeVotes(position, 3)).toBe(1000n);
  });

  it("should pay stakers 1/96 of positive saldo only", () => {
    const state = stateWithStaker();
    rewardRecord(state, 1, 1).yTokensSaldo = 384n * WAD;
    rewardRecord(state, 1, 2).yTokensSaldo = -300n * WAD;
    rewardRecord(state, 1, 3).yTokensSaldo = 96n;

    expect(settleStaker(state, 1, 4)).toBe(4n * WAD + 1n);
    expect(settleStaker(state, 1, 4)).toBe(0n);
    expect(state.stakerPositions.get(1)?.lastRewardedEpoch).toBe(4);
  });
});
