/**
 * Incentive Distribution Tests
 */

import { describe, it, expect, vi } from "vitest";
import type { ArenaConfig } from "../src/lib/config.js";
import {
  ALICE,
  ARENA,
  BOB,
  CAROL,
  createArenaFixture,
  stake,
  units,
  vote,
} from "./helpers/fakes.js";

/**
 * Alice's NFT is backed by Carol with 500 dai and 100 zoo and beats the arena
 * in epoch 1. Bob's NFT sits in the same collection without votes. Ends in epoch 3.
 */
function playIncentiveEpochs(overrides: Partial<ArenaConfig>) {
  const f = createArenaFixture({
    stakerIncentivePerEpoch: units(1000n),
    voterIncentivePerEpoch: units(2000n),
    ...overrides,
  });
  const s1 = stake(f, ALICE, 1);
  const s2 = stake(f, BOB, 2);
  const v1 = vote(f, CAROL, s1, units(500n));

  f.goTo("Pair");
  f.arena.pairNft(s1);
  f.goTo("ZooVote");
  f.zoo.fund(CAROL, units(100n), ARENA);
  f.voting.addZooToPosition(CAROL, v1, units(100n));
  f.goTo("Winner");
  f.arena.requestRandom();
  f.policy.fulfillRandomness(1n);
  vi.spyOn(f.policy, "decideWins").mockReturnValue(true);
  f.arena.chooseWinnerInPair(0);
  f.arena.updateEpoch();
  f.nextEpoch();
  return { f, s1, s2, v1 };
}

describe("Incentive rewards", () => {
  it("should split the staker incentive by collection weight and staked count", () => {
    const { f, s1, s2 } = playIncentiveEpochs({ endEpochOfIncentiveRewards: 10 });
    expect(f.arena.currentEpoch).toBe(3);

    expect(f.staking.claimIncentiveStakerReward(ALICE, s1)).toBe(units(1000n));
    expect(f.staking.claimIncentiveStakerReward(BOB, s2)).toBe(units(1000n));
    expect(f.incentive.balanceOf(ALICE)).toBe(units(1000n));
    expect(f.staking.claimIncentiveStakerReward(ALICE, s1)).toBe(0n);
  });

  it("should pay voters only for epochs their position played", () => {
    const { f, v1 } = playIncentiveEpochs({ endEpochOfIncentiveRewards: 10 });

    expect(f.voting.claimIncentiveVoterReward(CAROL, v1)).toBe(units(2000n));
    expect(f.incentive.balanceOf(CAROL)).toBe(units(2000n));
    expect(f.voting.claimIncentiveVoterReward(CAROL, v1)).toBe(0n);
  });

  it("should stop accruing after the last incentive epoch", () => {
    const { f, s1, v1 } = playIncentiveEpochs({ endEpochOfIncentiveRewards: 1 });

    expect(f.staking.claimIncentiveStakerReward(ALICE, s1)).toBe(units(500n));
    expect(f.voting.claimIncentiveVoterReward(CAROL, v1)).toBe(units(2000n));
  });

  it("should accrue nothing without veZoo weight", () => {
    const f = createArenaFixture({ stakerIncentivePerEpoch: units(1000n), endEpochOfIncentiveRewards: 10 });
    const s1 = stake(f, ALICE, 1);
    f.nextEpoch();
    expect(f.staking.claimIncentiveStakerReward(ALICE, s1)).toBe(0n);
  });

  it("should keep the zoo reward of the won battle claimable", () => {
    const { f, v1 } = playIncentiveEpochs({ endEpochOfIncentiveRewards: 10 });
    expect(f.voting.claimRewardFromVoting(CAROL, v1).zoo).toBe(units(100n));
  });
});
