/**
 * Epoch Stage Clock Tests
 */

import { describe, it, expect } from "vitest";
import { canAdvanceEpoch, getCurrentStage, requireStage } from "../src/arena/stage-clock.js";
import { ZooFunctions } from "../src/arena/policy.js";

const DAY = 86400;
const durations = new ZooFunctions().getStageDurations();
const clock = { currentEpoch: 1, epochStartDate: 1000 };

describe("Epoch stage clock", () => {
  it("should use the default durations", () => {
    expect(durations).toEqual({
      stake: 3 * DAY,
      daiVote: 3 * DAY,
      pair: DAY,
      zooVote: 2 * DAY,
      winner: 2 * DAY,
      total: 11 * DAY,
    });
  });

  it("should derive the stage from elapsed time", () => {
    expect(getCurrentStage(clock, durations, 1000)).toBe("Stake");
    expect(getCurrentStage(clock, durations, 1000 + 3 * DAY - 1)).toBe("Stake");
    expect(getCurrentStage(clock, durations, 1000 + 3 * DAY)).toBe("DaiVote");
    expect(getCurrentStage(clock, durations, 1000 + 6 * DAY)).toBe("Pair");
    expect(getCurrentStage(clock, durations, 1000 + 7 * DAY)).toBe("ZooVote");
    expect(getCurrentStage(clock, durations, 1000 + 9 * DAY)).toBe("Winner");
  });

  it("should skip stages of zero length", () => {
    const noPairStage = { ...durations, pair: 0 };
    expect(getCurrentStage(clock, noPairStage, 1000 + 6 * DAY - 1)).toBe("DaiVote");
    expect(getCurrentStage(clock, noPairStage, 1000 + 6 * DAY)).toBe("ZooVote");
  });

  it("should stay in Winner past the epoch length", () => {
    expect(getCurrentStage(clock, durations, 1000 + 100 * DAY)).toBe("Winner");
  });

  it("should allow advancing once time is up or every pair is decided", () => {
    expect(canAdvanceEpoch(clock, durations, 1000 + 10 * DAY, 2, 1)).toBe(false);
    expect(canAdvanceEpoch(clock, durations, 1000 + 10 * DAY, 2, 2)).toBe(true);
    expect(canAdvanceEpoch(clock, durations, 1000 + 11 * DAY, 2, 0)).toBe(true);
  });

  it("should reject operations outside their stages", () => {
    expect(() => requireStage("Pair", ["Stake"], "Staking")).toThrow("Staking is not allowed in stage Pair");
    expect(() => requireStage("Stake", ["Stake", "DaiVote"], "Voting")).not.toThrow();
  });
});
