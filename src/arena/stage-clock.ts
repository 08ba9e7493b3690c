/**
 * Epoch Stage Clock
 *
 * Stage boundaries are offsets from the epoch start date.
 * Once the first four stages have elapsed the epoch stays in "Winner"
 * until it is advanced.
 */

import { STAGES, type Stage, type StageDurations } from "../types/arena.js";
import { ArenaError } from "./errors.js";

export interface ClockState {
  currentEpoch: number;
  /** Unix seconds */
  epochStartDate: number;
}

const STAGE_LENGTH: Record<Stage, (durations: StageDurations) => number> = {
  Stake: (d) => d.stake,
  DaiVote: (d) => d.daiVote,
  Pair: (d) => d.pair,
  ZooVote: (d) => d.zooVote,
  Winner: () => Infinity,
};

export function getCurrentStage(clock: ClockState, durations: StageDurations, now: number): Stage {
  const elapsed = now - clock.epochStartDate;
  let boundary = 0;
  for (const stage of STAGES) {
    boundary += STAGE_LENGTH[stage](durations);
    if (elapsed < boundary) return stage;
  }
  return "Winner";
}

export function requireStage(current: Stage, allowed: readonly Stage[], operation: string): void {
  if (!allowed.includes(current)) {
    throw new ArenaError("InvalidStage", `${operation} is not allowed in stage ${current}`, {
      stage: current,
      allowed: [...allowed],
    });
  }
}

/**
 * Whether the epoch may be closed: full duration elapsed, or every pair decided
 */
export function canAdvanceEpoch(
  clock: ClockState,
  durations: StageDurations,
  now: number,
  pairsTotal: number,
  pairsPlayed: number
): boolean {
  return now >= clock.epochStartDate + durations.total || pairsPlayed === pairsTotal;
}

/** Stages in which dai votes count for the running epoch */
export const DAI_VOTE_STAGES: readonly Stage[] = ["Stake", "DaiVote"];
