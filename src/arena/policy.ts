/**
 * Default Game Policy
 *
 * Stage durations, vote pricing, leagues and randomness. The epoch random is
 * requested by the arena and fulfilled by an oracle keeper.
 */

import { createHash } from "crypto";
import type { StageDurations } from "../types/arena.js";
import type { Checkpointable, RandomnessPolicy } from "./interfaces.js";
import { ArenaError, invariant } from "./errors.js";
import { WAD, mulDiv } from "./math.js";
import { DAY_SECONDS } from "../lib/constants.js";

export interface PolicyOptions {
  durations?: Omit<StageDurations, "total"> & { total?: number };
  /** Ascending vote thresholds; league = number of thresholds <= votes */
  leagueThresholds?: bigint[];
  /** Zoo grant per league for beating the arena */
  leagueZooRewards?: bigint[];
  /** Votes per 100 units of dai */
  daiVoteRate?: bigint;
  /** Votes per 100 units of zoo */
  zooVoteRate?: bigint;
  seed?: string;
}

export const DEFAULT_DURATIONS: Omit<StageDurations, "total"> = {
  stake: 3 * DAY_SECONDS,
  daiVote: 3 * DAY_SECONDS,
  pair: 1 * DAY_SECONDS,
  zooVote: 2 * DAY_SECONDS,
  winner: 2 * DAY_SECONDS,
};

export const DEFAULT_LEAGUE_THRESHOLDS: bigint[] = [10_000n, 50_000n, 250_000n, 1_000_000n, 5_000_000n].map(
  (v) => v * WAD
);

export const DEFAULT_LEAGUE_ZOO_REWARDS: bigint[] = [100n, 250n, 500n, 1_000n, 2_500n, 5_000n].map(
  (v) => v * WAD
);

interface RandomState {
  requested: boolean;
  result: bigint | null;
  nonce: bigint;
  daiVoteRate: bigint;
  zooVoteRate: bigint;
}

export class ZooFunctions implements RandomnessPolicy, Checkpointable {
  private readonly durations: StageDurations;
  private readonly leagueThresholds: bigint[];
  private readonly leagueZooRewards: bigint[];
  private readonly seed: string;
  private state: RandomState;

  constructor(opts: PolicyOptions = {}) {
    const d: NonNullable<PolicyOptions["durations"]> = opts.durations ?? DEFAULT_DURATIONS;
    const sum = d.stake + d.daiVote + d.pair + d.zooVote + d.winner;
    this.durations = { ...d, total: d.total ?? sum };
    invariant(this.durations.total >= sum - d.winner, "Epoch total shorter than its voting stages");

    this.leagueThresholds = opts.leagueThresholds ?? DEFAULT_LEAGUE_THRESHOLDS;
    this.leagueZooRewards = opts.leagueZooRewards ?? DEFAULT_LEAGUE_ZOO_REWARDS;
    invariant(
      this.leagueZooRewards.length === this.leagueThresholds.length + 1,
      "Every league needs a zoo reward"
    );
    this.seed = opts.seed ?? "arena";
    this.state = {
      requested: false,
      result: null,
      nonce: 0n,
      daiVoteRate: opts.daiVoteRate ?? 100n,
      zooVoteRate: opts.zooVoteRate ?? 100n,
    };
  }

  requestRandomNumber(): void {
    this.state.requested = true;
  }

  /**
   * Oracle callback delivering the random value for the requested epoch
   */
  fulfillRandomness(value: bigint): void {
    if (!this.state.requested) {
      throw new ArenaError("RandomNotReady", "No random number was requested");
    }
    this.state.result = value;
  }

  isRandomRequested(): boolean {
    return this.state.requested;
  }

  getRandomResult(): bigint {
    if (this.state.result === null) {
      throw new ArenaError("RandomNotReady", "Random number is not fulfilled yet");
    }
    return this.state.result;
  }

  resetRandom(): void {
    this.state.requested = false;
    this.state.result = null;
  }

  computePseudoRandom(): bigint {
    this.state.nonce++;
    return hashToBigint(`${this.seed}:${this.state.nonce}`);
  }

  decideWins(votesA: bigint, votesB: bigint, random: bigint): boolean {
    const total = votesA + votesB;
    if (total === 0n) {
      return random % 2n === 0n;
    }
    return random % total < votesA;
  }

  computeVotesByDai(amount: bigint): bigint {
    return mulDiv(amount, this.state.daiVoteRate, 100n);
  }

  computeVotesByZoo(amount: bigint): bigint {
    return mulDiv(amount, this.state.zooVoteRate, 100n);
  }

  /**
   * Governance: vote rates only go up, so recomputed votes never shrink
   */
  setVoteRates(daiVoteRate: bigint, zooVoteRate: bigint): void {
    invariant(daiVoteRate >= this.state.daiVoteRate, "Dai vote rate can not decrease");
    invariant(zooVoteRate >= this.state.zooVoteRate, "Zoo vote rate can not decrease");
    this.state.daiVoteRate = daiVoteRate;
    this.state.zooVoteRate = zooVoteRate;
  }

  getNftLeague(votes: bigint): number {
    let league = 0;
    for (const threshold of this.leagueThresholds) {
      if (votes < threshold) break;
      league++;
    }
    return league;
  }

  getLeagueZooRewards(league: number): bigint {
    return this.leagueZooRewards[league] ?? 0n;
  }

  getStageDurations(): StageDurations {
    return { ...this.durations };
  }

  checkpoint(): () => void {
    const saved = { ...this.state };
    return () => {
      this.state = saved;
    };
  }
}

export function hashToBigint(input: string): bigint {
  return BigInt(`0x${createHash("sha256").update(input).digest("hex")}`);
}

/**
 * Per-pair random derived from the shared epoch random
 */
export function pairRandom(epochRandom: bigint, epoch: number, pairIndex: number): bigint {
  return hashToBigint(`${epochRandom.toString()}:${epoch}:${pairIndex}`);
}
