/**
 * NFT Battle Arena
 *
 * Position ledger, pairing, winner selection and reward claims, driven by the
 * five-stage epoch clock. Every public mutator is one atomic operation: on any
 * failure the arena state and every checkpointable collaborator are restored.
 */

import type {
  Address,
  BattleOutcome,
  BattleRewardForEpoch,
  ClaimResult,
  CollectionId,
  NftPair,
  Stage,
  StakerPosition,
  VotingPosition,
} from "../types/arena.js";
import type { ArenaConfig } from "../lib/config.js";
import type {
  CollectionRegistryPort,
  FungibleToken,
  RandomnessPolicy,
  VaultAdapter,
} from "./interfaces.js";
import { isCheckpointable } from "./interfaces.js";
import { ArenaError, invariant, isArenaError } from "./errors.js";
import { checkedSub, mulDiv, requirePositive } from "./math.js";
import {
  DAI_VOTE_STAGES,
  canAdvanceEpoch,
  getCurrentStage,
  requireStage,
} from "./stage-clock.js";
import {
  addPosition,
  idsIn,
  movePosition,
  partitionOf,
  removePosition,
  resetGames,
} from "./position-index.js";
import {
  addPlayedVotes,
  createArenaState,
  getStaker,
  getVoting,
  pairsOf,
  peekRecord,
  rewardRecord,
  type ArenaState,
} from "./state.js";
import {
  settleStaker,
  settleVoter,
  stakerLastEpoch,
  syncPartition,
  updateInfo,
  type AccountingContext,
} from "./reward-accountant.js";
import {
  battleIncome,
  releaseIncome,
  selectOpponent,
  snapshotBattleStart,
  splitBattleIncome,
} from "./battle-engine.js";
import { accrueStakerIncentive, recordStaked, recordUnstaked, type IncentiveParams } from "./incentives.js";
import { normalizeCollection } from "./collection-registry.js";
import { pairRandom } from "./policy.js";
import { ARENA_OPPONENT_ID } from "../lib/constants.js";
import { info, warn } from "../lib/logger.js";
import { recordBattle, recordOperation } from "../lib/metrics.js";

export interface ArenaDependencies {
  dai: FungibleToken;
  zoo: FungibleToken;
  incentiveToken: FungibleToken;
  vault: VaultAdapter;
  policy: RandomnessPolicy;
  registry: CollectionRegistryPort;
  config: ArenaConfig;
  /** Unix seconds */
  now?: () => number;
  /** Called after every committed top-level operation */
  onCommit?: (operation: string) => void;
}

export interface ActivePositions {
  inGame: number[];
  eligible: number[];
  zeroVotes: number[];
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

export class NftBattleArena {
  private state: ArenaState;
  private depth = 0;
  private readonly participants = new Set<unknown>();
  private readonly dai: FungibleToken;
  private readonly zoo: FungibleToken;
  private readonly incentiveToken: FungibleToken;
  private readonly vault: VaultAdapter;
  private readonly policy: RandomnessPolicy;
  private readonly registry: CollectionRegistryPort;
  private readonly config: ArenaConfig;
  private readonly now: () => number;
  private readonly onCommit?: (operation: string) => void;

  constructor(deps: ArenaDependencies) {
    this.dai = deps.dai;
    this.zoo = deps.zoo;
    this.incentiveToken = deps.incentiveToken;
    this.vault = deps.vault;
    this.policy = deps.policy;
    this.registry = deps.registry;
    this.config = deps.config;
    this.now = deps.now ?? unixNow;
    this.onCommit = deps.onCommit;
    this.state = createArenaState(this.now());
    this.enlist(deps.dai, deps.zoo, deps.incentiveToken, deps.vault, deps.policy, deps.registry);
  }

  // ---------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------

  /**
   * Add collaborators whose state must roll back with the arena's
   */
  enlist(...collaborators: unknown[]): void {
    for (const c of collaborators) {
      this.participants.add(c);
    }
  }

  /**
   * Run `fn` as one all-or-nothing operation. Nested calls join the outer one.
   */
  atomic<T>(operation: string, fn: () => T): T {
    if (this.depth > 0) {
      return fn();
    }

    const start = Date.now();
    // Full copy: cost grows with the per-epoch reward records kept in state
    const savedState = structuredClone(this.state);
    const rollbacks: Array<() => void> = [];
    for (const participant of this.participants) {
      if (isCheckpointable(participant)) {
        rollbacks.push(participant.checkpoint());
      }
    }

    this.depth++;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.state = savedState;
      for (const rollback of rollbacks.reverse()) {
        rollback();
      }
      recordOperation(operation, Date.now() - start, true);
      warn(`${operation} rejected`, {
        code: isArenaError(err) ? err.code : "Unknown",
        reason: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      this.depth--;
    }

    recordOperation(operation, Date.now() - start);
    this.onCommit?.(operation);
    return result;
  }

  private external<T>(what: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isArenaError(err)) throw err;
      throw new ArenaError("CollaboratorFailure", `${what} failed`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private get accounting(): AccountingContext {
    return {
      state: this.state,
      policy: this.policy,
      registry: this.registry,
      incentives: this.incentiveParams,
    };
  }

  private get incentiveParams(): IncentiveParams {
    return {
      stakerIncentivePerEpoch: this.config.stakerIncentivePerEpoch,
      voterIncentivePerEpoch: this.config.voterIncentivePerEpoch,
      endEpochOfIncentiveRewards: this.config.endEpochOfIncentiveRewards,
    };
  }

  // ---------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------

  get currentEpoch(): number {
    return this.state.clock.currentEpoch;
  }

  get epochStartDate(): number {
    return this.state.clock.epochStartDate;
  }

  get treasury(): Address {
    return this.config.treasury;
  }

  getCurrentStage(): Stage {
    return getCurrentStage(this.state.clock, this.policy.getStageDurations(), this.now());
  }

  getStakerPosition(stakingId: number): StakerPosition {
    return { ...getStaker(this.state, stakingId) };
  }

  getVotingPosition(votingId: number): VotingPosition {
    return { ...getVoting(this.state, votingId) };
  }

  stakerPositionIds(): number[] {
    return [...this.state.stakerPositions.keys()];
  }

  votingPositionIds(): number[] {
    return [...this.state.votingPositions.keys()];
  }

  /** Record as stored; positions that were not caught up read their last materialized epoch */
  getRewardRecord(stakingId: number, epoch: number): BattleRewardForEpoch {
    return { ...peekRecord(this.state, stakingId, epoch) };
  }

  getPairs(epoch: number = this.currentEpoch): NftPair[] {
    return (this.state.pairs.get(epoch) ?? []).map((p) => ({ ...p }));
  }

  numberOfPlayedPairs(epoch: number = this.currentEpoch): number {
    return this.state.playedPairs.get(epoch) ?? 0;
  }

  activePositions(): ActivePositions {
    return {
      inGame: idsIn(this.state.index, "inGame"),
      eligible: idsIn(this.state.index, "eligible"),
      zeroVotes: idsIn(this.state.index, "zeroVotes"),
    };
  }

  get numberOfNftsWithNonZeroVotes(): number {
    return this.state.index.nonZero;
  }

  get nftsInGame(): number {
    return this.state.index.inGame;
  }

  /**
   * Rewards a voter could claim now, computed on a throwaway copy
   */
  previewVotingReward(votingId: number): { shares: bigint; zoo: bigint; incentive: bigint } {
    return this.preview(() => {
      const position = settleVoter(this.accounting, votingId);
      return {
        shares: position.yTokensRewardDebt,
        zoo: position.zooRewardDebt,
        incentive: position.incentiveRewardDebt,
      };
    });
  }

  /** Shares a voter still owns after deductions, on a throwaway copy */
  previewVoterShares(votingId: number): bigint {
    return this.preview(() => settleVoter(this.accounting, votingId).yTokensNumber);
  }

  previewStakingReward(stakingId: number): bigint {
    return this.preview(() => {
      updateInfo(this.state, this.policy, stakingId);
      return settleStaker(this.state, stakingId, stakerLastEpoch(this.state, stakingId));
    });
  }

  private preview<T>(fn: () => T): T {
    const savedState = structuredClone(this.state);
    const rollbacks: Array<() => void> = [];
    for (const participant of this.participants) {
      if (isCheckpointable(participant)) rollbacks.push(participant.checkpoint());
    }
    try {
      return fn();
    } finally {
      this.state = savedState;
      for (const rollback of rollbacks.reverse()) rollback();
    }
  }

  // ---------------------------------------------------------------------
  // Staker positions
  // ---------------------------------------------------------------------

  createStakerPosition(collection: CollectionId): number {
    return this.atomic("createStakerPosition", () => {
      requireStage(this.getCurrentStage(), ["Stake"], "Staking");
      const key = normalizeCollection(collection);
      const epoch = this.currentEpoch;
      const stakingId = this.state.nextStakerId++;

      this.state.stakerPositions.set(stakingId, {
        startEpoch: epoch,
        endEpoch: 0,
        lastRewardedEpoch: epoch,
        lastUpdateEpoch: epoch,
        collection: key,
        lastEpochOfIncentiveReward: epoch,
      });
      rewardRecord(this.state, stakingId, epoch);
      addPosition(this.state.index, stakingId);
      recordStaked(this.state, key, epoch);

      info("Staker position created", { stakingId, collection: key, epoch });
      return stakingId;
    });
  }

  removeStakerPosition(stakingId: number): void {
    this.atomic("removeStakerPosition", () => {
      requireStage(this.getCurrentStage(), ["Stake"], "Unstaking");
      const staker = getStaker(this.state, stakingId);
      invariant(staker.endEpoch === 0, "Position is already unstaked", { stakingId });

      updateInfo(this.state, this.policy, stakingId);
      staker.endEpoch = this.currentEpoch;
      removePosition(this.state.index, stakingId);
      recordUnstaked(this.state, staker.collection, this.currentEpoch);

      info("Staker position removed", { stakingId, epoch: this.currentEpoch });
    });
  }

  claimRewardFromStaking(stakingId: number, beneficiary: Address): ClaimResult {
    return this.atomic("claimRewardFromStaking", () => {
      updateInfo(this.state, this.policy, stakingId);
      const shares = settleStaker(this.state, stakingId, stakerLastEpoch(this.state, stakingId));
      const assets = this.redeemTo(beneficiary, shares);
      return { shares, assets, zoo: 0n };
    });
  }

  claimIncentiveStakerReward(stakingId: number, beneficiary: Address): bigint {
    return this.atomic("claimIncentiveStakerReward", () => {
      const until = stakerLastEpoch(this.state, stakingId);
      const amount = accrueStakerIncentive(this.state, this.registry, this.incentiveParams, stakingId, until);
      if (amount > 0n) {
        this.external("incentiveToken.transfer", () =>
          this.incentiveToken.transfer(this.config.arenaAddress, beneficiary, amount)
        );
      }
      return amount;
    });
  }

  // ---------------------------------------------------------------------
  // Voting positions
  // ---------------------------------------------------------------------

  createVotingPosition(stakingId: number, voter: Address, amount: bigint): number {
    return this.atomic("createVotingPosition", () => {
      requirePositive(amount, "Dai amount");
      const staker = getStaker(this.state, stakingId);
      invariant(staker.endEpoch === 0, "Staker position is not active", { stakingId });
      updateInfo(this.state, this.policy, stakingId);

      const epoch = this.currentEpoch;
      const pending = !DAI_VOTE_STAGES.includes(this.getCurrentStage());
      const target = pending ? epoch + 1 : epoch;
      const shares = this.deposit(voter, amount);
      const votes = this.policy.computeVotesByDai(amount);
      const votingId = this.state.nextVotingId++;

      this.state.votingPositions.set(votingId, {
        stakingPositionId: stakingId,
        daiInvested: amount,
        yTokensNumber: shares,
        zooInvested: 0n,
        daiVotes: votes,
        votes,
        startEpoch: target,
        endEpoch: 0,
        lastRewardedEpoch: target,
        lastEpochYTokensWereDeductedForRewards: target,
        yTokensRewardDebt: 0n,
        zooRewardDebt: 0n,
        incentiveRewardDebt: 0n,
        lastEpochOfIncentiveReward: target,
        pendingVotes: 0n,
        pendingYTokens: 0n,
        pendingVotesEpoch: 0,
      });
      this.addVotes(stakingId, target, votes, shares);

      info("Voting position created", { votingId, stakingId, amount, votes, pending });
      return votingId;
    });
  }

  addDaiToVoting(votingId: number, voter: Address, amount: bigint): bigint {
    return this.atomic("addDaiToVoting", () => {
      requirePositive(amount, "Dai amount");
      const position = this.activeVoting(votingId);
      const epoch = this.currentEpoch;
      const pending = !DAI_VOTE_STAGES.includes(this.getCurrentStage());
      const target = pending ? epoch + 1 : epoch;

      const shares = this.deposit(voter, amount);
      const votes = this.policy.computeVotesByDai(amount);
      position.daiInvested += amount;
      position.daiVotes += votes;
      position.votes += votes;
      position.yTokensNumber += shares;
      if (pending && position.startEpoch <= epoch) {
        position.pendingVotes += votes;
        position.pendingYTokens += shares;
        position.pendingVotesEpoch = target;
      }
      this.addVotes(position.stakingPositionId, target, votes, shares);
      return votes;
    });
  }

  addZooToVoting(votingId: number, voter: Address, amount: bigint): bigint {
    return this.atomic("addZooToVoting", () => {
      requireStage(this.getCurrentStage(), ["ZooVote"], "Adding zoo");
      requirePositive(amount, "Zoo amount");
      const position = this.activeVoting(votingId);
      const epoch = this.currentEpoch;
      invariant(position.startEpoch <= epoch, "Voting position starts next epoch", { votingId });
      invariant(position.zooInvested + amount <= position.daiInvested, "Zoo can not exceed dai invested", {
        zooInvested: position.zooInvested.toString(),
        daiInvested: position.daiInvested.toString(),
      });

      this.external("zoo.transferFrom", () =>
        this.zoo.transferFrom(this.config.arenaAddress, voter, this.config.arenaAddress, amount)
      );
      const votes = this.policy.computeVotesByZoo(amount);
      position.zooInvested += amount;
      position.votes += votes;
      this.addVotes(position.stakingPositionId, epoch, votes, 0n);

      const collection = getStaker(this.state, position.stakingPositionId).collection;
      this.registry.addVotesToVeZoo(collection, amount, epoch);
      return votes;
    });
  }

  /**
   * Withdraw dai; withdrawing everything liquidates the position.
   * Returns the assets paid to the beneficiary.
   */
  withdrawDaiFromVoting(votingId: number, beneficiary: Address, amount: bigint): bigint {
    return this.atomic("withdrawDaiFromVoting", () => {
      requirePositive(amount, "Dai amount");
      const position = settleVoter(this.accounting, votingId);
      invariant(position.endEpoch === 0, "Voting position is liquidated", { votingId });
      const stakerActive = this.requireWithdrawWindow(position);
      invariant(amount <= position.daiInvested, "Withdrawing more dai than invested", {
        amount: amount.toString(),
        daiInvested: position.daiInvested.toString(),
      });

      const full = amount === position.daiInvested;
      const sharesOut = full ? position.yTokensNumber : mulDiv(position.yTokensNumber, amount, position.daiInvested);
      const daiVotesOut = full ? position.daiVotes : mulDiv(position.daiVotes, amount, position.daiInvested);

      position.daiInvested -= amount;
      position.daiVotes -= daiVotesOut;
      position.votes = checkedSub(position.votes, daiVotesOut, "Votes");
      position.yTokensNumber -= sharesOut;

      let votesOut = daiVotesOut;
      if (position.zooInvested > position.daiInvested) {
        votesOut += this.releaseZoo(position, position.zooInvested - position.daiInvested, beneficiary);
      }
      if (stakerActive) {
        this.removeVotes(position.stakingPositionId, votesOut, sharesOut);
      }

      const assets = this.redeemTo(beneficiary, sharesOut);
      if (full) {
        position.endEpoch = this.currentEpoch;
        info("Voting position liquidated", { votingId, assets });
      }
      return assets;
    });
  }

  withdrawZooFromVoting(votingId: number, beneficiary: Address, amount: bigint): bigint {
    return this.atomic("withdrawZooFromVoting", () => {
      requirePositive(amount, "Zoo amount");
      const position = settleVoter(this.accounting, votingId);
      invariant(position.endEpoch === 0, "Voting position is liquidated", { votingId });
      const stakerActive = this.requireWithdrawWindow(position);
      invariant(amount <= position.zooInvested, "Withdrawing more zoo than invested", {
        amount: amount.toString(),
        zooInvested: position.zooInvested.toString(),
      });

      const votesOut = this.releaseZoo(position, amount, beneficiary);
      if (stakerActive) {
        this.removeVotes(position.stakingPositionId, votesOut, 0n);
      }
      return votesOut;
    });
  }

  recomputeDaiVotes(votingId: number): bigint {
    return this.atomic("recomputeDaiVotes", () => {
      requireStage(this.getCurrentStage(), DAI_VOTE_STAGES, "Recomputing dai votes");
      const position = this.activeVoting(votingId);
      const votes = this.policy.computeVotesByDai(position.daiInvested);
      invariant(votes >= position.daiVotes, "Votes can not be recomputed to a lower value", {
        votingId,
        current: position.daiVotes.toString(),
        recomputed: votes.toString(),
      });

      const delta = votes - position.daiVotes;
      position.daiVotes = votes;
      position.votes += delta;
      this.addVotes(position.stakingPositionId, Math.max(this.currentEpoch, position.startEpoch), delta, 0n);
      return position.votes;
    });
  }

  recomputeZooVotes(votingId: number): bigint {
    return this.atomic("recomputeZooVotes", () => {
      requireStage(this.getCurrentStage(), ["ZooVote"], "Recomputing zoo votes");
      const position = this.activeVoting(votingId);
      const current = position.votes - position.daiVotes;
      const votes = this.policy.computeVotesByZoo(position.zooInvested);
      invariant(votes >= current, "Votes can not be recomputed to a lower value", {
        votingId,
        current: current.toString(),
        recomputed: votes.toString(),
      });

      const delta = votes - current;
      position.votes += delta;
      this.addVotes(position.stakingPositionId, this.currentEpoch, delta, 0n);
      return position.votes;
    });
  }

  claimRewardFromVoting(votingId: number, beneficiary: Address): ClaimResult {
    return this.atomic("claimRewardFromVoting", () => {
      const position = settleVoter(this.accounting, votingId);
      const shares = position.yTokensRewardDebt;
      const zoo = position.zooRewardDebt;
      position.yTokensRewardDebt = 0n;
      position.zooRewardDebt = 0n;

      const assets = this.redeemTo(beneficiary, shares);
      if (zoo > 0n) {
        this.external("zoo.transfer", () => this.zoo.transfer(this.config.arenaAddress, beneficiary, zoo));
      }
      return { shares, assets, zoo };
    });
  }

  claimIncentiveVoterReward(votingId: number, beneficiary: Address): bigint {
    return this.atomic("claimIncentiveVoterReward", () => {
      const position = settleVoter(this.accounting, votingId);
      const amount = position.incentiveRewardDebt;
      position.incentiveRewardDebt = 0n;
      if (amount > 0n) {
        this.external("incentiveToken.transfer", () =>
          this.incentiveToken.transfer(this.config.arenaAddress, beneficiary, amount)
        );
      }
      return amount;
    });
  }

  // ---------------------------------------------------------------------
  // Battles
  // ---------------------------------------------------------------------

  /**
   * Pair a position with a random same-league opponent, or with the arena.
   * Returns the pair index.
   */
  pairNft(stakingId: number): number {
    return this.atomic("pairNft", () => {
      requireStage(this.getCurrentStage(), ["Pair"], "Pairing");
      const staker = getStaker(this.state, stakingId);
      invariant(staker.endEpoch === 0, "Staker position is not active", { stakingId });

      const unpaired = [...idsIn(this.state.index, "eligible"), ...idsIn(this.state.index, "zeroVotes")];
      for (const id of unpaired) {
        updateInfo(this.state, this.policy, id);
      }
      invariant(partitionOf(this.state.index, stakingId) !== "inGame", "Position is already paired", { stakingId });

      const epoch = this.currentEpoch;
      const record = rewardRecord(this.state, stakingId, epoch);
      invariant(record.votes > 0n, "Position has no votes", { stakingId });

      const candidates = idsIn(this.state.index, "eligible").filter(
        (id) => id !== stakingId && peekRecord(this.state, id, epoch).league === record.league
      );
      const opponent =
        candidates.length > 0
          ? selectOpponent(candidates, this.policy.computePseudoRandom()) ?? ARENA_OPPONENT_ID
          : ARENA_OPPONENT_ID;

      const pricePerShare = this.exchangeRate();
      movePosition(this.state.index, stakingId, "inGame");
      snapshotBattleStart(record, pricePerShare);
      if (opponent !== ARENA_OPPONENT_ID) {
        movePosition(this.state.index, opponent, "inGame");
        snapshotBattleStart(rewardRecord(this.state, opponent, epoch), pricePerShare);
      }

      const pairs = pairsOf(this.state, epoch);
      pairs.push({ token1: stakingId, token2: opponent, playedInEpoch: false, win: false });
      info("Positions paired", { epoch, pairIndex: pairs.length - 1, token1: stakingId, token2: opponent });
      return pairs.length - 1;
    });
  }

  requestRandom(): void {
    this.atomic("requestRandom", () => {
      requireStage(this.getCurrentStage(), ["Winner"], "Requesting random");
      invariant(this.state.randomRequestedEpoch !== this.currentEpoch, "Random already requested for this epoch");
      this.external("policy.requestRandomNumber", () => this.policy.requestRandomNumber());
      this.state.randomRequestedEpoch = this.currentEpoch;
    });
  }

  chooseWinnerInPair(pairIndex: number): BattleOutcome {
    return this.atomic("chooseWinnerInPair", () => {
      requireStage(this.getCurrentStage(), ["Winner"], "Choosing winners");
      const epoch = this.currentEpoch;
      const pair = pairsOf(this.state, epoch)[pairIndex];
      if (!pair) {
        throw new ArenaError("NotFound", `Pair ${pairIndex} does not exist in epoch ${epoch}`, { pairIndex, epoch });
      }
      invariant(!pair.playedInEpoch, "Winner already chosen", { pairIndex, epoch });

      const random = pairRandom(this.policy.getRandomResult(), epoch, pairIndex);
      const pricePerShare = this.exchangeRate();
      const outcome =
        pair.token2 === ARENA_OPPONENT_ID
          ? this.decideArenaPair(pair, pairIndex, random, pricePerShare)
          : this.decidePair(pair, pairIndex, random, pricePerShare);

      pair.playedInEpoch = true;
      this.state.playedPairs.set(epoch, (this.state.playedPairs.get(epoch) ?? 0) + 1);
      recordBattle(pair.token2 === ARENA_OPPONENT_ID, outcome.treasuryShares);
      info("Winner chosen", {
        epoch,
        pairIndex,
        winner: outcome.winner,
        loser: outcome.loser,
        treasuryShares: outcome.treasuryShares,
      });
      return outcome;
    });
  }

  private decidePair(pair: NftPair, pairIndex: number, random: bigint, pricePerShare: bigint): BattleOutcome {
    const epoch = this.currentEpoch;
    const record1 = rewardRecord(this.state, pair.token1, epoch);
    const record2 = rewardRecord(this.state, pair.token2, epoch);
    pair.win = this.policy.decideWins(record1.votes, record2.votes, random);

    const income1 = battleIncome(record1, pricePerShare);
    const income2 = battleIncome(record2, pricePerShare);
    const [winner, loser] = pair.win ? [pair.token1, pair.token2] : [pair.token2, pair.token1];
    const [winnerRecord, loserRecord] = pair.win ? [record1, record2] : [record2, record1];
    const [winnerIncome, loserIncome] = pair.win ? [income1, income2] : [income2, income1];

    const outcome: BattleOutcome = {
      pairIndex,
      epoch,
      winner,
      loser,
      income1,
      income2,
      treasuryShares: 0n,
      winnerSaldoDelta: 0n,
      loserSaldoDelta: 0n,
      zooRewards: 0n,
    };

    if (income1 + income2 > 0n) {
      const split = splitBattleIncome(winnerIncome, loserIncome);
      releaseIncome(record1, income1, pricePerShare);
      releaseIncome(record2, income2, pricePerShare);
      winnerRecord.yTokensSaldo += split.winnerSaldoDelta;
      loserRecord.yTokensSaldo += split.loserSaldoDelta;
      this.redeemTo(this.config.treasury, split.treasuryShares);
      outcome.treasuryShares = split.treasuryShares;
      outcome.winnerSaldoDelta = split.winnerSaldoDelta;
      outcome.loserSaldoDelta = split.loserSaldoDelta;
    }

    this.markPlayed(pair.token1, record1);
    this.markPlayed(pair.token2, record2);
    return outcome;
  }

  private decideArenaPair(pair: NftPair, pairIndex: number, random: bigint, pricePerShare: bigint): BattleOutcome {
    const epoch = this.currentEpoch;
    const record = rewardRecord(this.state, pair.token1, epoch);
    pair.win = this.policy.decideWins(1n, 1n, random);

    const income = battleIncome(record, pricePerShare);
    const outcome: BattleOutcome = {
      pairIndex,
      epoch,
      winner: pair.win ? pair.token1 : ARENA_OPPONENT_ID,
      loser: pair.win ? ARENA_OPPONENT_ID : pair.token1,
      income1: income,
      income2: 0n,
      treasuryShares: 0n,
      winnerSaldoDelta: 0n,
      loserSaldoDelta: 0n,
      zooRewards: 0n,
    };

    if (pair.win) {
      const grant = this.policy.getLeagueZooRewards(record.league);
      record.zooRewards += grant;
      outcome.zooRewards = grant;
    } else if (income > 0n) {
      releaseIncome(record, income, pricePerShare);
      this.redeemTo(this.config.treasury, income);
      outcome.treasuryShares = income;
    }

    this.markPlayed(pair.token1, record);
    return outcome;
  }

  private markPlayed(stakingId: number, record: BattleRewardForEpoch): void {
    record.battlePlayed = true;
    const collection = getStaker(this.state, stakingId).collection;
    addPlayedVotes(this.state, this.currentEpoch, collection, record.votes);
  }

  /**
   * Close the epoch once its duration has passed or every pair is decided
   */
  updateEpoch(): number {
    return this.atomic("updateEpoch", () => {
      requireStage(this.getCurrentStage(), ["Winner"], "Advancing the epoch");
      const durations = this.policy.getStageDurations();
      const now = this.now();
      const epoch = this.currentEpoch;
      const pairs = pairsOf(this.state, epoch).length;
      const played = this.numberOfPlayedPairs(epoch);
      if (!canAdvanceEpoch(this.state.clock, durations, now, pairs, played)) {
        throw new ArenaError("EpochNotFinished", "Epoch has undecided pairs and time left", {
          epoch,
          pairs,
          played,
        });
      }

      this.state.clock.currentEpoch = epoch + 1;
      this.state.clock.epochStartDate = now;
      resetGames(this.state.index);
      this.external("policy.resetRandom", () => this.policy.resetRandom());

      info("Epoch advanced", { epoch: epoch + 1, pairs, played });
      return epoch + 1;
    });
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private activeVoting(votingId: number): VotingPosition {
    const position = settleVoter(this.accounting, votingId);
    invariant(position.endEpoch === 0, "Voting position is liquidated", { votingId });
    const staker = getStaker(this.state, position.stakingPositionId);
    invariant(staker.endEpoch === 0, "Staker position is not active", { stakingId: position.stakingPositionId });
    return position;
  }

  /**
   * Withdrawals are limited to the stake stage while the staker is active.
   * Returns whether the staker is active.
   */
  private requireWithdrawWindow(position: VotingPosition): boolean {
    const staker = getStaker(this.state, position.stakingPositionId);
    if (staker.endEpoch !== 0) return false;
    requireStage(this.getCurrentStage(), ["Stake"], "Withdrawing");
    return true;
  }

  private addVotes(stakingId: number, epoch: number, votes: bigint, shares: bigint): void {
    const record = rewardRecord(this.state, stakingId, epoch);
    record.votes += votes;
    record.yTokens += shares;
    if (epoch === this.currentEpoch) {
      record.league = this.policy.getNftLeague(record.votes);
      syncPartition(this.state, stakingId);
    }
  }

  private removeVotes(stakingId: number, votes: bigint, shares: bigint): void {
    const record = rewardRecord(this.state, stakingId, this.currentEpoch);
    record.votes = checkedSub(record.votes, votes, "Position votes");
    record.yTokens = record.votes === 0n || shares >= record.yTokens ? 0n : record.yTokens - shares;
    record.league = this.policy.getNftLeague(record.votes);
    syncPartition(this.state, stakingId);
  }

  /**
   * Return zoo to the beneficiary and drop its votes; returns the votes removed
   */
  private releaseZoo(position: VotingPosition, amount: bigint, beneficiary: Address): bigint {
    const zooVotes = position.votes - position.daiVotes;
    const votesOut = amount === position.zooInvested ? zooVotes : mulDiv(zooVotes, amount, position.zooInvested);
    position.zooInvested -= amount;
    position.votes -= votesOut;

    this.external("zoo.transfer", () => this.zoo.transfer(this.config.arenaAddress, beneficiary, amount));
    const collection = getStaker(this.state, position.stakingPositionId).collection;
    this.registry.removeVotesFromVeZoo(collection, amount, this.currentEpoch);
    return votesOut;
  }

  private deposit(voter: Address, amount: bigint): bigint {
    this.external("dai.transferFrom", () =>
      this.dai.transferFrom(this.config.arenaAddress, voter, this.config.arenaAddress, amount)
    );
    const shares = this.external("vault.mint", () => this.vault.mint(amount));
    if (shares <= 0n) {
      throw new ArenaError("CollaboratorFailure", "Vault minted no shares", { amount: amount.toString() });
    }
    return shares;
  }

  private redeemTo(to: Address, shares: bigint): bigint {
    if (shares === 0n) return 0n;
    const assets = this.external("vault.redeem", () => this.vault.redeem(shares));
    if (assets > 0n) {
      this.external("dai.transfer", () => this.dai.transfer(this.config.arenaAddress, to, assets));
    }
    return assets;
  }

  private exchangeRate(): bigint {
    const rate = this.external("vault.exchangeRateCurrent", () => this.vault.exchangeRateCurrent());
    if (rate <= 0n) {
      throw new ArenaError("CollaboratorFailure", "Vault returned a non-positive exchange rate");
    }
    return rate;
  }
}
