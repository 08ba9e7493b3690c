/**
 * Collaborator Interfaces
 *
 * External contracts the arena consumes. Caller identity is passed explicitly
 * where the on-chain version would read it from the transaction.
 *
 * The arena's own accounts (arena address, treasury) arrive as lowercase hex;
 * implementations keyed by checksummed addresses must normalise on their side.
 */

import type { Address, CollectionId, StageDurations } from "../types/arena.js";

/**
 * Fungible asset (stable deposit asset, zoo boost token, incentive token)
 */
export interface FungibleToken {
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;
  approve(owner: Address, spender: Address, amount: bigint): void;
  allowance(owner: Address, spender: Address): bigint;
}

/**
 * Non-fungible ownership (staked collections and position tokens)
 */
export interface NonFungibleToken {
  ownerOf(tokenId: number): Address;
  transferFrom(operator: Address, from: Address, to: Address, tokenId: number): void;
}

/**
 * Yield vault wrapper. `mint` pulls assets from the arena account and
 * returns the shares created; `redeem` returns assets to the arena account.
 */
export interface VaultAdapter {
  mint(assets: bigint): bigint;
  redeem(shares: bigint): bigint;
  /** Assets per share, scaled by 1e18; never decreases */
  exchangeRateCurrent(): bigint;
}

/**
 * Randomness and game-policy module
 */
export interface RandomnessPolicy {
  requestRandomNumber(): void;
  /** Throws `RandomNotReady` until the requested value is fulfilled */
  getRandomResult(): bigint;
  resetRandom(): void;
  computePseudoRandom(): bigint;
  decideWins(votesA: bigint, votesB: bigint, random: bigint): boolean;
  computeVotesByDai(amount: bigint): bigint;
  computeVotesByZoo(amount: bigint): bigint;
  getNftLeague(votes: bigint): number;
  getLeagueZooRewards(league: number): bigint;
  getStageDurations(): StageDurations;
}

/**
 * Collection eligibility and veZoo weight ledger
 */
export interface CollectionRegistryPort {
  isEligible(collection: CollectionId): boolean;
  addVotesToVeZoo(collection: CollectionId, amount: bigint, epoch: number): void;
  removeVotesFromVeZoo(collection: CollectionId, amount: bigint, epoch: number): void;
  /** Carry the collection and global weights forward to `epoch` */
  updateCollectionWeights(collection: CollectionId, epoch: number): void;
  getCollectionWeight(collection: CollectionId, epoch: number): bigint;
  getGlobalWeight(epoch: number): bigint;
}

/**
 * Optional capability: take a checkpoint and get back a rollback closure
 */
export interface Checkpointable {
  checkpoint(): () => void;
}

export function isCheckpointable(value: unknown): value is Checkpointable {
  return (
    typeof value === "object" &&
    value !== null &&
    "checkpoint" in value &&
    typeof value.checkpoint === "function"
  );
}
