/**
 * Staking front end
 *
 * Takes custody of collection NFTs and hands out staking position tokens.
 */

import type { Address, ClaimResult, CollectionId } from "../types/arena.js";
import type { CollectionRegistryPort, NonFungibleToken } from "./interfaces.js";
import type { NftBattleArena } from "./battle-arena.js";
import { PositionToken } from "./position-token.js";
import { ArenaError } from "./errors.js";
import { normalizeCollection } from "./collection-registry.js";
import { info } from "../lib/logger.js";

export interface StakedNft {
  collection: CollectionId;
  tokenId: number;
}

export interface UnstakeResult {
  nft: StakedNft;
  reward: ClaimResult;
  incentive: bigint;
}

export class NftStakingPosition {
  readonly token = new PositionToken("StakingPosition");
  private staked = new Map<number, StakedNft>();
  private readonly collections: Map<CollectionId, NonFungibleToken>;

  constructor(
    private readonly arena: NftBattleArena,
    private readonly registry: CollectionRegistryPort,
    collections: Map<CollectionId, NonFungibleToken>,
    private readonly custody: Address
  ) {
    this.collections = new Map([...collections].map(([key, nft]) => [normalizeCollection(key), nft]));
    arena.enlist(this.token, this, ...this.collections.values());
  }

  stakedNft(stakingId: number): StakedNft | undefined {
    const nft = this.staked.get(stakingId);
    return nft ? { ...nft } : undefined;
  }

  stakeNft(owner: Address, collection: CollectionId, tokenId: number): number {
    return this.arena.atomic("stakeNft", () => {
      const key = normalizeCollection(collection);
      if (!this.registry.isEligible(key)) {
        throw new ArenaError("CollectionNotEligible", `Collection ${key} is not eligible for staking`, {
          collection: key,
        });
      }
      const nft = this.collectionNft(key);
      if (nft.ownerOf(tokenId) !== owner) {
        throw new ArenaError("NotOwner", `Caller does not own token ${tokenId}`, { collection: key, tokenId });
      }

      nft.transferFrom(owner, owner, this.custody, tokenId);
      const stakingId = this.arena.createStakerPosition(key);
      this.token.mint(owner, stakingId);
      this.staked.set(stakingId, { collection: key, tokenId });

      info("NFT staked", { stakingId, collection: key, tokenId });
      return stakingId;
    });
  }

  /**
   * Unstake, pay out what the position earned and return the NFT
   */
  unstakeNft(owner: Address, stakingId: number): UnstakeResult {
    return this.arena.atomic("unstakeNft", () => {
      this.token.requireOwner(owner, stakingId);
      const nft = this.staked.get(stakingId);
      if (!nft) {
        throw new ArenaError("NotFound", `No NFT staked under position ${stakingId}`, { stakingId });
      }

      this.arena.removeStakerPosition(stakingId);
      const reward = this.arena.claimRewardFromStaking(stakingId, owner);
      const incentive = this.arena.claimIncentiveStakerReward(stakingId, owner);

      this.collectionNft(nft.collection).transferFrom(this.custody, this.custody, owner, nft.tokenId);
      this.token.burn(stakingId);
      this.staked.delete(stakingId);

      info("NFT unstaked", { stakingId, collection: nft.collection, tokenId: nft.tokenId });
      return { nft, reward, incentive };
    });
  }

  claimRewardFromStaking(owner: Address, stakingId: number, beneficiary: Address = owner): ClaimResult {
    return this.arena.atomic("claimRewardFromStaking", () => {
      this.token.requireOwner(owner, stakingId);
      return this.arena.claimRewardFromStaking(stakingId, beneficiary);
    });
  }

  batchClaimRewardsFromStaking(owner: Address, stakingIds: number[], beneficiary: Address = owner): ClaimResult {
    return this.arena.atomic("batchClaimRewardsFromStaking", () => {
      const total: ClaimResult = { shares: 0n, assets: 0n, zoo: 0n };
      for (const stakingId of stakingIds) {
        this.token.requireOwner(owner, stakingId);
        const claimed = this.arena.claimRewardFromStaking(stakingId, beneficiary);
        total.shares += claimed.shares;
        total.assets += claimed.assets;
      }
      return total;
    });
  }

  claimIncentiveStakerReward(owner: Address, stakingId: number, beneficiary: Address = owner): bigint {
    return this.arena.atomic("claimIncentiveStakerReward", () => {
      this.token.requireOwner(owner, stakingId);
      return this.arena.claimIncentiveStakerReward(stakingId, beneficiary);
    });
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.staked);
    return () => {
      this.staked = saved;
    };
  }

  private collectionNft(collection: CollectionId): NonFungibleToken {
    const nft = this.collections.get(collection);
    if (!nft) {
      throw new ArenaError("NotFound", `No token contract registered for ${collection}`, { collection });
    }
    return nft;
  }
}
