/**
 * Voting front end
 *
 * One position token per voting position; every mutator checks ownership.
 */

import type { Address, ClaimResult } from "../types/arena.js";
import type { NftBattleArena } from "./battle-arena.js";
import { PositionToken } from "./position-token.js";

export class NftVotingPosition {
  readonly token = new PositionToken("VotingPosition");

  constructor(private readonly arena: NftBattleArena) {
    arena.enlist(this.token);
  }

  createNewVotingPosition(voter: Address, stakingId: number, amount: bigint): number {
    return this.arena.atomic("createNewVotingPosition", () => {
      const votingId = this.arena.createVotingPosition(stakingId, voter, amount);
      this.token.mint(voter, votingId);
      return votingId;
    });
  }

  addDaiToPosition(owner: Address, votingId: number, amount: bigint): bigint {
    return this.arena.atomic("addDaiToPosition", () => {
      this.token.requireOwner(owner, votingId);
      return this.arena.addDaiToVoting(votingId, owner, amount);
    });
  }

  addZooToPosition(owner: Address, votingId: number, amount: bigint): bigint {
    return this.arena.atomic("addZooToPosition", () => {
      this.token.requireOwner(owner, votingId);
      return this.arena.addZooToVoting(votingId, owner, amount);
    });
  }

  /**
   * Withdrawing all dai liquidates the position and burns its token
   */
  withdrawDaiFromVotingPosition(owner: Address, votingId: number, amount: bigint, beneficiary: Address = owner): bigint {
    return this.arena.atomic("withdrawDaiFromVotingPosition", () => {
      this.token.requireOwner(owner, votingId);
      const assets = this.arena.withdrawDaiFromVoting(votingId, beneficiary, amount);
      if (this.arena.getVotingPosition(votingId).endEpoch !== 0) {
        this.arena.claimRewardFromVoting(votingId, beneficiary);
        this.arena.claimIncentiveVoterReward(votingId, beneficiary);
        this.token.burn(votingId);
      }
      return assets;
    });
  }

  withdrawZooFromVotingPosition(owner: Address, votingId: number, amount: bigint, beneficiary: Address = owner): bigint {
    return this.arena.atomic("withdrawZooFromVotingPosition", () => {
      this.token.requireOwner(owner, votingId);
      return this.arena.withdrawZooFromVoting(votingId, beneficiary, amount);
    });
  }

  recomputeDaiVotes(owner: Address, votingId: number): bigint {
    return this.arena.atomic("recomputeDaiVotes", () => {
      this.token.requireOwner(owner, votingId);
      return this.arena.recomputeDaiVotes(votingId);
    });
  }

  recomputeZooVotes(owner: Address, votingId: number): bigint {
    return this.arena.atomic("recomputeZooVotes", () => {
      this.token.requireOwner(owner, votingId);
      return this.arena.recomputeZooVotes(votingId);
    });
  }

  claimRewardFromVoting(owner: Address, votingId: number, beneficiary: Address = owner): ClaimResult {
    return this.arena.atomic("claimRewardFromVoting", () => {
      this.token.requireOwner(owner, votingId);
      return this.arena.claimRewardFromVoting(votingId, beneficiary);
    });
  }

  batchClaimRewardsFromVotings(owner: Address, votingIds: number[], beneficiary: Address = owner): ClaimResult {
    return this.arena.atomic("batchClaimRewardsFromVotings", () => {
      const total: ClaimResult = { shares: 0n, assets: 0n, zoo: 0n };
      for (const votingId of votingIds) {
        this.token.requireOwner(owner, votingId);
        const claimed = this.arena.claimRewardFromVoting(votingId, beneficiary);
        total.shares += claimed.shares;
        total.assets += claimed.assets;
        total.zoo += claimed.zoo;
      }
      return total;
    });
  }

  claimIncentiveVoterReward(owner: Address, votingId: number, beneficiary: Address = owner): bigint {
    return this.arena.atomic("claimIncentiveVoterReward", () => {
      this.token.requireOwner(owner, votingId);
      return this.arena.claimIncentiveVoterReward(votingId, beneficiary);
    });
  }
}
