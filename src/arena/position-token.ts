/**
 * Position Token
 *
 * Ownership ledger for staking and voting position tokens. Token ids are
 * the arena's position ids.
 */

import type { Address } from "../types/arena.js";
import type { Checkpointable, NonFungibleToken } from "./interfaces.js";
import { ArenaError, invariant } from "./errors.js";

interface TokenState {
  owners: Map<number, Address>;
  approvals: Map<number, Address>;
}

export class PositionToken implements NonFungibleToken, Checkpointable {
  readonly name: string;
  private state: TokenState = { owners: new Map(), approvals: new Map() };

  constructor(name: string) {
    this.name = name;
  }

  ownerOf(tokenId: number): Address {
    const owner = this.state.owners.get(tokenId);
    if (!owner) {
      throw new ArenaError("NotFound", `${this.name} token ${tokenId} does not exist`, { tokenId });
    }
    return owner;
  }

  exists(tokenId: number): boolean {
    return this.state.owners.has(tokenId);
  }

  balanceOf(owner: Address): number {
    let count = 0;
    for (const holder of this.state.owners.values()) {
      if (holder === owner) count++;
    }
    return count;
  }

  tokensOf(owner: Address): number[] {
    return [...this.state.owners].filter(([, holder]) => holder === owner).map(([id]) => id);
  }

  approve(owner: Address, spender: Address, tokenId: number): void {
    this.requireOwner(owner, tokenId);
    this.state.approvals.set(tokenId, spender);
  }

  transferFrom(operator: Address, from: Address, to: Address, tokenId: number): void {
    const owner = this.ownerOf(tokenId);
    invariant(owner === from, `${this.name} token ${tokenId} is not owned by sender`, { tokenId });
    if (operator !== owner && this.state.approvals.get(tokenId) !== operator) {
      throw new ArenaError("NotOwner", `Not allowed to transfer ${this.name} token ${tokenId}`, { tokenId, operator });
    }
    this.state.approvals.delete(tokenId);
    this.state.owners.set(tokenId, to);
  }

  mint(to: Address, tokenId: number): void {
    invariant(!this.state.owners.has(tokenId), `${this.name} token ${tokenId} already minted`, { tokenId });
    this.state.owners.set(tokenId, to);
  }

  burn(tokenId: number): void {
    this.ownerOf(tokenId);
    this.state.owners.delete(tokenId);
    this.state.approvals.delete(tokenId);
  }

  /**
   * Throws NotOwner unless `account` holds the token
   */
  requireOwner(account: Address, tokenId: number): void {
    if (this.ownerOf(tokenId) !== account) {
      throw new ArenaError("NotOwner", `Caller does not own ${this.name} token ${tokenId}`, {
        tokenId,
        caller: account,
      });
    }
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      this.state = saved;
    };
  }
}
