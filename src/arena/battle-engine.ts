/**
 * Battle income and reward split.
 *
 * Income is measured in vault shares: the shares a position holds beyond what
 * its battle-start value costs at the current exchange rate.
 */

import type { BattleRewardForEpoch } from "../types/arena.js";
import { WAD, assetsToShares, mulDiv, sharesToAssets } from "./math.js";
import { TREASURY_FEE_PERCENT } from "../lib/constants.js";

export interface IncomeSplit {
  treasuryShares: bigint;
  winnerSaldoDelta: bigint;
  loserSaldoDelta: bigint;
}

/**
 * Snapshot taken when a position is paired
 */
export function snapshotBattleStart(record: BattleRewardForEpoch, pricePerShare: bigint): void {
  record.pricePerShareAtBattleStart = pricePerShare;
  record.tokensAtBattleStart = sharesToAssets(record.yTokens, pricePerShare);
}

export function battleIncome(record: BattleRewardForEpoch, pricePerShare: bigint): bigint {
  if (record.pricePerShareAtBattleStart === 0n) return 0n;
  const principalShares = assetsToShares(record.tokensAtBattleStart, pricePerShare);
  return record.yTokens > principalShares ? record.yTokens - principalShares : 0n;
}

/**
 * Scale applied to every voter's shares once the battle income has left them
 */
export function pricePerShareCoef(pricePerShareAtStart: bigint, pricePerShare: bigint): bigint {
  return mulDiv(pricePerShareAtStart, WAD, pricePerShare);
}

/**
 * Both incomes form the pot. The treasury takes its fee, the winner's saldo
 * gains the rest and the loser's saldo records the income it gave up.
 */
export function splitBattleIncome(winnerIncome: bigint, loserIncome: bigint): IncomeSplit {
  const pot = winnerIncome + loserIncome;
  const treasuryShares = (pot * TREASURY_FEE_PERCENT) / 100n;
  return {
    treasuryShares,
    winnerSaldoDelta: pot - treasuryShares,
    loserSaldoDelta: -loserIncome,
  };
}

/**
 * Remove a position's battle income from its holdings and record the coefficient
 */
export function releaseIncome(record: BattleRewardForEpoch, income: bigint, pricePerShare: bigint): void {
  record.yTokens -= income;
  record.pricePerShareCoef = pricePerShareCoef(record.pricePerShareAtBattleStart, pricePerShare);
}

export function selectOpponent(candidates: number[], random: bigint): number | undefined {
  if (candidates.length === 0) return undefined;
  return candidates[Number(random % BigInt(candidates.length))];
}
