/**
 * Fixed-point helpers for share/asset conversion.
 *
 * Exchange rates are scaled by WAD: assets = shares * rate / WAD.
 */

import { invariant } from "./errors.js";

export const WAD = 10n ** 18n;

export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  invariant(denominator > 0n, "Division by zero");
  return (a * b) / denominator;
}

export function sharesToAssets(shares: bigint, rate: bigint): bigint {
  return mulDiv(shares, rate, WAD);
}

export function assetsToShares(assets: bigint, rate: bigint): bigint {
  return mulDiv(assets, WAD, rate);
}

/**
 * Subtract, rejecting underflow instead of going negative
 */
export function checkedSub(a: bigint, b: bigint, what: string): bigint {
  invariant(b <= a, `${what} underflow`, { value: a.toString(), subtrahend: b.toString() });
  return a - b;
}

export function requirePositive(amount: bigint, what: string): void {
  invariant(amount > 0n, `${what} must be positive`, { amount: amount.toString() });
}
