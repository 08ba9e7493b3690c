/**
 * Application Constants
 *
 * Centralized configuration values and magic numbers.
 */

/**
 * Redis connection health check interval
 * Only ping if this duration has elapsed since last successful operation
 */
export const PING_INTERVAL_MS = 30000; // 30 seconds

export const DAY_SECONDS = 86400;

/**
 * Share of the combined battle income redeemed to the treasury, in percent
 */
export const TREASURY_FEE_PERCENT = 4n;

/**
 * Stakers receive saldo / 96 of every positive saldo; voters share the rest
 */
export const STAKER_SALDO_DIVISOR = 96n;

/**
 * Arena opponent id used in pairs without a same-league match
 */
export const ARENA_OPPONENT_ID = 0;
